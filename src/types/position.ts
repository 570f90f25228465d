export type PositionStatus = 'HOLDING' | 'EXIT_PENDING' | 'CLOSED';

export type ExitReason = 'TAKE_PROFIT' | 'STOP_LOSS' | 'LIQUIDATION';

export interface PositionState {
  id: string;
  tokenAddress: string;
  chainId: number;
  pricingChainId: number;
  symbol: string;
  decimals: number;
  quantity: bigint;
  entryPrice: number;
  takeProfitPct: number;
  stopLossPct: number;
  quoteSymbol: string;
  feeTier: number;
  status: PositionStatus;
  exitReason: ExitReason | null;
  exitPrice: number | null;
  exitTxHash: string | null;
  realizedPnl: number | null;
  openedAt: Date;
  closedAt: Date | null;
}

export type NewPosition = Omit<
  PositionState,
  'id' | 'status' | 'exitReason' | 'exitPrice' | 'exitTxHash' | 'realizedPnl' | 'openedAt' | 'closedAt'
>;

/** Latest pool price seen for a position, kept for PnL display. */
export interface PriceObservation {
  price: number;
  observedAt: Date;
}

/** Why an EXIT_PENDING position cannot currently be sold. */
export interface ExitBlock {
  reason: 'EMPTY_BALANCE';
  /** Raw token units the wallet held when the block was recorded. */
  balance: string;
  since: Date;
}
