export interface RiskParameters {
  gasReserveWei: bigint;
  maxSlippageBps: number;
  executionCooldownMs: number;
  swapGasLimit: bigint;
}

export interface TradingParameters {
  takeProfitPct: number;
  stopLossPct: number;
  monitorTickMs: number;
  priceReadAttempts: number;
  priceReadBackoffMs: number;
  swapDeadlineSeconds: number;
}

export type RiskRule = 'GAS_RESERVE' | 'MAX_SLIPPAGE' | 'EXECUTION_COOLDOWN' | 'INVALID_AMOUNT';

export interface RiskCheckResult {
  approved: boolean;
  violations: RiskViolation[];
}

export interface RiskViolation {
  rule: RiskRule;
  message: string;
  currentValue: string;
  limit: string;
}
