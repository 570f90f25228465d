import { randomUUID } from 'node:crypto';
import { formatUnits } from 'ethers';
import type { Container } from '../../infra/container.js';
import { redisKey } from '../../infra/redis.js';
import type { EventBus } from '../../services/event-bus.js';
import type { ExitReason, NewPosition, PositionState, PositionStatus } from '../../types/position.js';
import { DuplicatePositionError, ImmutableFieldError, InvalidTransitionError } from '../../errors.js';

interface PositionRow {
  id: string;
  token_address: string;
  chain_id: number;
  pricing_chain_id: number;
  symbol: string;
  decimals: number;
  quantity: string;
  entry_price: number;
  take_profit_pct: number;
  stop_loss_pct: number;
  quote_symbol: string;
  fee_tier: number;
  status: string;
  exit_reason: string | null;
  exit_price: number | null;
  exit_tx_hash: string | null;
  realized_pnl: number | null;
  opened_at: string;
  closed_at: string | null;
}

export interface TradingStats {
  tradeCount: number;
  wins: number;
  losses: number;
  winRate: number;
  realizedPnl: number;
  openPositions: number;
}

const TRANSITIONS: Record<PositionStatus, readonly PositionStatus[]> = {
  HOLDING: ['EXIT_PENDING'],
  EXIT_PENDING: ['CLOSED'],
  CLOSED: [],
};

function toStatus(value: string): PositionStatus {
  if (value === 'HOLDING' || value === 'EXIT_PENDING' || value === 'CLOSED') return value;
  throw new Error(`Unknown position status: ${value}`);
}

function toExitReason(value: string | null): ExitReason | null {
  if (value === null) return null;
  if (value === 'TAKE_PROFIT' || value === 'STOP_LOSS' || value === 'LIQUIDATION') return value;
  throw new Error(`Unknown exit reason: ${value}`);
}

function toPosition(row: PositionRow): PositionState {
  return {
    id: row.id,
    tokenAddress: row.token_address,
    chainId: row.chain_id,
    pricingChainId: row.pricing_chain_id,
    symbol: row.symbol,
    decimals: row.decimals,
    quantity: BigInt(row.quantity),
    entryPrice: row.entry_price,
    takeProfitPct: row.take_profit_pct,
    stopLossPct: row.stop_loss_pct,
    quoteSymbol: row.quote_symbol,
    feeTier: row.fee_tier,
    status: toStatus(row.status),
    exitReason: toExitReason(row.exit_reason),
    exitPrice: row.exit_price,
    exitTxHash: row.exit_tx_hash,
    realizedPnl: row.realized_pnl,
    openedAt: new Date(row.opened_at),
    closedAt: row.closed_at ? new Date(row.closed_at) : null,
  };
}

/** Realized PnL in quote-token units: (exit - entry) * whole-token quantity. */
export function computeRealizedPnl(position: Pick<PositionState, 'entryPrice' | 'quantity' | 'decimals'>, exitPrice: number): number {
  const quantity = Number(formatUnits(position.quantity, position.decimals));
  return (exitPrice - position.entryPrice) * quantity;
}

export class StateEngine {
  private readonly container: Container;
  private readonly eventBus: EventBus;
  private readonly positions: Map<string, PositionState> = new Map();

  constructor(container: Container, eventBus: EventBus) {
    this.container = container;
    this.eventBus = eventBus;
  }

  async start(): Promise<void> {
    const { logger, db } = this.container;
    logger.info('Starting state engine');

    const rows = db
      .prepare<[], PositionRow>("SELECT * FROM positions WHERE status != 'CLOSED' ORDER BY opened_at")
      .all();

    for (const row of rows) {
      const position = toPosition(row);
      this.positions.set(position.id, position);
    }

    logger.info({ positionCount: this.positions.size }, 'State engine started');
  }

  getPosition(positionId: string): PositionState | undefined {
    const cached = this.positions.get(positionId);
    if (cached) return { ...cached };

    const row = this.container.db
      .prepare<[string], PositionRow>('SELECT * FROM positions WHERE id = ?')
      .get(positionId);
    return row ? toPosition(row) : undefined;
  }

  /** Every position that is not CLOSED, as copies; changes go through updatePosition. */
  getOpenPositions(): PositionState[] {
    return Array.from(this.positions.values(), (p) => ({ ...p }));
  }

  findOpenPosition(tokenAddress: string, chainId: number): PositionState | undefined {
    const address = tokenAddress.toLowerCase();
    return this.getOpenPositions().find((p) => p.tokenAddress === address && p.chainId === chainId);
  }

  listPositions(status?: PositionStatus): PositionState[] {
    const { db } = this.container;
    const rows =
      status === undefined
        ? db.prepare<[], PositionRow>('SELECT * FROM positions ORDER BY opened_at DESC').all()
        : db
            .prepare<[string], PositionRow>('SELECT * FROM positions WHERE status = ? ORDER BY opened_at DESC')
            .all(status);
    return rows.map(toPosition);
  }

  openPosition(input: NewPosition): PositionState {
    const { db, logger } = this.container;
    const tokenAddress = input.tokenAddress.toLowerCase();

    if (this.findOpenPosition(tokenAddress, input.chainId)) {
      throw new DuplicatePositionError(tokenAddress, input.chainId);
    }

    const position: PositionState = {
      ...input,
      id: randomUUID(),
      tokenAddress,
      status: 'HOLDING',
      exitReason: null,
      exitPrice: null,
      exitTxHash: null,
      realizedPnl: null,
      openedAt: new Date(),
      closedAt: null,
    };

    db.prepare<[string, string, number, number, string, number, string, number, number, number, string, number, string]>(
      `INSERT INTO positions
         (id, token_address, chain_id, pricing_chain_id, symbol, decimals, quantity, entry_price,
          take_profit_pct, stop_loss_pct, quote_symbol, fee_tier, status, opened_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'HOLDING', ?)`,
    ).run(
      position.id,
      position.tokenAddress,
      position.chainId,
      position.pricingChainId,
      position.symbol,
      position.decimals,
      position.quantity.toString(),
      position.entryPrice,
      position.takeProfitPct,
      position.stopLossPct,
      position.quoteSymbol,
      position.feeTier,
      position.openedAt.toISOString(),
    );

    this.positions.set(position.id, position);

    logger.info(
      {
        positionId: position.id,
        token: position.tokenAddress,
        chainId: position.chainId,
        entryPrice: position.entryPrice,
        quantity: position.quantity.toString(),
      },
      'Position opened',
    );

    this.eventBus.emit({
      id: randomUUID(),
      type: 'POSITION_OPENED',
      timestamp: Date.now(),
      chainId: position.chainId,
      positionId: position.id,
      tokenAddress: position.tokenAddress,
      entryPrice: position.entryPrice,
      quantity: position.quantity.toString(),
    });

    this.scheduleSnapshot();
    return { ...position };
  }

  /** HOLDING -> EXIT_PENDING. */
  markExitPending(positionId: string, reason: ExitReason, price: number | null): PositionState {
    const position = this.updatePosition(positionId, { status: 'EXIT_PENDING', exitReason: reason });

    this.eventBus.emit({
      id: randomUUID(),
      type: 'EXIT_TRIGGERED',
      timestamp: Date.now(),
      chainId: position.chainId,
      positionId,
      reason,
      price,
    });
    return position;
  }

  /** EXIT_PENDING -> CLOSED, after a confirmed exit swap. */
  closePosition(positionId: string, exitPrice: number | null, txHash: string): PositionState {
    const existing = this.requirePosition(positionId);
    const realizedPnl = exitPrice === null ? null : computeRealizedPnl(existing, exitPrice);

    const position = this.updatePosition(positionId, {
      status: 'CLOSED',
      exitPrice,
      exitTxHash: txHash,
      realizedPnl,
      closedAt: new Date(),
    });

    this.eventBus.emit({
      id: randomUUID(),
      type: 'POSITION_CLOSED',
      timestamp: Date.now(),
      chainId: position.chainId,
      positionId,
      tokenAddress: position.tokenAddress,
      reason: position.exitReason ?? 'LIQUIDATION',
      exitPrice,
      realizedPnl,
      txHash,
    });
    return position;
  }

  /**
   * Applies an update after checking the position's invariants: the entry
   * price never changes and status only moves forward.
   */
  updatePosition(positionId: string, update: Partial<Omit<PositionState, 'id'>>): PositionState {
    const existing = this.requirePosition(positionId);

    if (update.entryPrice !== undefined && update.entryPrice !== existing.entryPrice) {
      throw new ImmutableFieldError(positionId, 'entryPrice');
    }
    if (update.openedAt !== undefined && update.openedAt.getTime() !== existing.openedAt.getTime()) {
      throw new ImmutableFieldError(positionId, 'openedAt');
    }
    if (existing.status === 'CLOSED') {
      throw new InvalidTransitionError(positionId, existing.status, update.status ?? existing.status);
    }
    if (update.status !== undefined && !TRANSITIONS[existing.status].includes(update.status)) {
      throw new InvalidTransitionError(positionId, existing.status, update.status);
    }

    const next: PositionState = { ...existing, ...update };

    this.container.db
      .prepare<[string, string, string | null, number | null, string | null, number | null, string | null, string]>(
        `UPDATE positions
           SET quantity = ?, status = ?, exit_reason = ?, exit_price = ?, exit_tx_hash = ?,
               realized_pnl = ?, closed_at = ?
         WHERE id = ?`,
      )
      .run(
        next.quantity.toString(),
        next.status,
        next.exitReason,
        next.exitPrice,
        next.exitTxHash,
        next.realizedPnl,
        next.closedAt ? next.closedAt.toISOString() : null,
        positionId,
      );

    if (next.status === 'CLOSED') {
      this.positions.delete(positionId);
    } else {
      this.positions.set(positionId, next);
    }

    if (update.status !== undefined) {
      this.container.logger.info(
        { positionId, from: existing.status, to: next.status, reason: next.exitReason },
        'Position status changed',
      );
    }

    this.scheduleSnapshot();
    return { ...next };
  }

  getStats(): TradingStats {
    const row = this.container.db
      .prepare<[], { trades: number; wins: number | null; losses: number | null; pnl: number | null }>(
        `SELECT COUNT(*) AS trades,
                SUM(CASE WHEN realized_pnl > 0 THEN 1 ELSE 0 END) AS wins,
                SUM(CASE WHEN realized_pnl <= 0 THEN 1 ELSE 0 END) AS losses,
                SUM(realized_pnl) AS pnl
           FROM positions WHERE status = 'CLOSED'`,
      )
      .get();

    const tradeCount = row?.trades ?? 0;
    const wins = row?.wins ?? 0;
    return {
      tradeCount,
      wins,
      losses: row?.losses ?? 0,
      winRate: tradeCount > 0 ? wins / tradeCount : 0,
      realizedPnl: row?.pnl ?? 0,
      openPositions: this.getOpenPositions().length,
    };
  }

  private requirePosition(positionId: string): PositionState {
    const position = this.getPosition(positionId);
    if (!position) {
      throw new Error(`Position ${positionId} not found`);
    }
    return position;
  }

  private scheduleSnapshot(): void {
    this.persistSnapshot().catch((err) => {
      this.container.logger.error({ err }, 'Failed to persist state snapshot');
    });
  }

  private async persistSnapshot(): Promise<void> {
    const { redis, redisKeyPrefix, logger } = this.container;

    const snapshot = {
      positions: Array.from(this.positions.values()).map((pos) => ({
        ...pos,
        quantity: pos.quantity.toString(),
      })),
      timestamp: Date.now(),
    };

    await redis.set(redisKey(redisKeyPrefix, 'state', 'snapshot'), JSON.stringify(snapshot), 'EX', 300);
    logger.debug({ positionCount: this.positions.size }, 'State snapshot persisted');
  }

  async stop(): Promise<void> {
    await this.persistSnapshot();
    this.container.logger.info('State engine stopped');
  }
}
