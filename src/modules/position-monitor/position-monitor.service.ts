import type { Container } from '../../infra/container.js';
import type { StateEngine } from '../state-engine/state-engine.service.js';
import type { PoolDiscovery } from '../pool-discovery/pool-discovery.service.js';
import type { PriceReader } from '../price-reader/price-reader.service.js';
import type { ExecutionEngine } from '../execution-engine/execution-engine.service.js';
import type { ExitBlock, ExitReason, PositionState, PriceObservation } from '../../types/position.js';
import type { ExecutionResult } from '../../types/execution.js';
import { computeRealizedPnl } from '../state-engine/state-engine.service.js';
import { EmptyBalanceError, PriceUnavailableError } from '../../errors.js';

export type MonitorAction = 'HOLD' | 'EXIT_REQUESTED' | 'EXIT_BLOCKED' | 'SKIPPED';

export interface MonitorOutcome {
  positionId: string;
  action: MonitorAction;
  price: number | null;
  reason: ExitReason | null;
  execution: ExecutionResult | null;
}

/**
 * Take-profit wins when both bounds are crossed, which only happens with a
 * zero or negative band.
 */
export function evaluateExit(
  position: Pick<PositionState, 'entryPrice' | 'takeProfitPct' | 'stopLossPct'>,
  price: number,
): ExitReason | null {
  if (price >= position.entryPrice * (1 + position.takeProfitPct)) return 'TAKE_PROFIT';
  if (price <= position.entryPrice * (1 - position.stopLossPct)) return 'STOP_LOSS';
  return null;
}

export class PositionMonitor {
  private readonly container: Container;
  private readonly stateEngine: StateEngine;
  private readonly poolDiscovery: PoolDiscovery;
  private readonly priceReader: PriceReader;
  private readonly executionEngine: ExecutionEngine;
  private readonly latestPrices: Map<string, PriceObservation> = new Map();
  private readonly exitBlocks: Map<string, ExitBlock> = new Map();

  constructor(
    container: Container,
    stateEngine: StateEngine,
    poolDiscovery: PoolDiscovery,
    priceReader: PriceReader,
    executionEngine: ExecutionEngine,
  ) {
    this.container = container;
    this.stateEngine = stateEngine;
    this.poolDiscovery = poolDiscovery;
    this.priceReader = priceReader;
    this.executionEngine = executionEngine;
  }

  /**
   * One evaluation of a non-CLOSED position. HOLDING positions are checked
   * against their thresholds; EXIT_PENDING positions have their exit requested
   * again. An exit with nothing to sell yields EXIT_BLOCKED and writes no
   * execution.
   */
  async checkPosition(position: PositionState): Promise<MonitorOutcome> {
    const { logger } = this.container;

    if (position.status === 'EXIT_PENDING') {
      const reason = position.exitReason ?? 'LIQUIDATION';
      const price = await this.tryReadPrice(position);
      if (!this.exitBlocks.has(position.id)) {
        logger.info({ positionId: position.id, reason, price }, 'Re-requesting pending exit');
      }
      return this.requestExit(position, reason, price);
    }

    if (position.status !== 'HOLDING') {
      return this.skipped(position.id, null);
    }

    let price: number;
    try {
      const observed = await this.readPrice(position);
      if (observed === null) return this.skipped(position.id, null);
      price = observed;
    } catch (err) {
      if (err instanceof PriceUnavailableError) {
        logger.warn({ err, positionId: position.id }, 'Price unavailable, skipping position this tick');
        return this.skipped(position.id, null);
      }
      throw err;
    }

    const reason = evaluateExit(position, price);
    if (!reason) {
      logger.debug({ positionId: position.id, price, entryPrice: position.entryPrice }, 'Position within band');
      return { positionId: position.id, action: 'HOLD', price, reason: null, execution: null };
    }

    logger.info(
      { positionId: position.id, token: position.tokenAddress, reason, price, entryPrice: position.entryPrice },
      'Exit threshold crossed',
    );

    const pending = this.stateEngine.markExitPending(position.id, reason, price);
    return this.requestExit(pending, reason, price);
  }

  /** Moves a position to EXIT_PENDING with reason LIQUIDATION and sells it. */
  async liquidate(position: PositionState): Promise<MonitorOutcome> {
    const price = await this.tryReadPrice(position);
    const pending =
      position.status === 'HOLDING' ? this.stateEngine.markExitPending(position.id, 'LIQUIDATION', price) : position;

    return this.requestExit(pending, 'LIQUIDATION', price);
  }

  latestPrice(positionId: string): PriceObservation | undefined {
    return this.latestPrices.get(positionId);
  }

  /** Unrealized PnL at the last observed price, or null before the first read. */
  unrealizedPnl(position: PositionState): number | null {
    const observation = this.latestPrices.get(position.id);
    return observation ? computeRealizedPnl(position, observation.price) : null;
  }

  /** Set while an EXIT_PENDING position has no sellable balance. */
  exitBlock(positionId: string): ExitBlock | undefined {
    return this.exitBlocks.get(positionId);
  }

  forget(positionId: string): void {
    this.latestPrices.delete(positionId);
    this.exitBlocks.delete(positionId);
  }

  private async requestExit(
    position: PositionState,
    reason: ExitReason,
    price: number | null,
  ): Promise<MonitorOutcome> {
    const { logger } = this.container;

    try {
      const execution = await this.executionEngine.sellPosition(position, reason, price);
      this.exitBlocks.delete(position.id);
      return { positionId: position.id, action: 'EXIT_REQUESTED', price, reason, execution };
    } catch (err) {
      if (!(err instanceof EmptyBalanceError)) throw err;

      if (this.exitBlocks.has(position.id)) {
        logger.debug({ positionId: position.id }, 'Exit still blocked on empty balance');
      } else {
        logger.warn(
          { positionId: position.id, token: position.tokenAddress, balance: err.balance.toString() },
          'No sellable balance, exit blocked until tokens arrive',
        );
        this.exitBlocks.set(position.id, {
          reason: 'EMPTY_BALANCE',
          balance: err.balance.toString(),
          since: new Date(),
        });
      }
      return { positionId: position.id, action: 'EXIT_BLOCKED', price, reason, execution: null };
    }
  }

  /** Null when the token has no pricing pool. */
  private async readPrice(position: PositionState): Promise<number | null> {
    const pool = await this.poolDiscovery.pricingPool(position.tokenAddress, position.chainId);
    if (!pool) {
      this.container.logger.warn(
        { positionId: position.id, token: position.tokenAddress, chainId: position.chainId },
        'No pricing pool, position excluded from monitoring',
      );
      return null;
    }

    const price = await this.priceReader.readPrice(pool, position.tokenAddress, position.decimals);
    this.latestPrices.set(position.id, { price, observedAt: new Date() });
    return price;
  }

  private async tryReadPrice(position: PositionState): Promise<number | null> {
    try {
      return await this.readPrice(position);
    } catch (err) {
      this.container.logger.warn({ err, positionId: position.id }, 'Price read failed, using last observation');
      return this.latestPrices.get(position.id)?.price ?? null;
    }
  }

  private skipped(positionId: string, price: number | null): MonitorOutcome {
    return { positionId, action: 'SKIPPED', price, reason: null, execution: null };
  }
}
