import type { Container } from '../../infra/container.js';
import type { StateEngine } from '../state-engine/state-engine.service.js';
import type { PositionMonitor, MonitorOutcome } from '../position-monitor/position-monitor.service.js';
import type { BuyRequest, ExecutionEngine } from '../execution-engine/execution-engine.service.js';
import type { ControlSignals, ControlStatus } from '../control/control-signals.service.js';
import type { ChainLock } from '../../utils/chain-lock.js';
import type { ScanScheduler } from './scan-scheduler.js';
import type { PositionState } from '../../types/position.js';
import type { ExecutionResult } from '../../types/execution.js';

export interface OrchestratorStatus {
  running: boolean;
  tickCount: number;
  lastTickAt: number;
  openPositions: number;
}

/**
 * Control loop: startup scan, then one evaluation tick every
 * `monitorTickMs`. The next tick is scheduled only after the current one
 * settles.
 */
export class Orchestrator {
  private readonly container: Container;
  private readonly stateEngine: StateEngine;
  private readonly monitor: PositionMonitor;
  private readonly executionEngine: ExecutionEngine;
  private readonly scheduler: ScanScheduler;
  private readonly signals: ControlSignals;
  private readonly lock: ChainLock;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private tickCount = 0;
  private lastTickAt = 0;
  private currentTick: Promise<void> | null = null;
  private resolveStopped: () => void = () => {};
  private readonly stopped: Promise<void>;

  constructor(
    container: Container,
    stateEngine: StateEngine,
    monitor: PositionMonitor,
    executionEngine: ExecutionEngine,
    scheduler: ScanScheduler,
    signals: ControlSignals,
    lock: ChainLock,
  ) {
    this.container = container;
    this.stateEngine = stateEngine;
    this.monitor = monitor;
    this.executionEngine = executionEngine;
    this.scheduler = scheduler;
    this.signals = signals;
    this.lock = lock;
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  async start(): Promise<void> {
    if (this.running) return;
    const { logger, tradingParams } = this.container;
    logger.info('Starting orchestrator');

    this.running = true;
    this.scheduler.start();

    const results = await this.scheduler.runStartupScan();
    logger.info(
      {
        chains: results.length,
        failedChains: results.filter((r) => r.error !== null).map((r) => r.chainId),
        positionsOpened: results.reduce((n, r) => n + r.positionsOpened.length, 0),
      },
      'Startup scan complete',
    );

    this.scheduleTick(0);
    logger.info({ tickIntervalMs: tradingParams.monitorTickMs }, 'Orchestrator started');
  }

  /** Resolves once the loop has ended, through a stop signal or stop(). */
  waitUntilStopped(): Promise<void> {
    return this.stopped;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.running = false;

    if (this.currentTick) {
      await this.currentTick;
    }
    await this.scheduler.stop();
    await this.lock.drain();

    this.container.logger.info({ totalTicks: this.tickCount }, 'Orchestrator stopped');
    this.resolveStopped();
  }

  /** Buys through the chain lock; the post-trade scan follows from TRADE_EXECUTED. */
  buy(request: BuyRequest): Promise<ExecutionResult> {
    return this.lock.run(request.chainId, () => this.executionEngine.buyToken(request));
  }

  getStatus(): OrchestratorStatus {
    return {
      running: this.running,
      tickCount: this.tickCount,
      lastTickAt: this.lastTickAt,
      openPositions: this.stateEngine.getOpenPositions().length,
    };
  }

  private scheduleTick(delayMs: number): void {
    if (!this.running) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      this.currentTick = this.tick()
        .catch((err) => {
          this.container.logger.error({ err, tickCount: this.tickCount }, 'Orchestrator tick error');
        })
        .finally(() => {
          this.currentTick = null;
          this.scheduleTick(this.container.tradingParams.monitorTickMs);
        });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    const { logger } = this.container;
    this.tickCount++;
    this.lastTickAt = Date.now();

    const signals = await this.readSignals();

    if (signals.stop) {
      logger.warn({ actor: signals.stop.actor }, 'Stop signal received, ending control loop');
      this.running = false;
      try {
        await this.signals.clear('stop');
      } catch (err) {
        logger.error({ err }, 'Failed to clear stop signal');
      }
      this.resolveStopped();
      return;
    }

    if (signals.sellAll) {
      logger.warn({ actor: signals.sellAll.actor }, 'Sell-all signal received, liquidating');
      await this.forEachChain(this.stateEngine.getOpenPositions(), (position) => this.monitor.liquidate(position));
      await this.signals.clear('sell-all');
      return;
    }

    await this.forEachChain(this.stateEngine.getOpenPositions(), (position) => this.monitor.checkPosition(position));
  }

  private async readSignals(): Promise<ControlStatus> {
    try {
      return await this.signals.status();
    } catch (err) {
      this.container.logger.error({ err }, 'Control signals unavailable, evaluating positions');
      return { stop: null, sellAll: null };
    }
  }

  /**
   * Positions of one chain are handled sequentially under that chain's
   * lock; chains run concurrently.
   */
  private async forEachChain(
    positions: PositionState[],
    handle: (position: PositionState) => Promise<MonitorOutcome>,
  ): Promise<void> {
    const byChain = new Map<number, string[]>();
    for (const position of positions) {
      const ids = byChain.get(position.chainId) ?? [];
      ids.push(position.id);
      byChain.set(position.chainId, ids);
    }

    await Promise.all(
      Array.from(byChain, ([chainId, ids]) =>
        this.lock.run(chainId, async () => {
          for (const id of ids) {
            const position = this.stateEngine.getPosition(id);
            if (!position || position.status === 'CLOSED') continue;
            await this.handleOne(position, handle);
          }
        }),
      ),
    );
  }

  private async handleOne(
    position: PositionState,
    handle: (position: PositionState) => Promise<MonitorOutcome>,
  ): Promise<void> {
    const { logger } = this.container;

    try {
      const outcome = await handle(position);
      if (outcome.execution?.status === 'CONFIRMED') {
        this.monitor.forget(position.id);
      } else if (outcome.execution) {
        logger.warn(
          { positionId: position.id, status: outcome.execution.status, error: outcome.execution.errorMessage },
          'Exit not filled, position stays EXIT_PENDING',
        );
      }
    } catch (err) {
      logger.error({ err, positionId: position.id }, 'Position evaluation failed');
    }
  }
}
