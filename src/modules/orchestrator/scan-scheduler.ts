import type { Container } from '../../infra/container.js';
import type { EventBus, Unsubscribe } from '../../services/event-bus.js';
import type { ScanResult, WalletScanner } from '../wallet-scanner/wallet-scanner.service.js';

/**
 * The only code that starts wallet scans: once at startup, then once per
 * executed trade on the chain that traded. Monitor ticks never scan.
 */
export class ScanScheduler {
  private readonly container: Container;
  private readonly scanner: WalletScanner;
  private readonly eventBus: EventBus;
  private readonly pending: Set<Promise<ScanResult>> = new Set();
  private startupDone = false;
  private unsubscribe: Unsubscribe | null = null;
  private accepting = false;

  constructor(container: Container, scanner: WalletScanner, eventBus: EventBus) {
    this.container = container;
    this.scanner = scanner;
    this.eventBus = eventBus;
  }

  start(): void {
    if (this.unsubscribe) return;
    this.accepting = true;
    this.unsubscribe = this.eventBus.onType('TRADE_EXECUTED', (event) => {
      this.schedulePostTrade(event.chainId);
    });
  }

  /** Runs at most once per process. */
  async runStartupScan(): Promise<ScanResult[]> {
    if (this.startupDone) {
      this.container.logger.warn('Startup scan already ran');
      return [];
    }
    this.startupDone = true;
    return this.scanner.scanAll('STARTUP');
  }

  /** Queued behind the chain's lock, so a scan triggered mid-trade runs after it. */
  schedulePostTrade(chainId: number): void {
    if (!this.accepting) return;

    this.container.logger.info({ chainId }, 'Post-trade scan scheduled');
    const scan = this.scanner.scanChain(chainId, 'POST_TRADE');
    this.pending.add(scan);
    scan
      .catch((err) => {
        this.container.logger.error({ err, chainId }, 'Post-trade scan failed');
      })
      .finally(() => {
        this.pending.delete(scan);
      });
  }

  async stop(): Promise<void> {
    this.accepting = false;
    this.unsubscribe?.();
    this.unsubscribe = null;
    await Promise.allSettled(Array.from(this.pending));
  }
}
