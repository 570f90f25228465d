import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ScanScheduler } from './scan-scheduler.js';
import { EventBus } from '../../services/event-bus.js';
import type { Container } from '../../infra/container.js';
import type { WalletScanner } from '../wallet-scanner/wallet-scanner.service.js';

function createMockContainer(): Container {
  return {
    logger: {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    } as unknown as Container['logger'],
  } as unknown as Container;
}

function tradeExecuted(chainId: number) {
  return {
    id: `trade-${chainId}`,
    type: 'TRADE_EXECUTED' as const,
    timestamp: Date.now(),
    chainId,
    executionId: 'exec-1',
    side: 'SELL' as const,
    txHash: '0xswap',
  };
}

describe('ScanScheduler', () => {
  let container: Container;
  let eventBus: EventBus;
  let scanner: { scanAll: ReturnType<typeof vi.fn>; scanChain: ReturnType<typeof vi.fn> };
  let scheduler: ScanScheduler;

  beforeEach(() => {
    container = createMockContainer();
    eventBus = new EventBus(container.logger);
    scanner = {
      scanAll: vi.fn().mockResolvedValue([]),
      scanChain: vi.fn().mockResolvedValue({
        chainId: 8453,
        trigger: 'POST_TRADE',
        newTransfers: 0,
        positionsOpened: [],
        error: null,
      }),
    };
    scheduler = new ScanScheduler(container, scanner as unknown as WalletScanner, eventBus);
    scheduler.start();
  });

  it('runs the startup scan only once', async () => {
    await scheduler.runStartupScan();
    await scheduler.runStartupScan();

    expect(scanner.scanAll).toHaveBeenCalledTimes(1);
    expect(scanner.scanAll).toHaveBeenCalledWith('STARTUP');
  });

  it('scans the traded chain after each executed trade', () => {
    eventBus.emit(tradeExecuted(8453));
    eventBus.emit(tradeExecuted(1));

    expect(scanner.scanChain.mock.calls).toEqual([
      [8453, 'POST_TRADE'],
      [1, 'POST_TRADE'],
    ]);
  });

  it('ignores other events', () => {
    eventBus.emit({
      id: 'scan-1',
      type: 'WALLET_SCANNED',
      timestamp: Date.now(),
      chainId: 8453,
      trigger: 'STARTUP',
      newTransfers: 0,
      positionsOpened: 0,
    });

    expect(scanner.scanChain).not.toHaveBeenCalled();
  });

  it('waits for pending scans on stop and ignores later trades', async () => {
    eventBus.emit(tradeExecuted(8453));
    await scheduler.stop();
    eventBus.emit(tradeExecuted(8453));

    expect(scanner.scanChain).toHaveBeenCalledTimes(1);
  });

  it('subscribes once however often it is started and detaches on stop', async () => {
    scheduler.start();
    expect(eventBus.listenerCount('TRADE_EXECUTED')).toBe(1);

    await scheduler.stop();
    expect(eventBus.listenerCount('TRADE_EXECUTED')).toBe(0);
  });

  it('logs a failing post-trade scan', async () => {
    scanner.scanChain.mockRejectedValue(new Error('rpc down'));

    eventBus.emit(tradeExecuted(8453));
    await scheduler.stop();

    expect(container.logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ chainId: 8453 }),
      'Post-trade scan failed',
    );
  });
});
