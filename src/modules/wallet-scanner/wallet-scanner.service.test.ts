import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WalletScanner } from './wallet-scanner.service.js';
import { WhitelistService } from '../whitelist/whitelist.service.js';
import { Registry } from '../registry/registry.service.js';
import { StateEngine } from '../state-engine/state-engine.service.js';
import { ChainLock } from '../../utils/chain-lock.js';
import { createDatabase } from '../../infra/database.js';
import { CHAINS } from '../../config/chains.js';
import { PriceUnavailableError } from '../../errors.js';
import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import { PoolDiscovery } from '../pool-discovery/pool-discovery.service.js';
import type { PriceReader } from '../price-reader/price-reader.service.js';
import type { InboundTransfer } from '../../types/whitelist.js';
import type { PoolReference } from '../../types/pool.js';

const TOKEN = '0xdddddddddddddddddddddddddddddddddddddddd';
const SENDER = '0x9999999999999999999999999999999999999999';
const STRANGER = '0x8888888888888888888888888888888888888888';

function transfer(overrides: Partial<InboundTransfer> = {}): InboundTransfer {
  return {
    transferId: '0xaaa:log:1',
    tokenAddress: TOKEN,
    chainId: 8453,
    sender: SENDER,
    amount: '5000000000000000000',
    blockNumber: 100,
    txHash: '0xaaa',
    symbol: 'TKN',
    ...overrides,
  };
}

const POOL: PoolReference = {
  chainId: 8453,
  tokenAddress: TOKEN,
  poolAddress: '0x7777777777777777777777777777777777777777',
  dex: 'uniswap_v3',
  feeTier: 10000,
  quoteSymbol: 'USDC',
  quoteAddress: CHAINS[8453]!.usdc.toLowerCase(),
  quoteDecimals: 6,
  discoveredAt: new Date(),
};

function createMockGateway() {
  return {
    connectedChainIds: vi.fn(() => [8453]),
    getInboundTransfers: vi.fn().mockResolvedValue([transfer()]),
    decimals: vi.fn().mockResolvedValue(18),
    symbol: vi.fn().mockResolvedValue('TKN'),
    name: vi.fn().mockResolvedValue('Token'),
    balanceOf: vi.fn().mockResolvedValue(5_000_000_000_000_000_000n),
    getV3Pool: vi.fn().mockResolvedValue(null),
  };
}

function createMockContainer(gateway: ReturnType<typeof createMockGateway>): Container {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } as unknown as Container['logger'];

  return {
    logger,
    db: createDatabase(':memory:', logger),
    redis: {
      set: vi.fn().mockResolvedValue('OK'),
    } as unknown as Container['redis'],
    redisKeyPrefix: 'test',
    evm: {} as Container['evm'],
    gateway: gateway as unknown as Container['gateway'],
    riskParams: {
      gasReserveWei: 10_000_000_000_000_000n,
      maxSlippageBps: 300,
      executionCooldownMs: 0,
      swapGasLimit: 600_000n,
    },
    tradingParams: {
      takeProfitPct: 0.05,
      stopLossPct: 0.03,
      monitorTickMs: 15_000,
      priceReadAttempts: 3,
      priceReadBackoffMs: 0,
      swapDeadlineSeconds: 300,
    },
  };
}

describe('WalletScanner', () => {
  let gateway: ReturnType<typeof createMockGateway>;
  let container: Container;
  let eventBus: EventBus;
  let whitelist: WhitelistService;
  let stateEngine: StateEngine;
  let poolDiscovery: { discover: ReturnType<typeof vi.fn>; pricingPool: ReturnType<typeof vi.fn> };
  let priceReader: { readPrice: ReturnType<typeof vi.fn> };
  let scanner: WalletScanner;

  beforeEach(async () => {
    gateway = createMockGateway();
    container = createMockContainer(gateway);
    eventBus = { emit: vi.fn(), on: vi.fn(), onType: vi.fn(), off: vi.fn() } as unknown as EventBus;
    whitelist = new WhitelistService(container);
    whitelist.addSender(SENDER, 'desk', 'test');
    stateEngine = new StateEngine(container, eventBus);
    await stateEngine.start();
    poolDiscovery = {
      discover: vi.fn().mockResolvedValue(POOL),
      pricingPool: vi.fn().mockResolvedValue(POOL),
    };
    priceReader = { readPrice: vi.fn().mockResolvedValue(0.25) };
    scanner = new WalletScanner(
      container,
      whitelist,
      new Registry(container),
      poolDiscovery as unknown as PoolDiscovery,
      priceReader as unknown as PriceReader,
      stateEngine,
      eventBus,
      new ChainLock(),
    );
  });

  afterEach(() => {
    container.db.close();
  });

  it('opens a position for a token sent by a whitelisted sender', async () => {
    const [result] = await scanner.scanAll();

    expect(result?.error).toBeNull();
    expect(result?.newTransfers).toBe(1);
    expect(result?.positionsOpened).toHaveLength(1);

    const position = stateEngine.findOpenPosition(TOKEN, 8453);
    expect(position).toMatchObject({
      tokenAddress: TOKEN,
      chainId: 8453,
      pricingChainId: 8453,
      symbol: 'TKN',
      decimals: 18,
      quantity: 5_000_000_000_000_000_000n,
      entryPrice: 0.25,
      takeProfitPct: 0.05,
      stopLossPct: 0.03,
      quoteSymbol: 'USDC',
      feeTier: 10000,
      status: 'HOLDING',
    });
    expect(whitelist.getToken(TOKEN, 8453)?.status).toBe('active');
    expect(eventBus.emit).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'WALLET_SCANNED', chainId: 8453, trigger: 'STARTUP', positionsOpened: 1 }),
    );
  });

  it('does not treat an already logged transfer as new', async () => {
    await scanner.scanChain(8453, 'STARTUP');
    const second = await scanner.scanChain(8453, 'POST_TRADE');

    expect(second.newTransfers).toBe(0);
    expect(second.positionsOpened).toHaveLength(0);
    expect(stateEngine.getOpenPositions()).toHaveLength(1);
  });

  it('ignores senders that are not whitelisted', async () => {
    gateway.getInboundTransfers.mockResolvedValue([transfer({ sender: STRANGER })]);

    const result = await scanner.scanChain(8453, 'STARTUP');

    expect(result.newTransfers).toBe(0);
    expect(gateway.balanceOf).not.toHaveBeenCalled();
  });

  it('skips the chain quote tokens', async () => {
    gateway.getInboundTransfers.mockResolvedValue([transfer({ tokenAddress: CHAINS[8453]!.weth.toLowerCase() })]);

    const result = await scanner.scanChain(8453, 'STARTUP');

    expect(result.newTransfers).toBe(0);
    expect(stateEngine.getOpenPositions()).toHaveLength(0);
  });

  it('logs the transfer but opens nothing for a zero balance', async () => {
    gateway.balanceOf.mockResolvedValue(0n);

    const result = await scanner.scanChain(8453, 'STARTUP');

    expect(result.newTransfers).toBe(1);
    expect(result.positionsOpened).toHaveLength(0);
    expect(whitelist.hasTransfer(8453, '0xaaa:log:1')).toBe(true);
  });

  it('leaves tokens without a pool unmonitored', async () => {
    poolDiscovery.discover.mockResolvedValue(null);

    const result = await scanner.scanChain(8453, 'STARTUP');

    expect(result.positionsOpened).toHaveLength(0);
    expect(priceReader.readPrice).not.toHaveBeenCalled();
  });

  it('retries a token whose entry price could not be read', async () => {
    priceReader.readPrice.mockRejectedValueOnce(new PriceUnavailableError(POOL.poolAddress, 3));

    const first = await scanner.scanChain(8453, 'STARTUP');
    expect(first.newTransfers).toBe(0);
    expect(whitelist.hasTransfer(8453, '0xaaa:log:1')).toBe(false);

    const second = await scanner.scanChain(8453, 'POST_TRADE');
    expect(second.positionsOpened).toHaveLength(1);
  });

  it('keeps the transfer unlogged when the factory lookup fails over RPC', async () => {
    gateway.getV3Pool.mockRejectedValue(new Error('header not found'));
    const registry = new Registry(container);
    const withFactory = new WalletScanner(
      container,
      whitelist,
      registry,
      new PoolDiscovery(container, registry),
      priceReader as unknown as PriceReader,
      stateEngine,
      eventBus,
      new ChainLock(),
    );

    const result = await withFactory.scanChain(8453, 'STARTUP');

    expect(result.error).toBeNull();
    expect(result.newTransfers).toBe(0);
    expect(whitelist.hasTransfer(8453, '0xaaa:log:1')).toBe(false);
    expect(registry.getPools(TOKEN, 8453)).toEqual([]);
  });

  it('does not open positions for blocked tokens', async () => {
    whitelist.whitelistToken({ address: TOKEN, chainId: 8453, symbol: 'TKN', sender: SENDER });
    whitelist.setTokenStatus(TOKEN, 8453, 'blocked', 'test');

    const result = await scanner.scanChain(8453, 'STARTUP');

    expect(result.positionsOpened).toHaveLength(0);
    expect(whitelist.getToken(TOKEN, 8453)?.status).toBe('blocked');
  });

  it('skips a failing chain and scans the others', async () => {
    gateway.connectedChainIds.mockReturnValue([8453, 1]);
    gateway.getInboundTransfers.mockImplementation(async (chainId: number) => {
      if (chainId === 1) throw new Error('rpc down');
      return [transfer()];
    });

    const results = await scanner.scanAll();

    expect(results.map((r) => [r.chainId, r.error])).toEqual([
      [8453, null],
      [1, 'rpc down'],
    ]);
    expect(stateEngine.getOpenPositions()).toHaveLength(1);
  });
});
