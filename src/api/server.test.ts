import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createServer } from './server.js';
import { createDatabase } from '../infra/database.js';
import { StateEngine } from '../modules/state-engine/state-engine.service.js';
import { Registry } from '../modules/registry/registry.service.js';
import { WhitelistService } from '../modules/whitelist/whitelist.service.js';
import { ControlSignals } from '../modules/control/control-signals.service.js';
import { CHAINS } from '../config/chains.js';
import { PoolNotFoundError } from '../errors.js';
import type { Container } from '../infra/container.js';
import type { EventBus } from '../services/event-bus.js';
import type { PositionMonitor } from '../modules/position-monitor/position-monitor.service.js';
import type { ExecutionEngine } from '../modules/execution-engine/execution-engine.service.js';
import type { Orchestrator } from '../modules/orchestrator/orchestrator.service.js';

const TOKEN = '0xdddddddddddddddddddddddddddddddddddddddd';
const SENDER = '0x9999999999999999999999999999999999999999';
const WALLET = '0x1111111111111111111111111111111111111111';
const BASE = CHAINS[8453]!;

function createFakeRedis() {
  const store = new Map<string, string>();
  return {
    ping: vi.fn().mockResolvedValue('PONG'),
    set: vi.fn(async (key: string, value: string) => {
      store.set(key, value);
      return 'OK';
    }),
    del: vi.fn(async (key: string) => (store.delete(key) ? 1 : 0)),
    mget: vi.fn(async (...keys: string[]) => keys.map((k) => store.get(k) ?? null)),
  };
}

function createMockContainer(): Container {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } as unknown as Container['logger'];

  return {
    logger,
    db: createDatabase(':memory:', logger),
    redis: createFakeRedis() as unknown as Container['redis'],
    redisKeyPrefix: 'test',
    evm: {} as Container['evm'],
    gateway: {
      walletAddress: WALLET,
      connectedChainIds: () => [8453],
      getBlockNumber: vi.fn().mockResolvedValue(123),
      getNativeBalance: vi.fn().mockResolvedValue(25_000_000_000_000_000n),
      balanceOf: vi.fn(async (_chainId: number, token: string) =>
        token === BASE.weth ? 2_000_000_000_000_000_000n : 1_500_000n,
      ),
    } as unknown as Container['gateway'],
    riskParams: {
      gasReserveWei: 10_000_000_000_000_000n,
      maxSlippageBps: 300,
      executionCooldownMs: 0,
      swapGasLimit: 600_000n,
    },
    tradingParams: {
      takeProfitPct: 0.02,
      stopLossPct: 0.02,
      monitorTickMs: 15_000,
      priceReadAttempts: 3,
      priceReadBackoffMs: 0,
      swapDeadlineSeconds: 300,
    },
  };
}

describe('API server', () => {
  let container: Container;
  let stateEngine: StateEngine;
  let whitelist: WhitelistService;
  let orchestrator: { buy: ReturnType<typeof vi.fn>; getStatus: ReturnType<typeof vi.fn> };
  let monitor: {
    latestPrice: ReturnType<typeof vi.fn>;
    unrealizedPnl: ReturnType<typeof vi.fn>;
    exitBlock: ReturnType<typeof vi.fn>;
  };
  let app: FastifyInstance;

  beforeEach(async () => {
    container = createMockContainer();
    const eventBus = { emit: vi.fn(), on: vi.fn(), onType: vi.fn(), off: vi.fn() } as unknown as EventBus;
    stateEngine = new StateEngine(container, eventBus);
    await stateEngine.start();
    whitelist = new WhitelistService(container);

    monitor = {
      latestPrice: vi.fn(() => ({ price: 101, observedAt: new Date('2026-01-01T00:00:00.000Z') })),
      unrealizedPnl: vi.fn(() => 5),
      exitBlock: vi.fn(() => undefined),
    };
    const executionEngine = {
      listExecutions: vi.fn(() => []),
      getExecution: vi.fn(() => undefined),
    };
    orchestrator = {
      buy: vi.fn().mockResolvedValue({ id: 'exec-buy', status: 'CONFIRMED', txHash: '0xbuy' }),
      getStatus: vi.fn(() => ({ running: true, tickCount: 3, lastTickAt: 0, openPositions: 0 })),
    };

    app = await createServer({
      container,
      stateEngine,
      monitor: monitor as unknown as PositionMonitor,
      executionEngine: executionEngine as unknown as ExecutionEngine,
      registry: new Registry(container),
      whitelist,
      signals: new ControlSignals(container),
      orchestrator: orchestrator as unknown as Orchestrator,
    });
  });

  afterEach(async () => {
    await app.close();
    container.db.close();
  });

  it('reports health for the database, redis and every chain', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe('healthy');
    expect(body.checks).toEqual({
      database: 'ok',
      redis: 'ok',
      chains: { '8453': { status: 'ok', blockNumber: 123 } },
    });
  });

  it('reports degraded health when redis is unreachable', async () => {
    vi.mocked(container.redis.ping).mockRejectedValue(new Error('ECONNREFUSED'));

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'degraded', checks: { database: 'ok', redis: 'degraded' } });
  });

  function openPosition() {
    return stateEngine.openPosition({
      tokenAddress: TOKEN,
      chainId: 8453,
      pricingChainId: 8453,
      symbol: 'TKN',
      decimals: 18,
      quantity: 5_000_000_000_000_000_000n,
      entryPrice: 100,
      takeProfitPct: 0.02,
      stopLossPct: 0.02,
      quoteSymbol: 'WETH',
      feeTier: 3000,
    });
  }

  it('lists positions with their latest price', async () => {
    openPosition();

    const res = await app.inject({ method: 'GET', url: '/positions?status=HOLDING' });

    expect(res.statusCode).toBe(200);
    const [position] = res.json();
    expect(position).toMatchObject({
      tokenAddress: TOKEN,
      quantity: '5000000000000000000',
      status: 'HOLDING',
      latestPrice: 101,
      latestPriceAt: '2026-01-01T00:00:00.000Z',
      unrealizedPnl: 5,
      exitBlocked: null,
    });
  });

  it('shows why a pending exit is blocked', async () => {
    const opened = openPosition();
    stateEngine.markExitPending(opened.id, 'STOP_LOSS', 98);
    monitor.exitBlock.mockReturnValue({
      reason: 'EMPTY_BALANCE',
      balance: '0',
      since: new Date('2026-01-02T00:00:00.000Z'),
    });

    const res = await app.inject({ method: 'GET', url: `/positions/${opened.id}` });

    expect(res.statusCode).toBe(200);
    expect(monitor.exitBlock).toHaveBeenCalledWith(opened.id);
    expect(res.json().exitBlocked).toEqual({
      reason: 'EMPTY_BALANCE',
      balance: '0',
      since: '2026-01-02T00:00:00.000Z',
    });
  });

  it('rejects an unknown status filter', async () => {
    const res = await app.inject({ method: 'GET', url: '/positions?status=OPEN' });
    expect(res.statusCode).toBe(400);
  });

  it('returns 404 for an unknown position', async () => {
    const res = await app.inject({ method: 'GET', url: '/positions/missing' });
    expect(res.statusCode).toBe(404);
  });

  it('adds a whitelisted sender and records the audit entry', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/whitelist/senders',
      payload: { address: SENDER, label: 'desk' },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toMatchObject({ address: SENDER, label: 'desk' });
    expect(whitelist.listAudit()).toMatchObject([{ action: 'ADD', address: SENDER, actor: 'api' }]);
  });

  it('rejects a malformed sender address', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/whitelist/senders',
      payload: { address: '0x1234' },
    });

    expect(res.statusCode).toBe(400);
  });

  it('returns 404 when removing a sender that is not whitelisted', async () => {
    const res = await app.inject({ method: 'DELETE', url: `/whitelist/senders/${SENDER}` });
    expect(res.statusCode).toBe(404);
  });

  it('removes a whitelisted sender', async () => {
    whitelist.addSender(SENDER, null, 'test');

    const res = await app.inject({ method: 'DELETE', url: `/whitelist/senders/${SENDER}?actor=ops` });

    expect(res.statusCode).toBe(204);
    expect(whitelist.isSenderWhitelisted(SENDER)).toBe(false);
    expect(whitelist.listAudit(1)).toMatchObject([{ action: 'REMOVE', actor: 'ops' }]);
  });

  it('changes a token status and audits it', async () => {
    whitelist.whitelistToken({ address: TOKEN, chainId: 8453, symbol: 'TKN', sender: SENDER });

    const res = await app.inject({
      method: 'PATCH',
      url: `/whitelist/tokens/8453/${TOKEN}`,
      payload: { status: 'blocked', actor: 'ops' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ address: TOKEN, chainId: 8453, status: 'blocked' });
    expect(whitelist.getToken(TOKEN, 8453)?.status).toBe('blocked');
    expect(whitelist.listAudit(1)).toMatchObject([
      { action: 'TOKEN_STATUS', address: TOKEN, label: 'chain 8453: active -> blocked', actor: 'ops' },
    ]);
  });

  it('returns 404 for a status change on an unknown token', async () => {
    const res = await app.inject({
      method: 'PATCH',
      url: `/whitelist/tokens/8453/${TOKEN}`,
      payload: { status: 'blocked' },
    });

    expect(res.statusCode).toBe(404);
  });

  it('rejects an unknown token status', async () => {
    whitelist.whitelistToken({ address: TOKEN, chainId: 8453, symbol: 'TKN', sender: SENDER });

    const res = await app.inject({
      method: 'PATCH',
      url: `/whitelist/tokens/8453/${TOKEN}`,
      payload: { status: 'paused' },
    });

    expect(res.statusCode).toBe(400);
    expect(whitelist.getToken(TOKEN, 8453)?.status).toBe('active');
  });

  it('reports wallet balances and reserve headroom per chain', async () => {
    const res = await app.inject({ method: 'GET', url: '/wallet' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      address: WALLET,
      gasReserveWei: '10000000000000000',
      chains: {
        '8453': {
          status: 'ok',
          name: 'Base',
          nativeBalanceWei: '25000000000000000',
          nativeBalance: '0.025',
          reserveHeadroomWei: '15000000000000000',
          quotes: [
            {
              symbol: 'WETH',
              address: BASE.weth.toLowerCase(),
              balance: '2000000000000000000',
              formatted: '2.0',
            },
            { symbol: 'USDC', address: BASE.usdc.toLowerCase(), balance: '1500000', formatted: '1.5' },
          ],
        },
      },
    });
  });

  it('reports a chain whose balances cannot be read', async () => {
    vi.mocked(container.gateway.getNativeBalance).mockRejectedValue(new Error('rpc down'));

    const res = await app.inject({ method: 'GET', url: '/wallet' });

    expect(res.statusCode).toBe(200);
    expect(res.json().chains).toEqual({ '8453': { status: 'error', error: 'rpc down' } });
  });

  it('raises and clears the stop signal', async () => {
    const raised = await app.inject({ method: 'POST', url: '/control/stop' });
    expect(raised.statusCode).toBe(202);
    expect(raised.json().stop.actor).toBe('api');

    const cleared = await app.inject({ method: 'POST', url: '/control/clear-stop' });
    expect(cleared.json()).toEqual({ stop: null, sellAll: null });
  });

  it('raises the sell-all signal', async () => {
    const res = await app.inject({ method: 'POST', url: '/control/sell-all', payload: { actor: 'ops' } });

    expect(res.statusCode).toBe(202);
    expect(res.json().sellAll.actor).toBe('ops');
  });

  it('places a buy through the orchestrator', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/trades/buy',
      payload: { tokenAddress: TOKEN, chainId: 8453, quoteAmount: '1000000' },
    });

    expect(res.statusCode).toBe(201);
    expect(orchestrator.buy).toHaveBeenCalledWith({
      tokenAddress: TOKEN,
      chainId: 8453,
      quoteAmount: 1_000_000n,
      maxSlippageBps: undefined,
    });
  });

  it('maps trader errors to status codes', async () => {
    orchestrator.buy.mockRejectedValue(new PoolNotFoundError(TOKEN, 8453));

    const res = await app.inject({
      method: 'POST',
      url: '/trades/buy',
      payload: { tokenAddress: TOKEN, chainId: 8453, quoteAmount: '1000000' },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: `No pool for ${TOKEN} on chain 8453`,
      code: 'POOL_NOT_FOUND',
      statusCode: 404,
    });
  });

  it('reports trading stats with the loop status', async () => {
    const res = await app.inject({ method: 'GET', url: '/stats' });

    expect(res.json()).toEqual({
      tradeCount: 0,
      wins: 0,
      losses: 0,
      winRate: 0,
      realizedPnl: 0,
      openPositions: 0,
      loop: { running: true, tickCount: 3, lastTickAt: 0, openPositions: 0 },
    });
  });
});
