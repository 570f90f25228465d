import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PriceReader } from './price-reader.service.js';
import { PriceUnavailableError } from '../../errors.js';
import type { Container } from '../../infra/container.js';
import type { PoolReference } from '../../types/pool.js';

const Q96 = 2n ** 96n;
const TOKEN = '0x9999999999999999999999999999999999999999';
const WETH = '0x4200000000000000000000000000000000000006';

const pool: PoolReference = {
  chainId: 8453,
  tokenAddress: TOKEN,
  poolAddress: '0x0000000000000000000000000000000000000d01',
  dex: 'uniswap_v3',
  feeTier: 3000,
  quoteSymbol: 'WETH',
  quoteAddress: WETH,
  quoteDecimals: 18,
  discoveredAt: new Date(),
};

function createMockContainer(): Container {
  return {
    logger: {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    } as unknown as Container['logger'],
    db: {} as Container['db'],
    redis: {} as Container['redis'],
    redisKeyPrefix: 'test',
    evm: {} as Container['evm'],
    gateway: {
      readSqrtPriceX96: vi.fn().mockResolvedValue(Q96 * 2n),
      readToken0: vi.fn().mockResolvedValue(WETH),
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

describe('PriceReader', () => {
  let container: Container;
  let reader: PriceReader;

  beforeEach(() => {
    container = createMockContainer();
    reader = new PriceReader(container);
  });

  it('inverts the pool price when the token is token1', async () => {
    await expect(reader.readPrice(pool, TOKEN, 18)).resolves.toBe(0.25);
  });

  it('uses the pool price when the token is token0', async () => {
    vi.mocked(container.gateway.readToken0).mockResolvedValue(TOKEN);
    await expect(reader.readPrice(pool, TOKEN, 18)).resolves.toBe(4);
  });

  it('reads from the pool chain', async () => {
    await reader.readPrice({ ...pool, chainId: 1 }, TOKEN, 18);
    expect(container.gateway.readSqrtPriceX96).toHaveBeenCalledWith(1, pool.poolAddress);
  });

  it('caches token0 per pool', async () => {
    await reader.readPrice(pool, TOKEN, 18);
    await reader.readPrice(pool, TOKEN, 18);

    expect(container.gateway.readToken0).toHaveBeenCalledTimes(1);
    expect(container.gateway.readSqrtPriceX96).toHaveBeenCalledTimes(2);
  });

  it('retries transient failures', async () => {
    vi.mocked(container.gateway.readSqrtPriceX96)
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(Q96);

    await expect(reader.readPrice(pool, TOKEN, 18)).resolves.toBe(1);
    expect(container.gateway.readSqrtPriceX96).toHaveBeenCalledTimes(2);
  });

  it('throws PriceUnavailableError after exhausting attempts', async () => {
    vi.mocked(container.gateway.readSqrtPriceX96).mockRejectedValue(new Error('rpc down'));

    await expect(reader.readPrice(pool, TOKEN, 18)).rejects.toBeInstanceOf(PriceUnavailableError);
    expect(container.gateway.readSqrtPriceX96).toHaveBeenCalledTimes(3);
  });

  it('treats a zero sqrt price as a failed read', async () => {
    vi.mocked(container.gateway.readSqrtPriceX96).mockResolvedValue(0n);

    await expect(reader.readPrice(pool, TOKEN, 18)).rejects.toThrow(PriceUnavailableError);
  });
});
