import { describe, it, expect, vi } from 'vitest';
import { checkRedisHealth, redisKey } from './redis.js';

describe('redisKey', () => {
  it('namespaces keys under the prefix and keyspace', () => {
    expect(redisKey('trader', 'control', 'sell-all')).toBe('trader:control:sell-all');
    expect(redisKey('trader', 'state', 'snapshot')).toBe('trader:state:snapshot');
  });
});

describe('checkRedisHealth', () => {
  it('is healthy when ping answers PONG', async () => {
    await expect(checkRedisHealth({ ping: vi.fn().mockResolvedValue('PONG') })).resolves.toBe(true);
  });

  it('is unhealthy when ping fails', async () => {
    await expect(
      checkRedisHealth({ ping: vi.fn().mockRejectedValue(new Error('ECONNREFUSED')) }),
    ).resolves.toBe(false);
  });
});
