import { Redis } from 'ioredis';
import type { Logger } from './logger.js';

export type RedisClient = Redis;

/** Keys the service owns under its prefix. */
export type RedisKeyspace = 'control' | 'state';

export function createRedisClient(url: string, logger: Logger): RedisClient {
  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 2,
    connectTimeout: 5_000,
    retryStrategy(times: number) {
      return Math.min(times * 250, 5_000);
    },
  });

  client.on('ready', () => {
    logger.info({ url: redactUrl(url) }, 'Redis ready');
  });
  client.on('reconnecting', (delayMs: number) => {
    logger.warn({ delayMs }, 'Redis reconnecting');
  });
  client.on('error', (err: Error) => {
    logger.error({ err }, 'Redis error');
  });

  return client;
}

export function redisKey(prefix: string, keyspace: RedisKeyspace, name: string): string {
  return `${prefix}:${keyspace}:${name}`;
}

export async function checkRedisHealth(client: Pick<RedisClient, 'ping'>): Promise<boolean> {
  try {
    return (await client.ping()) === 'PONG';
  } catch {
    return false;
  }
}

function redactUrl(url: string): string {
  return url.replace(/\/\/[^@/]*@/, '//***@');
}
