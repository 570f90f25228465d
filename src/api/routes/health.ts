import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import { checkDatabaseHealth } from '../../infra/database.js';
import { checkRedisHealth } from '../../infra/redis.js';

type ChainCheck = { status: 'ok'; blockNumber: number } | { status: 'error'; error: string };

export async function healthRoutes(app: FastifyInstance, container: Container): Promise<void> {
  app.get('/health', async (_request, reply) => {
    const { db, redis, gateway, logger } = container;

    const chains: Record<string, ChainCheck> = {};
    await Promise.all(
      gateway.connectedChainIds().map(async (chainId) => {
        try {
          chains[chainId] = { status: 'ok', blockNumber: await gateway.getBlockNumber(chainId) };
        } catch (err) {
          chains[chainId] = { status: 'error', error: err instanceof Error ? err.message : String(err) };
        }
      }),
    );

    const database = checkDatabaseHealth(db);
    const redisOk = await checkRedisHealth(redis);
    const rpcHealthy = Object.values(chains).every((c) => c.status === 'ok');

    // Redis holds only the snapshot and control flags.
    const status = !database ? 'unhealthy' : redisOk && rpcHealthy ? 'healthy' : 'degraded';
    if (status !== 'healthy') {
      logger.warn({ database, redis: redisOk, chains }, 'Health check not fully healthy');
    }

    return reply.status(database ? 200 : 503).send({
      status,
      timestamp: new Date().toISOString(),
      checks: {
        database: database ? 'ok' : 'error',
        redis: redisOk ? 'ok' : 'degraded',
        chains,
      },
    });
  });
}
