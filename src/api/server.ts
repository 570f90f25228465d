import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Container } from '../infra/container.js';
import type { StateEngine } from '../modules/state-engine/state-engine.service.js';
import type { PositionMonitor } from '../modules/position-monitor/position-monitor.service.js';
import type { ExecutionEngine } from '../modules/execution-engine/execution-engine.service.js';
import type { Registry } from '../modules/registry/registry.service.js';
import type { WhitelistService } from '../modules/whitelist/whitelist.service.js';
import type { ControlSignals } from '../modules/control/control-signals.service.js';
import type { Orchestrator } from '../modules/orchestrator/orchestrator.service.js';
import { TraderError, type TraderErrorCode } from '../errors.js';
import { healthRoutes } from './routes/health.js';
import { positionRoutes } from './routes/positions.js';
import { tokenRoutes } from './routes/tokens.js';
import { executionRoutes } from './routes/executions.js';
import { statsRoutes } from './routes/stats.js';
import { whitelistRoutes } from './routes/whitelist.js';
import { controlRoutes } from './routes/control.js';
import { tradeRoutes } from './routes/trades.js';
import { walletRoutes } from './routes/wallet.js';

export interface ServerDeps {
  container: Container;
  stateEngine: StateEngine;
  monitor: PositionMonitor;
  executionEngine: ExecutionEngine;
  registry: Registry;
  whitelist: WhitelistService;
  signals: ControlSignals;
  orchestrator: Orchestrator;
}

const STATUS_BY_CODE: Record<TraderErrorCode, number> = {
  PRICE_UNAVAILABLE: 503,
  POOL_NOT_FOUND: 404,
  GAS_RESERVE: 422,
  INVALID_TRANSITION: 409,
  IMMUTABLE_FIELD: 409,
  DUPLICATE_POSITION: 409,
  CHAIN_NOT_CONFIGURED: 400,
  EMPTY_BALANCE: 409,
};

export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { container } = deps;

  const app = Fastify({
    logger: false, // pino instance lives on the container
    requestTimeout: 30_000,
    bodyLimit: 1_048_576,
  });

  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  app.addHook('onRequest', async (request) => {
    container.logger.debug({ method: request.method, url: request.url }, 'Incoming request');
  });

  app.addHook('onResponse', async (request, reply) => {
    container.logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed',
    );
  });

  app.setErrorHandler((error: Error & { statusCode?: number }, _request, reply) => {
    const statusCode = error instanceof TraderError ? STATUS_BY_CODE[error.code] : (error.statusCode ?? 500);
    if (statusCode >= 500) {
      container.logger.error({ err: error }, 'Unhandled route error');
    } else {
      container.logger.warn({ err: error }, 'Route error');
    }
    return reply.status(statusCode).send({
      error: error.message,
      code: error instanceof TraderError ? error.code : undefined,
      statusCode,
    });
  });

  await healthRoutes(app, container);
  await positionRoutes(app, deps.stateEngine, deps.monitor, deps.executionEngine);
  await tokenRoutes(app, deps.registry);
  await executionRoutes(app, deps.executionEngine);
  await statsRoutes(app, deps.stateEngine, deps.orchestrator);
  await walletRoutes(app, container);
  await whitelistRoutes(app, deps.whitelist);
  await controlRoutes(app, deps.signals);
  await tradeRoutes(app, container, deps.orchestrator);

  return app;
}
