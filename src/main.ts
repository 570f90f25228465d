import { parseEther } from 'ethers';
import { validateEnv } from './config/env.js';
import {
  createLogger,
  createRedisClient,
  createDatabase,
  createEvmContext,
  checkRpcHealth,
} from './infra/index.js';
import type { Container } from './infra/container.js';
import { ChainGateway } from './services/chain-gateway.js';
import { EventBus } from './services/event-bus.js';
import { ChainLock } from './utils/chain-lock.js';
import { Registry } from './modules/registry/index.js';
import { WhitelistService } from './modules/whitelist/index.js';
import { StateEngine } from './modules/state-engine/index.js';
import { PoolDiscovery } from './modules/pool-discovery/index.js';
import { PriceReader } from './modules/price-reader/index.js';
import { RiskEngine } from './modules/risk-engine/index.js';
import { ExecutionEngine } from './modules/execution-engine/index.js';
import { PositionMonitor } from './modules/position-monitor/index.js';
import { WalletScanner } from './modules/wallet-scanner/index.js';
import { ControlSignals } from './modules/control/index.js';
import { Orchestrator, ScanScheduler } from './modules/orchestrator/index.js';
import { createServer } from './api/server.js';

async function main(): Promise<void> {
  const env = validateEnv();
  const logger = createLogger({ LOG_LEVEL: env.LOG_LEVEL, NODE_ENV: env.NODE_ENV });
  logger.info('Position trader starting');

  // Infrastructure
  const db = createDatabase(env.DATABASE_PATH, logger);

  const redis = createRedisClient(env.REDIS_URL, logger);
  await redis.connect();

  const evm = createEvmContext(env, logger);
  await checkRpcHealth(evm, logger);

  const container: Container = {
    logger,
    db,
    redis,
    redisKeyPrefix: env.REDIS_KEY_PREFIX,
    evm,
    gateway: new ChainGateway(evm, logger),
    riskParams: {
      gasReserveWei: parseEther(env.GAS_RESERVE_NATIVE.toFixed(18)),
      maxSlippageBps: env.MAX_SLIPPAGE_BPS,
      executionCooldownMs: env.EXECUTION_COOLDOWN_MS,
      swapGasLimit: BigInt(env.SWAP_GAS_LIMIT),
    },
    tradingParams: {
      takeProfitPct: env.TAKE_PROFIT_PCT,
      stopLossPct: env.STOP_LOSS_PCT,
      monitorTickMs: env.MONITOR_TICK_MS,
      priceReadAttempts: env.PRICE_READ_ATTEMPTS,
      priceReadBackoffMs: env.PRICE_READ_BACKOFF_MS,
      swapDeadlineSeconds: env.SWAP_DEADLINE_SECONDS,
    },
  };

  // Core services
  const eventBus = new EventBus(logger);
  const lock = new ChainLock();
  const registry = new Registry(container);
  const whitelist = new WhitelistService(container);
  const stateEngine = new StateEngine(container, eventBus);
  const poolDiscovery = new PoolDiscovery(container, registry);
  const priceReader = new PriceReader(container);
  const riskEngine = new RiskEngine(container);
  const executionEngine = new ExecutionEngine(
    container,
    stateEngine,
    riskEngine,
    poolDiscovery,
    priceReader,
    eventBus,
  );
  const monitor = new PositionMonitor(container, stateEngine, poolDiscovery, priceReader, executionEngine);
  const scanner = new WalletScanner(
    container,
    whitelist,
    registry,
    poolDiscovery,
    priceReader,
    stateEngine,
    eventBus,
    lock,
  );
  const signals = new ControlSignals(container);
  const scheduler = new ScanScheduler(container, scanner, eventBus);
  const orchestrator = new Orchestrator(
    container,
    stateEngine,
    monitor,
    executionEngine,
    scheduler,
    signals,
    lock,
  );

  const stopTrackingClosures = whitelist.trackClosures(eventBus);
  await stateEngine.start();

  // API server
  const server = await createServer({
    container,
    stateEngine,
    monitor,
    executionEngine,
    registry,
    whitelist,
    signals,
    orchestrator,
  });
  await server.listen({ host: env.API_HOST, port: env.API_PORT });
  logger.info({ host: env.API_HOST, port: env.API_PORT }, 'API server listening');

  await orchestrator.start();

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');

    await server.close();
    await orchestrator.stop();
    await executionEngine.stop();
    await riskEngine.stop();
    await stateEngine.stop();
    stopTrackingClosures();
    eventBus.removeAllListeners();

    for (const ctx of evm.chains.values()) {
      ctx.provider.destroy();
    }
    redis.disconnect();
    db.close();

    logger.info('Position trader shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => { shutdown('SIGTERM').catch(() => process.exit(1)); });
  process.on('SIGINT', () => { shutdown('SIGINT').catch(() => process.exit(1)); });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception');
    process.exit(1);
  });

  // A stop signal raised through the API ends the loop; the process follows.
  orchestrator
    .waitUntilStopped()
    .then(() => shutdown('control:stop'))
    .catch((err) => {
      logger.fatal({ err }, 'Shutdown after stop signal failed');
      process.exit(1);
    });

  logger.info({ chains: container.gateway.connectedChainIds() }, 'Position trader fully operational');
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal startup error:', err);
  process.exit(1);
});
