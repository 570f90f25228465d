export { createLogger, chainLogger } from './logger.js';
export type { Logger } from './logger.js';
export { createRedisClient, redisKey, checkRedisHealth } from './redis.js';
export type { RedisClient, RedisKeyspace } from './redis.js';
export { createDatabase, checkDatabaseHealth } from './database.js';
export type { SqliteDatabase } from './database.js';
export { createEvmContext, checkRpcHealth } from './evm.js';
export type { EvmContext, ChainContext } from './evm.js';
export type { Container } from './container.js';
