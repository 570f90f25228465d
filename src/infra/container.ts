import type { RedisClient } from './redis.js';
import type { Logger } from './logger.js';
import type { SqliteDatabase } from './database.js';
import type { EvmContext } from './evm.js';
import type { ChainGateway } from '../services/chain-gateway.js';
import type { RiskParameters, TradingParameters } from '../types/risk.js';

export interface Container {
  logger: Logger;
  db: SqliteDatabase;
  redis: RedisClient;
  redisKeyPrefix: string;
  evm: EvmContext;
  gateway: ChainGateway;
  riskParams: RiskParameters;
  tradingParams: TradingParameters;
}
