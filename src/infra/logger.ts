import pino from 'pino';
import type { EnvConfig } from '../config/env.js';
import { CHAINS } from '../config/chains.js';

export type Logger = pino.Logger;

export function createLogger(config: Pick<EnvConfig, 'LOG_LEVEL' | 'NODE_ENV'>): Logger {
  return pino({
    name: 'position-trader',
    level: config.LOG_LEVEL,
    enabled: config.NODE_ENV !== 'test',
    base: { pid: process.pid, env: config.NODE_ENV },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: ['privateKey', 'WALLET_PRIVATE_KEY', '*.privateKey', 'signer', 'config.WALLET_PRIVATE_KEY'],
      censor: '[REDACTED]',
    },
  });
}

/** Child logger bound to one chain, for RPC and transaction logs. */
export function chainLogger(logger: Logger, chainId: number): Logger {
  return logger.child({ chainId, chain: CHAINS[chainId]?.name ?? 'unknown' });
}
