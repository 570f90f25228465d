import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const rpcUrl = z.string().url().optional().or(z.literal('').transform(() => undefined));

export const envSchema = z
  .object({
    MAINNET_RPC_URL: rpcUrl,
    BASE_RPC_URL: rpcUrl,
    ARBITRUM_RPC_URL: rpcUrl,
    OPTIMISM_RPC_URL: rpcUrl,
    POLYGON_RPC_URL: rpcUrl,
    SEPOLIA_RPC_URL: rpcUrl,
    BASE_SEPOLIA_RPC_URL: rpcUrl,
    ARBITRUM_SEPOLIA_RPC_URL: rpcUrl,

    WALLET_PRIVATE_KEY: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, 'Expected a 32-byte hex key'),

    DATABASE_PATH: z.string().default('./data/trader.db'),
    REDIS_URL: z.string(),
    REDIS_KEY_PREFIX: z.string().default('trader'),

    API_HOST: z.string().default('127.0.0.1'),
    API_PORT: z.coerce.number().int().min(1).max(65535).default(4000),

    TAKE_PROFIT_PCT: z.coerce.number().positive().max(10).default(0.02),
    STOP_LOSS_PCT: z.coerce.number().positive().lt(1).default(0.02),
    GAS_RESERVE_NATIVE: z.coerce.number().min(0).default(0.01),
    MAX_SLIPPAGE_BPS: z.coerce.number().int().min(1).max(10000).default(300),
    EXECUTION_COOLDOWN_MS: z.coerce.number().int().min(0).default(30_000),

    MONITOR_TICK_MS: z.coerce.number().int().min(1000).default(15_000),
    PRICE_READ_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    PRICE_READ_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
    RPC_TIMEOUT_MS: z.coerce.number().int().min(1000).default(15_000),
    SWAP_GAS_LIMIT: z.coerce.number().int().min(21_000).default(600_000),
    SWAP_DEADLINE_SECONDS: z.coerce.number().int().min(30).default(300),

    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
      .default('info'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${messages}`);
  }

  const hasRpc = Object.entries(result.data).some(
    ([key, value]) => key.endsWith('_RPC_URL') && typeof value === 'string',
  );
  if (!hasRpc) {
    throw new Error('At least one *_RPC_URL must be set');
  }

  return result.data;
}
