import { z } from 'zod';

const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'Invalid EVM address');

const chainId = z.coerce.number().int().positive();

const actor = z.string().min(1).max(64).default('api');

export const idParamsSchema = z.object({
  id: z.string().min(1).max(64),
});

export const positionsQuerySchema = z.object({
  status: z.enum(['HOLDING', 'EXIT_PENDING', 'CLOSED']).optional(),
});

export const tokensQuerySchema = z.object({
  chainId: chainId.optional(),
});

export const executionsQuerySchema = z.object({
  positionId: z.string().min(1).optional(),
  status: z.enum(['PENDING', 'SUBMITTED', 'CONFIRMED', 'FAILED', 'REFUSED']).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export const addSenderSchema = z.object({
  address,
  label: z.string().max(255).optional(),
  actor,
});

export const senderParamsSchema = z.object({
  address,
});

export const removeSenderQuerySchema = z.object({
  actor,
});

const tokenStatus = z.enum(['pending', 'active', 'completed', 'blocked']);

export const whitelistTokensQuerySchema = z.object({
  status: tokenStatus.optional(),
});

export const tokenStatusParamsSchema = z.object({
  chainId,
  address,
});

export const tokenStatusBodySchema = z.object({
  status: tokenStatus,
  actor,
});

export const auditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const controlBodySchema = z
  .object({
    actor,
  })
  .default({});

export const buySchema = z.object({
  tokenAddress: address,
  chainId: z.number().int().positive(),
  /** Raw units of the chain's quote token, as a decimal string. */
  quoteAmount: z.string().regex(/^[1-9]\d*$/, 'Must be a positive integer in raw units'),
  maxSlippageBps: z.number().int().min(1).max(10_000).optional(),
});
