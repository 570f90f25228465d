import type { FastifyInstance } from 'fastify';
import type { Registry } from '../../modules/registry/registry.service.js';
import { tokensQuerySchema } from '../schemas.js';

export async function tokenRoutes(app: FastifyInstance, registry: Registry): Promise<void> {
  app.get('/tokens', async (request, reply) => {
    const parsed = tokensQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    const tokens = registry.listTokens(parsed.data.chainId).map((token) => ({
      ...token,
      pools: registry.getPools(token.address, token.chainId),
    }));
    return reply.send(tokens);
  });
}
