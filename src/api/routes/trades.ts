import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import type { Orchestrator } from '../../modules/orchestrator/orchestrator.service.js';
import { buySchema } from '../schemas.js';

export async function tradeRoutes(app: FastifyInstance, container: Container, orchestrator: Orchestrator): Promise<void> {
  app.post('/trades/buy', async (request, reply) => {
    const parsed = buySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    const input = parsed.data;
    container.logger.info(
      { token: input.tokenAddress, chainId: input.chainId, quoteAmount: input.quoteAmount },
      'Buy requested via API',
    );

    const result = await orchestrator.buy({
      tokenAddress: input.tokenAddress,
      chainId: input.chainId,
      quoteAmount: BigInt(input.quoteAmount),
      maxSlippageBps: input.maxSlippageBps,
    });

    return reply.status(result.status === 'CONFIRMED' ? 201 : 422).send(result);
  });
}
