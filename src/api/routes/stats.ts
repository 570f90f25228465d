import type { FastifyInstance } from 'fastify';
import type { StateEngine } from '../../modules/state-engine/state-engine.service.js';
import type { Orchestrator } from '../../modules/orchestrator/orchestrator.service.js';

export async function statsRoutes(
  app: FastifyInstance,
  stateEngine: StateEngine,
  orchestrator: Orchestrator,
): Promise<void> {
  app.get('/stats', async (_request, reply) => {
    return reply.send({
      ...stateEngine.getStats(),
      loop: orchestrator.getStatus(),
    });
  });
}
