import type { FastifyInstance } from 'fastify';
import type { ExecutionEngine } from '../../modules/execution-engine/execution-engine.service.js';
import { executionsQuerySchema, idParamsSchema } from '../schemas.js';

export async function executionRoutes(app: FastifyInstance, executionEngine: ExecutionEngine): Promise<void> {
  app.get('/executions', async (request, reply) => {
    const parsed = executionsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    return reply.send(executionEngine.listExecutions(parsed.data));
  });

  app.get('/executions/:id', async (request, reply) => {
    const parsed = idParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    const execution = executionEngine.getExecution(parsed.data.id);
    if (!execution) {
      return reply.status(404).send({ error: 'Execution not found' });
    }

    return reply.send(execution);
  });
}
