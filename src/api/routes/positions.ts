import type { FastifyInstance } from 'fastify';
import type { StateEngine } from '../../modules/state-engine/state-engine.service.js';
import type { PositionMonitor } from '../../modules/position-monitor/position-monitor.service.js';
import type { ExecutionEngine } from '../../modules/execution-engine/execution-engine.service.js';
import type { PositionState } from '../../types/position.js';
import { idParamsSchema, positionsQuerySchema } from '../schemas.js';
import { serializePosition } from '../serializers.js';

export async function positionRoutes(
  app: FastifyInstance,
  stateEngine: StateEngine,
  monitor: PositionMonitor,
  executionEngine: ExecutionEngine,
): Promise<void> {
  const view = (position: PositionState) =>
    serializePosition(
      position,
      monitor.latestPrice(position.id),
      monitor.unrealizedPnl(position),
      monitor.exitBlock(position.id) ?? null,
    );

  app.get('/positions', async (request, reply) => {
    const parsed = positionsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: parsed.error.format(),
      });
    }

    const positions = stateEngine.listPositions(parsed.data.status);
    return reply.send(positions.map(view));
  });

  app.get('/positions/:id', async (request, reply) => {
    const parsed = idParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    const position = stateEngine.getPosition(parsed.data.id);
    if (!position) {
      return reply.status(404).send({ error: 'Position not found' });
    }

    return reply.send({
      ...view(position),
      executions: executionEngine.listExecutions({ positionId: position.id }),
    });
  });
}
