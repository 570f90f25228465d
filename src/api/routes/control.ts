import type { FastifyInstance } from 'fastify';
import type { ControlSignals } from '../../modules/control/control-signals.service.js';
import { controlBodySchema } from '../schemas.js';

export async function controlRoutes(app: FastifyInstance, signals: ControlSignals): Promise<void> {
  app.get('/control', async (_request, reply) => {
    return reply.send(await signals.status());
  });

  app.post('/control/stop', async (request, reply) => {
    const parsed = controlBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    await signals.requestStop(parsed.data.actor);
    return reply.status(202).send(await signals.status());
  });

  app.post('/control/sell-all', async (request, reply) => {
    const parsed = controlBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    await signals.requestSellAll(parsed.data.actor);
    return reply.status(202).send(await signals.status());
  });

  app.post('/control/clear-stop', async (_request, reply) => {
    await signals.clear('stop');
    return reply.send(await signals.status());
  });
}
