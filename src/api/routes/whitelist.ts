import type { FastifyInstance } from 'fastify';
import type { WhitelistService } from '../../modules/whitelist/whitelist.service.js';
import {
  addSenderSchema,
  auditQuerySchema,
  removeSenderQuerySchema,
  senderParamsSchema,
  tokenStatusBodySchema,
  tokenStatusParamsSchema,
  whitelistTokensQuerySchema,
} from '../schemas.js';

export async function whitelistRoutes(app: FastifyInstance, whitelist: WhitelistService): Promise<void> {
  app.get('/whitelist/senders', async (_request, reply) => {
    return reply.send(whitelist.listSenders());
  });

  app.post('/whitelist/senders', async (request, reply) => {
    const parsed = addSenderSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    const { address, label, actor } = parsed.data;
    const sender = whitelist.addSender(address, label ?? null, actor);
    return reply.status(201).send(sender);
  });

  app.delete('/whitelist/senders/:address', async (request, reply) => {
    const params = senderParamsSchema.safeParse(request.params);
    const query = removeSenderQuerySchema.safeParse(request.query);
    if (!params.success) {
      return reply.status(400).send({ error: 'Validation failed', details: params.error.format() });
    }
    if (!query.success) {
      return reply.status(400).send({ error: 'Validation failed', details: query.error.format() });
    }

    const removed = whitelist.removeSender(params.data.address, query.data.actor);
    if (!removed) {
      return reply.status(404).send({ error: 'Sender not whitelisted' });
    }
    return reply.status(204).send();
  });

  app.get('/whitelist/tokens', async (request, reply) => {
    const parsed = whitelistTokensQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    return reply.send(whitelist.listTokens(parsed.data.status));
  });

  app.patch('/whitelist/tokens/:chainId/:address', async (request, reply) => {
    const params = tokenStatusParamsSchema.safeParse(request.params);
    const body = tokenStatusBodySchema.safeParse(request.body);
    if (!params.success) {
      return reply.status(400).send({ error: 'Validation failed', details: params.error.format() });
    }
    if (!body.success) {
      return reply.status(400).send({ error: 'Validation failed', details: body.error.format() });
    }

    const { address, chainId } = params.data;
    const token = whitelist.setTokenStatus(address, chainId, body.data.status, body.data.actor);
    if (!token) {
      return reply.status(404).send({ error: 'Token not whitelisted' });
    }
    return reply.send(token);
  });

  app.get('/whitelist/audit', async (request, reply) => {
    const parsed = auditQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.format() });
    }

    return reply.send(whitelist.listAudit(parsed.data.limit));
  });
}
