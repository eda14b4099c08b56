import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { transformEvent } from '../../application/index.js';
import {
  MalformedPayloadError,
  UnknownEventTypeError,
} from '../../domain/index.js';
import type { TransformResult, WebhookSource } from '../../domain/index.js';
import type { BacklogLinks } from '../../domain/backlog/index.js';
import type { MessageDispatcher } from '../../infrastructure/notifications/index.js';

export interface WebhookRouteOptions {
  links: BacklogLinks;
  deliver: MessageDispatcher;
}

/**
 * Webhook ingestion routes.
 *
 * POST /kibela  — Kibela outgoing webhook
 * POST /backlog — Backlog webhook
 *
 * Transforms synchronously, hands the message to delivery without
 * awaiting it and answers 200. Unknown event types answer 400, payloads
 * missing required structure answer 422.
 */
async function webhookRoutes(
  fastify: FastifyInstance,
  opts: WebhookRouteOptions,
): Promise<void> {

  const handle = (source: WebhookSource) =>
    async (request: FastifyRequest, reply: FastifyReply) => {
      let result: TransformResult;
      try {
        result = transformEvent(source, request.body, { links: opts.links, log: request.log });
      } catch (err: unknown) {
        if (err instanceof UnknownEventTypeError) {
          return reply.status(400).send({ mode: source, error: err.message });
        }
        if (err instanceof MalformedPayloadError) {
          return reply.status(422).send({ mode: source, error: err.message, issues: err.issues });
        }
        throw err;
      }

      if (!result.notify) {
        request.log.info({ source, reason: result.reason }, 'Webhook acknowledged without notification');
        return reply.status(200).send({ mode: source, skipped: true });
      }

      opts.deliver(source, result.message);
      return reply.status(200).send({ mode: source });
    };

  fastify.post('/kibela', handle('kibela'));
  fastify.post('/backlog', handle('backlog'));
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  fastify: '5.x',
});
