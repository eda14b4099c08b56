import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /healthz — liveness probe. The relay keeps no connections, so being
 * able to answer is the whole check.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/healthz',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ status: 'ok' });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
