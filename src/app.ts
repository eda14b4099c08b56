import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import { healthRoutes, webhookRoutes } from './interfaces/http/index.js';
import { createMessageDispatcher } from './infrastructure/notifications/index.js';
import type { MessageDispatcher, RelayConfig } from './infrastructure/notifications/index.js';

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
  /** Replaces webhook delivery; tests pass a spy here. */
  deliver?: MessageDispatcher;
}

/**
 * Builds the Fastify instance without listening.
 *
 * Order:
 * 1) Logger + delivery
 * 2) HTTP routes
 */
export async function buildServer(
  config: RelayConfig,
  options: BuildServerOptions = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
  });

  const deliver = options.deliver ?? createMessageDispatcher(config, fastify.log);

  await fastify.register(healthRoutes);
  await fastify.register(webhookRoutes, {
    links: {
      baseUrl: config.backlog.base_url,
      projectPrefix: config.backlog.project_prefix,
    },
    deliver,
  });

  return fastify;
}
