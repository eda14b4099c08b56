import { buildServer } from './app.js';
import { loadRelayConfig } from './infrastructure/notifications/index.js';

/**
 * Bootstrap the relay.
 *
 * Order:
 * 1) Configuration (config/relay.yaml + environment)
 * 2) Server + routes
 * 3) Shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadRelayConfig();
  const fastify = await buildServer(config);

  fastify.log.info(
    {
      backlog_base_url: config.backlog.base_url,
      project_prefix: config.backlog.project_prefix,
      backlog_delivery: config.backlog.webhook_url !== '',
      kibela_delivery: config.kibela.webhook_url !== '',
    },
    'Relay config loaded',
  );

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({
    host,
    port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
