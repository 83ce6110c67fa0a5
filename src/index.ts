import { buildServer } from './app.js';
import {
  createDbClient,
  ensureSchema,
  loadConfig,
  PgRecordStore,
} from './infrastructure/index.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Configuration
 * 2) Record store (schema bootstrap)
 * 3) Server assembly
 * 4) listen()
 * 5) Signal handlers
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const { sql, db } = createDbClient(config.databaseUrl);
  await ensureSchema(sql);

  const fastify = await buildServer({
    config,
    store: new PgRecordStore(db),
    releaseStore: async () => {
      await sql.end();
    },
  });

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  fastify.log.info(
    { debug: config.debug },
    `Dashboard available at http://${config.host}:${config.port}/app/tasks`,
  );

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
