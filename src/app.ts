import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { RecordStore, SnapshotProvider } from './application/index.js';
import type { AppConfig } from './infrastructure/index.js';
import { storePlugin } from './infrastructure/index.js';
import {
  taskRoutes,
  runRoutes,
  workerRoutes,
  dashboardRoutes,
  diagnosticRoutes,
  healthRoutes,
  registerErrorHandler,
} from './interfaces/http/index.js';
import { liveChannelPlugin } from './interfaces/ws/index.js';

export interface BuildServerOptions {
  config: AppConfig;
  store: RecordStore;
  /** Releases the store on shutdown (e.g. ends the connection pool). */
  releaseStore?: () => Promise<void>;
  snapshot?: SnapshotProvider;
}

/**
 * Assembles the Fastify server without listening.
 *
 * Order:
 * 1) Error handler
 * 2) Record store and live channel
 * 3) HTTP routes
 */
export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  registerErrorHandler(fastify, { debug: config.debug, staticDir: config.staticDir });

  await fastify.register(storePlugin, { store: options.store, release: options.releaseStore });
  await fastify.register(liveChannelPlugin, { snapshot: options.snapshot });

  await fastify.register(taskRoutes);
  await fastify.register(runRoutes);
  await fastify.register(workerRoutes);
  await fastify.register(dashboardRoutes, { staticDir: config.staticDir });
  await fastify.register(diagnosticRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
