import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import {
  BroadcastRouter,
  ConnectionRegistry,
  DashboardGateway,
} from '../../application/index.js';
import type { SnapshotProvider } from '../../application/index.js';
import { WebSocketServer } from './websocket-server.js';
import type { WebSocketServerOptions } from './websocket-server.js';

export interface LiveChannelOptions extends WebSocketServerOptions {
  snapshot?: SnapshotProvider;
}

export interface LiveChannel {
  registry: ConnectionRegistry;
  router: BroadcastRouter;
  gateway: DashboardGateway;
  server: WebSocketServer;
}

/**
 * Fastify plugin that owns the live channel.
 *
 * Builds the registry, router and gateway, attaches the WebSocket server
 * to the HTTP server's upgrade event, and decorates `fastify.live` so
 * routes can read connection counts or broadcast. Open connections are
 * closed before the HTTP server stops accepting.
 */
async function liveChannelPlugin(fastify: FastifyInstance, options: LiveChannelOptions): Promise<void> {
  const registry = new ConnectionRegistry(fastify.log.child({ component: 'registry' }));
  const router = new BroadcastRouter(registry, fastify.log.child({ component: 'broadcast' }));
  const gateway = new DashboardGateway({
    registry,
    router,
    log: fastify.log.child({ component: 'gateway' }),
    snapshot: options.snapshot,
  });

  const server = new WebSocketServer(gateway, fastify.log.child({ component: 'ws' }), {
    path: options.path,
    maxPayloadBytes: options.maxPayloadBytes,
  });
  server.attach(fastify.server);

  fastify.decorate('live', { registry, router, gateway, server });

  // Upgraded sockets keep the HTTP server's close() waiting, so they must
  // go before it runs.
  fastify.addHook('preClose', async () => {
    server.close();
    fastify.log.info('Live channel closed');
  });
}

export default fp(liveChannelPlugin, {
  name: 'live-channel',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.live` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    live: LiveChannel;
  }
}
