import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { RecordStore } from '../../application/index.js';

export interface StorePluginOptions {
  store: RecordStore;
  /** Releases the store's resources when the server closes. */
  release?: () => Promise<void>;
}

/**
 * Fastify plugin that exposes the record store to routes.
 *
 * Decorates `fastify.store`. Runs `release` on server shutdown.
 */
async function storePlugin(fastify: FastifyInstance, options: StorePluginOptions): Promise<void> {
  fastify.decorate('store', options.store);

  const { release } = options;
  if (release !== undefined) {
    fastify.addHook('onClose', async () => {
      await release();
      fastify.log.info('Record store released');
    });
  }
}

export default fp(storePlugin, {
  name: 'record-store',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.store` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    store: RecordStore;
  }
}
