import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listWorkers, getWorkerOverview } from '../../application/index.js';

/**
 * Worker routes.
 *
 * GET /workers             — every known worker
 * GET /workers/:worker_id  — worker details and merged assignments
 */
async function workerRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/workers',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const rows = await listWorkers(fastify.store);
      return reply.status(200).send(rows);
    },
  );

  fastify.get(
    '/workers/:worker_id',
    async (
      request: FastifyRequest<{ Params: { worker_id: string } }>,
      reply: FastifyReply,
    ) => {
      const overview = await getWorkerOverview(fastify.store, request.params.worker_id, request.log);

      if (overview === null) {
        return reply.status(404).send({ error: 'Worker not found' });
      }

      return reply.status(200).send(overview);
    },
  );
}

export default fp(workerRoutes, {
  name: 'worker-routes',
  dependencies: ['record-store'],
  fastify: '5.x',
});
