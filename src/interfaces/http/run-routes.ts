import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getRunOverview } from '../../application/index.js';

/**
 * GET /runs/:run_id — run details, HITs and merged assignments.
 */
async function runRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/runs/:run_id',
    async (
      request: FastifyRequest<{ Params: { run_id: string } }>,
      reply: FastifyReply,
    ) => {
      const overview = await getRunOverview(fastify.store, request.params.run_id, request.log);

      if (overview === null) {
        return reply.status(404).send({ error: 'Run not found' });
      }

      return reply.status(200).send(overview);
    },
  );
}

export default fp(runRoutes, {
  name: 'run-routes',
  dependencies: ['record-store'],
  fastify: '5.x',
});
