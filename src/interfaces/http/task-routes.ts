import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listRuns } from '../../application/index.js';

/**
 * Task (run) listing routes.
 *
 * GET  /tasks — every recorded run
 * POST /tasks — echoes the decoded JSON body (diagnostic)
 */
async function taskRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/tasks',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const rows = await listRuns(fastify.store);
      return reply.status(200).send(rows);
    },
  );

  fastify.post(
    '/tasks',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      return reply.status(200).send({ t: 'testing!', req: request.body ?? null });
    },
  );
}

export default fp(taskRoutes, {
  name: 'task-routes',
  dependencies: ['record-store'],
  fastify: '5.x',
});
