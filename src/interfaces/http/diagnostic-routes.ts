import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/**
 * GET /error/* — fault injection. Always throws, carrying the captured
 * text, so the top-level error handling can be exercised end to end.
 */
async function diagnosticRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/error/*',
    async (request: FastifyRequest<{ Params: { '*': string } }>) => {
      const text = request.params['*'];
      throw new Error(text === '' ? 'test error' : text);
    },
  );
}

export default fp(diagnosticRoutes, {
  name: 'diagnostic-routes',
  fastify: '5.x',
});
