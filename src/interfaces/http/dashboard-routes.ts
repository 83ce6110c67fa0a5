import { existsSync, readFileSync, statSync } from 'node:fs';
import { extname, join, resolve, sep } from 'node:path';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { renderDashboardShell } from './templates.js';

export interface DashboardRoutesOptions {
  staticDir: string;
}

const MIME: Record<string, string> = {
  '.html': 'text/html',
  '.js':   'application/javascript',
  '.css':  'text/css',
  '.json': 'application/json',
  '.svg':  'image/svg+xml',
  '.png':  'image/png',
  '.ico':  'image/x-icon',
  '.map':  'application/json',
};

/**
 * Dashboard shell and assets.
 *
 * GET /           → redirect to /app/tasks
 * GET /app/*      → HTML shell; the client routes on the captured path
 * GET /static/*   → files from the static directory
 */
async function dashboardRoutes(fastify: FastifyInstance, options: DashboardRoutesOptions): Promise<void> {
  const staticDir = resolve(options.staticDir);

  fastify.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.redirect('/app/tasks');
  });

  fastify.get(
    '/app/*',
    async (request: FastifyRequest<{ Params: { '*': string } }>, reply: FastifyReply) => {
      const html = renderDashboardShell(staticDir, request.params['*']);
      return reply.type('text/html').send(html);
    },
  );

  fastify.get(
    '/static/*',
    async (request: FastifyRequest<{ Params: { '*': string } }>, reply: FastifyReply) => {
      const filePath = join(staticDir, request.params['*']);

      // Security: reject path traversal
      if (!filePath.startsWith(staticDir + sep)) {
        return reply.status(403).send({ error: 'Forbidden' });
      }

      if (!existsSync(filePath) || !statSync(filePath).isFile()) {
        return reply.status(404).send({ error: 'Not found' });
      }

      const mime = MIME[extname(filePath)] ?? 'application/octet-stream';
      return reply.type(mime).send(readFileSync(filePath));
    },
  );
}

export default fp(dashboardRoutes, {
  name: 'dashboard-routes',
  fastify: '5.x',
});
