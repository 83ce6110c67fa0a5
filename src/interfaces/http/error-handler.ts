import type { FastifyError, FastifyInstance } from 'fastify';
import { renderErrorPage } from './templates.js';

export interface ErrorHandlerOptions {
  /** Answer 500s with a diagnostic page instead of an empty body. */
  debug: boolean;
  staticDir: string;
}

/**
 * Top-level handler for errors thrown out of routes.
 *
 * Client errors (4xx status on the error, e.g. an unparseable JSON body)
 * keep their status. Everything else is a 500: with the diagnostic page in
 * debug mode, with an empty body otherwise.
 */
export function registerErrorHandler(app: FastifyInstance, options: ErrorHandlerOptions): void {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const status = error.statusCode;

    if (status !== undefined && status >= 400 && status < 500) {
      request.log.warn({ err: error, url: request.url }, 'Request rejected');
      return reply.status(status).send({ error: error.message });
    }

    request.log.error({ err: error, method: request.method, url: request.url }, 'Unhandled request error');

    if (!options.debug) {
      return reply.status(500).send();
    }

    let page: string;
    try {
      page = renderErrorPage(options.staticDir, {
        message: error.message,
        trace: error.stack ?? String(error),
        method: request.method,
        url: request.url,
      });
    } catch (renderErr: unknown) {
      request.log.error({ err: renderErr }, 'Error page rendering failed');
      return reply.status(500).type('text/plain').send(error.stack ?? error.message);
    }

    return reply.status(500).type('text/html').send(page);
  });
}
