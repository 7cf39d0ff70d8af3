/**
 * Node HTTP host for the Fetch-API handler
 *
 * fastify owns the socket, access logging and lifecycle; every request is
 * converted to a Request, passed to App.fetch, and the Response copied back.
 */

import fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from 'fastify';
import type { App } from './index';

export interface ServerOptions {
  app: App;
  logger: FastifyBaseLogger;
}

// Routing never looks at the host, and a client's Host header may not parse
const REQUEST_BASE = 'http://localhost';

function toRequest(req: FastifyRequest): Request {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    headers.set(name, Array.isArray(value) ? value.join(', ') : value);
  }
  return new Request(`${REQUEST_BASE}${req.url}`, { method: req.method, headers });
}

async function sendResponse(reply: FastifyReply, response: Response): Promise<FastifyReply> {
  reply.status(response.status);
  response.headers.forEach((value, name) => {
    reply.header(name, value);
  });

  if (response.body === null) {
    return reply.send();
  }
  return reply.send(Buffer.from(await response.arrayBuffer()));
}

export function buildServer(options: ServerOptions): FastifyInstance {
  const server = fastify({
    loggerInstance: options.logger,
    exposeHeadRoutes: false,
    routerOptions: {
      // Origin URLs are embedded in the path and may be long
      maxParamLength: 8192,
    },
  });

  // Request bodies are never read; any content type is accepted and dropped
  server.removeAllContentTypeParsers();
  server.addContentTypeParser('*', (_req, _payload, done) => {
    done(null, undefined);
  });

  // Every method reaches the handler, which answers the ones it does not serve with 405
  server.all('/*', async (req, reply) => sendResponse(reply, await options.app.fetch(toRequest(req))));

  return server;
}

/**
 * Listen on the configured host and port; resolves with the bound address
 */
export async function startServer(server: FastifyInstance, host: string, port: number): Promise<string> {
  return server.listen({ host, port });
}
