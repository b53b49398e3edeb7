/**
 * API server assembly
 */

import { createServer, type Server } from 'http';
import { createRouter, type RouterDeps } from './routes/index.js';
import { sendError, setCorsHeaders } from './utils/http.js';

/**
 * Build the HTTP server. Listening is left to the caller.
 */
export function createApiServer(deps: RouterDeps): Server {
  const router = createRouter(deps);

  return createServer((req, res) => {
    setCorsHeaders(res);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    router
      .handle(req, res, url)
      .then((handled) => {
        if (!handled) {
          sendError(res, 404, 'Not found');
        }
      })
      .catch((error: unknown) => {
        console.error('[Server] Request failed:', error);
        if (!res.headersSent) {
          sendError(res, 500, 'Internal server error');
        }
      });
  });
}
