/**
 * HTTP router for the API server
 * Supports exact paths and parameterized paths
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { matchPath, sendError } from '../utils/http.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type RouteParams = Record<string, string>;

export interface RouteContext {
  params: RouteParams;
  query: URLSearchParams;
}

export type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  ctx: RouteContext
) => void | Promise<void>;

interface ParamRouteEntry {
  method: HttpMethod;
  pattern: string;
  handler: RouteHandler;
}

function isHttpMethod(method: string | undefined): method is HttpMethod {
  return method === 'GET' || method === 'POST' || method === 'DELETE';
}

/**
 * Matches requests to handlers. Exact paths are checked before
 * parameterized ones. Handler failures become 500 responses.
 */
export class Router {
  private exactRoutes: Map<string, RouteHandler> = new Map();
  private paramRoutes: ParamRouteEntry[] = [];

  /**
   * Example: router.add('GET', '/health', handler)
   */
  add(method: HttpMethod, path: string, handler: RouteHandler): void {
    this.exactRoutes.set(`${method}:${path}`, handler);
  }

  /**
   * Example: router.addParam('DELETE', '/api/config/overrides/:path', handler)
   */
  addParam(method: HttpMethod, pattern: string, handler: RouteHandler): void {
    this.paramRoutes.push({ method, pattern, handler });
  }

  private find(method: HttpMethod, pathname: string): { handler: RouteHandler; params: RouteParams } | null {
    const exact = this.exactRoutes.get(`${method}:${pathname}`);
    if (exact) return { handler: exact, params: {} };

    for (const route of this.paramRoutes) {
      if (route.method !== method) continue;
      const params = matchPath(pathname, route.pattern);
      if (params) return { handler: route.handler, params };
    }

    return null;
  }

  /**
   * Handle a request. Resolves false if no route matched (caller should 404).
   */
  async handle(req: IncomingMessage, res: ServerResponse, url: URL): Promise<boolean> {
    if (!isHttpMethod(req.method)) return false;

    const match = this.find(req.method, url.pathname);
    if (!match) return false;

    try {
      await match.handler(req, res, { params: match.params, query: url.searchParams });
    } catch (error) {
      console.error(`[Router] ${req.method} ${url.pathname} failed:`, error);
      if (!res.headersSent) {
        sendError(res, 500, 'Internal server error');
      }
    }
    return true;
  }
}
