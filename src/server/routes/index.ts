/**
 * Route composition
 * Creates and configures the main router with all route modules
 */

import { Router } from './router.js';
import { registerHealthRoutes } from './health.js';
import { registerTradeRoutes } from './trade.js';
import { registerQueryRoutes } from './queries.js';
import { registerConfigRoutes } from './config.js';
import type { RouteTools } from '../../tools/route-tools.js';
import type { QueryLogDatabase } from '../../storage/index.js';
import type { RouteToolConfig } from '../../core/types.js';

export interface RouterDeps {
  tools: RouteTools;
  routeConfig: RouteToolConfig;
  database: QueryLogDatabase | null;
}

/**
 * Create and configure the main router with all routes
 */
export function createRouter(deps: RouterDeps): Router {
  const router = new Router();

  registerHealthRoutes(router, deps.tools);
  registerTradeRoutes(router, deps.tools);
  registerQueryRoutes(router, deps.database);
  registerConfigRoutes(router, deps.routeConfig);

  return router;
}

export { Router } from './router.js';
export type { HttpMethod, RouteHandler, RouteParams, RouteContext } from './router.js';
