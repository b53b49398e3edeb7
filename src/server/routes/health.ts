/**
 * Health check routes
 */

import type { Router } from './router.js';
import type { RouteTools } from '../../tools/route-tools.js';
import { sendJson } from '../utils/http.js';

export function registerHealthRoutes(router: Router, tools: RouteTools): void {
  router.add('GET', '/health', (_req, res) => {
    sendJson(res, 200, { status: 'ok', tools: tools.availableTools() });
  });
}
