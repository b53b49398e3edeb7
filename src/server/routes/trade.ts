/**
 * Trade tool routes
 * Thin HTTP wrappers around the route and profit tools
 */

import type { Router } from './router.js';
import type { RouteTools } from '../../tools/route-tools.js';
import { sendJson, sendError, parseJsonBody } from '../utils/http.js';

const STATUS_CODES: Record<string, number> = {
  'ok-with-routes': 200,
  'ok-no-profitable-route': 200,
  ok: 200,
  'invalid-input': 400,
  'tool-disabled': 403,
  'no-catalog-data': 503,
};

export function registerTradeRoutes(router: Router, tools: RouteTools): void {
  // Ranked commodity routes
  router.add('POST', '/api/routes', async (req, res) => {
    const body = await parseJsonBody(req);
    if (!body.ok) {
      sendError(res, 400, body.reason);
      return;
    }

    const result = await tools.commodityRoute(body.value);
    sendJson(res, STATUS_CODES[result.status] ?? 200, result);
  });

  // Profit figures for a buy/sell pair
  router.add('POST', '/api/profit', async (req, res) => {
    const body = await parseJsonBody(req);
    if (!body.ok) {
      sendError(res, 400, body.reason);
      return;
    }

    const result = tools.profitCalculation(body.value);
    sendJson(res, STATUS_CODES[result.status] ?? 200, result);
  });
}
