/**
 * Query log routes
 */

import type { Router } from './router.js';
import type { QueryLogDatabase } from '../../storage/index.js';
import { sendJson, sendError, parseLimit } from '../utils/http.js';

export function registerQueryRoutes(router: Router, database: QueryLogDatabase | null): void {
  router.add('GET', '/api/queries', (_req, res, { query }) => {
    if (!database) {
      sendError(res, 503, 'Query log not enabled');
      return;
    }
    const limit = parseLimit(query.get('limit'), 20);
    sendJson(res, 200, { queries: database.getRecentQueries(limit) });
  });

  router.add('GET', '/api/queries/stats', (_req, res) => {
    if (!database) {
      sendError(res, 503, 'Query log not enabled');
      return;
    }
    sendJson(res, 200, database.getQueryStats());
  });
}
