/**
 * Config routes
 * Current route tool options and the persisted overrides
 */

import { z } from 'zod';
import type { Router } from './router.js';
import type { RouteToolConfig } from '../../core/types.js';
import { sendJson, sendError, parseJsonBody } from '../utils/http.js';
import {
  loadOverrides,
  addOverride,
  removeOverride,
  clearOverrides,
  getOverridesPath,
  routeToolConfigSchema,
} from '../../config/overrides.js';

const overrideBodySchema = z.object({
  path: routeToolConfigSchema.keyof(),
  value: z.unknown(),
});

export function registerConfigRoutes(router: Router, routeConfig: RouteToolConfig): void {
  router.add('GET', '/api/config', (_req, res) => {
    sendJson(res, 200, routeConfig);
  });

  router.add('GET', '/api/config/overrides', (_req, res) => {
    sendJson(res, 200, {
      ...loadOverrides(),
      filePath: getOverridesPath(),
    });
  });

  router.add('POST', '/api/config/overrides', async (req, res) => {
    const body = await parseJsonBody(req);
    if (!body.ok) {
      sendError(res, 400, body.reason);
      return;
    }

    const parsed = overrideBodySchema.safeParse(body.value);
    if (!parsed.success) {
      sendError(res, 400, 'path must name a route option');
      return;
    }

    const { path, value } = parsed.data;
    if (!addOverride({ path, newValue: value, source: 'api' })) {
      sendError(res, 400, `Invalid value for ${path}`);
      return;
    }

    sendJson(res, 200, {
      success: true,
      message: `Override for ${path} saved. Restart server to apply.`,
    });
  });

  router.add('DELETE', '/api/config/overrides', (_req, res) => {
    if (clearOverrides()) {
      sendJson(res, 200, {
        success: true,
        message: 'All config overrides cleared. Restart server to apply default config.',
      });
    } else {
      sendError(res, 500, 'Failed to clear overrides');
    }
  });

  router.addParam('DELETE', '/api/config/overrides/:path', (_req, res, { params }) => {
    const success = removeOverride(params.path);
    sendJson(res, 200, {
      success,
      message: success
        ? `Override for ${params.path} removed. Restart server to apply.`
        : `No override found for ${params.path}`,
    });
  });
}
