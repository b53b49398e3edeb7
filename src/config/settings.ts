/**
 * Runtime settings
 * Environment-driven configuration for the CLI and API server
 */

import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import type { z } from 'zod';
import type { RouteToolConfig } from '../core/types.js';
import { applyOverridesToConfig, routeToolConfigSchema } from './overrides.js';

// ============================================================================
// Route Tool Defaults
// ============================================================================

/**
 * Defaults of the commodity route and profit calculation tools
 */
export const DEFAULT_ROUTE_CONFIG: RouteToolConfig = {
  toolCommodityRoute: true,
  toolProfitCalculation: true,
  commodityRouteDefaultCount: 1,
  useEstimatedAvailability: true,
  advancedInfo: false,
  maxListEntries: 5,
  availabilityHorizonHours: 24,
};

function envFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

function envInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Keep an environment-supplied option only if it is a valid value for that option
 */
function checkedOption<K extends keyof RouteToolConfig>(
  key: K,
  value: RouteToolConfig[K]
): RouteToolConfig[K] {
  const schema: z.ZodTypeAny = routeToolConfigSchema.shape[key];
  if (schema.safeParse(value).success) {
    return value;
  }
  console.warn(`[Config] Invalid ${key}: ${String(value)}, using ${String(DEFAULT_ROUTE_CONFIG[key])}`);
  return DEFAULT_ROUTE_CONFIG[key];
}

// ============================================================================
// Process Configuration
// ============================================================================

export const config = {
  PORT: envInt(process.env.PORT, 3001),
  CATALOG_PATH: process.env.CATALOG_PATH || 'data/catalog.json',
  DB_PATH: process.env.DB_PATH || 'route-queries.db',
  DB_ENABLED: envFlag(process.env.DB_ENABLED, true),
};

/**
 * Build the route tool configuration from defaults, environment and overrides file.
 * Later sources win.
 */
export function loadRouteConfig(env: NodeJS.ProcessEnv = process.env): RouteToolConfig {
  const routeConfig: RouteToolConfig = {
    ...DEFAULT_ROUTE_CONFIG,
    toolCommodityRoute: envFlag(env.TOOL_COMMODITY_ROUTE, DEFAULT_ROUTE_CONFIG.toolCommodityRoute),
    toolProfitCalculation: envFlag(env.TOOL_PROFIT_CALCULATION, DEFAULT_ROUTE_CONFIG.toolProfitCalculation),
    commodityRouteDefaultCount: checkedOption(
      'commodityRouteDefaultCount',
      envInt(env.ROUTE_DEFAULT_COUNT, DEFAULT_ROUTE_CONFIG.commodityRouteDefaultCount)
    ),
    useEstimatedAvailability: envFlag(
      env.ROUTE_USE_ESTIMATED_AVAILABILITY,
      DEFAULT_ROUTE_CONFIG.useEstimatedAvailability
    ),
    advancedInfo: envFlag(env.ROUTE_ADVANCED_INFO, DEFAULT_ROUTE_CONFIG.advancedInfo),
  };

  return applyOverridesToConfig(routeConfig);
}
