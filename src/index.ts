/**
 * Public API
 */

export { TradeRouteEngine, validateConstraints } from './core/engine.js';
export type { EngineOptions, QueryOptions, QueryRecorder } from './core/engine.js';
export { TradeRouteError, InvalidInputError, NoCatalogDataError } from './core/errors.js';
export type * from './core/types.js';

export { calculateProfit, calculateBaseProfitPct } from './systems/profit.js';
export { estimateAvailability, estimateDemand } from './systems/availability.js';
export { isTradeable, canAccessCargo, rejectionReason } from './systems/legality.js';
export { buildCandidateLegs, resolveLocationTerminals } from './systems/candidate-graph.js';
export { optimizeRoutes, compareLegs } from './systems/route-optimizer.js';
export { shapeRouteResult, capList, formatPercent } from './systems/result-shaper.js';

export { parseCatalog, parseRouteRequest } from './catalog/schemas.js';
export { StaticCatalogProvider, FileCatalogProvider } from './catalog/provider.js';
export type { CatalogProvider } from './catalog/provider.js';

export { RouteTools } from './tools/route-tools.js';
export type { ProfitToolResult, RouteToolResult, ToolName } from './tools/route-tools.js';

export { DEFAULT_ROUTE_CONFIG, loadRouteConfig } from './config/settings.js';
export { QueryLogDatabase, createDatabase } from './storage/index.js';
