/**
 * Route Result Shaper
 *
 * Turns ranked routes into the record set handed to the assistant layer.
 * Output is read aloud downstream, so negative percentages are written
 * as "minus N%" and every truncated list says how many entries exist.
 */

import type {
  AdvancedRouteInfo,
  OptimizedRoutes,
  RankedRoute,
  RouteQueryResult,
  RouteView,
  TerminalLocation,
  TerminalStockStatus,
} from '../core/types.js';

export const DEFAULT_MAX_LIST_ENTRIES = 5;

export interface ShapeOptions {
  advancedInfo: boolean;
  /** Count explicitly requested by the caller, lifts the list cap */
  requestedCount?: number;
  maxListEntries?: number;
}

export interface CappedList<T> {
  items: T[];
  total: number;
  truncated: boolean;
}

/**
 * Cap a list for display. Applies to every list-producing tool:
 * at most `maxEntries` items unless the caller asked for a count.
 * `total` defaults to the list length when the list is already pre-limited
 * and the true count is known separately.
 */
export function capList<T>(
  items: readonly T[],
  options: { requested?: number; maxEntries?: number; total?: number } = {}
): CappedList<T> {
  const cap = options.requested ?? options.maxEntries ?? DEFAULT_MAX_LIST_ENTRIES;
  const total = Math.max(options.total ?? items.length, items.length);
  const kept = items.slice(0, Math.max(0, cap));
  return { items: kept, total, truncated: kept.length < total };
}

/**
 * Format a percentage for speech: 150 → "150%", -20 → "minus 20%"
 */
export function formatPercent(value: number): string {
  const rounded = Number(value.toFixed(1));
  if (rounded < 0) {
    return `minus ${Math.abs(rounded)}%`;
  }
  // toFixed can produce -0
  return `${Math.abs(rounded)}%`;
}

/**
 * "Port Tressler, microTech, Stanton" style location label
 */
export function formatLocation(location: TerminalLocation): string {
  const parts = [
    location.outpost,
    location.city,
    location.station,
    location.moon,
    location.planet,
    location.system,
  ];
  return parts.filter((p): p is string => p !== undefined && p.length > 0).join(', ');
}

/**
 * Buy status follows the last report. An emptied terminal whose stock is
 * projected to have recovered still reads "out of stock".
 */
function buyStatus(route: RankedRoute): TerminalStockStatus {
  return route.reportedStockScu < 1 ? 'out of stock' : 'available';
}

function sellStatus(route: RankedRoute): TerminalStockStatus {
  return route.estimatedDemandScu < 1 ? 'full inventory' : 'available';
}

function advancedInfo(route: RankedRoute): AdvancedRouteInfo {
  return {
    profitMargin: formatPercent(route.profit.profitMarginPct),
    baseProfit: formatPercent(route.profit.baseProfitPct),
    buyLocation: formatLocation(route.buyTerminal.location),
    sellLocation: formatLocation(route.sellTerminal.location),
    buyTerminalMonitored: route.buyTerminal.isMonitored,
    sellTerminalMonitored: route.sellTerminal.isMonitored,
    score: route.score,
    estimatedStockScu: Math.floor(route.estimatedStockScu),
    estimatedDemandScu: Math.floor(route.estimatedDemandScu),
    dataAgeHours: Number(route.dataAgeHours.toFixed(1)),
  };
}

export function toRouteView(route: RankedRoute, includeAdvanced: boolean): RouteView {
  const view: RouteView = {
    rank: route.rank,
    commodity: route.commodity.name,
    buyTerminal: route.buyTerminal.name,
    sellTerminal: route.sellTerminal.name,
    buyPrice: route.buyPrice,
    sellPrice: route.sellPrice,
    quantityScu: route.usableQuantity,
    investment: route.investment,
    profit: route.profit.absoluteProfit,
    buyStatus: buyStatus(route),
    sellStatus: sellStatus(route),
  };

  if (includeAdvanced) {
    view.advanced = advancedInfo(route);
  }

  return view;
}

/**
 * Notices the assistant must relay to the user
 */
function collectNotices(routes: RankedRoute[], listed: CappedList<RankedRoute>): string[] {
  const notices: string[] = [];

  if (listed.truncated) {
    notices.push(`Showing ${listed.items.length} of ${listed.total} available routes.`);
  }

  for (const route of listed.items) {
    if (route.estimatedDemandScu < route.usableQuantity) {
      notices.push(
        `${route.sellTerminal.name} may only accept ${Math.floor(route.estimatedDemandScu)} SCU of ` +
          `${route.commodity.name} (route #${route.rank} carries ${route.usableQuantity} SCU).`
      );
    }
  }

  if (routes.length === 0) {
    notices.push('No profitable route found for the given ship, budget and location.');
  }

  return notices;
}

/**
 * Shape optimizer output into a query result
 */
export function shapeRouteResult(optimized: OptimizedRoutes, options: ShapeOptions): RouteQueryResult {
  const listed = capList(optimized.routes, {
    requested: options.requestedCount,
    maxEntries: options.maxListEntries,
    total: optimized.totalProfitable,
  });

  return {
    status: optimized.status,
    routes: listed.items.map((route) => toRouteView(route, options.advancedInfo)),
    totalAvailable: optimized.totalProfitable,
    truncated: listed.truncated,
    notices: collectNotices(optimized.routes, listed),
  };
}
