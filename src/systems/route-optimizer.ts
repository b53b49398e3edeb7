/**
 * Route Optimizer
 * Ranks candidate legs and selects the top routes
 */

import type { CandidateLeg, OptimizedRoutes, RankedRoute } from '../core/types.js';

export interface OptimizerOptions {
  /** Maximum routes to return; at least one is returned when any is profitable */
  limit: number;
  /** Hours over which data freshness halves the score */
  freshnessHalfLifeHours?: number;
}

const DEFAULT_FRESHNESS_HALF_LIFE_HOURS = 24;

/**
 * Ranking order: descending profit, descending margin, ascending buy terminal id.
 * Sell terminal and commodity ids settle any remaining ties.
 */
export function compareLegs(a: CandidateLeg, b: CandidateLeg): number {
  if (a.profit.absoluteProfit !== b.profit.absoluteProfit) {
    return b.profit.absoluteProfit - a.profit.absoluteProfit;
  }
  if (a.profit.profitMarginPct !== b.profit.profitMarginPct) {
    return b.profit.profitMarginPct - a.profit.profitMarginPct;
  }
  return (
    compareIds(a.buyTerminal.id, b.buyTerminal.id) ||
    compareIds(a.sellTerminal.id, b.sellTerminal.id) ||
    compareIds(a.commodity.id, b.commodity.id)
  );
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Desirability score: profit weighted by how much the underlying
 * prices can be trusted.
 * - monitored terminals: 0.5 base + 0.25 per monitored end
 * - freshness: halves every `halfLifeHours` of report age
 */
export function scoreLeg(leg: CandidateLeg, halfLifeHours: number = DEFAULT_FRESHNESS_HALF_LIFE_HOURS): number {
  const confidence =
    0.5 + (leg.buyTerminal.isMonitored ? 0.25 : 0) + (leg.sellTerminal.isMonitored ? 0.25 : 0);
  const freshness = Math.pow(0.5, leg.dataAgeHours / halfLifeHours);
  return Math.round(leg.profit.absoluteProfit * confidence * freshness);
}

/**
 * Keep profitable legs, rank them and take the top `limit`
 */
export function optimizeRoutes(legs: readonly CandidateLeg[], options: OptimizerOptions): OptimizedRoutes {
  const profitable = legs.filter((leg) => leg.profit.absoluteProfit > 0);

  if (profitable.length === 0) {
    return { status: 'ok-no-profitable-route', routes: [], totalProfitable: 0 };
  }

  const ranked = [...profitable].sort(compareLegs);
  const limit = Math.max(1, Math.floor(options.limit));
  const halfLife = options.freshnessHalfLifeHours ?? DEFAULT_FRESHNESS_HALF_LIFE_HOURS;

  const routes: RankedRoute[] = ranked.slice(0, limit).map((leg, i) => ({
    ...leg,
    rank: i + 1,
    score: scoreLeg(leg, halfLife),
  }));

  return {
    status: 'ok-with-routes',
    routes,
    totalProfitable: profitable.length,
  };
}
