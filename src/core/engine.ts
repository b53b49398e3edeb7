/**
 * Trade Route Engine
 * Runs one route query: validate → build candidates → optimize → shape
 */

import type {
  CatalogSnapshot,
  RouteQueryResult,
  RouteToolConfig,
  TerminalId,
  TradeConstraints,
  Timestamp,
} from './types.js';
import { InvalidInputError, NoCatalogDataError } from './errors.js';
import { buildCandidateLegs, resolveLocationTerminals } from '../systems/candidate-graph.js';
import { optimizeRoutes } from '../systems/route-optimizer.js';
import { shapeRouteResult } from '../systems/result-shaper.js';

export interface QueryOptions {
  /** Caller may discard the query; checked between phases */
  signal?: AbortSignal;
}

/**
 * Receives every finished query (e.g. the query log)
 */
export interface QueryRecorder {
  recordQuery(constraints: TradeConstraints, result: RouteQueryResult, durationMs: number): void;
}

export interface EngineOptions {
  /** Clock used for availability estimates */
  now?: () => Timestamp;
  recorder?: QueryRecorder;
}

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(field, `${field} must be a positive number`);
  }
}

/**
 * Reject malformed constraints before any computation
 */
export function validateConstraints(constraints: TradeConstraints): void {
  requirePositive('budget', constraints.budget);
  requirePositive('cargoCapacityScu', constraints.ship.cargoCapacityScu);

  if (constraints.routeCount !== undefined) {
    if (!Number.isInteger(constraints.routeCount) || constraints.routeCount < 1) {
      throw new InvalidInputError('routeCount', 'routeCount must be a positive integer');
    }
  }
}

function checkAborted(signal: AbortSignal | undefined): void {
  signal?.throwIfAborted();
}

export class TradeRouteEngine {
  private config: RouteToolConfig;
  private now: () => Timestamp;
  private recorder: QueryRecorder | null;

  constructor(config: RouteToolConfig, options: EngineOptions = {}) {
    this.config = config;
    this.now = options.now ?? Date.now;
    this.recorder = options.recorder ?? null;
  }

  getConfig(): RouteToolConfig {
    return this.config;
  }

  /**
   * Compute ranked routes. Throws InvalidInputError / NoCatalogDataError;
   * see findRoutes for the status-returning variant.
   */
  computeRoutes(
    snapshot: CatalogSnapshot,
    constraints: TradeConstraints,
    options: QueryOptions = {}
  ): RouteQueryResult {
    validateConstraints(constraints);

    if (snapshot.commodities.length === 0 || snapshot.terminals.length === 0) {
      throw new NoCatalogDataError();
    }

    let buyTerminalIds: Set<TerminalId> | undefined;
    if (constraints.location !== undefined) {
      buyTerminalIds = resolveLocationTerminals(snapshot.terminals, constraints.location);
      if (buyTerminalIds.size === 0) {
        throw new InvalidInputError('location', `Unknown location: ${constraints.location}`);
      }
    }

    const legs = buildCandidateLegs(snapshot, constraints, {
      now: this.now(),
      buyTerminalIds,
      availability: {
        enabled: constraints.useEstimatedAvailability ?? this.config.useEstimatedAvailability,
        horizonHours: this.config.availabilityHorizonHours,
      },
    });
    checkAborted(options.signal);

    const optimized = optimizeRoutes(legs, {
      limit: constraints.routeCount ?? this.config.commodityRouteDefaultCount,
    });
    checkAborted(options.signal);

    return shapeRouteResult(optimized, {
      advancedInfo: constraints.advancedInfo ?? this.config.advancedInfo,
      requestedCount: constraints.routeCount,
      maxListEntries: this.config.maxListEntries,
    });
  }

  /**
   * Compute routes, reporting invalid input and missing catalog data as statuses.
   * Any other error propagates.
   */
  findRoutes(
    snapshot: CatalogSnapshot,
    constraints: TradeConstraints,
    options: QueryOptions = {}
  ): RouteQueryResult {
    const startedAt = performance.now();
    let result: RouteQueryResult;

    try {
      result = this.computeRoutes(snapshot, constraints, options);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        result = failure('invalid-input', error.message);
      } else if (error instanceof NoCatalogDataError) {
        result = failure('no-catalog-data', error.message);
      } else {
        throw error;
      }
    }

    const durationMs = performance.now() - startedAt;
    console.log(
      `[TradeRouteEngine] ${result.status}: ${result.routes.length}/${result.totalAvailable} routes ` +
        `(capacity ${constraints.ship.cargoCapacityScu} SCU, budget ${constraints.budget}) in ${durationMs.toFixed(1)}ms`
    );
    this.recorder?.recordQuery(constraints, result, durationMs);

    return result;
  }
}

function failure(status: 'invalid-input' | 'no-catalog-data', message: string): RouteQueryResult {
  return {
    status,
    routes: [],
    totalAvailable: 0,
    truncated: false,
    notices: [message],
    error: message,
  };
}
