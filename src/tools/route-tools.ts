/**
 * Route Tools
 * The commodity route and profit calculation tools exposed to the
 * assistant layer. Arguments arrive untyped and are validated here.
 */

import type { CatalogProvider } from '../catalog/provider.js';
import { parseOrThrow, parseRouteRequest, profitRequestSchema } from '../catalog/schemas.js';
import type { TradeRouteEngine, QueryOptions } from '../core/engine.js';
import { InvalidInputError, NoCatalogDataError } from '../core/errors.js';
import type {
  CatalogSnapshot,
  RouteQueryResult,
  RouteToolConfig,
  TradeConstraints,
} from '../core/types.js';
import { calculateBaseProfitPct, calculateProfit } from '../systems/profit.js';
import { formatPercent } from '../systems/result-shaper.js';

export type ToolName = 'commodity_route' | 'profit_calculation';

export interface ProfitToolResult {
  status: 'ok' | 'invalid-input' | 'tool-disabled';
  buyPrice?: number;
  sellPrice?: number;
  quantity?: number;
  absoluteProfit?: number;
  profitMarginPct?: number;
  baseProfitPct?: number;
  /** Spoken forms, e.g. "minus 20%" */
  display?: {
    absoluteProfit?: string;
    profitMargin?: string;
    baseProfit: string;
  };
  error?: string;
}

export type RouteToolResult = RouteQueryResult | { status: 'tool-disabled'; error: string };

/**
 * "minus 1500" for losses, "1500" otherwise
 */
export function formatAmount(value: number): string {
  const rounded = Math.round(value);
  return rounded < 0 ? `minus ${Math.abs(rounded)}` : `${Math.abs(rounded)}`;
}

export class RouteTools {
  private engine: TradeRouteEngine;
  private catalog: CatalogProvider;

  constructor(engine: TradeRouteEngine, catalog: CatalogProvider) {
    this.engine = engine;
    this.catalog = catalog;
  }

  private get config(): RouteToolConfig {
    return this.engine.getConfig();
  }

  /**
   * Tools enabled by the current configuration
   */
  availableTools(): ToolName[] {
    const tools: ToolName[] = [];
    if (this.config.toolCommodityRoute) tools.push('commodity_route');
    if (this.config.toolProfitCalculation) tools.push('profit_calculation');
    return tools;
  }

  /**
   * Find the best trade routes for a ship, budget and optional location
   */
  async commodityRoute(args: unknown, options: QueryOptions = {}): Promise<RouteToolResult> {
    if (!this.config.toolCommodityRoute) {
      return { status: 'tool-disabled', error: 'Commodity route tool is disabled' };
    }

    let constraints: TradeConstraints;
    try {
      constraints = parseRouteRequest(args);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        return invalidRouteResult(error.message);
      }
      throw error;
    }

    let snapshot: CatalogSnapshot;
    try {
      snapshot = await this.catalog.getSnapshot();
    } catch (error) {
      if (error instanceof NoCatalogDataError) {
        console.warn('[RouteTools] Catalog unavailable:', error.message);
        return {
          status: 'no-catalog-data',
          routes: [],
          totalAvailable: 0,
          truncated: false,
          notices: [error.message],
          error: error.message,
        };
      }
      throw error;
    }

    return this.engine.findRoutes(snapshot, constraints, options);
  }

  /**
   * Absolute profit, profit margin and base profit for a buy/sell pair.
   * Without a quantity only the base profit is reported.
   */
  profitCalculation(args: unknown): ProfitToolResult {
    if (!this.config.toolProfitCalculation) {
      return { status: 'tool-disabled', error: 'Profit calculation tool is disabled' };
    }

    try {
      const request = parseOrThrow(profitRequestSchema, args);

      if (request.quantity === undefined) {
        const baseProfitPct = calculateBaseProfitPct(request.buyPrice, request.sellPrice);
        return {
          status: 'ok',
          buyPrice: request.buyPrice,
          sellPrice: request.sellPrice,
          baseProfitPct,
          display: { baseProfit: formatPercent(baseProfitPct) },
        };
      }

      const figures = calculateProfit(request.buyPrice, request.sellPrice, request.quantity);
      return {
        status: 'ok',
        buyPrice: request.buyPrice,
        sellPrice: request.sellPrice,
        quantity: request.quantity,
        ...figures,
        display: {
          absoluteProfit: formatAmount(figures.absoluteProfit),
          profitMargin: formatPercent(figures.profitMarginPct),
          baseProfit: formatPercent(figures.baseProfitPct),
        },
      };
    } catch (error) {
      if (error instanceof InvalidInputError) {
        return { status: 'invalid-input', error: error.message };
      }
      throw error;
    }
  }
}

function invalidRouteResult(message: string): RouteQueryResult {
  return {
    status: 'invalid-input',
    routes: [],
    totalAvailable: 0,
    truncated: false,
    notices: [message],
    error: message,
  };
}
