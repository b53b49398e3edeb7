/**
 * Candidate Graph Builder
 *
 * Builds every feasible buy → sell leg for each tradeable commodity.
 * No profitability filtering happens here; the optimizer decides what
 * is worth returning.
 *
 * usableQuantity = floor(min(capacity, estimated stock, budget / buyPrice))
 *
 * Legs with usableQuantity < 1 cannot be executed and are dropped.
 */

import type {
  CandidateLeg,
  CatalogSnapshot,
  Commodity,
  Terminal,
  TerminalId,
  TerminalPrice,
  TradeConstraints,
  Timestamp,
} from '../core/types.js';
import { calculateProfit } from './profit.js';
import {
  estimateAvailability,
  estimateDemand,
  reportAgeHours,
  type AvailabilityOptions,
} from './availability.js';
import { isTradeable } from './legality.js';

export interface CandidateGraphOptions {
  availability: AvailabilityOptions;
  /** Query time used for availability estimates */
  now: Timestamp;
  /** Restrict buy terminals to these ids (location scoping) */
  buyTerminalIds?: ReadonlySet<TerminalId>;
}

interface TradeableEntry {
  terminal: Terminal;
  price: TerminalPrice;
}

/**
 * Index terminals by id for the duration of a build
 */
export function indexTerminals(terminals: readonly Terminal[]): Map<TerminalId, Terminal> {
  const byId = new Map<TerminalId, Terminal>();
  for (const terminal of terminals) {
    byId.set(terminal.id, terminal);
  }
  return byId;
}

/**
 * Largest whole quantity the ship can carry, the terminal can supply
 * and the budget can pay for
 */
export function usableQuantity(
  capacityScu: number,
  estimatedStockScu: number,
  budget: number,
  buyPrice: number
): number {
  const affordable = Math.floor(budget / buyPrice);
  return Math.max(0, Math.floor(Math.min(capacityScu, estimatedStockScu, affordable)));
}

/**
 * Terminals where this commodity can be traded on the given side
 */
function tradeableEntries(
  commodity: Commodity,
  terminals: Map<TerminalId, Terminal>,
  constraints: TradeConstraints,
  side: 'buy' | 'sell'
): TradeableEntry[] {
  const entries: TradeableEntry[] = [];

  for (const price of commodity.prices) {
    const terminal = terminals.get(price.terminalId);
    if (!terminal) continue;
    if (!isTradeable(commodity, constraints.ship, terminal, side, price)) continue;
    entries.push({ terminal, price });
  }

  return entries;
}

/**
 * Build all legs for a single commodity (one fan-out partition)
 */
export function buildCommodityLegs(
  commodity: Commodity,
  terminals: Map<TerminalId, Terminal>,
  constraints: TradeConstraints,
  options: CandidateGraphOptions
): CandidateLeg[] {
  if (commodity.isIllegal) return [];

  let buyEntries = tradeableEntries(commodity, terminals, constraints, 'buy');
  if (options.buyTerminalIds) {
    const scope = options.buyTerminalIds;
    buyEntries = buyEntries.filter((e) => scope.has(e.terminal.id));
  }
  if (buyEntries.length === 0) return [];

  const sellEntries = tradeableEntries(commodity, terminals, constraints, 'sell');
  if (sellEntries.length === 0) return [];

  const legs: CandidateLeg[] = [];

  for (const buy of buyEntries) {
    const estimatedStock = estimateAvailability(buy.price, options.now, options.availability);
    const quantity = usableQuantity(
      constraints.ship.cargoCapacityScu,
      estimatedStock,
      constraints.budget,
      buy.price.buyPrice
    );
    if (quantity < 1) continue;

    for (const sell of sellEntries) {
      if (sell.terminal.id === buy.terminal.id) continue;

      const estimatedDemand = estimateDemand(sell.price, options.now, options.availability);
      const dataAgeHours = Math.max(
        reportAgeHours(buy.price.reportedAt, options.now),
        reportAgeHours(sell.price.reportedAt, options.now)
      );

      legs.push({
        commodity,
        buyTerminal: buy.terminal,
        sellTerminal: sell.terminal,
        buyPrice: buy.price.buyPrice,
        sellPrice: sell.price.sellPrice,
        reportedStockScu: Math.max(0, buy.price.stockScu),
        estimatedStockScu: estimatedStock,
        estimatedDemandScu: estimatedDemand,
        usableQuantity: quantity,
        investment: quantity * buy.price.buyPrice,
        profit: calculateProfit(buy.price.buyPrice, sell.price.sellPrice, quantity),
        dataAgeHours,
      });
    }
  }

  return legs;
}

/**
 * Build the full feasible-leg set for a query.
 * Each commodity is an independent partition; results are merged by
 * concatenation and carry no ordering guarantee.
 */
export function buildCandidateLegs(
  snapshot: CatalogSnapshot,
  constraints: TradeConstraints,
  options: CandidateGraphOptions
): CandidateLeg[] {
  const terminals = indexTerminals(snapshot.terminals);

  return snapshot.commodities.flatMap((commodity) =>
    buildCommodityLegs(commodity, terminals, constraints, options)
  );
}

/**
 * Resolve a free-text location to the terminals it covers.
 * Matches terminal id, terminal name, or any component of its location
 * (system, planet, moon, station, city, outpost), case-insensitively.
 */
export function resolveLocationTerminals(
  terminals: readonly Terminal[],
  location: string
): Set<TerminalId> {
  const needle = location.trim().toLowerCase();
  const matched = new Set<TerminalId>();

  for (const terminal of terminals) {
    const { system, planet, moon, station, city, outpost } = terminal.location;
    const names = [terminal.id, terminal.name, system, planet, moon, station, city, outpost];
    if (names.some((name) => name !== undefined && name.toLowerCase() === needle)) {
      matched.add(terminal.id);
    }
  }

  return matched;
}
