/**
 * Shared builders for catalog test data
 */

import type {
  CandidateLeg,
  CatalogSnapshot,
  Commodity,
  RouteToolConfig,
  Ship,
  Terminal,
  TerminalPrice,
} from '../src/core/types.js';
import { calculateProfit } from '../src/systems/profit.js';

export const NOW = Date.UTC(2026, 9, 19, 12, 0, 0);
export const HOUR = 60 * 60 * 1000;

export const TEST_CONFIG: RouteToolConfig = {
  toolCommodityRoute: true,
  toolProfitCalculation: true,
  commodityRouteDefaultCount: 1,
  useEstimatedAvailability: true,
  advancedInfo: false,
  maxListEntries: 5,
  availabilityHorizonHours: 24,
};

export function createTerminal(id: string, overrides: Partial<Terminal> = {}): Terminal {
  return {
    id,
    name: `Terminal ${id}`,
    location: { system: 'Stanton' },
    requiresLoadingDock: false,
    hasLoadingDock: true,
    hasFreightElevator: true,
    isMonitored: true,
    ...overrides,
  };
}

export function createPrice(terminalId: string, overrides: Partial<TerminalPrice> = {}): TerminalPrice {
  return {
    terminalId,
    buyPrice: 0,
    sellPrice: 0,
    stockScu: 0,
    demandScu: 0,
    reportedAt: NOW,
    ...overrides,
  };
}

export function createCommodity(
  id: string,
  prices: TerminalPrice[],
  overrides: Partial<Commodity> = {}
): Commodity {
  return {
    id,
    name: `Commodity ${id}`,
    code: id.toUpperCase(),
    isIllegal: false,
    prices,
    ...overrides,
  };
}

export function createShip(cargoCapacityScu: number, docking: Partial<Ship['docking']> = {}): Ship {
  return {
    cargoCapacityScu,
    docking: { loadingDock: true, freightElevator: true, ...docking },
  };
}

export function createSnapshot(commodities: Commodity[], terminals: Terminal[]): CatalogSnapshot {
  return { commodities, terminals, capturedAt: NOW };
}

/**
 * A commodity bought at `buyTerminal` and sold at `sellTerminal` with ample stock and demand
 */
export function createSimplePair(
  id: string,
  buyTerminal: string,
  sellTerminal: string,
  buyPrice: number,
  sellPrice: number
): Commodity {
  return createCommodity(id, [
    createPrice(buyTerminal, { buyPrice, stockScu: 10_000 }),
    createPrice(sellTerminal, { sellPrice, demandScu: 10_000 }),
  ]);
}

/**
 * A candidate leg built directly, bypassing the graph builder
 */
export function createLeg(
  commodityId: string,
  buyTerminalId: string,
  sellTerminalId: string,
  buyPrice: number,
  sellPrice: number,
  quantity: number
): CandidateLeg {
  return {
    commodity: createCommodity(commodityId, []),
    buyTerminal: createTerminal(buyTerminalId),
    sellTerminal: createTerminal(sellTerminalId),
    buyPrice,
    sellPrice,
    reportedStockScu: quantity,
    estimatedStockScu: quantity,
    estimatedDemandScu: quantity,
    usableQuantity: quantity,
    investment: buyPrice * quantity,
    profit: calculateProfit(buyPrice, sellPrice, quantity),
    dataAgeHours: 0,
  };
}
