/**
 * Core types for the trade route engine
 * Catalog snapshot, ship, constraints and route records
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type CommodityId = string;
export type TerminalId = string;

/** Epoch milliseconds */
export type Timestamp = number;

// ============================================================================
// Catalog
// ============================================================================

/**
 * Where a terminal sits in the star system hierarchy
 */
export interface TerminalLocation {
  system: string;
  planet?: string;
  moon?: string;
  station?: string;
  city?: string;
  outpost?: string;
}

export interface Terminal {
  id: TerminalId;
  name: string;
  location: TerminalLocation;
  /** Cargo can only be moved through a loading dock here */
  requiresLoadingDock: boolean;
  hasLoadingDock: boolean;
  hasFreightElevator: boolean;
  /** Prices here are reported by monitored sources (data-quality signal) */
  isMonitored: boolean;
}

/**
 * A commodity's price and stock entry at one terminal
 */
export interface TerminalPrice {
  terminalId: TerminalId;
  buyPrice: number; // 0 when not buyable here
  sellPrice: number; // 0 when not sellable here
  stockScu: number; // reported SCU available to buy
  demandScu: number; // reported SCU the terminal takes
  reportedAt: Timestamp;
  stockCeilingScu?: number; // known max inventory
  averageStockScu?: number; // equilibrium stock
}

export interface Commodity {
  id: CommodityId;
  name: string;
  code: string;
  isIllegal: boolean;
  prices: TerminalPrice[];
}

/**
 * Immutable catalog for the duration of one query
 */
export interface CatalogSnapshot {
  commodities: readonly Commodity[];
  terminals: readonly Terminal[];
  capturedAt: Timestamp;
}

// ============================================================================
// Ship & Constraints
// ============================================================================

/**
 * Cargo handling the ship can use. A freight elevator is never a
 * substitute for a loading dock.
 */
export interface DockingCapability {
  loadingDock: boolean;
  freightElevator: boolean;
}

export interface Ship {
  name?: string;
  cargoCapacityScu: number;
  docking: DockingCapability;
}

export interface TradeConstraints {
  ship: Ship;
  budget: number;
  /** Terminal, station, city, moon, planet or system name to start from */
  location?: string;
  /** Caller-requested route count (overrides the configured default) */
  routeCount?: number;
  useEstimatedAvailability?: boolean;
  advancedInfo?: boolean;
}

// ============================================================================
// Routes
// ============================================================================

export interface ProfitFigures {
  absoluteProfit: number;
  profitMarginPct: number;
  baseProfitPct: number;
}

export interface CandidateLeg {
  commodity: Commodity;
  buyTerminal: Terminal;
  sellTerminal: Terminal;
  buyPrice: number;
  sellPrice: number;
  /** Stock in the last report, before estimation */
  reportedStockScu: number;
  estimatedStockScu: number;
  estimatedDemandScu: number;
  usableQuantity: number;
  investment: number;
  profit: ProfitFigures;
  /** Age of the older of the two price reports, in hours */
  dataAgeHours: number;
}

export interface RankedRoute extends CandidateLeg {
  rank: number;
  /** Profit weighted by data quality (monitoring, freshness) */
  score: number;
}

export type RouteStatus =
  | 'ok-with-routes'
  | 'ok-no-profitable-route'
  | 'invalid-input'
  | 'no-catalog-data';

export interface OptimizedRoutes {
  status: Extract<RouteStatus, 'ok-with-routes' | 'ok-no-profitable-route'>;
  routes: RankedRoute[];
  /** Profitable candidates found, before the limit was applied */
  totalProfitable: number;
}

export type TerminalStockStatus = 'available' | 'out of stock' | 'full inventory';

/**
 * Route record handed to the calling assistant layer
 */
export interface RouteView {
  rank: number;
  commodity: string;
  buyTerminal: string;
  sellTerminal: string;
  buyPrice: number;
  sellPrice: number;
  quantityScu: number;
  investment: number;
  profit: number;
  buyStatus: TerminalStockStatus;
  sellStatus: TerminalStockStatus;
  advanced?: AdvancedRouteInfo;
}

export interface AdvancedRouteInfo {
  profitMargin: string;
  baseProfit: string;
  buyLocation: string;
  sellLocation: string;
  buyTerminalMonitored: boolean;
  sellTerminalMonitored: boolean;
  score: number;
  estimatedStockScu: number;
  estimatedDemandScu: number;
  dataAgeHours: number;
}

export interface RouteQueryResult {
  status: RouteStatus;
  routes: RouteView[];
  /** True count of profitable routes, regardless of how many are listed */
  totalAvailable: number;
  truncated: boolean;
  /** Important information for the user */
  notices: string[];
  error?: string;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Recognized route tool options, passed in explicitly
 */
export interface RouteToolConfig {
  toolCommodityRoute: boolean;
  toolProfitCalculation: boolean;
  commodityRouteDefaultCount: number;
  useEstimatedAvailability: boolean;
  advancedInfo: boolean;
  /** List cap when the caller did not request a count */
  maxListEntries: number;
  /** Hours for reported stock to fully converge on equilibrium */
  availabilityHorizonHours: number;
}
