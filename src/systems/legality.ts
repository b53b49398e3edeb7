/**
 * Legality Filter
 * Decides whether a commodity can be traded by a ship at a terminal
 */

import type { Commodity, Ship, Terminal, TerminalPrice } from '../core/types.js';

export type TradeSide = 'buy' | 'sell';

export type RejectionReason =
  | 'illegal_commodity'
  | 'not_listed'
  | 'loading_dock_required'
  | 'no_cargo_access';

/**
 * Find a commodity's price entry at a terminal
 */
export function findPriceEntry(commodity: Commodity, terminalId: string): TerminalPrice | undefined {
  return commodity.prices.find((p) => p.terminalId === terminalId);
}

/**
 * Whether the ship can move cargo at the terminal.
 * A freight elevator never satisfies a loading dock requirement.
 */
export function canAccessCargo(ship: Ship, terminal: Terminal): boolean {
  const viaDock = ship.docking.loadingDock && terminal.hasLoadingDock;
  const viaElevator =
    ship.docking.freightElevator && terminal.hasFreightElevator && !terminal.requiresLoadingDock;
  return viaDock || viaElevator;
}

/**
 * Why a commodity/ship/terminal combination is rejected, or null if it is tradeable.
 * `entry` is the price entry being judged; by default the first one listed
 * for the terminal.
 */
export function rejectionReason(
  commodity: Commodity,
  ship: Ship,
  terminal: Terminal,
  side: TradeSide,
  entry: TerminalPrice | undefined = findPriceEntry(commodity, terminal.id)
): RejectionReason | null {
  if (commodity.isIllegal) return 'illegal_commodity';
  if (entry !== undefined && entry.terminalId !== terminal.id) return 'not_listed';

  const price = side === 'buy' ? entry?.buyPrice : entry?.sellPrice;
  if (price === undefined || !(price > 0)) return 'not_listed';

  if (!canAccessCargo(ship, terminal)) {
    return terminal.requiresLoadingDock && !ship.docking.loadingDock
      ? 'loading_dock_required'
      : 'no_cargo_access';
  }

  return null;
}

export function isTradeable(
  commodity: Commodity,
  ship: Ship,
  terminal: Terminal,
  side: TradeSide,
  entry?: TerminalPrice
): boolean {
  return rejectionReason(commodity, ship, terminal, side, entry) === null;
}
