/**
 * Profit Calculator
 *
 * Pure arithmetic for a buy/sell pair:
 * - absolute profit = (sell - buy) * quantity
 * - profit margin % = ((sell - buy) / buy) * 100
 * - base profit %   = per-unit figure, same formula, quantity-independent
 *
 * Loss-making inputs are valid and produce negative figures.
 */

import { InvalidInputError } from '../core/errors.js';
import type { ProfitFigures } from '../core/types.js';

function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(field, `${field} must be a finite number`);
  }
}

function validatePrices(buyPrice: number, sellPrice: number): void {
  requireFinite('buyPrice', buyPrice);
  requireFinite('sellPrice', sellPrice);
  if (buyPrice <= 0) {
    throw new InvalidInputError('buyPrice', 'buyPrice must be greater than 0');
  }
  if (sellPrice < 0) {
    throw new InvalidInputError('sellPrice', 'sellPrice must not be negative');
  }
}

/**
 * Per-unit profit percentage relative to the buy price
 */
export function calculateBaseProfitPct(buyPrice: number, sellPrice: number): number {
  validatePrices(buyPrice, sellPrice);
  return ((sellPrice - buyPrice) / buyPrice) * 100;
}

/**
 * Calculate profit figures for trading `quantity` units
 */
export function calculateProfit(
  buyPrice: number,
  sellPrice: number,
  quantity: number
): ProfitFigures {
  validatePrices(buyPrice, sellPrice);
  requireFinite('quantity', quantity);
  if (quantity <= 0) {
    throw new InvalidInputError('quantity', 'quantity must be greater than 0');
  }

  const margin = ((sellPrice - buyPrice) / buyPrice) * 100;

  return {
    absoluteProfit: (sellPrice - buyPrice) * quantity,
    profitMarginPct: margin,
    baseProfitPct: margin,
  };
}
