/**
 * Availability Estimator
 *
 * Projects a terminal's last reported stock (or demand) to query time.
 * Terminals drift back toward their equilibrium level after a report, the
 * same way market depth recovers toward its target:
 *
 *   estimate = raw + (equilibrium - raw) * min(1, elapsedHours / horizonHours)
 *
 * The estimate is clamped to [0, ceiling], where the ceiling is the
 * terminal's known inventory maximum, or the raw report when none is known.
 * At zero elapsed time the estimate is exactly the raw report.
 */

import type { TerminalPrice, Timestamp } from '../core/types.js';

const MS_PER_HOUR = 60 * 60 * 1000;

export interface AvailabilityOptions {
  /** When false the raw report is returned unmodified */
  enabled: boolean;
  /** Hours until the estimate fully converges on equilibrium */
  horizonHours: number;
}

export const DEFAULT_AVAILABILITY_OPTIONS: AvailabilityOptions = {
  enabled: true,
  horizonHours: 24,
};

/**
 * Hours since the report, never negative
 */
export function reportAgeHours(reportedAt: Timestamp, now: Timestamp): number {
  return Math.max(0, (now - reportedAt) / MS_PER_HOUR);
}

/**
 * Linear convergence of a reported level toward equilibrium
 */
export function projectLevel(
  raw: number,
  equilibrium: number,
  ceiling: number,
  elapsedHours: number,
  horizonHours: number
): number {
  if (elapsedHours <= 0) return raw;

  const progress = horizonHours > 0 ? Math.min(1, elapsedHours / horizonHours) : 1;
  const projected = raw + (equilibrium - raw) * progress;

  return Math.min(ceiling, Math.max(0, projected));
}

/**
 * Estimated SCU available to buy at the terminal
 */
export function estimateAvailability(
  record: TerminalPrice,
  now: Timestamp,
  options: AvailabilityOptions = DEFAULT_AVAILABILITY_OPTIONS
): number {
  const reported = Math.max(0, record.stockScu);
  if (!options.enabled) return reported;

  // A report above the known ceiling is taken as the ceiling
  const ceiling = record.stockCeilingScu ?? reported;
  const raw = Math.min(reported, ceiling);
  const equilibrium = Math.min(record.averageStockScu ?? raw, ceiling);
  const elapsed = reportAgeHours(record.reportedAt, now);

  return projectLevel(raw, equilibrium, ceiling, elapsed, options.horizonHours);
}

/**
 * Estimated SCU the terminal will take when selling.
 * Without a known ceiling the raw demand report is used as-is.
 */
export function estimateDemand(
  record: TerminalPrice,
  now: Timestamp,
  options: AvailabilityOptions = DEFAULT_AVAILABILITY_OPTIONS
): number {
  const raw = Math.max(0, record.demandScu);
  if (!options.enabled || record.stockCeilingScu === undefined) return raw;

  // Free space the terminal had when it was at equilibrium
  const equilibrium = record.averageStockScu === undefined
    ? raw
    : Math.max(0, record.stockCeilingScu - record.averageStockScu);
  const elapsed = reportAgeHours(record.reportedAt, now);

  return projectLevel(
    raw,
    equilibrium,
    Math.max(raw, record.stockCeilingScu),
    elapsed,
    options.horizonHours
  );
}
