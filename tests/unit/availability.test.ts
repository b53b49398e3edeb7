/**
 * Availability Estimator Tests
 */

import { describe, it, expect } from 'vitest';
import {
  estimateAvailability,
  estimateDemand,
  projectLevel,
  reportAgeHours,
} from '../../src/systems/availability.js';
import { createPrice, NOW, HOUR } from '../fixtures.js';

const ENABLED = { enabled: true, horizonHours: 24 };
const DISABLED = { enabled: false, horizonHours: 24 };

describe('estimateAvailability', () => {
  it('returns the raw report unmodified when estimation is disabled', () => {
    const record = createPrice('t1', {
      stockScu: 200,
      averageStockScu: 900,
      stockCeilingScu: 1000,
      reportedAt: NOW - 48 * HOUR,
    });

    expect(estimateAvailability(record, NOW, DISABLED)).toBe(200);
  });

  it('equals the raw report at zero elapsed time', () => {
    const record = createPrice('t1', { stockScu: 200, averageStockScu: 500, stockCeilingScu: 1000 });

    expect(estimateAvailability(record, NOW, ENABLED)).toBe(200);
  });

  it('moves linearly toward equilibrium over the horizon', () => {
    const record = createPrice('t1', {
      stockScu: 200,
      averageStockScu: 400,
      stockCeilingScu: 1000,
      reportedAt: NOW - 12 * HOUR,
    });

    expect(estimateAvailability(record, NOW, ENABLED)).toBe(300);
  });

  it('settles at equilibrium once the horizon has passed', () => {
    const record = createPrice('t1', {
      stockScu: 200,
      averageStockScu: 400,
      stockCeilingScu: 1000,
      reportedAt: NOW - 48 * HOUR,
    });

    expect(estimateAvailability(record, NOW, ENABLED)).toBe(400);
  });

  it('decays toward a lower equilibrium', () => {
    const record = createPrice('t1', {
      stockScu: 300,
      averageStockScu: 100,
      stockCeilingScu: 500,
      reportedAt: NOW - 12 * HOUR,
    });

    expect(estimateAvailability(record, NOW, ENABLED)).toBe(200);
  });

  it('never estimates above the last report when no ceiling is known', () => {
    const record = createPrice('t1', {
      stockScu: 200,
      averageStockScu: 400,
      reportedAt: NOW - 12 * HOUR,
    });

    expect(estimateAvailability(record, NOW, ENABLED)).toBe(200);
  });

  it('never exceeds a known ceiling', () => {
    const record = createPrice('t1', { stockScu: 700, stockCeilingScu: 500 });

    expect(estimateAvailability(record, NOW, ENABLED)).toBe(500);
    expect(estimateAvailability({ ...record, reportedAt: NOW - 6 * HOUR }, NOW, ENABLED)).toBe(500);
  });

  it('is never negative', () => {
    const negative = createPrice('t1', { stockScu: -20, reportedAt: NOW - 5 * HOUR });
    expect(estimateAvailability(negative, NOW, ENABLED)).toBe(0);
    expect(estimateAvailability(negative, NOW, DISABLED)).toBe(0);
  });

  it('treats reports from the future as fresh', () => {
    const record = createPrice('t1', {
      stockScu: 80,
      averageStockScu: 10,
      stockCeilingScu: 100,
      reportedAt: NOW + HOUR,
    });

    expect(estimateAvailability(record, NOW, ENABLED)).toBe(80);
  });
});

describe('estimateDemand', () => {
  it('uses the raw demand without a known ceiling', () => {
    const record = createPrice('t1', { demandScu: 150, reportedAt: NOW - 10 * HOUR });

    expect(estimateDemand(record, NOW, ENABLED)).toBe(150);
  });

  it('trends toward the free space the terminal has at equilibrium', () => {
    const record = createPrice('t1', {
      demandScu: 100,
      stockCeilingScu: 1000,
      averageStockScu: 400,
      reportedAt: NOW - 24 * HOUR,
    });

    expect(estimateDemand(record, NOW, ENABLED)).toBe(600);
    expect(estimateDemand(record, NOW, DISABLED)).toBe(100);
  });
});

describe('helpers', () => {
  it('reportAgeHours measures hours and floors at zero', () => {
    expect(reportAgeHours(NOW - 3 * HOUR, NOW)).toBe(3);
    expect(reportAgeHours(NOW + HOUR, NOW)).toBe(0);
  });

  it('projectLevel jumps straight to equilibrium with a zero horizon', () => {
    expect(projectLevel(10, 50, 100, 1, 0)).toBe(50);
  });
});
