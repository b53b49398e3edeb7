/**
 * Route Optimizer Tests
 * Ranking order, profit filtering and top-K selection
 */

import { describe, it, expect } from 'vitest';
import { compareLegs, optimizeRoutes, scoreLeg } from '../../src/systems/route-optimizer.js';
import { createLeg, createTerminal } from '../fixtures.js';

describe('optimizeRoutes', () => {
  const legs = [
    createLeg('a', 'B', 'Z', 20, 30, 100), // profit 1000, margin 50%
    createLeg('b', 'B', 'Z', 10, 20, 100), // profit 1000, margin 100%
    createLeg('c', 'C', 'Z', 10, 30, 100), // profit 2000, margin 200%
    createLeg('d', 'A', 'Z', 10, 20, 100), // profit 1000, margin 100%
  ];

  it('sorts by profit, then margin, then buy terminal id', () => {
    const result = optimizeRoutes(legs, { limit: 10 });

    expect(result.routes.map((r) => r.commodity.id)).toEqual(['c', 'd', 'b', 'a']);
    expect(result.routes.map((r) => r.rank)).toEqual([1, 2, 3, 4]);
  });

  it('returns the top routes but counts every profitable one', () => {
    const result = optimizeRoutes(legs, { limit: 2 });

    expect(result.status).toBe('ok-with-routes');
    expect(result.routes).toHaveLength(2);
    expect(result.totalProfitable).toBe(4);
  });

  it('excludes break-even and loss-making legs', () => {
    const result = optimizeRoutes(
      [createLeg('even', 'A', 'B', 10, 10, 5), createLeg('loss', 'A', 'B', 10, 9, 5), createLeg('win', 'A', 'B', 10, 11, 5)],
      { limit: 5 }
    );

    expect(result.routes.map((r) => r.commodity.id)).toEqual(['win']);
    expect(result.totalProfitable).toBe(1);
    expect(result.routes.every((r) => r.profit.absoluteProfit > 0)).toBe(true);
  });

  it('returns at least one route whenever one is profitable', () => {
    const result = optimizeRoutes(legs, { limit: 0 });

    expect(result.status).toBe('ok-with-routes');
    expect(result.routes.map((r) => r.commodity.id)).toEqual(['c']);
    expect(result.totalProfitable).toBe(4);
  });

  it('reports no profitable route as a normal outcome', () => {
    const result = optimizeRoutes([createLeg('loss', 'A', 'B', 10, 9, 5)], { limit: 3 });

    expect(result).toEqual({ status: 'ok-no-profitable-route', routes: [], totalProfitable: 0 });
  });

  it('does not reorder the input', () => {
    const input = [...legs];
    optimizeRoutes(input, { limit: 4 });

    expect(input.map((l) => l.commodity.id)).toEqual(['a', 'b', 'c', 'd']);
  });
});

describe('compareLegs', () => {
  it('falls back to sell terminal id for identical figures', () => {
    const x = createLeg('ore', 'A', 'S2', 10, 20, 10);
    const y = createLeg('ore', 'A', 'S1', 10, 20, 10);

    expect(compareLegs(x, y)).toBeGreaterThan(0);
    expect([x, y].sort(compareLegs)[0].sellTerminal.id).toBe('S1');
  });
});

describe('scoreLeg', () => {
  it('equals profit for fresh data from monitored terminals', () => {
    expect(scoreLeg(createLeg('ore', 'A', 'B', 10, 20, 100))).toBe(1000);
  });

  it('discounts unmonitored terminals and stale data', () => {
    const leg = {
      ...createLeg('ore', 'A', 'B', 10, 20, 100),
      sellTerminal: createTerminal('B', { isMonitored: false }),
      dataAgeHours: 24,
    };

    expect(scoreLeg(leg)).toBe(375);
  });
});
