/**
 * Trade Route Engine Tests
 * End-to-end queries over small catalogs
 */

import { describe, it, expect } from 'vitest';
import { TradeRouteEngine, type QueryRecorder } from '../../src/core/engine.js';
import { InvalidInputError, NoCatalogDataError } from '../../src/core/errors.js';
import type { RouteQueryResult, TradeConstraints } from '../../src/core/types.js';
import {
  createCommodity,
  createPrice,
  createShip,
  createSimplePair,
  createSnapshot,
  createTerminal,
  NOW,
  TEST_CONFIG,
} from '../fixtures.js';

const terminals = [
  createTerminal('A', { location: { system: 'Stanton', planet: 'Hurston' } }),
  createTerminal('B', { location: { system: 'Stanton', planet: 'ArcCorp' } }),
  createTerminal('C', { location: { system: 'Stanton', planet: 'microTech' } }),
];

function createEngine(overrides: Partial<typeof TEST_CONFIG> = {}, recorder?: QueryRecorder): TradeRouteEngine {
  return new TradeRouteEngine({ ...TEST_CONFIG, ...overrides }, { now: () => NOW, recorder });
}

function query(capacity: number, budget: number, extra: Partial<TradeConstraints> = {}): TradeConstraints {
  return { ship: createShip(capacity), budget, ...extra };
}

describe('TradeRouteEngine', () => {
  it('finds the single capacity-bound route', () => {
    const x = createCommodity('x', [
      createPrice('A', { buyPrice: 10, stockScu: 200 }),
      createPrice('B', { sellPrice: 25, demandScu: 500 }),
    ]);

    const result = createEngine().findRoutes(
      createSnapshot([x], terminals),
      query(100, 500_000, { advancedInfo: true })
    );

    expect(result.status).toBe('ok-with-routes');
    expect(result.totalAvailable).toBe(1);
    expect(result.routes).toHaveLength(1);
    expect(result.routes[0].quantityScu).toBe(100);
    expect(result.routes[0].profit).toBe(1500);
    expect(result.routes[0].advanced?.profitMargin).toBe('150%');
  });

  it('reports no profitable route when every margin is non-positive', () => {
    const snapshot = createSnapshot(
      [createSimplePair('x', 'A', 'B', 20, 15), createSimplePair('y', 'B', 'C', 10, 10)],
      terminals
    );

    const result = createEngine().findRoutes(snapshot, query(100, 10_000));

    expect(result.status).toBe('ok-no-profitable-route');
    expect(result.routes).toEqual([]);
    expect(result.totalAvailable).toBe(0);
  });

  it('never returns an illegal commodity, however attractive', () => {
    const contraband = createCommodity(
      'widow',
      [createPrice('A', { buyPrice: 1, stockScu: 1000 }), createPrice('C', { sellPrice: 9000, demandScu: 1000 })],
      { isIllegal: true }
    );
    const snapshot = createSnapshot([contraband, createSimplePair('ore', 'A', 'B', 10, 11)], terminals);

    const result = createEngine({ commodityRouteDefaultCount: 5 }).findRoutes(snapshot, query(100, 10_000));

    expect(result.routes.map((r) => r.commodity)).toEqual(['Commodity ore']);
    expect(result.totalAvailable).toBe(1);
  });

  it('builds routes from a terminal listed twice for one commodity', () => {
    const ore = createCommodity('ore', [
      createPrice('A', { buyPrice: 10, stockScu: 100 }),
      createPrice('A', { sellPrice: 3, demandScu: 100 }),
      createPrice('B', { sellPrice: 25, demandScu: 100 }),
    ]);

    const result = createEngine().findRoutes(createSnapshot([ore], terminals), query(10, 1000));

    expect(result.status).toBe('ok-with-routes');
    expect(result.routes[0]).toMatchObject({ buyTerminal: 'Terminal A', sellTerminal: 'Terminal B', profit: 150 });
  });

  it('returns the configured default count and reports the true total', () => {
    const snapshot = createSnapshot(
      [
        createSimplePair('a', 'A', 'B', 10, 20),
        createSimplePair('b', 'A', 'B', 10, 30),
        createSimplePair('c', 'B', 'C', 10, 40),
      ],
      terminals
    );

    const result = createEngine().findRoutes(snapshot, query(10, 10_000));

    expect(result.routes.map((r) => r.commodity)).toEqual(['Commodity c']);
    expect(result.totalAvailable).toBe(3);
    expect(result.truncated).toBe(true);
    expect(result.notices).toEqual(['Showing 1 of 3 available routes.']);
  });

  it('lets the caller override the count', () => {
    const snapshot = createSnapshot(
      [
        createSimplePair('a', 'A', 'B', 10, 20),
        createSimplePair('b', 'A', 'B', 10, 30),
        createSimplePair('c', 'B', 'C', 10, 40),
      ],
      terminals
    );

    const result = createEngine().findRoutes(snapshot, query(10, 10_000, { routeCount: 2 }));

    expect(result.routes.map((r) => r.rank)).toEqual([1, 2]);
    expect(result.notices).toEqual(['Showing 2 of 3 available routes.']);
  });

  it('scopes buy terminals to the current location', () => {
    const ore = createCommodity('ore', [
      createPrice('A', { buyPrice: 10, stockScu: 100 }),
      createPrice('B', { buyPrice: 5, stockScu: 100 }),
      createPrice('C', { sellPrice: 20, demandScu: 100 }),
    ]);

    const result = createEngine({ commodityRouteDefaultCount: 5 }).findRoutes(
      createSnapshot([ore], terminals),
      query(10, 10_000, { location: 'Hurston' })
    );

    expect(result.routes.map((r) => r.buyTerminal)).toEqual(['Terminal A']);
  });

  it('turns invalid constraints into an invalid-input status', () => {
    const snapshot = createSnapshot([createSimplePair('ore', 'A', 'B', 10, 20)], terminals);
    const engine = createEngine();

    const badBudget = engine.findRoutes(snapshot, query(10, 0));
    expect(badBudget.status).toBe('invalid-input');
    expect(badBudget.error).toBe('budget must be a positive number');

    const badCapacity = engine.findRoutes(snapshot, query(-5, 100));
    expect(badCapacity.error).toBe('cargoCapacityScu must be a positive number');

    const badLocation = engine.findRoutes(snapshot, query(10, 100, { location: 'Pyro' }));
    expect(badLocation.status).toBe('invalid-input');
    expect(badLocation.error).toBe('Unknown location: Pyro');
  });

  it('validates input before looking at the catalog', () => {
    const result = createEngine().findRoutes(createSnapshot([], []), query(10, 0));

    expect(result.status).toBe('invalid-input');
  });

  it('reports an empty catalog distinctly from no profitable route', () => {
    const result = createEngine().findRoutes(createSnapshot([], terminals), query(10, 100));

    expect(result.status).toBe('no-catalog-data');
    expect(result.error).toBe('No commodity catalog data available');
  });

  it('throws typed errors from computeRoutes', () => {
    const engine = createEngine();

    expect(() => engine.computeRoutes(createSnapshot([], []), query(10, 100))).toThrow(NoCatalogDataError);
    expect(() => engine.computeRoutes(createSnapshot([], []), query(10, 100, { routeCount: 0 }))).toThrow(
      InvalidInputError
    );
  });

  it('honours the per-query estimated availability flag', () => {
    const ore = createCommodity('ore', [
      createPrice('A', {
        buyPrice: 10,
        stockScu: 20,
        averageStockScu: 60,
        stockCeilingScu: 100,
        reportedAt: NOW - 12 * 60 * 60 * 1000,
      }),
      createPrice('B', { sellPrice: 20, demandScu: 100 }),
    ]);
    const snapshot = createSnapshot([ore], terminals);
    const engine = createEngine();

    expect(engine.findRoutes(snapshot, query(100, 10_000)).routes[0].quantityScu).toBe(40);
    expect(
      engine.findRoutes(snapshot, query(100, 10_000, { useEstimatedAvailability: false })).routes[0].quantityScu
    ).toBe(20);
  });

  it('never returns partial results for an aborted query', () => {
    const controller = new AbortController();
    controller.abort();
    const snapshot = createSnapshot([createSimplePair('ore', 'A', 'B', 10, 20)], terminals);

    expect(() => createEngine().findRoutes(snapshot, query(10, 100), { signal: controller.signal })).toThrow();
  });

  it('hands every finished query to the recorder', () => {
    const recorded: RouteQueryResult[] = [];
    const recorder: QueryRecorder = {
      recordQuery: (_constraints, result) => {
        recorded.push(result);
      },
    };
    const engine = createEngine({}, recorder);
    const snapshot = createSnapshot([createSimplePair('ore', 'A', 'B', 10, 20)], terminals);

    engine.findRoutes(snapshot, query(10, 100));
    engine.findRoutes(snapshot, query(10, 0));

    expect(recorded.map((r) => r.status)).toEqual(['ok-with-routes', 'invalid-input']);
  });
});
