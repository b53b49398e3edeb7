/**
 * SQLite Query Log
 * Records route queries and their outcomes for later analysis.
 * Prices themselves are not stored.
 */

import Database from 'better-sqlite3';
import type { RouteQueryResult, RouteStatus, TradeConstraints } from '../core/types.js';
import type { QueryRecorder } from '../core/engine.js';

// ============================================================================
// Types
// ============================================================================

export interface QueryLogEntry {
  id: number;
  createdAt: string;
  shipName: string | null;
  cargoCapacityScu: number;
  budget: number;
  location: string | null;
  status: RouteStatus;
  routesReturned: number;
  totalAvailable: number;
  topCommodity: string | null;
  topProfit: number | null;
  durationMs: number;
}

export interface QueryStats {
  totalQueries: number;
  byStatus: Partial<Record<RouteStatus, number>>;
  avgTopProfit: number | null;
  avgDurationMs: number | null;
}

interface QueryRow {
  id: number;
  created_at: string;
  ship_name: string | null;
  cargo_capacity_scu: number;
  budget: number;
  location: string | null;
  status: RouteStatus;
  routes_returned: number;
  total_available: number;
  top_commodity: string | null;
  top_profit: number | null;
  duration_ms: number;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA = `
-- One row per route query
CREATE TABLE IF NOT EXISTS route_queries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  ship_name TEXT,
  cargo_capacity_scu REAL NOT NULL,
  budget REAL NOT NULL,
  location TEXT,
  status TEXT NOT NULL CHECK(status IN ('ok-with-routes', 'ok-no-profitable-route', 'invalid-input', 'no-catalog-data')),
  routes_returned INTEGER NOT NULL,
  total_available INTEGER NOT NULL,
  top_commodity TEXT,
  top_profit REAL,
  duration_ms REAL NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_route_queries_status ON route_queries(status);
`;

// ============================================================================
// QueryLogDatabase Class
// ============================================================================

/**
 * SQLite store for route query records
 * All methods are synchronous for simplicity with better-sqlite3
 */
export class QueryLogDatabase implements QueryRecorder {
  private db: Database.Database;
  private stmtInsertQuery: Database.Statement;

  /**
   * @param dbPath Path to SQLite database file (use ':memory:' for in-memory)
   */
  constructor(dbPath: string = 'route-queries.db') {
    this.db = new Database(dbPath);

    // Enable WAL mode for better concurrent performance
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(SCHEMA);

    this.stmtInsertQuery = this.db.prepare(`
      INSERT INTO route_queries
      (ship_name, cargo_capacity_scu, budget, location, status, routes_returned, total_available, top_commodity, top_profit, duration_ms)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  /**
   * Record a finished query
   */
  recordQuery(constraints: TradeConstraints, result: RouteQueryResult, durationMs: number): void {
    const top = result.routes[0];
    this.stmtInsertQuery.run(
      constraints.ship.name ?? null,
      constraints.ship.cargoCapacityScu,
      constraints.budget,
      constraints.location ?? null,
      result.status,
      result.routes.length,
      result.totalAvailable,
      top ? top.commodity : null,
      top ? top.profit : null,
      durationMs
    );
  }

  /**
   * Most recent queries first
   */
  getRecentQueries(limit: number = 20): QueryLogEntry[] {
    const rows = this.db
      .prepare(`SELECT * FROM route_queries ORDER BY id DESC LIMIT ?`)
      .all(limit) as QueryRow[];

    return rows.map((row) => ({
      id: row.id,
      createdAt: row.created_at,
      shipName: row.ship_name,
      cargoCapacityScu: row.cargo_capacity_scu,
      budget: row.budget,
      location: row.location,
      status: row.status,
      routesReturned: row.routes_returned,
      totalAvailable: row.total_available,
      topCommodity: row.top_commodity,
      topProfit: row.top_profit,
      durationMs: row.duration_ms,
    }));
  }

  /**
   * Aggregate counts and averages across all recorded queries
   */
  getQueryStats(): QueryStats {
    const statusRows = this.db
      .prepare(`SELECT status, COUNT(*) AS count FROM route_queries GROUP BY status`)
      .all() as Array<{ status: RouteStatus; count: number }>;

    const averages = this.db
      .prepare(`SELECT AVG(top_profit) AS avg_top_profit, AVG(duration_ms) AS avg_duration_ms FROM route_queries`)
      .get() as { avg_top_profit: number | null; avg_duration_ms: number | null };

    const byStatus: Partial<Record<RouteStatus, number>> = {};
    let totalQueries = 0;
    for (const row of statusRows) {
      byStatus[row.status] = row.count;
      totalQueries += row.count;
    }

    return {
      totalQueries,
      byStatus,
      avgTopProfit: averages.avg_top_profit,
      avgDurationMs: averages.avg_duration_ms,
    };
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}

/**
 * Create a database, or return null if initialization fails
 */
export function createDatabase(dbPath: string): QueryLogDatabase | null {
  try {
    return new QueryLogDatabase(dbPath);
  } catch (error) {
    console.error('[QueryLog] Failed to initialize database:', error);
    return null;
  }
}
