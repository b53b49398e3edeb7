/**
 * Storage Module
 * SQLite query log for route requests
 */

export { QueryLogDatabase, createDatabase } from './database.js';
export type { QueryLogEntry, QueryStats } from './database.js';
