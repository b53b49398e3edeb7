/**
 * Catalog providers
 * Sources of catalog snapshots. The live market-data client lives outside
 * this project and only needs to implement CatalogProvider.
 */

import { readFile } from 'fs/promises';
import { NoCatalogDataError } from '../core/errors.js';
import type { CatalogSnapshot } from '../core/types.js';
import { deepFreeze, parseCatalog } from './schemas.js';

export interface CatalogProvider {
  getSnapshot(): Promise<CatalogSnapshot>;
}

/**
 * Serves a fixed, already validated snapshot
 */
export class StaticCatalogProvider implements CatalogProvider {
  private snapshot: CatalogSnapshot;

  constructor(snapshot: CatalogSnapshot) {
    this.snapshot = deepFreeze(snapshot);
  }

  async getSnapshot(): Promise<CatalogSnapshot> {
    return this.snapshot;
  }

  /**
   * Replace the snapshot wholesale (never mutated in place)
   */
  replace(snapshot: CatalogSnapshot): void {
    this.snapshot = deepFreeze(snapshot);
  }
}

/**
 * Reads a catalog payload from a JSON file on every request
 */
export class FileCatalogProvider implements CatalogProvider {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async getSnapshot(): Promise<CatalogSnapshot> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new NoCatalogDataError(`Catalog file not found: ${this.filePath}`);
      }
      throw error;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch {
      throw new NoCatalogDataError(`Catalog file is not valid JSON: ${this.filePath}`);
    }

    return parseCatalog(payload);
  }
}
