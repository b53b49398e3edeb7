/**
 * Config Overrides Manager
 * Persists route tool option changes to a JSON file
 * that gets merged with the defaults on startup
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { RouteToolConfig } from '../core/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Path to overrides file (relative to project root)
const OVERRIDES_PATH = resolve(__dirname, '../../config/route-overrides.json');

// ============================================================================
// Types
// ============================================================================

export interface ConfigOverride {
  path: keyof RouteToolConfig;
  newValue: unknown;
  appliedAt: string;
  source: string; // e.g., "api", "cli"
}

export interface OverridesFile {
  version: number;
  lastModified: string;
  overrides: ConfigOverride[];
}

export const routeToolConfigSchema = z.object({
  toolCommodityRoute: z.boolean(),
  toolProfitCalculation: z.boolean(),
  commodityRouteDefaultCount: z.number().int().min(1).max(100),
  useEstimatedAvailability: z.boolean(),
  advancedInfo: z.boolean(),
  maxListEntries: z.number().int().min(1).max(100),
  availabilityHorizonHours: z.number().positive(),
});

const overridesFileSchema = z.object({
  version: z.number(),
  lastModified: z.string(),
  overrides: z.array(
    z.object({
      path: routeToolConfigSchema.keyof(),
      newValue: z.unknown(),
      appliedAt: z.string(),
      source: z.string(),
    })
  ),
});

function emptyOverrides(): OverridesFile {
  return {
    version: 1,
    lastModified: new Date().toISOString(),
    overrides: [],
  };
}

// ============================================================================
// Load/Save Functions
// ============================================================================

/**
 * Load overrides from file
 */
export function loadOverrides(filePath: string = OVERRIDES_PATH): OverridesFile {
  try {
    if (existsSync(filePath)) {
      const content = readFileSync(filePath, 'utf-8');
      const parsed = overridesFileSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return {
          ...parsed.data,
          overrides: parsed.data.overrides.map((o) => ({ ...o, newValue: o.newValue })),
        };
      }
      console.warn('[ConfigOverrides] Ignoring malformed overrides file:', parsed.error.message);
    }
  } catch (error) {
    console.warn('[ConfigOverrides] Failed to load overrides:', error);
  }

  return emptyOverrides();
}

/**
 * Save overrides to file
 */
export function saveOverrides(data: OverridesFile, filePath: string = OVERRIDES_PATH): boolean {
  try {
    data.lastModified = new Date().toISOString();
    writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
    console.log('[ConfigOverrides] Saved to', filePath);
    return true;
  } catch (error) {
    console.error('[ConfigOverrides] Failed to save:', error);
    return false;
  }
}

/**
 * Add a new override. The value is validated against the option's type.
 */
export function addOverride(
  override: Omit<ConfigOverride, 'appliedAt'>,
  filePath: string = OVERRIDES_PATH
): boolean {
  const schema: z.ZodTypeAny = routeToolConfigSchema.shape[override.path];
  const check = schema.safeParse(override.newValue);
  if (!check.success) {
    console.warn(`[ConfigOverrides] Rejected ${override.path}: ${check.error.issues[0]?.message ?? 'invalid value'}`);
    return false;
  }

  const data = loadOverrides(filePath);

  // Remove any existing override for the same path
  data.overrides = data.overrides.filter((o) => o.path !== override.path);

  data.overrides.push({
    ...override,
    appliedAt: new Date().toISOString(),
  });

  return saveOverrides(data, filePath);
}

/**
 * Remove an override by path
 */
export function removeOverride(path: string, filePath: string = OVERRIDES_PATH): boolean {
  const data = loadOverrides(filePath);
  const initialLength = data.overrides.length;
  data.overrides = data.overrides.filter((o) => o.path !== path);

  if (data.overrides.length < initialLength) {
    return saveOverrides(data, filePath);
  }
  return false;
}

/**
 * Clear all overrides
 */
export function clearOverrides(filePath: string = OVERRIDES_PATH): boolean {
  return saveOverrides(emptyOverrides(), filePath);
}

/**
 * Apply overrides on top of a config, returning the merged config.
 * If the merged result does not validate, the base config is kept.
 */
export function applyOverridesToConfig(
  base: RouteToolConfig,
  filePath: string = OVERRIDES_PATH
): RouteToolConfig {
  const data = loadOverrides(filePath);
  const patch: Record<string, unknown> = {};

  for (const override of data.overrides) {
    patch[override.path] = override.newValue;
  }

  const merged = routeToolConfigSchema.safeParse({ ...base, ...patch });
  if (!merged.success) {
    console.warn('[ConfigOverrides] Overrides do not validate, using base config:', merged.error.message);
    return base;
  }

  if (data.overrides.length > 0) {
    console.log(`[ConfigOverrides] Applied ${data.overrides.length} override(s)`);
  }

  return merged.data;
}

/**
 * Get the overrides file path (for display purposes)
 */
export function getOverridesPath(): string {
  return OVERRIDES_PATH;
}
