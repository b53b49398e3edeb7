/**
 * Boundary schemas
 * Map the loosely typed market-data payload and tool arguments
 * onto the internal types. Nothing past this module handles untyped data.
 */

import { z } from 'zod';
import { InvalidInputError } from '../core/errors.js';
import type { CatalogSnapshot, Commodity, Terminal, TradeConstraints } from '../core/types.js';

// ============================================================================
// Primitives
// ============================================================================

/** Upstream flags arrive as 0/1, booleans or "0"/"1" */
const flagSchema = z
  .union([z.boolean(), z.number(), z.string()])
  .optional()
  .transform((value) => {
    if (value === undefined) return false;
    if (typeof value === 'string') return !['', '0', 'false', 'no'].includes(value.trim().toLowerCase());
    return Boolean(value);
  });

const idSchema = z.union([z.string().min(1), z.number().int()]).transform((value) => String(value));

const amountSchema = z.coerce.number().finite().min(0);

/** Upstream reports 0 or null for unknown optional figures */
const optionalAmountSchema = z.coerce
  .number()
  .finite()
  .min(0)
  .nullish()
  .transform((value) => (value ? value : undefined));

const optionalName = z
  .string()
  .nullish()
  .transform((value) => (value ? value : undefined));

/** Unix seconds or ISO date string to epoch milliseconds */
const timestampSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') {
    // Heuristic: values below 1e12 are seconds
    return value < 1e12 ? value * 1000 : value;
  }
  const parsed = Date.parse(value);
  if (isNaN(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

// ============================================================================
// Catalog Payload
// ============================================================================

const rawTerminalSchema = z
  .object({
    id: idSchema,
    name: z.string().min(1),
    star_system_name: z.string().min(1),
    planet_name: optionalName,
    moon_name: optionalName,
    space_station_name: optionalName,
    city_name: optionalName,
    outpost_name: optionalName,
    requires_loading_dock: flagSchema,
    has_loading_dock: flagSchema,
    has_freight_elevator: flagSchema,
    is_monitored: flagSchema,
  })
  .transform(
    (raw): Terminal => ({
      id: raw.id,
      name: raw.name,
      location: {
        system: raw.star_system_name,
        planet: raw.planet_name,
        moon: raw.moon_name,
        station: raw.space_station_name,
        city: raw.city_name,
        outpost: raw.outpost_name,
      },
      requiresLoadingDock: raw.requires_loading_dock,
      hasLoadingDock: raw.has_loading_dock,
      hasFreightElevator: raw.has_freight_elevator,
      isMonitored: raw.is_monitored,
    })
  );

const rawPriceSchema = z.object({
  id_terminal: idSchema,
  price_buy: amountSchema.default(0),
  price_sell: amountSchema.default(0),
  scu_buy: amountSchema.default(0),
  scu_sell: amountSchema.default(0),
  scu_buy_max: optionalAmountSchema,
  scu_buy_avg: optionalAmountSchema,
  date_modified: timestampSchema,
});

const rawCommoditySchema = z
  .object({
    id: idSchema,
    name: z.string().min(1),
    code: z.string().default(''),
    is_illegal: flagSchema,
    prices: z.array(rawPriceSchema).default([]),
  })
  .transform(
    (raw): Commodity => ({
      id: raw.id,
      name: raw.name,
      code: raw.code,
      isIllegal: raw.is_illegal,
      prices: raw.prices.map((p) => ({
        terminalId: p.id_terminal,
        buyPrice: p.price_buy,
        sellPrice: p.price_sell,
        stockScu: p.scu_buy,
        demandScu: p.scu_sell,
        reportedAt: p.date_modified,
        stockCeilingScu: p.scu_buy_max,
        averageStockScu: p.scu_buy_avg,
      })),
    })
  );

export const catalogPayloadSchema = z.object({
  captured_at: timestampSchema.optional(),
  terminals: z.array(rawTerminalSchema),
  commodities: z.array(rawCommoditySchema),
});

export type CatalogPayload = z.input<typeof catalogPayloadSchema>;

// ============================================================================
// Tool Arguments
// ============================================================================

export const routeRequestSchema = z.object({
  shipName: z.string().optional(),
  cargoCapacityScu: z.coerce.number().finite(),
  budget: z.coerce.number().finite(),
  location: z.string().trim().min(1).optional(),
  count: z.coerce.number().int().min(1).max(100).optional(),
  shipHasLoadingDock: z.boolean().default(true),
  shipHasFreightElevator: z.boolean().default(true),
  useEstimatedAvailability: z.boolean().optional(),
  advancedInfo: z.boolean().optional(),
});

export type RouteRequest = z.input<typeof routeRequestSchema>;

export const profitRequestSchema = z.object({
  buyPrice: z.coerce.number().finite(),
  sellPrice: z.coerce.number().finite(),
  quantity: z.coerce.number().finite().optional(),
});

export type ProfitRequest = z.input<typeof profitRequestSchema>;

// ============================================================================
// Parsing Helpers
// ============================================================================

/**
 * Parse with a schema, turning the first issue into an InvalidInputError
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'input';
  throw new InvalidInputError(field, `${field}: ${issue?.message ?? 'invalid value'}`);
}

/**
 * Recursively freeze a value so a snapshot cannot be mutated mid-query
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate a raw catalog payload into a frozen snapshot
 */
export function parseCatalog(payload: unknown, now: number = Date.now()): CatalogSnapshot {
  const parsed = parseOrThrow(catalogPayloadSchema, payload);
  return deepFreeze({
    commodities: parsed.commodities,
    terminals: parsed.terminals,
    capturedAt: parsed.captured_at ?? now,
  });
}

/**
 * Validate route tool arguments into trade constraints
 */
export function parseRouteRequest(args: unknown): TradeConstraints {
  const request = parseOrThrow(routeRequestSchema, args);
  return {
    ship: {
      name: request.shipName,
      cargoCapacityScu: request.cargoCapacityScu,
      docking: {
        loadingDock: request.shipHasLoadingDock,
        freightElevator: request.shipHasFreightElevator,
      },
    },
    budget: request.budget,
    location: request.location,
    routeCount: request.count,
    useEstimatedAvailability: request.useEstimatedAvailability,
    advancedInfo: request.advancedInfo,
  };
}
