#!/usr/bin/env node
/**
 * Route CLI
 * Runs a single route query against a catalog file and prints the result
 */

import { config, loadRouteConfig } from '../config/settings.js';
import { FileCatalogProvider } from '../catalog/provider.js';
import { TradeRouteEngine } from '../core/engine.js';
import type { RouteQueryResult, RouteView } from '../core/types.js';
import { createDatabase } from '../storage/index.js';
import { RouteTools, type RouteToolResult } from '../tools/route-tools.js';

interface CliOptions {
  catalog: string;
  capacity: number;
  budget: number;
  location?: string;
  count?: number;
  advanced: boolean;
  rawAvailability: boolean;
  loadingDock: boolean;
  freightElevator: boolean;
  json: boolean;
  log: boolean;
}

function printHelp(): void {
  console.log(`
Trade Route CLI

Usage: npm run routes -- --capacity <scu> --budget <amount> [options]

Options:
  --catalog <file>       Catalog JSON file (default: ${config.CATALOG_PATH})
  --capacity <scu>       Ship cargo capacity in SCU (required)
  --budget <amount>      Available budget (required)
  --location <name>      Start location (terminal, station, city, moon, planet or system)
  --count <n>            Number of routes to show
  --advanced             Include margins, monitoring flags and scores
  --raw-availability     Use reported stock instead of estimated availability
  --no-dock              Ship cannot use loading docks
  --no-elevator          Ship cannot use freight elevators
  --json                 Print the raw result as JSON
  --log                  Record the query in the query log (${config.DB_PATH})
  --help, -h             Show this help

Examples:
  npm run routes -- --capacity 96 --budget 250000
  npm run routes -- --capacity 4608 --budget 2000000 --no-elevator --count 3 --advanced
  npm run routes -- --capacity 46 --budget 50000 --location Hurston
`);
}

function parseArgs(args: string[]): CliOptions | null {
  const options: CliOptions = {
    catalog: config.CATALOG_PATH,
    capacity: NaN,
    budget: NaN,
    advanced: false,
    rawAvailability: false,
    loadingDock: true,
    freightElevator: true,
    json: false,
    log: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--catalog':
        options.catalog = next;
        i++;
        break;
      case '--capacity':
        options.capacity = parseFloat(next);
        i++;
        break;
      case '--budget':
        options.budget = parseFloat(next);
        i++;
        break;
      case '--location':
        options.location = next;
        i++;
        break;
      case '--count':
        options.count = parseInt(next, 10);
        i++;
        break;
      case '--advanced':
        options.advanced = true;
        break;
      case '--raw-availability':
        options.rawAvailability = true;
        break;
      case '--no-dock':
        options.loadingDock = false;
        break;
      case '--no-elevator':
        options.freightElevator = false;
        break;
      case '--json':
        options.json = true;
        break;
      case '--log':
        options.log = true;
        break;
      case '--help':
      case '-h':
        return null;
    }
  }

  return options;
}

function formatRoute(route: RouteView): string {
  const lines = [
    `#${route.rank} ${route.commodity}: ${route.buyTerminal} -> ${route.sellTerminal}`,
    `   ${route.quantityScu} SCU, buy ${route.buyPrice} / sell ${route.sellPrice}, ` +
      `invest ${route.investment}, profit ${route.profit}`,
    `   status: buy ${route.buyStatus}, sell ${route.sellStatus}`,
  ];

  if (route.advanced) {
    const a = route.advanced;
    lines.push(
      `   margin ${a.profitMargin}, base profit ${a.baseProfit}, score ${a.score}`,
      `   from ${a.buyLocation}${a.buyTerminalMonitored ? ' (monitored)' : ''}` +
        ` to ${a.sellLocation}${a.sellTerminalMonitored ? ' (monitored)' : ''}`,
      `   est. stock ${a.estimatedStockScu} SCU, est. demand ${a.estimatedDemandScu} SCU, data age ${a.dataAgeHours}h`
    );
  }

  return lines.join('\n');
}

function formatResult(result: RouteToolResult): string {
  if (result.status === 'tool-disabled') {
    return `Error: ${result.error}`;
  }

  const query: RouteQueryResult = result;
  const lines: string[] = [`Status: ${query.status}`];

  for (const route of query.routes) {
    lines.push(formatRoute(route));
  }
  for (const notice of query.notices) {
    lines.push(`Note: ${notice}`);
  }

  return lines.join('\n');
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (!options) {
    printHelp();
    return;
  }

  const database = options.log ? createDatabase(config.DB_PATH) : null;
  const engine = new TradeRouteEngine(loadRouteConfig(), { recorder: database ?? undefined });
  const tools = new RouteTools(engine, new FileCatalogProvider(options.catalog));

  try {
    const result = await tools.commodityRoute({
      cargoCapacityScu: options.capacity,
      budget: options.budget,
      location: options.location,
      count: options.count,
      shipHasLoadingDock: options.loadingDock,
      shipHasFreightElevator: options.freightElevator,
      useEstimatedAvailability: options.rawAvailability ? false : undefined,
      advancedInfo: options.advanced || undefined,
    });

    console.log(options.json ? JSON.stringify(result, null, 2) : formatResult(result));

    if (result.status === 'invalid-input' || result.status === 'no-catalog-data' || result.status === 'tool-disabled') {
      process.exitCode = 1;
    }
  } finally {
    database?.close();
  }
}

main().catch((error: unknown) => {
  console.error('[CLI] Route query failed:', error);
  process.exitCode = 1;
});
