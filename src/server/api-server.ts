/**
 * API Server
 * Serves the route and profit tools over HTTP
 */

import { config, loadRouteConfig } from '../config/settings.js';
import { FileCatalogProvider } from '../catalog/provider.js';
import { TradeRouteEngine } from '../core/engine.js';
import { createDatabase } from '../storage/index.js';
import { RouteTools } from '../tools/route-tools.js';
import { createApiServer } from './app.js';

const routeConfig = loadRouteConfig();
const database = config.DB_ENABLED ? createDatabase(config.DB_PATH) : null;
if (database) {
  console.log(`[Database] Query log at ${config.DB_PATH}`);
}

const engine = new TradeRouteEngine(routeConfig, { recorder: database ?? undefined });
const tools = new RouteTools(engine, new FileCatalogProvider(config.CATALOG_PATH));
const server = createApiServer({ tools, routeConfig, database });

server.listen(config.PORT, () => {
  console.log('='.repeat(50));
  console.log('Trade Route API Server');
  console.log('='.repeat(50));
  console.log(`HTTP:      http://localhost:${config.PORT}`);
  console.log(`Catalog:   ${config.CATALOG_PATH}`);
  console.log(`Tools:     ${tools.availableTools().join(', ') || 'none'}`);
  console.log(`Database:  ${database ? config.DB_PATH : 'Disabled'}`);
  console.log('='.repeat(50));
});

process.on('SIGINT', () => {
  console.log('\n[Server] Shutting down...');
  database?.close();
  server.close(() => process.exit(0));
});
