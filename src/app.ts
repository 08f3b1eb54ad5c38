import dotenv from 'dotenv';
import { BudgetTracker } from './budget.js';
import { RawResponseCache } from './cache.js';
import { OpenSkyClient } from './client.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { Controllers } from './controllers.js';
import { ConfigurationError } from './errors.js';
import { FetchScheduler } from './scheduler.js';
import { createServer } from './server.js';
import { SnapshotStore } from './storage.js';
import { TokenManager } from './token.js';

// Load environment variables
dotenv.config();

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigurationError) {
    console.error('[CONFIG] Refusing to start:');
    error.issues.forEach(issue => console.error(`[CONFIG]   ${issue}`));
    process.exit(1);
  }
  throw error;
}

const tokens = new TokenManager(config.credentials, {
  tokenUrl: config.authUrl,
  safetyMarginSec: config.tokenSafetyMarginSec,
});
const budget = new BudgetTracker(config.dailyCreditLimit);
const store = new SnapshotStore();
const scheduler = new FetchScheduler({
  regions: config.regions,
  budget,
  tokens,
  client: new OpenSkyClient(config.apiBase, tokens),
  cache: new RawResponseCache(config.rawCacheTtlSec * 1000),
  store,
  transform: config.transform,
  analytics: config.analytics,
  refreshIntervalSec: config.refreshIntervalSec,
  fetchTimeoutSec: config.fetchTimeoutSec,
  cronExpression: config.refreshCron,
});

const app = createServer(new Controllers(scheduler, store, budget));

const server = app.listen(config.port, () => {
  console.log(`Server is running on http://localhost:${config.port}`);
  console.log(`[CONFIG] Regions: ${config.regions.map(r => `${r.name} (${r.creditCost} credit(s))`).join(', ')}`);
  scheduler.start();
});

const shutdown = (signal: string): void => {
  console.log(`[APP] ${signal} received, shutting down`);
  scheduler.stop();
  server.close(() => process.exit(0));
};
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
