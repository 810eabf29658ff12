import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

// .env из корня проекта или из backend/
const cwd = process.cwd();
const rootEnv = path.join(cwd, '.env');
const backendEnv = path.join(cwd, 'backend', '.env');
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
if (fs.existsSync(backendEnv)) dotenv.config({ path: backendEnv });
if (!fs.existsSync(rootEnv) && !fs.existsSync(backendEnv)) dotenv.config();

import { createServer, type Server } from 'http';

import { config } from './config';
import { logger } from './lib/logger';
import { errorMessage } from './lib/errors';
import { loadUniverse } from './lib/universe';
import { initDb, isMemoryStore, closeDb } from './db';
import { createApp } from './app';
import { FinnhubCandleProvider } from './services/candleProvider';
import { BatchScanner } from './services/batchScanner';
import { startScanScheduler, stopScanScheduler } from './services/scanScheduler';

export async function startServer(port: number = config.port): Promise<Server> {
  const store = initDb();
  logger.info('Server', isMemoryStore() ? 'Database: in-memory (native SQLite unavailable)' : 'Database: SQLite initialized');
  if (!config.finnhub.hasCredentials) {
    logger.warn('Server', 'FINNHUB_API_KEY not set: scans will skip every ticker');
  }

  const getUniverse = () => loadUniverse(config.scan.universePath);
  const scanner = new BatchScanner({ provider: new FinnhubCandleProvider(), store });
  const app = createApp({ store, scanner, getUniverse });
  const server = createServer(app);

  startScanScheduler({
    scanner,
    store,
    getTickers: getUniverse,
    intervalMs: config.scan.intervalMs,
    runOnStart: config.scan.onStart,
    retentionDays: config.database.retentionDays
  });

  const shutdown = (signal: string) => {
    logger.info('Server', `${signal} received, shutting down`);
    stopScanScheduler();
    server.close(() => {
      closeDb();
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return new Promise((resolve) => {
    server.listen(port, () => {
      logger.info('Server', `API: http://localhost:${port}`);
      resolve(server);
    });
  });
}

// Run standalone if executed directly (npm run start)
if (require.main === module) {
  startServer().catch((e) => {
    logger.error('Server', 'Startup failed', { error: errorMessage(e) });
    process.exit(1);
  });
}
