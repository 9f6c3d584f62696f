// Load environment variables FIRST - before any other imports
import * as dotenv from 'dotenv';
import * as path from 'path';

// In production __dirname is 'dist/', so '../.env' resolves to the project root
dotenv.config({ path: path.resolve(__dirname, '../.env') });

/**
 * State graph runtime - HTTP entry point
 */

// Initialize Sentry first to capture boot-time errors
import { initSentry } from './sentry';
initSentry();

import { Pool } from 'pg';
import { createApp } from './app';
import { loadEngineConfig, loadServerConfig } from './config/engineConfig';
import { handleUncaughtException, handleUnhandledRejection } from './middleware/errorHandler';
import { buildCustomerServiceGraph } from './services/stategraph/flows/customerServiceGraph';
import { PostgresSessionStore } from './services/stategraph/pgSessionStore';
import { InMemorySessionStore, type SessionStore } from './services/stategraph/sessionStore';
import logger from './utils/logger';

handleUncaughtException();
handleUnhandledRejection();

async function createSessionStore(): Promise<{ store: SessionStore; close: () => Promise<void> }> {
  const config = loadServerConfig();
  if (!config.databaseUrl) {
    logger.warn('DATABASE_URL not set; sessions are kept in memory');
    return { store: new InMemorySessionStore(), close: async () => undefined };
  }

  const pool = new Pool({ connectionString: config.databaseUrl });
  const store = new PostgresSessionStore(pool, {
    table: config.sessionTable,
    ttlSeconds: config.sessionTtlSeconds,
  });
  await store.ensureSchema();
  logger.info(`✅ Postgres session store ready (${config.sessionTable})`);
  return { store, close: () => pool.end() };
}

async function main(): Promise<void> {
  const serverConfig = loadServerConfig();
  const engineConfig = loadEngineConfig();
  const { store, close } = await createSessionStore();

  const app = createApp({
    graphs: [buildCustomerServiceGraph()],
    sessionStore: store,
    engineOptions: engineConfig,
  });

  const server = app.listen(serverConfig.port, () => {
    logger.info(`🎉 State graph runtime listening on port ${serverConfig.port}`);
    logger.info(`📊 Health check: http://localhost:${serverConfig.port}/health`);
  });

  const shutdown = (signal: string) => {
    logger.info(`👋 ${signal} signal received: closing HTTP server`);
    server.close(() => {
      close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close session store', { error });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
