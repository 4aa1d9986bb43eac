/**
 * Clinic Records API server
 *
 * Entry point: loads the environment, checks the database, applies the
 * schema and starts listening.
 */

import dotenv from 'dotenv';

// Load environment variables before anything reads them
dotenv.config();

import { createApp } from './app';
import { closePool, ensureSchema, testConnection } from './models/db';
import { logInfo, logSystemError } from './utils/logger.utils';

const PORT = parseInt(process.env.PORT || '3001', 10);

async function startServer(): Promise<void> {
  const dbConnected = await testConnection();
  if (!dbConnected) {
    logSystemError('server.startup_failed', 'Failed to connect to database. Exiting...');
    process.exit(1);
  }

  await ensureSchema();

  const app = createApp();
  app.listen(PORT, () => {
    logInfo('server.started', `Clinic Records API listening on port ${PORT}`, undefined, {
      environment: process.env.NODE_ENV || 'development',
    });
  });
}

// ======================
// GRACEFUL SHUTDOWN
// ======================

function shutdown(signal: string): void {
  logInfo('server.shutdown', `${signal} received. Shutting down gracefully...`);
  closePool()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logSystemError('server.shutdown_failed', 'Error while closing the database pool', error);
      process.exit(1);
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

startServer().catch((error: unknown) => {
  logSystemError('server.startup_failed', 'Server failed to start', error);
  process.exit(1);
});
