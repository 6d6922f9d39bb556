/**
 * Express Server - process entry point
 * Opens the database, builds the app around it and closes both on shutdown.
 */
import 'dotenv/config';
import { createApp } from './app.js';
import { CHART_CONFIG, DATABASE_CONFIG, SERVER_CONFIG, VIEWS_DIR, resolveDatabasePath } from './config.js';
import { closeDatabase, countAggregates, countWorkers, openDatabase, type DatabaseHandle } from './database.js';
import { describeError } from './errors.js';

function start(): void {
  console.log('[Server] Initializing database...');
  const db: DatabaseHandle = openDatabase({
    path: resolveDatabasePath(DATABASE_CONFIG.url),
    migrationsDir: DATABASE_CONFIG.migrationsDir,
  });
  console.log(`[Server] ${countAggregates(db)} aggregate and ${countWorkers(db)} worker records on file`);

  const app = createApp({
    db,
    chart: CHART_CONFIG,
    viewsDir: VIEWS_DIR,
    logRequests: SERVER_CONFIG.logRequests,
  });

  const server = app.listen(SERVER_CONFIG.port, SERVER_CONFIG.host, () => {
    console.log(`[Server] Running on http://${SERVER_CONFIG.host}:${SERVER_CONFIG.port}/form`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log('[Server] HTTP server closed');
      closeDatabase(db);
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  start();
} catch (error) {
  console.error('[FATAL] Server initialization failed:', describeError(error));
  process.exit(1);
}
