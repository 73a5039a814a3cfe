/**
 * Medical Imaging Access Backend Server
 *
 * Entry point: load configuration, connect to PostgreSQL, check the audit
 * sink, then start listening.
 */

import type { Server } from 'http';
import { createApp } from './app';
import { ConfigError, loadConfigFromEnvironment } from './config';
import { createServices, pgRepositories } from './container';
import { closePool, initPool, testConnection } from './models/db';
import { createFsBlobStore } from './services/blob.service';
import { logInfo, logSystemError } from './utils/logger.utils';

let server: Server | null = null;
let stopSweep: () => void = () => undefined;

async function startServer(): Promise<void> {
  const config = loadConfigFromEnvironment();

  initPool(config.database);

  // Test database connection
  if (!(await testConnection())) {
    logSystemError('server.db_unavailable', 'Failed to connect to database. Exiting...');
    process.exit(1);
  }

  const services = createServices({
    repositories: pgRepositories,
    blobs: createFsBlobStore(config.storageRoot),
    config,
    checkDatabase: testConnection,
  });

  // A broken audit sink is a configuration error, not a per-request one
  try {
    await services.audit.verifySink();
  } catch (error) {
    logSystemError('server.audit_sink_unavailable', 'Audit log is not writable. Exiting...', error);
    process.exit(1);
  }

  if (config.expirySweepIntervalMs > 0) {
    stopSweep = services.approvals.startExpirySweep(config.expirySweepIntervalMs);
  }

  const app = createApp(services, config);
  server = app.listen(config.port, () => {
    logInfo('server.started', 'Server listening', undefined, {
      port: config.port,
      environment: config.nodeEnv,
      expirySweepIntervalMs: config.expirySweepIntervalMs,
    });
  });
}

// ======================
// GRACEFUL SHUTDOWN
// ======================

async function shutdown(signal: string): Promise<void> {
  logInfo('server.shutdown', `${signal} received. Shutting down gracefully...`);
  stopSweep();
  if (server) {
    await new Promise<void>((resolve) => server?.close(() => resolve()));
  }
  await closePool();
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logSystemError('server.shutdown_failed', 'Shutdown failed', error);
      process.exit(1);
    });
  });
}

startServer().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logSystemError('server.invalid_config', error.message, undefined, { variable: error.variable });
  } else {
    logSystemError('server.start_failed', 'Server failed to start', error);
  }
  process.exit(1);
});
