import { serve } from '@hono/node-server';
import { createGovernanceApp } from './server.js';
import { loadConfig } from './config.js';
import { migrate } from './db/migrate.js';
import { initTelemetry, shutdownTelemetry } from './telemetry.js';

const config = loadConfig();

// OTEL SDK starts before the app so instrumentation sees every module
const telemetrySdk = initTelemetry({ endpoint: config.otelEndpoint });

const { app, log, policyStore, monitor, dbPool, signalEmitter } = createGovernanceApp(config);

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// An invalid policy at boot leaves the store empty: admission denies and
// cycles skip until a valid document is loaded
policyStore.reloadQuietly('startup');

if (dbPool) {
  const result = await migrate(dbPool);
  log('info', {
    event: 'migrations_complete',
    applied: result.applied,
    skipped: result.skipped.length,
    warnings: result.warnings,
  });
}

if (signalEmitter) {
  // Connect asynchronously; publishing reports false until connected
  signalEmitter.connect().catch((err: unknown) => {
    log('error', { event: 'nats_connect_error', message: errorMessage(err) });
  });
}

process.on('SIGHUP', () => {
  policyStore.reloadQuietly('sighup');
});

monitor.start();

const server = serve(
  { fetch: app.fetch, port: config.port },
  (info) => {
    log('info', { event: 'server_listening', port: info.port, policy_path: config.policyPath });
  },
);

let shuttingDown = false;
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log('info', { event: 'shutdown_started', signal });

  // 1. Stop accepting new connections
  server.close();

  // 2. Let an in-flight cycle stop at its next claim boundary
  await monitor.stop();
  policyStore.close();

  // 3. Flush pending OTEL spans
  await shutdownTelemetry(telemetrySdk).catch((err: unknown) => {
    log('warn', { event: 'telemetry_shutdown_error', message: errorMessage(err) });
  });

  // 4. Close infrastructure connections
  if (signalEmitter) {
    await signalEmitter.close().catch((err: unknown) => {
      log('warn', { event: 'nats_close_error', message: errorMessage(err) });
    });
  }
  if (dbPool) {
    await dbPool.end().catch((err: unknown) => {
      log('warn', { event: 'db_close_error', message: errorMessage(err) });
    });
  }

  log('info', { event: 'shutdown_complete' });

  // Force exit if the event loop does not drain within 10s
  setTimeout(() => process.exit(1), 10_000).unref();
}

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});
