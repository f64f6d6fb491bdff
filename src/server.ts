import { connectDatabase, disconnectDatabase } from './config/database';
import { env } from './config/env';
import { createApp } from './app';
import { createServices } from './container';
import { MongoUnitOfWork } from './repositories/unitOfWork';
import { ProviderAdapterFactory } from './providerAdapters/adapter.factory';
import { createDefaultChannelAdapters } from './notificationAdapters/channelSenders';
import { JobWorker, scheduleRecurringJob } from './jobs/worker';
import { JOB_TYPES } from './jobs/jobRegistry';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

// Start server
async function startServer(): Promise<void> {
  // Connect to database
  await connectDatabase();

  const services = createServices(new MongoUnitOfWork(), {
    resolveProvider: new ProviderAdapterFactory({ timeoutMs: env.PROVIDER_TIMEOUT_MS }).resolver(),
    channelAdapters: createDefaultChannelAdapters(),
    publicBaseUrl: env.PUBLIC_BASE_URL,
  });

  const app = createApp(services);
  const server = app.listen(env.PORT, () => {
    logger.info('Server running', { port: env.PORT, environment: env.NODE_ENV });
  });

  // Background processing: notification dispatch and the overdue sweep
  const worker = new JobWorker(services.jobs, services.jobHandlers, {
    concurrency: env.WORKER_CONCURRENCY,
    pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
  });
  worker.start();
  const cancelSweep = scheduleRecurringJob(services.jobs, JOB_TYPES.LEDGER_OVERDUE_SWEEP, env.OVERDUE_SWEEP_INTERVAL_MS);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { signal });
    cancelSweep();
    await new Promise<void>(resolve => server.close(() => resolve()));
    await worker.stop();
    await disconnectDatabase();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        });
    });
  }
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
