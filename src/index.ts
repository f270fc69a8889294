import { Server } from 'http';
import { createApp, createServices } from './app';
import { getEnv } from './config/env';
import { initializeDatabase, closeDatabase } from './database';
import { getRefreshTokenRepository, getUserRepository } from './repositories';
import { BackgroundTask } from './services/background-task.service';
import { ConfigurationError } from './utils/errors';
import { Logger, LogLevel } from './utils/logger';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

const LOG_LEVELS = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
} as const;

// Initialize database and start server
async function startServer(): Promise<void> {
  const env = getEnv();
  Logger.configure({
    ...(env.LOG_LEVEL ? { level: LOG_LEVELS[env.LOG_LEVEL] } : {}),
    ...(env.LOG_FORMAT ? { format: env.LOG_FORMAT } : {}),
  });
  await initializeDatabase(env);

  const refreshTokenRepository = getRefreshTokenRepository();
  const services = createServices(env, getUserRepository(), refreshTokenRepository);

  try {
    await services.revocations.warmUp(refreshTokenRepository, env.ACCESS_TOKEN_TTL * 1000);
  } catch (error) {
    Logger.error('Revocation cache warm-up failed; continuing with an empty cache', error);
  }

  const tasks = [
    new BackgroundTask(
      {
        name: 'Expired token cleanup',
        intervalMs: env.TOKEN_CLEANUP_INTERVAL * 1000,
        retryDelayMs: env.TOKEN_CLEANUP_RETRY_DELAY * 1000,
        runOnStart: true,
      },
      async (signal) => {
        await services.refreshTokens.sweepExpired(signal);
      }
    ),
    new BackgroundTask(
      {
        name: 'Revocation cache purge',
        intervalMs: env.REVOCATION_CACHE_PURGE_INTERVAL * 1000,
        retryDelayMs: env.REVOCATION_CACHE_PURGE_INTERVAL * 1000,
      },
      async () => {
        services.revocations.purgeExpired();
      }
    ),
  ];
  tasks.forEach((task) => task.start());

  const app = createApp(services, env);
  const server = app.listen(env.PORT, () => {
    Logger.info(`Server is running on http://localhost:${env.PORT}`);
    Logger.info(`Swagger documentation available at http://localhost:${env.PORT}/api-docs`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    Logger.info('Shutting down', { signal });
    await Promise.all(tasks.map((task) => task.stop()));
    await closeServer(server);
    await closeDatabase();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error) => {
          Logger.error('Shutdown failed', error);
          process.exit(1);
        });
    });
  }
}

startServer().catch((error) => {
  if (error instanceof ConfigurationError) {
    Logger.error('Invalid configuration', error, { issues: error.issues });
  } else {
    Logger.error('Failed to start server', error);
  }
  process.exit(1);
});
