// src/main.ts
import { Server } from 'http';
import { Express } from 'express';
import { createContainer } from './container';
import { AppConfig, configManager } from './infra/config/config';
import { database } from './infra/database/connection';
import { createApp, createFallbackApp } from './infra/http/app';
import { logger, setLogLevel } from './infra/logger';
import { MigrationService } from './infra/migrations/migration.service';
import { APP_VERSION, HTTP_DEFAULTS } from './shared/constants';

/**
 * Main Application Class.
 * Loads configuration, connects the database, applies migrations and
 * serves HTTP until a termination signal arrives.
 */
class Application {
  private server: Server | null = null;
  private isShuttingDown = false;

  async start(): Promise<void> {
    let config: AppConfig;
    try {
      config = configManager.load();
    } catch (error) {
      logger.error('Configuration failed to load; serving health endpoints only', {
        error: (error as Error).message,
      });
      this.listen(createFallbackApp(process.env.NODE_ENV || 'development'), this.fallbackPort());
      return;
    }

    setLogLevel(config.app.logLevel);
    logger.info(`Starting Dairy Cooperative back office v${APP_VERSION}...`);

    try {
      await database.connect({
        connectionString: config.database.url,
        ssl: config.database.ssl,
        maxConnections: config.database.maxConnections,
        minConnections: config.database.minConnections,
      });

      await new MigrationService().run();
      logger.info('Database ready', { pool: database.getPoolStats() });
    } catch (error) {
      logger.error('Database unavailable at startup; continuing without migrations', {
        error: (error as Error).message,
      });
    }

    const container = createContainer(config);
    this.listen(createApp(container, config), config.http.port);
  }

  private listen(app: Express, port: number): void {
    this.server = app.listen(port, () => {
      logger.info(`HTTP server listening on port ${port}`);
    });
  }

  private fallbackPort(): number {
    const port = Number.parseInt(process.env.PORT ?? '', 10);
    return Number.isNaN(port) ? HTTP_DEFAULTS.PORT : port;
  }

  async shutdown(exitCode = 0): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    logger.info('Initiating graceful shutdown...', { exitCode });
    try {
      const server = this.server;
      if (server) {
        await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
      }
      logger.debug('Closing database pool', { pool: database.getPoolStats() });
      await database.disconnect();
      logger.info('Graceful shutdown completed successfully.');
      process.exit(exitCode);
    } catch (error) {
      logger.error('Error during shutdown procedure', { error: (error as Error).message });
      process.exit(1);
    }
  }
}

const app = new Application();

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Promise Rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message });
  void app.shutdown(1);
});

process.on('SIGINT', () => void app.shutdown(0));
process.on('SIGTERM', () => void app.shutdown(0));

void app.start();
