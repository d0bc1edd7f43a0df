// src/server.ts

import { createServer } from 'http';
import { createApp } from './app';
import { ConfigError, loadConfig } from './config';
import { createStore } from './models/store';
import { createBotEngine } from './services/bot';
import { configureLogger, logger } from './services/logging/logger';
import { BotRegistry } from './services/registry/BotRegistry';

function start(): void {
  const config = loadConfig();
  configureLogger({ level: config.logLevel, logDir: config.logDir });

  const registry = new BotRegistry({
    store: createStore(config.store),
    engine: createBotEngine(config.bot),
  });

  registry.on('userCreated', (user) => logger.debug('Registry event: userCreated', { userId: user.id }));
  registry.on('messageStored', (message) =>
    logger.debug('Registry event: messageStored', { userId: message.userId, messageId: message.id })
  );

  const app = createApp({ registry, corsOrigin: config.corsOrigin });
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`, {
      store: config.store.driver,
      engine: config.bot.kind,
    });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    httpServer.close((error) => {
      if (error) {
        logger.error('Error while closing server', { message: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  start();
} catch (error) {
  if (error instanceof ConfigError) {
    logger.error(error.message, { issues: error.issues });
  } else {
    logger.error('Failed to start server', {
      message: error instanceof Error ? error.message : String(error),
    });
  }
  process.exit(1);
}
