import express from 'express';
import type { Server } from 'node:http';
import { config } from './core/config';
import { loadBotRegistry } from './lib/bots/botRegistry';
import { LoginHandoffDispatcher } from './lib/loginHandoff/loginHandoffDispatcher';
import { SteamCommunityLoginResolver } from './lib/steamLogin/steamCommunityLoginResolver';
import { initServer } from './server';
import { logger } from './utils/logger';

const bootstrap = async () => {
  const bots = loadBotRegistry(config.bots.file);
  const resolver = new SteamCommunityLoginResolver({ requestTimeoutMs: config.steam.requestTimeoutMs });

  const app = express();
  initServer(app, {
    bots,
    loginHandoff: new LoginHandoffDispatcher({ bots, resolver }),
  });

  const httpServer = await new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.port, (error) => {
      if (error) {
        if (Reflect.get(error, 'code') === 'EADDRINUSE') {
          logger.error(`Port ${config.port} is already in use. Stop the other process or change PORT, then restart.`);
        }
        reject(error);
        return;
      }
      logger.info(`🚀 Login handoff server running on port ${config.port}`);
      resolve(server);
    });
  });

  // Graceful shutdown
  let isShuttingDown = false;
  const shutdown = async (signal: 'SIGINT' | 'SIGTERM') => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(`Shutting down gracefully... (${signal})`);

    // Stop accepting new connections
    await new Promise<void>((res) => {
      httpServer.close(() => res());
    });

    process.exit(0);
  };

  process.on('SIGINT', () => { void shutdown('SIGINT'); });
  process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
};

bootstrap().catch((err) => {
  logger.error('Error starting server:', err);
  process.exit(1);
});
