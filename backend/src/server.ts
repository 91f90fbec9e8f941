import express, { Express, RequestHandler } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { config } from './core/config';
import { setServices } from './core/services';
import type { AppServices } from './core/services';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { ipcAuthMiddleware } from './middleware/auth';
import { getRouteEntries } from './utils/routesRegistry';
import type { RouteMethod } from './utils/routesRegistry';
import { logger } from './utils/logger';
import './api';

export const initServer = (app: Express, services: AppServices) => {
  setServices(services);

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '64kb' }));

  const mount: Record<RouteMethod, (path: string, handlers: RequestHandler[]) => void> = {
    get: (path, handlers) => { app.get(path, ...handlers); },
    post: (path, handlers) => { app.post(path, ...handlers); },
    put: (path, handlers) => { app.put(path, ...handlers); },
    delete: (path, handlers) => { app.delete(path, ...handlers); },
    patch: (path, handlers) => { app.patch(path, ...handlers); },
  };

  getRouteEntries().forEach(([path, routeInfo]) => {
    const handlers: RequestHandler[] = [routeInfo.handler];
    if (routeInfo.options.protected) {
      handlers.unshift(ipcAuthMiddleware);
    }
    mount[routeInfo.method](path, handlers);
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  logger.debug(`Registered ${getRouteEntries().length} route(s); IPC password ${config.ipc.password ? 'enabled' : 'disabled'}`);
};
