import { RequestHandler } from 'express';
import { RouteParameters } from 'express-serve-static-core';

type RouteOptions = {
  /** Guarded by the IPC password when one is configured */
  protected?: boolean;
}

export type RouteMethod = 'get' | 'post' | 'put' | 'delete' | 'patch';

type RouteInfo = {
  method: RouteMethod;
  handler: RequestHandler;
  options: RouteOptions;
}

const routesRegistry = new Map<string, RouteInfo[]>();

export const registerRoute = <
  TRoute extends string,
  TParams = RouteParameters<TRoute>,
>(method: RouteMethod | RouteMethod[], path: TRoute, handler: RequestHandler<TParams>, options: RouteOptions = {}) => {
  const existingRoutes = routesRegistry.get(path) || [];
  for (const m of Array.isArray(method) ? method : [method]) {
    existingRoutes.push({
      method: m,
      handler: handler as never,
      options,
    });
  }
  routesRegistry.set(path, existingRoutes);
};

export const getRouteEntries = () => {
  const res: [string, RouteInfo][] = [];
  for (const [path, routes] of routesRegistry) {
    for (const route of routes) {
      res.push([path, route]);
    }
  }
  return res;
};

export const findRoute = (method: RouteMethod, path: string): RouteInfo | undefined => (
  routesRegistry.get(path)?.find((route) => route.method === method)
);
