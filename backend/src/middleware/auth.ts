import crypto from 'crypto';
import express from 'express';
import { config } from '../core/config';
import { sendFailure } from '../utils/genericResponse';
import { getRequestTranslator } from '../utils/requestLocale';

const IPC_PASSWORD_HEADER = 'authentication';

const digest = (value: string) => crypto.createHash('sha256').update(value).digest();

export const verifyIpcPassword = (candidate: string, expected: string): boolean => (
  crypto.timingSafeEqual(digest(candidate), digest(expected))
);

const readCandidate = (req: express.Request): string | null => {
  const header = req.headers[IPC_PASSWORD_HEADER];
  if (typeof header === 'string' && header) return header;
  const query = req.query.password;
  if (typeof query === 'string' && query) return query;
  return null;
};

const respondUnauthorized = (req: express.Request, res: express.Response) => {
  sendFailure(res, 401, getRequestTranslator(req)('Http.unauthorized'));
};

/**
 * Checks the `Authentication` header or `password` query parameter against IPC_PASSWORD.
 * Lets every request through when no password is configured.
 */
export const ipcAuthMiddleware = (req: express.Request, res: express.Response, next: express.NextFunction) => {
  const expected = config.ipc.password;
  if (!expected) return next();

  const candidate = readCandidate(req);
  if (!candidate || !verifyIpcPassword(candidate, expected)) {
    respondUnauthorized(req, res);
    return;
  }
  next();
};
