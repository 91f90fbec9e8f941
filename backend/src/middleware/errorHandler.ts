import { ErrorRequestHandler, RequestHandler } from 'express';
import { config } from '../core/config';
import { sendFailure } from '../utils/genericResponse';
import { logger } from '../utils/logger';
import { getRequestTranslator } from '../utils/requestLocale';

type BodyParserError = Error & { type: string; status: number };

const isBodyParserError = (err: unknown): err is BodyParserError => (
  err instanceof Error
  && typeof Reflect.get(err, 'type') === 'string'
  && typeof Reflect.get(err, 'status') === 'number'
);

export const notFoundHandler: RequestHandler = (req, res) => {
  sendFailure(res, 404, getRequestTranslator(req)('Http.notFound', { method: req.method, path: req.path }));
};

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const t = getRequestTranslator(req);

  if (isBodyParserError(err) && err.status < 500) {
    logger.warn(`Rejected request body (${err.type}): ${err.message}`);
    sendFailure(res, err.status, err.type === 'entity.parse.failed' ? t('Http.invalidBody') : err.message);
    return;
  }

  logger.error('Unhandled error:', err);
  const exposeMessage = config.env === 'development' && err instanceof Error;
  sendFailure(res, 500, exposeMessage ? err.message : t('Http.internalError'));
};
