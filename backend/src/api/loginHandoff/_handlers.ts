import { Request, Response } from 'express';
import { z } from 'zod';
import { getServices } from '../../core/services';
import type { Translator } from '../../lib/localization';
import type { LoginRequest, LoginResponse, RequestBinding } from '../../lib/loginHandoff/loginHandoffDispatcher';
import type { LoginProtocol } from '../../lib/steamLogin/types';
import { sendFailure, sendOk } from '../../utils/genericResponse';
import { getRequestTranslator } from '../../utils/requestLocale';

export type LoginResponseBody = {
  Success: boolean;
  LoginUrl: string | null;
};

const OAuthBodySchema = z.object({
  BotName: z.string().nullish(),
  OAuthUrl: z.string().nullish(),
});

const OpenIdBodySchema = z.object({
  BotName: z.string().nullish(),
  OpenIdUrl: z.string().nullish(),
});

const isPresent = (body: unknown): boolean => body !== undefined && body !== null;

const toResponseBody = (response: LoginResponse): LoginResponseBody => ({
  Success: response.success,
  LoginUrl: response.loginUrl,
});

/**
 * Body fields of the wrong type are treated like absent ones.
 */
const extractFromBody = (protocol: LoginProtocol, body: unknown): LoginRequest | null => {
  if (!isPresent(body)) return null;
  if (protocol === 'oauth') {
    const parsed = OAuthBodySchema.safeParse(body);
    return parsed.success ? { botName: parsed.data.BotName, seedUrl: parsed.data.OAuthUrl } : {};
  }
  const parsed = OpenIdBodySchema.safeParse(body);
  return parsed.success ? { botName: parsed.data.BotName, seedUrl: parsed.data.OpenIdUrl } : {};
};

const respond = async (
  protocol: LoginProtocol,
  binding: RequestBinding,
  request: LoginRequest | null,
  t: Translator,
  res: Response,
): Promise<void> => {
  const outcome = await getServices().loginHandoff.resolve(protocol, binding, request, t);
  if (!outcome.ok) {
    sendFailure(res, 400, outcome.message);
    return;
  }
  sendOk(res, toResponseBody(outcome.response));
};

export const oAuthFromBody = (req: Request, res: Response) => (
  respond('oauth', 'body', extractFromBody('oauth', req.body), getRequestTranslator(req), res)
);

export const oAuthFromRoute = (req: Request<{ botName: string; oAuthUrl: string }>, res: Response) => (
  respond('oauth', 'route', { botName: req.params.botName, seedUrl: req.params.oAuthUrl }, getRequestTranslator(req), res)
);

export const openIdFromBody = (req: Request, res: Response) => (
  respond('openId', 'body', extractFromBody('openId', req.body), getRequestTranslator(req), res)
);

export const openIdFromRoute = (req: Request<{ botName: string; openIdUrl: string }>, res: Response) => (
  respond('openId', 'route', { botName: req.params.botName, seedUrl: req.params.openIdUrl }, getRequestTranslator(req), res)
);
