import { logger } from '../../utils/logger';
import type { BotRegistry } from '../bots/types';
import type { Translator } from '../localization';
import type { LoginProtocol, SteamLoginResolver } from '../steamLogin/types';

const log = logger.child('LoginHandoff');

/** Which HTTP adapter extracted the request fields */
export type RequestBinding = 'body' | 'route';

export type LoginRequest = {
  botName?: string | null;
  seedUrl?: string | null;
};

export type LoginResponse = {
  success: boolean;
  loginUrl: string | null;
};

export type LoginHandoffOutcome =
  | { ok: true; response: LoginResponse }
  | { ok: false; message: string };

export type LoginHandoffDeps = {
  bots: BotRegistry;
  resolver: SteamLoginResolver;
};

/** Wire name of the seed url field, as the caller sent it */
const SEED_URL_FIELD: Record<LoginProtocol, string> = {
  oauth: 'OAuthUrl',
  openId: 'OpenIdUrl',
};

const fail = (message: string): LoginHandoffOutcome => ({ ok: false, message });

/**
 * Success is declared by the resolver's url convention: only a url starting with `https`
 * is a usable login url. The raw value is surfaced either way.
 */
export const classifyLoginResult = (result: string | null | undefined): LoginResponse => ({
  success: typeof result === 'string' && result.startsWith('https'),
  loginUrl: result ?? null,
});

const originOf = (url: string): string => {
  try {
    return new URL(url).origin;
  } catch {
    return '<opaque>';
  }
};

export class LoginHandoffDispatcher {
  constructor(private readonly deps: LoginHandoffDeps) {}

  /**
   * Validates one login request, resolves the bot and runs the protocol's handshake.
   * Validation failures are returned, never thrown.
   */
  async resolve(
    protocol: LoginProtocol,
    binding: RequestBinding,
    request: LoginRequest | null | undefined,
    t: Translator,
  ): Promise<LoginHandoffOutcome> {
    const field = SEED_URL_FIELD[protocol];

    if (!request) {
      return fail('Request can not be null');
    }

    const { botName, seedUrl } = request;
    if (!botName || (binding === 'body' && !seedUrl)) {
      return fail(`BotName or ${field} can not be null`);
    }

    const bot = this.deps.bots.getBot(botName);
    if (!bot) {
      return fail(t('Bots.notFound', { botName }));
    }

    if (!seedUrl) {
      return fail(`${field} can not be null`);
    }

    const result = protocol === 'oauth'
      ? await this.deps.resolver.loginViaSteamOAuth(bot, seedUrl)
      : await this.deps.resolver.loginViaSteamOpenId(bot, seedUrl);

    const response = classifyLoginResult(result);
    if (response.success && response.loginUrl) {
      log.info(`${protocol} login for ${bot.name} succeeded (${originOf(response.loginUrl)})`);
    } else {
      log.warn(`${protocol} login for ${bot.name} failed: ${result}`);
    }

    return { ok: true, response };
  }
}
