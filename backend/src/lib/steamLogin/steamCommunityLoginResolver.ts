import { logger } from '../../utils/logger';
import type { Bot } from '../bots/types';
import { findLoginForm } from './loginForm';
import type { LoginForm } from './loginForm';
import type { LoginProtocol, SteamLoginResolver } from './types';

const log = logger.child('SteamLogin');

const STEAM_LOGIN_HOSTS = [
  'steamcommunity.com',
  'store.steampowered.com',
  'login.steampowered.com',
] as const;

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';

type FetchFn = typeof fetch;

export type SteamCommunityLoginResolverOptions = {
  requestTimeoutMs: number;
  /** Injected for tests; defaults to the global fetch */
  fetchFn?: FetchFn;
};

const isRedirect = (status: number) => status >= 300 && status < 400;

const isSteamLoginUrl = (url: URL) => (
  url.protocol === 'https:' && STEAM_LOGIN_HOSTS.some((host) => url.hostname === host)
);

// An unread body keeps the keep-alive socket checked out of the pool.
const discardBody = async (response: Response): Promise<void> => {
  await response.body?.cancel();
};

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.name === 'TimeoutError' ? 'request timed out' : error.message;
  }
  return String(error);
};

export class SteamCommunityLoginResolver implements SteamLoginResolver {
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: SteamCommunityLoginResolverOptions) {
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  loginViaSteamOAuth(bot: Bot, oAuthUrl: string): Promise<string> {
    return this.login('oauth', bot, oAuthUrl);
  }

  loginViaSteamOpenId(bot: Bot, openIdUrl: string): Promise<string> {
    return this.login('openId', bot, openIdUrl);
  }

  private async login(protocol: LoginProtocol, bot: Bot, seedUrl: string): Promise<string> {
    const target = this.parseSeedUrl(seedUrl);
    if (typeof target === 'string') return target;

    if (!bot.enabled || !bot.webSession) {
      return `Error: bot ${bot.name} is not logged on`;
    }
    const cookie = `steamLoginSecure=${bot.webSession.steamLoginSecure}; sessionid=${bot.webSession.sessionId}`;

    try {
      const page = await this.fetchFn(target.toString(), {
        method: 'GET',
        headers: { Cookie: cookie, 'User-Agent': USER_AGENT },
        redirect: 'manual',
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });

      // Sites the account already authorized skip the consent page.
      if (isRedirect(page.status)) {
        await discardBody(page);
        return this.followRedirect(protocol, bot, page, target);
      }
      if (!page.ok) {
        await discardBody(page);
        return `Error: ${protocol} page returned HTTP ${page.status}`;
      }

      const form = this.findForm(protocol, await page.text(), target.toString());
      if (!form) {
        return `Error: no ${protocol} login form found, the bot session may have expired`;
      }

      const submit = await this.fetchFn(form.action, {
        method: 'POST',
        headers: {
          Cookie: cookie,
          'User-Agent': USER_AGENT,
          'Content-Type': 'application/x-www-form-urlencoded',
          Referer: target.toString(),
        },
        body: new URLSearchParams(form.fields).toString(),
        redirect: 'manual',
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });

      await discardBody(submit);
      if (!isRedirect(submit.status)) {
        return `Error: ${protocol} login returned HTTP ${submit.status}`;
      }
      return this.followRedirect(protocol, bot, submit, new URL(form.action));
    } catch (error) {
      log.warn(`${protocol} login for ${bot.name} failed: ${describeError(error)}`);
      return `Error: ${describeError(error)}`;
    }
  }

  private parseSeedUrl(seedUrl: string): URL | string {
    let url: URL;
    try {
      url = new URL(seedUrl);
    } catch {
      return 'Error: login url is not a valid url';
    }
    if (url.protocol !== 'https:') {
      return 'Error: login url must use https';
    }
    if (!isSteamLoginUrl(url)) {
      return `Error: ${url.hostname} is not a Steam login host`;
    }
    return url;
  }

  private findForm(protocol: LoginProtocol, html: string, pageUrl: string): LoginForm | null {
    if (protocol === 'openId') {
      return findLoginForm(html, pageUrl, (attrs, action) => attrs.id === 'openidForm' && isSteamLoginUrl(action));
    }
    return findLoginForm(
      html,
      pageUrl,
      (attrs, action) => (attrs.method || 'get').toLowerCase() === 'post'
        && action.protocol === 'https:'
        && action.hostname === 'steamcommunity.com',
    );
  }

  private followRedirect(protocol: LoginProtocol, bot: Bot, response: Response, base: URL): string {
    const location = response.headers.get('location');
    if (!location) return `Error: ${protocol} login redirected without a location`;

    let url: URL;
    try {
      url = new URL(location, base);
    } catch {
      return `Error: ${protocol} login redirected to an invalid location`;
    }
    // Steam bounces expired sessions to its own sign-in page.
    if (url.hostname === 'steamcommunity.com' && url.pathname.startsWith('/login')) {
      return `Error: bot ${bot.name} session expired`;
    }
    return url.toString();
  }
}
