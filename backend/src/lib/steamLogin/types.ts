import type { Bot } from '../bots/types';

export type LoginProtocol = 'oauth' | 'openId';

/**
 * Performs the login handshake on steamcommunity.com for a bot.
 *
 * Both methods resolve to the third-party login URL on success, which always starts with
 * `https`. Any other string is a failure description. They never reject for a failed login.
 */
export interface SteamLoginResolver {
  loginViaSteamOAuth(bot: Bot, oAuthUrl: string): Promise<string>;
  loginViaSteamOpenId(bot: Bot, openIdUrl: string): Promise<string>;
}
