/**
 * steamcommunity.com cookies of a logged-on bot
 */
export type BotWebSession = {
  steamLoginSecure: string;
  sessionId: string;
};

/**
 * A managed Steam account. Owned by the registry, never mutated by request handlers.
 */
export type Bot = {
  name: string;
  /** SteamID64 as a decimal string */
  steamId?: string;
  enabled: boolean;
  /** Absent until the bot has logged on to the community site */
  webSession?: BotWebSession;
};

export interface BotRegistry {
  getBot(name: string): Bot | null;
  listBots(): Bot[];
}
