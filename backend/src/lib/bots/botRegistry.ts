import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import type { Bot, BotRegistry } from './types';

const log = logger.child('BotRegistry');

const STEAM_ID_64 = /^\d{17}$/;

const BotsFileSchema = z.object({
  bots: z.array(z.object({
    name: z.string().trim().min(1),
    steamId: z.string().regex(STEAM_ID_64, 'steamId must be a SteamID64').optional(),
    enabled: z.boolean().default(true),
    webSession: z.object({
      steamLoginSecure: z.string().min(1),
      sessionId: z.string().min(1),
    }).optional(),
  })).default([]),
});

export class InMemoryBotRegistry implements BotRegistry {
  private readonly bots = new Map<string, Bot>();

  constructor(bots: Bot[] = []) {
    for (const bot of bots) {
      if (this.bots.has(bot.name)) {
        throw new Error(`Duplicate bot name: ${bot.name}`);
      }
      this.bots.set(bot.name, bot);
    }
  }

  /**
   * Exact name match first; a SteamID64 that names no bot selects the bot with that id.
   */
  getBot(name: string): Bot | null {
    const byName = this.bots.get(name);
    if (byName) return byName;

    if (!STEAM_ID_64.test(name)) return null;

    for (const bot of this.bots.values()) {
      if (bot.steamId === name) return bot;
    }
    return null;
  }

  listBots(): Bot[] {
    return [...this.bots.values()];
  }
}

export const parseBotsFile = (raw: unknown): Bot[] => {
  const parsed = BotsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid bots file: ${details}`);
  }
  return parsed.data.bots;
};

export const loadBotRegistry = (file: string): InMemoryBotRegistry => {
  const resolved = path.resolve(file);
  if (!fs.existsSync(resolved)) {
    log.warn(`Bots file ${resolved} not found; starting with no bots`);
    return new InMemoryBotRegistry();
  }

  const text = fs.readFileSync(resolved, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new Error(`Bots file ${resolved} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const registry = new InMemoryBotRegistry(parseBotsFile(raw));
  log.info(`Loaded ${registry.listBots().length} bot(s) from ${resolved}`);
  return registry;
};
