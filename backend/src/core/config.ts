import 'dotenv/config';
import { z } from 'zod';
import { logger } from '../utils/logger';

const EnvironmentEnum = z.enum(['development', 'staging', 'production', 'test']);

export const SUPPORTED_LOCALES = ['en', 'zh-CN'] as const;
export type SupportedLocale = typeof SUPPORTED_LOCALES[number];

const DEV_DEFAULTS = {
  BOTS_FILE: 'config/bots.json',
} as const;

const ConfigSchema = z.object({
  env: EnvironmentEnum.default('development'),
  port: z.coerce.number().int().min(1).max(65_535).default(1242),
  defaultLocale: z.enum(SUPPORTED_LOCALES).default('en'),
  ipc: z.object({
    // Unset means the API is open, the same as a bare local install.
    password: z.string().min(1).optional(),
  }),
  bots: z.object({
    file: z.string().min(1).default(DEV_DEFAULTS.BOTS_FILE),
  }),
  steam: z.object({
    requestTimeoutMs: z.coerce.number().int().positive().default(15_000),
  }),
});

const rawConfig = {
  env: process.env.HANDOFF_ENV,
  port: process.env.PORT,
  defaultLocale: process.env.DEFAULT_LOCALE,
  ipc: {
    password: process.env.IPC_PASSWORD || undefined,
  },
  bots: {
    file: process.env.BOTS_FILE,
  },
  steam: {
    requestTimeoutMs: process.env.STEAM_TIMEOUT_MS,
  },
};

const parsed = ConfigSchema.safeParse(rawConfig);

if (!parsed.success) {
  logger.error('Invalid configuration', parsed.error.format());
  throw new Error('Configuration validation failed');
}

if (parsed.data.env === 'production' && !parsed.data.ipc.password) {
  logger.warn('IPC_PASSWORD not set; the login API is reachable without authentication');
}

if (parsed.data.env === 'development' && !process.env.BOTS_FILE) {
  logger.warn(`BOTS_FILE not set; using ${DEV_DEFAULTS.BOTS_FILE}`);
}

export const config = parsed.data;
export type AppConfig = typeof config;
