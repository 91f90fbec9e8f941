import type { Request } from 'express';
import { config, SUPPORTED_LOCALES } from '../core/config';
import type { SupportedLocale } from '../core/config';
import { getTranslator } from '../lib/localization';
import type { Translator } from '../lib/localization';

export const isSupportedLocale = (value: unknown): value is SupportedLocale => (
  typeof value === 'string' && SUPPORTED_LOCALES.some((locale) => locale === value)
);

type LocaleSource = Pick<Request, 'headers' | 'acceptsLanguages'>;

/**
 * Best Accept-Language match among the supported locales, else the configured default.
 */
export const resolveRequestLocale = (req: LocaleSource): SupportedLocale => {
  // Without the header `accepts` answers with the first candidate, not the configured default.
  if (!req.headers['accept-language']) return config.defaultLocale;
  const accepted = req.acceptsLanguages([...SUPPORTED_LOCALES]);
  return isSupportedLocale(accepted) ? accepted : config.defaultLocale;
};

export const getRequestTranslator = (req: LocaleSource): Translator => getTranslator(resolveRequestLocale(req));
