import { createTranslator } from 'use-intl';
import type { SupportedLocale } from '../../core/config';
import { en } from './en';
import { zhCN } from './zhCN';

type Messages = typeof en;

declare global {
  // eslint-disable-next-line @typescript-eslint/no-empty-interface
  interface IntlMessages extends Messages {}
}

const catalogs: Record<SupportedLocale, Messages> = {
  en,
  'zh-CN': zhCN,
};

export const getTranslator = (locale: SupportedLocale) => createTranslator({ messages: catalogs[locale], locale });
export type Translator = ReturnType<typeof getTranslator>;
