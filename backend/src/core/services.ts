import type { BotRegistry } from '../lib/bots/types';
import type { LoginHandoffDispatcher } from '../lib/loginHandoff/loginHandoffDispatcher';

export type AppServices = {
  bots: BotRegistry;
  loginHandoff: LoginHandoffDispatcher;
};

let services: AppServices | null = null;

export const setServices = (next: AppServices) => {
  services = next;
};

export const getServices = (): AppServices => {
  if (!services) throw new Error('Services requested before the server was initialised');
  return services;
};
