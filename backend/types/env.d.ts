declare global {
  namespace NodeJS {
    interface ProcessEnv {
      HANDOFF_ENV?: 'development' | 'staging' | 'production' | 'test';
      NODE_ENV?: 'development' | 'staging' | 'production' | 'test';
      PORT?: string;
      LOG_LEVEL?: string;
      DEFAULT_LOCALE?: string;
      IPC_PASSWORD?: string;
      BOTS_FILE?: string;
      STEAM_TIMEOUT_MS?: string;
      DEBUG_TESTS?: string;
    }
  }
}

export { };
