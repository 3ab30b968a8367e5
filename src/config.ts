// ────────────────  Runtime config (ENV‑driven)  ───────────────────────────

export const DEFAULT_DICTIONARY_PATH = "/usr/share/dict/words";

export interface AppConfig {
  /** Dictionary used when the command line names none. */
  dictionaryPath: string;
  logLevel: string;
  production: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const production = env.NODE_ENV === "production";
  return {
    dictionaryPath: env.DICTIONARY_PATH || DEFAULT_DICTIONARY_PATH,
    logLevel: env.LOG_LEVEL || (production ? "info" : "debug"),
    production,
  };
}
