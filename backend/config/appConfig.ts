export type AppConfig = {
  databasePath: string;
  port: number;
  requestTimeoutMs: number;
  jsonBodyLimit: string;
};

export const DEFAULT_APP_CONFIG: AppConfig = {
  databasePath: 'product_readiness.db',
  port: 8080,
  requestTimeoutMs: 15000,
  jsonBodyLimit: '10mb',
};

const positiveInt = (value: string | undefined, fallback: number): number => {
  const num = Number(value);
  return value !== undefined && Number.isInteger(num) && num > 0 ? num : fallback;
};

const nonEmpty = (value: string | undefined, fallback: string): string =>
  value && value.trim() ? value.trim() : fallback;

/** Reads settings from the environment; unset or invalid values use the defaults. */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    databasePath: nonEmpty(env.DATABASE_PATH, DEFAULT_APP_CONFIG.databasePath),
    port: positiveInt(env.API_PORT, DEFAULT_APP_CONFIG.port),
    requestTimeoutMs: positiveInt(env.API_TIMEOUT_MS, DEFAULT_APP_CONFIG.requestTimeoutMs),
    jsonBodyLimit: nonEmpty(env.JSON_BODY_LIMIT, DEFAULT_APP_CONFIG.jsonBodyLimit),
  };
}
