export const DEFAULT_PORT = 3000;
export const DEFAULT_DATA_FILE = "data/patients.json";
export const DEFAULT_API_URL = "http://localhost:3000";

export type AppConfig = {
  port: number;
  dataFile: string;
  storeMaxRetries: number;
  storeMinDelayMs: number;
  dev: boolean;
  apiBaseUrl: string;
};

type Env = Record<string, string | undefined>;

/**
 * Parses a non-negative integer from an env value, falling back on anything
 * missing or unparseable.
 */
function intFromEnv(value: string | undefined, fallback: number): number {
  if (!value || !value.trim()) return fallback;
  const n = Number.parseInt(value.trim(), 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function stringFromEnv(value: string | undefined, fallback: string): string {
  return value && value.trim() ? value.trim() : fallback;
}

/**
 * Reads server and client configuration from environment variables.
 *
 * - `PORT` (default 3000)
 * - `PATIENT_DATA_FILE` (default `data/patients.json`)
 * - `PATIENT_STORE_MAX_RETRIES` (default 3)
 * - `PATIENT_STORE_MIN_DELAY_MS` (default 50)
 * - `PATIENT_API_URL` (default `http://localhost:3000`, used by the CLI)
 * - `NODE_ENV` (anything but `production` runs Next in dev mode)
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: intFromEnv(env.PORT, DEFAULT_PORT),
    dataFile: stringFromEnv(env.PATIENT_DATA_FILE, DEFAULT_DATA_FILE),
    storeMaxRetries: intFromEnv(env.PATIENT_STORE_MAX_RETRIES, 3),
    storeMinDelayMs: intFromEnv(env.PATIENT_STORE_MIN_DELAY_MS, 50),
    dev: env.NODE_ENV !== "production",
    apiBaseUrl: stringFromEnv(env.PATIENT_API_URL, DEFAULT_API_URL).replace(
      /\/$/,
      ""
    ),
  };
}
