import dotenv from 'dotenv';

export interface ImmichSettings {
  url: string;
  apiKey: string;
}

export interface AppConfig {
  port: number;
  dbPath: string;
  defaultUser: string;
  immich?: ImmichSettings;
  sync: {
    enabled: boolean;
    intervalMs: number;
  };
  geocoding: {
    enabled: boolean;
    baseUrl: string;
  };
}

const DEFAULT_SYNC_INTERVAL_MS = 60 * 60 * 1000; // hourly

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Build the application config from environment variables.
 * Immich is optional: both URL and API key must be set to enable imports.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const immichUrl = env.IMMICH_URL?.trim();
  const immichKey = env.IMMICH_API_KEY?.trim();

  return {
    port: parseInteger(env.PORT, 8080),
    dbPath: env.DB_PATH || './data/wayline.db',
    defaultUser: env.DEFAULT_USER || 'default',
    immich: immichUrl && immichKey ? { url: immichUrl, apiKey: immichKey } : undefined,
    sync: {
      enabled: env.SYNC_ENABLED === 'true',
      intervalMs: parseInteger(env.SYNC_INTERVAL_MS, DEFAULT_SYNC_INTERVAL_MS),
    },
    geocoding: {
      enabled: env.GEOCODING_ENABLED !== 'false',
      baseUrl: env.NOMINATIM_URL || 'https://nominatim.openstreetmap.org',
    },
  };
}

/**
 * Load .env into process.env, then read the config
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig();
}
