import dotenv from 'dotenv';
import { ConfigError } from './errors';
import { SAPM_TEMPERATURE_PARAMETERS } from './services/solar/pvSystemModel';
import type { SystemDescription } from './types/forecast';

dotenv.config();

type Env = Record<string, string | undefined>;

export type RunMode = 'once' | 'continuous';

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  table: string;
  queryTimeoutMs: number;
}

export interface OutputConfig {
  print: boolean;
  csv: boolean;
  csvFile: string;
  db: boolean;
}

export interface Config {
  runMode: RunMode;
  station: {
    id: string;
    url: string;
  };
  pollIntervalSeconds: number;
  fetchTimeoutMs: number;
  system: SystemDescription;
  output: OutputConfig;
  db: DbConfig;
  http: {
    enabled: boolean;
    port: number;
    corsAllowedOrigins: string[];
  };
  observability: {
    prometheusEnabled: boolean;
    prometheusPath: string;
  };
  refresh: {
    stallThresholdSeconds: number;
    alertAfterFailures: number;
    alertCooldownSeconds: number;
    alertWebhookUrl?: string;
  };
}

export const DEFAULT_MOSMIX_BASE_URL =
  'https://opendata.dwd.de/weather/local_forecasts/mos/MOSMIX_L/single_stations';

const TEMPERATURE_MODELS = new Set(Object.keys(SAPM_TEMPERATURE_PARAMETERS));

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(name, 'is required');
  }
  return value;
}

function parseNumber(
  env: Env,
  name: string,
  fallback?: number,
  range?: { min?: number; max?: number },
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    if (fallback === undefined) {
      throw new ConfigError(name, 'is required');
    }
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(name, `must be a number (got "${raw}")`);
  }
  if (range?.min !== undefined && parsed < range.min) {
    throw new ConfigError(name, `must be >= ${range.min}`);
  }
  if (range?.max !== undefined && parsed > range.max) {
    throw new ConfigError(name, `must be <= ${range.max}`);
  }
  return parsed;
}

function parsePositiveInt(env: Env, name: string, fallback?: number): number {
  const parsed = parseNumber(env, name, fallback);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(name, 'must be a positive integer');
  }
  return parsed;
}

function parsePositive(env: Env, name: string, fallback?: number): number {
  const parsed = parseNumber(env, name, fallback);
  if (parsed <= 0) {
    throw new ConfigError(name, 'must be a positive number');
  }
  return parsed;
}

export function parseBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(name, `must be true/false or 1/0 (got "${raw}")`);
}

function parseTimezone(env: Env, name: string, fallback: string): string {
  const zone = env[name]?.trim() || fallback;
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone: zone });
  } catch {
    throw new ConfigError(name, `is not a valid IANA timezone (got "${zone}")`);
  }
  return zone;
}

function parseIdentifier(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim() || fallback;
  if (!/^[A-Za-z_][A-Za-z0-9_]{0,62}$/.test(value)) {
    throw new ConfigError(name, 'must be a plain SQL identifier');
  }
  return value;
}

function parseStationUrl(env: Env, stationId: string): string {
  const raw = env.MOSMIX_STATION_URL?.trim() || `${DEFAULT_MOSMIX_BASE_URL}/${stationId}/kml`;
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError('MOSMIX_STATION_URL', `is not a valid URL (got "${raw}")`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError('MOSMIX_STATION_URL', 'must use http or https');
  }
  return url.toString();
}

export function parseRunMode(raw: string | undefined, argv: readonly string[] = []): RunMode {
  if (argv.includes('--continuous')) return 'continuous';
  if (argv.includes('--once')) return 'once';
  const normalized = (raw ?? 'once').trim().toLowerCase();
  if (normalized === 'once' || normalized === 'simple') return 'once';
  if (normalized === 'continuous' || normalized === 'complex') return 'continuous';
  throw new ConfigError('RUN_MODE', `must be "once" or "continuous" (got "${raw}")`);
}

export function parseSystemDescription(env: Env): SystemDescription {
  const temperatureModel = env.PV_TEMPERATURE_MODEL?.trim() || 'open_rack_glass_glass';
  if (!TEMPERATURE_MODELS.has(temperatureModel)) {
    throw new ConfigError(
      'PV_TEMPERATURE_MODEL',
      `must be one of ${[...TEMPERATURE_MODELS].join(', ')}`,
    );
  }

  return {
    latitude: parseNumber(env, 'SITE_LATITUDE', undefined, { min: -90, max: 90 }),
    longitude: parseNumber(env, 'SITE_LONGITUDE', undefined, { min: -180, max: 180 }),
    altitudeM: parseNumber(env, 'SITE_ALTITUDE_M', undefined, { min: -500, max: 9000 }),
    tiltDeg: parseNumber(env, 'PV_TILT_DEG', undefined, { min: 0, max: 90 }),
    azimuthDeg: parseNumber(env, 'PV_AZIMUTH_DEG', undefined, { min: 0, max: 360 }),
    modulesPerString: parsePositiveInt(env, 'PV_MODULES_PER_STRING'),
    strings: parsePositiveInt(env, 'PV_STRINGS'),
    albedo: parseNumber(env, 'PV_ALBEDO', 0.25, { min: 0, max: 1 }),
    moduleName: required(env, 'PV_MODULE_NAME'),
    inverterName: required(env, 'PV_INVERTER_NAME'),
    temperatureModel,
    timezone: parseTimezone(env, 'SITE_TIMEZONE', 'UTC'),
    temperatureOffsetC: parseNumber(env, 'TEMPERATURE_OFFSET_C', 0),
    simpleMultiplicationFactor: parseNumber(env, 'SIMPLE_MULTIPLICATION_FACTOR', undefined, {
      min: 0,
    }),
  };
}

/**
 * Builds the process configuration from environment variables.
 * Throws {@link ConfigError} on the first missing or invalid value.
 */
export function loadConfig(env: Env = process.env, argv: readonly string[] = []): Config {
  const stationId = required(env, 'MOSMIX_STATION_ID');
  const pollIntervalSeconds = parsePositive(env, 'POLL_INTERVAL_SECONDS', 15);
  const output: OutputConfig = {
    print: parseBoolean(env, 'OUTPUT_PRINT', false),
    csv: parseBoolean(env, 'OUTPUT_CSV', true),
    csvFile: env.OUTPUT_CSV_FILE?.trim() || 'outputdwdforecast.csv',
    db: parseBoolean(env, 'OUTPUT_DB', false),
  };

  return {
    runMode: parseRunMode(env.RUN_MODE, argv),
    station: {
      id: stationId,
      url: parseStationUrl(env, stationId),
    },
    pollIntervalSeconds,
    fetchTimeoutMs: parsePositiveInt(env, 'FETCH_TIMEOUT_MS', 30_000),
    system: parseSystemDescription(env),
    output,
    db: {
      host: env.DB_HOST?.trim() || 'localhost',
      port: parsePositiveInt(env, 'DB_PORT', 5432),
      user: env.DB_USER?.trim() || 'postgres',
      // Only demanded when the database sink is on.
      password: output.db ? required(env, 'DB_PASSWORD') : env.DB_PASSWORD ?? '',
      database: env.DB_NAME?.trim() || 'mosmix',
      table: parseIdentifier(env, 'DB_TABLE', 'dwd_forecast'),
      queryTimeoutMs: parsePositiveInt(env, 'DB_QUERY_TIMEOUT_MS', 5_000),
    },
    http: {
      enabled: parseBoolean(env, 'HTTP_ENABLED', false),
      port: parsePositiveInt(env, 'PORT', 3001),
      corsAllowedOrigins: (env.CORS_ALLOWED_ORIGINS ?? 'http://localhost:3000')
        .split(',')
        .map((o) => o.trim())
        .filter(Boolean),
    },
    observability: {
      prometheusEnabled: parseBoolean(env, 'PROMETHEUS_ENABLED', true),
      prometheusPath: env.PROMETHEUS_PATH?.trim() || '/metrics',
    },
    refresh: {
      stallThresholdSeconds: parsePositive(
        env,
        'REFRESH_STALL_THRESHOLD_SECONDS',
        pollIntervalSeconds * 3,
      ),
      alertAfterFailures: parsePositiveInt(env, 'REFRESH_ALERT_AFTER_FAILURES', 5),
      alertCooldownSeconds: parsePositive(env, 'ALERT_COOLDOWN_SECONDS', 300),
      alertWebhookUrl: env.ALERT_WEBHOOK_URL?.trim() || undefined,
    },
  };
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) return cachedConfig;
  cachedConfig = loadConfig(process.env, process.argv.slice(2));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export interface LoggingSettings {
  logLevel: string;
  logPretty: boolean;
}

// Read separately so the logger works before (and when) the rest of the config fails validation.
export function getLoggingSettings(env: Env = process.env): LoggingSettings {
  return {
    logLevel: (env.LOG_LEVEL ?? 'info').toLowerCase(),
    logPretty: (env.LOG_PRETTY ?? 'true').toLowerCase() === 'true',
  };
}
