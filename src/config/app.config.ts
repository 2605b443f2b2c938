import { InvalidInputError } from '../errors/track.errors';

export const APP_CONFIG = 'APP_CONFIG';

export interface AppConfig {
  port: number;
  /** CelesTrak GP endpoint; `CATNR` and `FORMAT` are appended per request. */
  elementSetUrl: string;
  forecastHours: number;
  sampleIntervalSeconds: number;
  markerStride: number;
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
  port: 3000,
  elementSetUrl: 'https://celestrak.org/NORAD/elements/gp.php',
  forecastHours: 1.5,
  sampleIntervalSeconds: 30,
  markerStride: 20,
};

function readPositive(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  integer = false,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new InvalidInputError(
      `${key} must be a positive ${integer ? 'integer' : 'number'}, got "${raw}"`,
    );
  }
  return value;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readPositive(env, 'PORT', DEFAULT_CONFIG.port, true),
    elementSetUrl: env.ELEMENT_SET_URL?.trim() || DEFAULT_CONFIG.elementSetUrl,
    forecastHours: readPositive(env, 'FORECAST_HOURS', DEFAULT_CONFIG.forecastHours),
    sampleIntervalSeconds: readPositive(
      env,
      'SAMPLE_INTERVAL_SECONDS',
      DEFAULT_CONFIG.sampleIntervalSeconds,
      true,
    ),
    markerStride: readPositive(env, 'MARKER_STRIDE', DEFAULT_CONFIG.markerStride, true),
  };
}
