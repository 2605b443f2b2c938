import { InvalidInputError } from '../errors/track.errors';

export const DEFAULT_SAMPLE_INTERVAL_SECONDS = 30;

/** 14 days, the span over which an element set stays usable. */
export const MAX_FORECAST_HOURS = 14 * 24;

/**
 * floor(forecastHours * 3600 / sampleIntervalSeconds)
 *
 * @throws {InvalidInputError} for a non-positive window or interval, or a window shorter than one interval
 */
export function countSamples(
  forecastHours: number,
  sampleIntervalSeconds: number,
): number {
  if (!Number.isFinite(forecastHours) || forecastHours <= 0) {
    throw new InvalidInputError(
      `forecastHours must be a positive number, got ${forecastHours}`,
    );
  }
  if (!Number.isFinite(sampleIntervalSeconds) || sampleIntervalSeconds <= 0) {
    throw new InvalidInputError(
      `sampleIntervalSeconds must be a positive number, got ${sampleIntervalSeconds}`,
    );
  }

  const count = Math.floor((forecastHours * 3600) / sampleIntervalSeconds);
  if (count < 1) {
    throw new InvalidInputError(
      `A ${forecastHours} h window holds no ${sampleIntervalSeconds} s sample`,
    );
  }
  return count;
}

/** Drops the sub-second part; instants have whole-second resolution. */
export function truncateToSecond(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/**
 * start, start + interval, start + 2 * interval, ... within the half-open window.
 * The interval is a whole number of seconds and the window at most
 * MAX_FORECAST_HOURS long.
 */
export function sampleInstants(
  start: Date,
  forecastHours: number,
  sampleIntervalSeconds: number = DEFAULT_SAMPLE_INTERVAL_SECONDS,
): Date[] {
  if (Number.isNaN(start.getTime())) {
    throw new InvalidInputError('start is not a valid date');
  }
  if (forecastHours > MAX_FORECAST_HOURS) {
    throw new InvalidInputError(
      `forecastHours must not exceed ${MAX_FORECAST_HOURS}, got ${forecastHours}`,
    );
  }
  if (!Number.isInteger(sampleIntervalSeconds)) {
    throw new InvalidInputError(
      `sampleIntervalSeconds must be a whole number of seconds, got ${sampleIntervalSeconds}`,
    );
  }
  const count = countSamples(forecastHours, sampleIntervalSeconds);
  const origin = start.getTime();
  const stepMillis = sampleIntervalSeconds * 1000;

  return Array.from(
    { length: count },
    (_, i) => new Date(origin + i * stepMillis),
  );
}
