import { parseArgs } from 'node:util';

import { AppConfig } from './config/app.config';
import { InvalidInputError } from './errors/track.errors';
import { parseUtcTimestamp } from './utils/parseUtcTimestamp';
import { MAX_FORECAST_HOURS } from './utils/sampleInstants';

export const USAGE =
  'Usage: ground-track <catalogId> [-d YYYYMMDDTHHMMSS] [-o out.geojson] [-t title] ' +
  '[-f forecast-hours] [-s sample-interval-seconds] [-m marker-stride]';

export const DEFAULT_OUT_PATH = 'satellite_track.geojson';

export interface CliArguments {
  catalogId: number;
  /** Undefined means "now", resolved when the command runs. */
  date?: Date;
  outPath: string;
  title: string;
  forecastHours: number;
  sampleIntervalSeconds: number;
  markerStride: number;
}

function toNumber(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new InvalidInputError(`--${name} expects a number, got "${raw}"`);
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        date: { type: 'string', short: 'd' },
        'out-path': { type: 'string', short: 'o', default: DEFAULT_OUT_PATH },
        title: { type: 'string', short: 't', default: '' },
        'forecast-hours': { type: 'string', short: 'f' },
        'sample-interval': { type: 'string', short: 's' },
        'marker-stride': { type: 'string', short: 'm' },
      },
    });
  } catch (err) {
    throw new InvalidInputError(
      `${err instanceof Error ? err.message : String(err)}\n${USAGE}`,
      { cause: err },
    );
  }
}

export function parseCliArguments(
  argv: string[],
  defaults: Pick<AppConfig, 'forecastHours' | 'sampleIntervalSeconds' | 'markerStride'>,
): CliArguments {
  const { values, positionals } = readArgs(argv);

  if (positionals.length !== 1 || !/^\d+$/.test(positionals[0])) {
    throw new InvalidInputError(`Expected one integer catalog number\n${USAGE}`);
  }

  const forecastHours = toNumber(
    'forecast-hours',
    values['forecast-hours'],
    defaults.forecastHours,
  );
  if (forecastHours > MAX_FORECAST_HOURS) {
    throw new InvalidInputError(
      `--forecast-hours must not exceed ${MAX_FORECAST_HOURS}, got ${forecastHours}`,
    );
  }

  return {
    catalogId: parseInt(positionals[0], 10),
    date: values.date === undefined ? undefined : parseUtcTimestamp(values.date),
    outPath: values['out-path'] ?? DEFAULT_OUT_PATH,
    title: values.title ?? '',
    forecastHours,
    sampleIntervalSeconds: toNumber(
      'sample-interval',
      values['sample-interval'],
      defaults.sampleIntervalSeconds,
    ),
    markerStride: toNumber('marker-stride', values['marker-stride'], defaults.markerStride),
  };
}
