import { InvalidInputError } from '../errors/track.errors';
import {
  MAX_FORECAST_HOURS,
  countSamples,
  sampleInstants,
  truncateToSecond,
} from './sampleInstants';

const START = new Date('2026-01-01T00:00:00Z');

describe('countSamples', () => {
  it.each([
    [1.5, 30, 180],
    [0.5, 30, 60],
    [1, 60, 60],
    [0.01, 30, 1],
    [1, 7, 514],
  ])('%f h every %f s gives %i samples', (hours, interval, expected) => {
    expect(countSamples(hours, interval)).toBe(expected);
  });

  it.each([
    [0, 30],
    [-1, 30],
    [Number.NaN, 30],
    [Number.POSITIVE_INFINITY, 30],
    [1, 0],
    [1, -30],
    [0.001, 30],
  ])('rejects %f h every %f s', (hours, interval) => {
    expect(() => countSamples(hours, interval)).toThrow(InvalidInputError);
  });
});

describe('sampleInstants', () => {
  it('starts at the start instant and stays inside the half-open window', () => {
    const instants = sampleInstants(START, 1.5);

    expect(instants).toHaveLength(180);
    expect(instants[0]).toEqual(START);
    expect(instants[179]).toEqual(new Date('2026-01-01T01:29:30Z'));
  });

  it('spaces instants evenly', () => {
    const instants = sampleInstants(START, 0.5, 45);

    expect(instants).toHaveLength(40);
    instants.slice(1).forEach((instant, i) => {
      expect(instant.getTime() - instants[i].getTime()).toBe(45_000);
    });
  });

  it('accepts a window of exactly fourteen days', () => {
    expect(sampleInstants(START, MAX_FORECAST_HOURS, 3600)).toHaveLength(336);
  });

  it('rejects a window longer than fourteen days before allocating it', () => {
    expect(() => sampleInstants(START, 1e5, 30)).toThrow(
      'forecastHours must not exceed 336, got 100000',
    );
  });

  it('rejects an interval that is not a whole number of seconds', () => {
    expect(() => sampleInstants(START, 1, 0.5)).toThrow(InvalidInputError);
  });

  it('keeps every instant on a whole second', () => {
    const instants = sampleInstants(new Date('2026-01-01T00:00:07Z'), 0.1, 7);

    expect(instants.every((instant) => instant.getUTCMilliseconds() === 0)).toBe(true);
  });

  it('rejects an invalid start', () => {
    expect(() => sampleInstants(new Date('not a date'), 1)).toThrow(
      InvalidInputError,
    );
  });
});

describe('truncateToSecond', () => {
  it('drops milliseconds', () => {
    expect(truncateToSecond(new Date('2026-01-01T00:00:05.987Z'))).toEqual(
      new Date('2026-01-01T00:00:05Z'),
    );
  });
});
