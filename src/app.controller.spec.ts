import { Test } from '@nestjs/testing';

import { AppController } from './app.controller';
import { APP_CONFIG, DEFAULT_CONFIG } from './config/app.config';
import { InvalidInputError } from './errors/track.errors';
import {
  ELEMENT_SET_SOURCE,
  ElementSet,
  GroundPoint,
  PROPAGATOR,
  Propagator,
} from './ground-track.types';
import { GroundTrackService } from './ground-track.service';
import { StubElementSetSource } from './testing/fixtures';

class EquatorPropagator implements Propagator {
  propagate(_: ElementSet, instant: Date): GroundPoint {
    return { latitude: 0, longitude: (instant.getTime() / 1000) % 180 };
  }
}

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        GroundTrackService,
        { provide: APP_CONFIG, useValue: { ...DEFAULT_CONFIG, markerStride: 10 } },
        { provide: ELEMENT_SET_SOURCE, useValue: new StubElementSetSource() },
        { provide: PROPAGATOR, useValue: new EquatorPropagator() },
      ],
    }).compile();
    controller = moduleRef.get(AppController);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('applies the configured defaults', async () => {
    const response = await controller.groundTrack({
      catalogId: 25544,
      startTime: '2026-01-01T00:00:00Z',
    });

    expect(response.times).toHaveLength(180);
    expect(response.sampleIntervalSeconds).toBe(30);
    expect(response.markers.map((m) => m.time)).toEqual(
      Array.from({ length: 18 }, (_, i) =>
        new Date(Date.UTC(2026, 0, 1) + i * 300_000).toISOString(),
      ),
    );
  });

  it('honours the requested window', async () => {
    const response = await controller.groundTrack({
      catalogId: 25544,
      startTime: '2026-01-01T00:00:00Z',
      forecastHours: 0.5,
      sampleIntervalSeconds: 60,
      markerStride: 5,
    });

    expect(response.times).toHaveLength(30);
    expect(response.markers).toHaveLength(6);
  });

  it('starts at the time of each request when no start is given', async () => {
    jest.useFakeTimers({
      now: new Date('2026-02-01T10:00:00.400Z'),
      doNotFake: ['nextTick', 'setImmediate'],
    });
    const first = await controller.groundTrack({ catalogId: 25544, forecastHours: 0.1 });

    jest.setSystemTime(new Date('2026-02-01T11:30:00Z'));
    const second = await controller.groundTrack({ catalogId: 25544, forecastHours: 0.1 });

    expect(first.start).toBe('2026-02-01T10:00:00.000Z');
    expect(second.start).toBe('2026-02-01T11:30:00.000Z');
  });

  it('rejects a zero forecast window', async () => {
    await expect(
      controller.groundTrack({
        catalogId: 25544,
        startTime: '2026-01-01T00:00:00Z',
        forecastHours: 0,
      }),
    ).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('returns the GeoJSON layers with the title', async () => {
    const geoJson = await controller.groundTrackGeoJson({
      catalogId: 25544,
      startTime: '2026-01-01T00:00:00Z',
      forecastHours: 0.25,
      title: 'Test pass',
    });

    expect(geoJson.type).toBe('FeatureCollection');
    expect(geoJson.properties.title).toBe('Test pass');
    expect(geoJson.properties.markerStride).toBe(10);
    expect(
      geoJson.features.filter((f) => f.properties.layer === 'sample'),
    ).toHaveLength(30);
  });
});
