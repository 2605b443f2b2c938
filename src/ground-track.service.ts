import { Inject, Injectable, Logger } from '@nestjs/common';

import { InvalidInputError } from './errors/track.errors';
import {
  ELEMENT_SET_SOURCE,
  ElementSetSource,
  PROPAGATOR,
  Propagator,
  Track,
} from './ground-track.types';
import { GroundTrackResponse } from './dto/ground-track-response.dto';
import { sampleCoordinates } from './utils/sampleCoordinates';
import {
  DEFAULT_SAMPLE_INTERVAL_SECONDS,
  sampleInstants,
  truncateToSecond,
} from './utils/sampleInstants';
import { splitAtAntimeridian } from './utils/splitAtAntimeridian';
import { DEFAULT_MARKER_STRIDE, strideSample } from './utils/strideSample';

/**
 * GroundTrackService:
 *   - Builds the list of sample instants for the forecast window,
 *   - Fetches the element set and propagates it to every instant,
 *   - Shapes the result for map clients (segments, sparse markers).
 */
@Injectable()
export class GroundTrackService {
  private readonly logger = new Logger(GroundTrackService.name);

  constructor(
    @Inject(ELEMENT_SET_SOURCE) private readonly elementSets: ElementSetSource,
    @Inject(PROPAGATOR) private readonly propagator: Propagator,
  ) {}

  /**
   * @param catalogId NORAD catalog number
   * @param start first sample; truncated to the whole second
   * @param forecastHours length of the half-open window
   * @param sampleIntervalSeconds spacing between samples
   */
  async buildTrack(
    catalogId: number,
    start: Date,
    forecastHours: number,
    sampleIntervalSeconds: number = DEFAULT_SAMPLE_INTERVAL_SECONDS,
  ): Promise<Track> {
    if (!Number.isInteger(catalogId) || catalogId < 1) {
      throw new InvalidInputError(
        `Catalog number must be a positive integer, got ${catalogId}`,
      );
    }
    // window is validated before anything goes over the network
    const origin = truncateToSecond(start);
    const instants = sampleInstants(origin, forecastHours, sampleIntervalSeconds);

    const elementSet = await this.elementSets.fetchElements(catalogId);
    const points = sampleCoordinates(
      (set, instant) => this.propagator.propagate(set, instant),
      elementSet,
      instants,
    );

    this.logger.log(
      `Track for ${catalogId}: ${points.length} samples every ${sampleIntervalSeconds} s from ${origin.toISOString()}`,
    );

    return {
      elementSet,
      start: origin,
      sampleIntervalSeconds,
      samples: points.map((point, i) => ({ ...point, time: instants[i] })),
    };
  }

  describeTrack(
    track: Track,
    markerStride: number = DEFAULT_MARKER_STRIDE,
  ): GroundTrackResponse {
    const markers = strideSample(track.samples, markerStride);
    const segments = splitAtAntimeridian(track.samples);
    const first = track.samples[0];

    return {
      catalogId: track.elementSet.catalogId,
      name: track.elementSet.name,
      epoch: track.elementSet.epoch.toISOString(),
      start: track.start.toISOString(),
      sampleIntervalSeconds: track.sampleIntervalSeconds,
      times: track.samples.map((sample) => sample.time.toISOString()),
      latitudes: track.samples.map((sample) => sample.latitude),
      longitudes: track.samples.map((sample) => sample.longitude),
      segments: segments.map((segment) => ({
        latitudes: segment.map((sample) => sample.latitude),
        longitudes: segment.map((sample) => sample.longitude),
      })),
      markers: markers.map((sample) => ({
        time: sample.time.toISOString(),
        latitude: sample.latitude,
        longitude: sample.longitude,
      })),
      initialPosition: {
        time: first.time.toISOString(),
        latitude: first.latitude,
        longitude: first.longitude,
      },
    };
  }
}
