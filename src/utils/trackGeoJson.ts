import { Track, TrackSample } from '../ground-track.types';
import { splitAtAntimeridian } from './splitAtAntimeridian';
import { DEFAULT_MARKER_STRIDE, strideSample } from './strideSample';

export type TrackLayer = 'track' | 'sample' | 'marker' | 'start';

export interface PointGeometry {
  type: 'Point';
  coordinates: [number, number];
}

export interface LineStringGeometry {
  type: 'LineString';
  coordinates: [number, number][];
}

export interface TrackFeature {
  type: 'Feature';
  properties: { layer: TrackLayer; time?: string };
  geometry: PointGeometry | LineStringGeometry;
}

export interface TrackFeatureCollection {
  type: 'FeatureCollection';
  properties: {
    title: string;
    catalogId: number;
    name: string;
    epoch: string;
    start: string;
    sampleIntervalSeconds: number;
    markerStride: number;
  };
  features: TrackFeature[];
}

const toPosition = (sample: TrackSample): [number, number] => [
  sample.longitude,
  sample.latitude,
];

const pointFeature = (sample: TrackSample, layer: TrackLayer): TrackFeature => ({
  type: 'Feature',
  properties: { layer, time: sample.time.toISOString() },
  geometry: { type: 'Point', coordinates: toPosition(sample) },
});

/**
 * Map layers of a track: one line per antimeridian-free segment, every
 * sample, the stride-selected labeled markers and the starting position.
 */
export function trackToGeoJson(
  track: Track,
  options: { title?: string; markerStride?: number } = {},
): TrackFeatureCollection {
  const { title = '', markerStride = DEFAULT_MARKER_STRIDE } = options;
  const markers = strideSample(track.samples, markerStride);

  const lines = splitAtAntimeridian(track.samples).map(
    (segment): TrackFeature => ({
      type: 'Feature',
      properties: { layer: 'track' },
      geometry: { type: 'LineString', coordinates: segment.map(toPosition) },
    }),
  );

  const features: TrackFeature[] = [
    ...lines,
    ...track.samples.map((sample) => pointFeature(sample, 'sample')),
    ...markers.map((sample) => pointFeature(sample, 'marker')),
  ];
  const first = track.samples[0];
  if (first !== undefined) {
    features.push(pointFeature(first, 'start'));
  }

  return {
    type: 'FeatureCollection',
    properties: {
      title,
      catalogId: track.elementSet.catalogId,
      name: track.elementSet.name,
      epoch: track.elementSet.epoch.toISOString(),
      start: track.start.toISOString(),
      sampleIntervalSeconds: track.sampleIntervalSeconds,
      markerStride,
    },
    features,
  };
}
