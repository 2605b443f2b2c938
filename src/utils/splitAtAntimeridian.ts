import { GroundPoint, Segment } from '../ground-track.types';

/** Longitude jumps strictly larger than this are antimeridian crossings. */
export const CROSSING_THRESHOLD_DEGREES = 180;

/**
 * Splits an ordered point sequence wherever two consecutive longitudes differ
 * by more than 180 degrees, so each segment can be drawn as a single line on a
 * flat map. Concatenating the result gives back the input unchanged.
 */
export function splitAtAntimeridian<T extends GroundPoint>(
  points: readonly T[],
): Segment<T>[] {
  const segments: Segment<T>[] = [];
  let current: Segment<T> = [];

  for (const point of points) {
    const last = current[current.length - 1];
    if (
      last !== undefined &&
      Math.abs(point.longitude - last.longitude) > CROSSING_THRESHOLD_DEGREES
    ) {
      segments.push(current);
      current = [];
    }
    current.push(point);
  }

  if (current.length > 0) {
    segments.push(current);
  }
  return segments;
}
