import { InvalidInputError } from '../errors/track.errors';
import { ElementSet, GroundPoint, PropagateFn } from '../ground-track.types';

/**
 * Propagates the element set to each instant, in order.
 * The first failing propagation is rethrown as-is; there is no partial result.
 *
 * @throws {InvalidInputError} if `instants` is empty or not strictly increasing
 */
export function sampleCoordinates(
  propagate: PropagateFn,
  elementSet: ElementSet,
  instants: readonly Date[],
): GroundPoint[] {
  if (instants.length === 0) {
    throw new InvalidInputError('At least one instant is required');
  }

  for (let i = 0; i < instants.length; i++) {
    const time = instants[i].getTime();
    if (Number.isNaN(time)) {
      throw new InvalidInputError(`Instant ${i} is not a valid date`);
    }
    if (i > 0 && time <= instants[i - 1].getTime()) {
      throw new InvalidInputError(
        `Instants must be strictly increasing (index ${i}: ${instants[i].toISOString()})`,
      );
    }
  }

  return instants.map((instant) => propagate(elementSet, instant));
}
