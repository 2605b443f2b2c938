import { InvalidInputError } from '../errors/track.errors';

/** 20 samples of 30 s: one labeled marker every 10 minutes. */
export const DEFAULT_MARKER_STRIDE = 20;

export function strideSample<T>(
  items: readonly T[],
  stride: number = DEFAULT_MARKER_STRIDE,
): T[] {
  if (!Number.isInteger(stride) || stride < 1) {
    throw new InvalidInputError(`stride must be a positive integer, got ${stride}`);
  }
  return items.filter((_, index) => index % stride === 0);
}
