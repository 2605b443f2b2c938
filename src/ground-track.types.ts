/**
 * One two-line element set as published for a catalogued object.
 * Loaded once per track and never mutated afterwards.
 */
export interface ElementSet {
  readonly catalogId: number;
  /** Object name from the optional title line, empty when absent. */
  readonly name: string;
  readonly line1: string;
  readonly line2: string;
  readonly epoch: Date;
}

/** Sub-satellite point in degrees; longitude in (-180, 180]. */
export interface GroundPoint {
  readonly latitude: number;
  readonly longitude: number;
}

export interface TrackSample extends GroundPoint {
  readonly time: Date;
}

export interface Track {
  readonly elementSet: ElementSet;
  readonly start: Date;
  readonly sampleIntervalSeconds: number;
  /** Strictly increasing, evenly spaced in time. */
  readonly samples: readonly TrackSample[];
}

/** Maximal run of points that can be drawn as one unbroken line. */
export type Segment<T extends GroundPoint = GroundPoint> = T[];

export type PropagateFn = (elementSet: ElementSet, instant: Date) => GroundPoint;

export const ELEMENT_SET_SOURCE = 'ELEMENT_SET_SOURCE';
export const PROPAGATOR = 'PROPAGATOR';

export interface ElementSetSource {
  /**
   * @throws {NotFoundError} unknown catalog number
   * @throws {RetrievalError} network or service failure
   */
  fetchElements(catalogId: number): Promise<ElementSet>;
}

export interface Propagator {
  /** @throws {PropagationError} */
  propagate(elementSet: ElementSet, instant: Date): GroundPoint;
}
