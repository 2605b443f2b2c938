export type TrackErrorKind =
  | 'InvalidInput'
  | 'Retrieval'
  | 'NotFound'
  | 'Propagation';

/**
 * Base class of every failure raised while computing a ground track.
 * Nothing is retried; the first error aborts the whole computation.
 */
export abstract class TrackError extends Error {
  abstract readonly kind: TrackErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad forecast window, interval, stride, catalog id or instant list. */
export class InvalidInputError extends TrackError {
  readonly kind: TrackErrorKind = 'InvalidInput';
}

/** The element-set service could not be reached or returned unusable data. */
export class RetrievalError extends TrackError {
  readonly kind: TrackErrorKind = 'Retrieval';
}

/** No element set is published for the requested catalog number. */
export class NotFoundError extends RetrievalError {
  readonly kind: TrackErrorKind = 'NotFound';

  constructor(readonly catalogId: number) {
    super(`No element set found for catalog number ${catalogId}`);
  }
}

/** SGP4 rejected the element set or the requested instant. */
export class PropagationError extends TrackError {
  readonly kind: TrackErrorKind = 'Propagation';
}
