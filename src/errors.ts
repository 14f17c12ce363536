import type { AttemptOutcome } from './types/index.js';

export type AcquisitionErrorKind = Exclude<AttemptOutcome, 'success'>;

/**
 * A strategy declined to produce a rate. Never surfaces past the resolver.
 */
export abstract class AcquisitionError extends Error {
  abstract readonly kind: AcquisitionErrorKind;
}

/** Connection refused, DNS failure, timeout or a non-200 status. */
export class TransportError extends AcquisitionError {
  readonly kind = 'transport' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** The payload arrived but could not be read as the expected format. */
export class ParseError extends AcquisitionError {
  readonly kind = 'parse' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParseError';
  }
}

/** Well-formed payload that does not carry the target currency. */
export class FieldNotFoundError extends AcquisitionError {
  readonly kind = 'field-not-found' as const;

  constructor(message: string) {
    super(message);
    this.name = 'FieldNotFoundError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
