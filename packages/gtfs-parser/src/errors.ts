/**
 * Error taxonomy shared by the store, the feed client and the CLI.
 */
export class TransitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or HTTP failure while fetching a realtime feed */
export class TransportError extends TransitError {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Payload that is not a valid GTFS-Realtime FeedMessage */
export class DecodeError extends TransitError {
  constructor(message: string, readonly url: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Static archive table present but missing a required column or value */
export class DataFormatError extends TransitError {
  constructor(message: string, readonly table: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Static archive, or a named table inside it, is absent */
export class NotFoundError extends TransitError {
  constructor(message: string, readonly resource: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Malformed user-supplied coordinates, stop ids or timestamps */
export class InvalidInputError extends TransitError {
  constructor(message: string, readonly input: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type FeedError = TransportError | DecodeError;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
