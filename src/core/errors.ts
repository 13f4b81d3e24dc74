/**
 * Error surface of the codec.
 *
 * Every failure inside a decode or encode call is a `MarshalError` with one
 * of a closed set of kinds. Errors are terminal to the call: nothing is
 * retried and no partial result is returned.
 */

export type MarshalErrorKind =
  | 'IncompatibleVersion'
  | 'UnexpectedEnd'
  | 'TrailingData'
  | 'BadReference'
  | 'UnknownTag'
  | 'SchemaMismatch'
  | 'GridShapeMismatch';

export interface SchemaLocation {
  className: string;
  field?: string;
}

export class MarshalError extends Error {
  readonly kind: MarshalErrorKind;
  readonly className?: string;
  readonly field?: string;

  constructor(kind: MarshalErrorKind, message: string, location?: SchemaLocation) {
    super(location ? `${describeLocation(location)}: ${message}` : message);
    this.name = 'MarshalError';
    this.kind = kind;
    this.className = location?.className;
    this.field = location?.field;
  }
}

function describeLocation(location: SchemaLocation): string {
  return location.field ? `${location.className}.${location.field}` : location.className;
}

/** Narrow an unknown thrown value to a `MarshalError` of the given kind. */
export function isMarshalError(error: unknown, kind?: MarshalErrorKind): error is MarshalError {
  return error instanceof MarshalError && (kind === undefined || error.kind === kind);
}

export class DataFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataFormatError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
