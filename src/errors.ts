export type SanitizeErrorKind = 'EncodingError' | 'MissingOrInvalidType';

export class SanitizeError extends Error {
  constructor(
    public readonly kind: SanitizeErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SanitizeError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** The YAML round trip or a final render failed. The original error is kept as `cause`. */
export class EncodingError extends SanitizeError {
  constructor(
    public readonly stage: string,
    cause: unknown,
  ) {
    super('EncodingError', `Failed to encode ${stage}: ${describeCause(cause)}`, { cause });
    this.name = 'EncodingError';
  }
}

export class MissingOrInvalidTypeError extends SanitizeError {
  /** `typeof` label of the received type field, 'null' for null. */
  constructor(public readonly received: string) {
    super(
      'MissingOrInvalidType',
      received === 'undefined'
        ? 'Attempted to sanitize config without a type field'
        : `Config type field must be a string, got ${received}`,
    );
    this.name = 'MissingOrInvalidTypeError';
  }
}
