export type GroundingErrorCode =
  | 'MANIFEST_UNREADABLE'
  | 'MANIFEST_INVALID'
  | 'CALIBRATION_FAILED'
  | 'EMBEDDING_FAILED'
  | 'DIMENSION_MISMATCH'
  | 'DEGENERATE_VECTOR';

export class GroundingError extends Error {
  readonly code: GroundingErrorCode;

  constructor(code: GroundingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Manifest missing, unreadable or structurally invalid. Fatal at startup.
 */
export class ManifestError extends GroundingError {
  readonly issues: string[];

  constructor(
    code: 'MANIFEST_UNREADABLE' | 'MANIFEST_INVALID',
    message: string,
    issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
    this.issues = issues;
  }
}

export class CalibrationError extends GroundingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CALIBRATION_FAILED', message, options);
  }
}

export class EmbeddingProviderError extends GroundingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_FAILED', message, options);
  }
}

export class DimensionMismatchError extends GroundingError {
  constructor(readonly expected: number, readonly actual: number) {
    super('DIMENSION_MISMATCH', `Dimension mismatch: ${expected} vs ${actual}`);
  }
}

/** A vector with zero Euclidean norm cannot be normalized. */
export class DegenerateVectorError extends GroundingError {
  constructor(message = 'Cannot normalize a zero-norm vector') {
    super('DEGENERATE_VECTOR', message);
  }
}
