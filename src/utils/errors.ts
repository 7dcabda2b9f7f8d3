export class AppError extends Error {
  constructor(
    public message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, code?: string) {
    super(message, code);
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', code?: string) {
    super(message, code);
    this.name = 'NotFoundError';
  }
}

/**
 * Taxonomy source missing or unparseable. Fatal at startup.
 */
export class TaxonomyLoadError extends AppError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message, 'TAXONOMY_LOAD_FAILED');
    this.name = 'TaxonomyLoadError';
  }
}

export type ProviderErrorKind =
  | 'unavailable'
  | 'model_not_found'
  | 'quota'
  | 'rate_limited'
  | 'timeout'
  | 'blocked'
  | 'invalid_response'
  | 'provider_error';

/**
 * Failure inside an LLM provider call. Caught at the disambiguator boundary
 * and converted into a failed DisambiguationResult.
 */
export class ProviderError extends AppError {
  constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
    public readonly model: string
  ) {
    super(message, `PROVIDER_${kind.toUpperCase()}`);
    this.name = 'ProviderError';
  }
}
