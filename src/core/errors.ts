export type AcquisitionErrorKind = 'blocked' | 'transport' | 'parse_empty';
export type EnrichmentErrorKind = 'api_unavailable' | 'rate_limited' | 'invalid_data';
export type ConfigErrorKind = 'invalid_range' | 'missing_required_proxy';
export type FetchErrorKind = 'timeout' | 'http_status' | 'network';

export class AcquisitionError extends Error {
  constructor(
    readonly kind: AcquisitionErrorKind,
    readonly source: string,
    message: string,
  ) {
    super(message);
    this.name = 'AcquisitionError';
  }

  get retryable(): boolean {
    return this.kind !== 'parse_empty';
  }
}

export class EnrichmentError extends Error {
  constructor(
    readonly kind: EnrichmentErrorKind,
    readonly service: string,
    message: string,
  ) {
    super(message);
    this.name = 'EnrichmentError';
  }
}

export class ConfigError extends Error {
  constructor(
    readonly kind: ConfigErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class FetchError extends Error {
  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
