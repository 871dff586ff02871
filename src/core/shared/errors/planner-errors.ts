import { AppError } from './app-error';

/** Network failure or timeout on an embedding or generation call, after the retry budget. */
export class ProviderUnavailableError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(503, message, 'PROVIDER_UNAVAILABLE', details);
  }
}

/** The provider answered, but the answer cannot be used. Never retried as-is. */
export class MalformedResponseError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(502, message, 'MALFORMED_RESPONSE', details);
  }
}

export class InvalidGroupingRequestError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(400, message, 'INVALID_GROUPING_REQUEST', details);
  }
}

export class EmbeddingUnavailableError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(503, message, 'EMBEDDING_UNAVAILABLE', details);
  }
}
