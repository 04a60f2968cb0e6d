import { isAxiosError } from 'axios';

export type ProviderErrorKind = 'timeout' | 'unavailable' | 'rejected';

const ERROR_CODES: Record<ProviderErrorKind, string> = {
  timeout: 'PROVIDER_TIMEOUT',
  unavailable: 'PROVIDER_UNAVAILABLE',
  rejected: 'PROVIDER_REJECTED',
};

/**
 * Failure talking to the mapping provider. `retryable` marks failures where
 * repeating the same read-only lookup may succeed.
 */
export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly retryable: boolean;

  constructor(kind: ProviderErrorKind, message: string, retryable: boolean) {
    super(message);
    this.name = 'ProviderError';
    this.kind = kind;
    this.retryable = retryable;
  }

  get code(): string {
    return ERROR_CODES[this.kind];
  }
}

// Statuses that mean nothing matched rather than failure.
export const EMPTY_STATUSES: ReadonlySet<string> = new Set(['ZERO_RESULTS', 'NOT_FOUND']);

// Provider statuses that mean "try again later" rather than "your request is wrong".
const TRANSIENT_STATUSES = new Set(['UNKNOWN_ERROR', 'OVER_QUERY_LIMIT']);

export function statusError(status: string, detail?: string): ProviderError {
  const message = detail ? `${status}: ${detail}` : status;
  if (TRANSIENT_STATUSES.has(status)) {
    return new ProviderError('unavailable', `Maps provider returned ${message}`, true);
  }
  return new ProviderError('rejected', `Maps provider rejected the request: ${message}`, false);
}

export function readStatusBody(data: unknown): { status?: string; error_message?: string } {
  if (typeof data !== 'object' || data === null) {
    return {};
  }
  const status = 'status' in data && typeof data.status === 'string' ? data.status : undefined;
  const errorMessage =
    'error_message' in data && typeof data.error_message === 'string'
      ? data.error_message
      : undefined;
  return { status, error_message: errorMessage };
}

/**
 * True for an HTTP error whose body carries an empty-result status, as sent
 * when a client maps provider statuses onto HTTP codes.
 */
export function isEmptyStatusError(error: unknown): boolean {
  if (!isAxiosError(error) || !error.response) {
    return false;
  }
  const { status } = readStatusBody(error.response.data);
  return status !== undefined && EMPTY_STATUSES.has(status);
}

/**
 * Classify anything thrown by the HTTP client into a ProviderError.
 */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ProviderError('timeout', 'Maps provider request timed out', true);
    }

    const response = error.response;
    if (!response) {
      return new ProviderError(
        'unavailable',
        `Maps provider unreachable: ${error.message}`,
        true
      );
    }

    const body = readStatusBody(response.data);
    if (response.status >= 500 || response.status === 429) {
      return new ProviderError(
        'unavailable',
        `Maps provider returned HTTP ${response.status}`,
        true
      );
    }
    if (body.status) {
      return statusError(body.status, body.error_message);
    }
    return new ProviderError(
      'rejected',
      `Maps provider rejected the request: HTTP ${response.status}`,
      false
    );
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return new ProviderError('unavailable', `Maps provider request failed: ${message}`, false);
}
