export type AnalysisErrorCode =
  | 'INVALID_URL'
  | 'FETCH_FAILED'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'HTTP_ERROR'
  | 'API_ERROR'
  | 'PARSE_ERROR'
  | 'CONFIG_ERROR'
  | 'CONTRACT_VIOLATION'
  | 'UNKNOWN';

export class AnalysisError extends Error {
  code: AnalysisErrorCode;
  details?: string;
  retryable: boolean;

  constructor(code: AnalysisErrorCode, message: string, details?: string, retryable = false) {
    super(message);
    this.name = 'AnalysisError';
    this.code = code;
    this.details = details;
    this.retryable = retryable;
  }

  static fromFetchError(error: unknown, url: string): AnalysisError {
    if (error instanceof AnalysisError) {
      return error;
    }
    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        return new AnalysisError('TIMEOUT', `Request timed out for ${url}`, error.message, true);
      }
      if (error.message.includes('network') || error.message.includes('fetch')) {
        return new AnalysisError('NETWORK_ERROR', `Network error fetching ${url}`, error.message, true);
      }
    }
    return new AnalysisError('FETCH_FAILED', `Failed to fetch ${url}`, String(error), true);
  }

  static invalidUrl(url: string): AnalysisError {
    return new AnalysisError('INVALID_URL', `Invalid URL: ${url}`, 'URL must be a valid HTTP or HTTPS URL', false);
  }

  static httpStatus(url: string, status: number): AnalysisError {
    return new AnalysisError('HTTP_ERROR', `HTTP ${status} from ${url}`, undefined, status >= 500 || status === 429);
  }

  static timeout(operation: string, ms: number): AnalysisError {
    return new AnalysisError('TIMEOUT', `Timeout: ${operation} exceeded ${ms}ms`, undefined, true);
  }

  static apiError(message: string, details?: string): AnalysisError {
    return new AnalysisError('API_ERROR', message, details, true);
  }

  static parseError(message: string, details?: string): AnalysisError {
    return new AnalysisError('PARSE_ERROR', message, details, false);
  }

  static configError(message: string, details?: string): AnalysisError {
    return new AnalysisError('CONFIG_ERROR', message, details, false);
  }

  static contractViolation(message: string, details?: string): AnalysisError {
    return new AnalysisError('CONTRACT_VIOLATION', message, details, false);
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      retryable: this.retryable,
    };
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

export function getErrorMessage(error: unknown): string {
  if (isAnalysisError(error)) {
    return error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
