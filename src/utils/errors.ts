/**
 * Error handling utilities and error types
 */

export enum ErrorType {
  // Transient errors - should retry
  NETWORK_ERROR = 'NETWORK_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  TIMEOUT = 'TIMEOUT',
  SERVER_ERROR = 'SERVER_ERROR', // 5xx errors

  // Permanent errors - don't retry
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  PARSING_ERROR = 'PARSING_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export type ErrorContext = Record<string, unknown>;

export interface ErrorDetails {
  type: ErrorType;
  message: string;
  originalError?: unknown;
  context?: ErrorContext;
  retryable: boolean;
  httpStatus?: number;
}

export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly retryable: boolean;
  public readonly context?: ErrorContext;
  public readonly httpStatus?: number;
  public readonly originalError?: unknown;

  constructor(details: ErrorDetails) {
    super(details.message);
    this.name = 'AppError';
    this.type = details.type;
    this.retryable = details.retryable;
    this.context = details.context;
    this.httpStatus = details.httpStatus;
    this.originalError = details.originalError;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      httpStatus: this.httpStatus,
    };
  }
}

/**
 * Errors that make every following request fail the same way
 */
export function isFatal(error: AppError): boolean {
  return error.type === ErrorType.AUTHENTICATION_ERROR || error.type === ErrorType.CONFIGURATION_ERROR;
}

export function configurationError(message: string, context?: ErrorContext): AppError {
  return new AppError({ type: ErrorType.CONFIGURATION_ERROR, message, retryable: false, context });
}

interface HttpLikeResponse {
  status?: number;
  statusCode?: number;
  data?: unknown;
  headers?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function getResponse(error: unknown): HttpLikeResponse | undefined {
  if (!isRecord(error) || !isRecord(error.response)) return undefined;
  const { status, statusCode, data, headers } = error.response;
  return {
    status: typeof status === 'number' ? status : undefined,
    statusCode: typeof statusCode === 'number' ? statusCode : undefined,
    data,
    headers: isRecord(headers) ? headers : undefined,
  };
}

function getMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isRecord(error) && typeof error.message === 'string') return error.message;
  return '';
}

function getCode(error: unknown): string | undefined {
  if (!isRecord(error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Google APIs answer with `{ error: { message } }`; other services with `{ error: { detail } }`
 */
function getDetail(data: unknown): string | undefined {
  if (!isRecord(data) || !isRecord(data.error)) return undefined;
  const { detail, message } = data.error;
  if (typeof detail === 'string') return detail;
  if (typeof message === 'string') return message;
  return undefined;
}

interface HttpErrorKind {
  type: ErrorType;
  label: string;
  retryable: boolean;
}

function httpErrorKind(status: number): HttpErrorKind | undefined {
  if (status === 429) return { type: ErrorType.RATE_LIMIT, label: 'Rate limit exceeded', retryable: true };
  if (status === 401 || status === 403) {
    return { type: ErrorType.AUTHENTICATION_ERROR, label: 'Authentication failed', retryable: false };
  }
  if (status === 404) return { type: ErrorType.NOT_FOUND, label: 'Resource not found', retryable: false };
  if (status === 400 || status === 422) {
    return { type: ErrorType.VALIDATION_ERROR, label: 'Validation error', retryable: false };
  }
  if (status >= 500) return { type: ErrorType.SERVER_ERROR, label: `Server error (${status})`, retryable: true };
  return undefined;
}

const NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN']);

// Thrown by google-auth-library when a token or key file is missing or revoked
const CREDENTIAL_FAILURES = ['invalid_grant', 'Could not load the default credentials'];

/**
 * Classify an error and create an AppError
 */
export function classifyError(error: unknown, context?: ErrorContext): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const message = getMessage(error);
  const response = getResponse(error);
  const status = response ? response.status ?? response.statusCode ?? 0 : 0;
  const kind = httpErrorKind(status);

  if (response && kind) {
    const fallback = kind.type === ErrorType.VALIDATION_ERROR ? JSON.stringify(response.data) : message;
    return new AppError({
      type: kind.type,
      message: `${kind.label}: ${getDetail(response.data) || fallback}`,
      retryable: kind.retryable,
      httpStatus: status,
      context: kind.type === ErrorType.RATE_LIMIT
        ? { ...context, retryAfter: response.headers?.['retry-after'] }
        : context,
      originalError: error,
    });
  }

  const code = getCode(error);
  if (code && NETWORK_CODES.has(code)) {
    return new AppError({ type: ErrorType.NETWORK_ERROR, message: `Network error: ${message}`, retryable: true, context, originalError: error });
  }

  if (/timeout/i.test(message)) {
    return new AppError({ type: ErrorType.TIMEOUT, message: `Request timeout: ${message}`, retryable: true, context, originalError: error });
  }

  if (CREDENTIAL_FAILURES.some(failure => message.includes(failure))) {
    return new AppError({ type: ErrorType.AUTHENTICATION_ERROR, message, retryable: false, context, originalError: error });
  }

  return new AppError({
    type: ErrorType.UNKNOWN_ERROR,
    message: message || String(error) || 'Unknown error occurred',
    retryable: false,
    context,
    originalError: error,
  });
}

/**
 * Sleep utility for retry delays
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  onRetry?: (error: AppError, attempt: number) => void;
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelay = 1000,
    maxDelay = 30000,
    backoffMultiplier = 2,
    onRetry,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const appError = classifyError(error);

      // Don't retry if error is not retryable, or on the last attempt
      if (!appError.retryable || attempt >= maxRetries) {
        throw appError;
      }

      // Calculate delay with exponential backoff
      const delay = Math.min(
        initialDelay * Math.pow(backoffMultiplier, attempt),
        maxDelay
      );

      if (onRetry) {
        onRetry(appError, attempt + 1);
      }

      await sleep(delay);
    }
  }
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    const parts = [
      `[${error.type}] ${error.message}`,
      error.context ? `Context: ${JSON.stringify(error.context)}` : '',
      error.httpStatus ? `HTTP ${error.httpStatus}` : '',
    ].filter(Boolean);
    return parts.join(' | ');
  }

  const response = getResponse(error);
  if (response) {
    const status = response.status ?? response.statusCode;
    return `HTTP ${status}: ${JSON.stringify(response.data)}`;
  }

  return getMessage(error) || String(error);
}
