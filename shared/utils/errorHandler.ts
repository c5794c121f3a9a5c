// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

import { AxiosError } from 'axios';

// ============================================================================
// ERROR TYPES
// ============================================================================

export interface AppError {
  message: string;
  type: ErrorType;
  status?: number;
  code?: string;
  isRetryable: boolean;
}

export type ErrorType =
  | 'NETWORK_ERROR'
  | 'TIMEOUT_ERROR'
  | 'VALIDATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'NOT_FOUND_ERROR'
  | 'RATE_LIMIT_ERROR'
  | 'SERVER_ERROR'
  | 'CLIENT_ERROR'
  | 'UNKNOWN_ERROR';

// ============================================================================
// ERROR PARSING UTILITIES
// ============================================================================

/**
 * Parse any error into a structured AppError
 */
export function parseError(error: unknown): AppError {
  if (isAxiosError(error)) {
    return parseAxiosError(error);
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      type: 'UNKNOWN_ERROR',
      isRetryable: false,
    };
  }

  if (typeof error === 'string') {
    return {
      message: error,
      type: 'UNKNOWN_ERROR',
      isRetryable: false,
    };
  }

  return {
    message: 'An unknown error occurred',
    type: 'UNKNOWN_ERROR',
    isRetryable: false,
  };
}

/**
 * Type guard for Axios errors
 */
export function isAxiosError(error: unknown): error is AxiosError {
  return error !== null && typeof error === 'object' && 'isAxiosError' in error && error.isAxiosError === true;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Parse Axios errors into structured format
 */
function parseAxiosError(error: AxiosError): AppError {
  const response = error.response;
  const code = error.code;

  // No response at all: the request never completed
  if (!response) {
    const timedOut = code !== undefined && TIMEOUT_CODES.has(code);
    return {
      message: error.message || 'Network request failed',
      type: timedOut ? 'TIMEOUT_ERROR' : 'NETWORK_ERROR',
      code,
      isRetryable: true,
    };
  }

  const status = response.status;
  let message = error.message || `Request failed with status ${status}`;
  const data = response.data;
  if (data && typeof data === 'object') {
    if ('error' in data && typeof data.error === 'string') {
      message = data.error;
    } else if ('message' in data && typeof data.message === 'string') {
      message = data.message;
    }
  }

  let type: ErrorType = 'UNKNOWN_ERROR';
  switch (status) {
    case 400:
      type = 'VALIDATION_ERROR';
      break;
    case 401:
    case 403:
      type = 'AUTHENTICATION_ERROR';
      break;
    case 404:
      type = 'NOT_FOUND_ERROR';
      break;
    case 429:
      type = 'RATE_LIMIT_ERROR';
      break;
    default:
      if (status >= 500) {
        type = 'SERVER_ERROR';
      } else if (status >= 400) {
        type = 'CLIENT_ERROR';
      }
  }

  return {
    message,
    type,
    status,
    code,
    isRetryable: type === 'RATE_LIMIT_ERROR' || type === 'SERVER_ERROR',
  };
}

/**
 * One-line description of an unknown thrown value, for log lines and warnings
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

// ============================================================================
// RE-EXPORT NEVERTHROW TYPES AND UTILITIES
// ============================================================================

export { Result, Ok, Err, ok, err } from 'neverthrow';
