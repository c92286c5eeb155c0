/**
 * Error types and HTTP status classification for the Orangic client.
 */

import axios from 'axios';
import { z } from 'zod';

/**
 * Error kinds for Orangic errors.
 */
export enum OrangicErrorKind {
  /** Missing or rejected credentials. */
  Authentication = 'authentication_error',
  /** Rate limit exceeded. */
  RateLimit = 'rate_limit_error',
  /** Any other API failure. */
  Api = 'api_error',
  /** Invalid client configuration. */
  Configuration = 'configuration_error',
}

/**
 * Additional error details.
 */
export interface OrangicErrorDetails {
  /** HTTP status code. */
  statusCode?: number;
  /** Request ID for debugging. */
  requestId?: string;
  /** Retry after duration in seconds. */
  retryAfter?: number;
}

/**
 * Base class for every error raised by the client.
 */
export class OrangicError extends Error {
  /** Error kind. */
  readonly kind: OrangicErrorKind;

  /** HTTP status code, when the error came from a response. */
  readonly statusCode?: number;

  /** Additional error details. */
  readonly details: OrangicErrorDetails;

  constructor(kind: OrangicErrorKind, message: string, details: OrangicErrorDetails = {}) {
    super(message);
    this.name = 'OrangicError';
    this.kind = kind;
    this.statusCode = details.statusCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns true if repeating the request may succeed.
   */
  isRetryable(): boolean {
    if (this.kind === OrangicErrorKind.RateLimit) {
      return true;
    }
    return (
      this.kind === OrangicErrorKind.Api &&
      this.statusCode !== undefined &&
      this.statusCode >= 500
    );
  }

  /**
   * Returns the retry-after duration in seconds if the server sent one.
   */
  getRetryAfter(): number | undefined {
    return this.details.retryAfter;
  }

  static authentication(message: string, details?: OrangicErrorDetails): AuthenticationError {
    return new AuthenticationError(message, details);
  }

  static rateLimit(message: string, details?: OrangicErrorDetails): RateLimitError {
    return new RateLimitError(message, details);
  }

  static api(message: string, details?: OrangicErrorDetails): ApiError {
    return new ApiError(message, details);
  }

  static configuration(message: string): OrangicError {
    return new OrangicError(OrangicErrorKind.Configuration, message);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/**
 * Raised when no API key is available or the server answers 401.
 */
export class AuthenticationError extends OrangicError {
  constructor(message: string, details?: OrangicErrorDetails) {
    super(OrangicErrorKind.Authentication, message, details);
    this.name = 'AuthenticationError';
  }
}

/**
 * Raised when the server answers 429.
 */
export class RateLimitError extends OrangicError {
  constructor(message: string, details?: OrangicErrorDetails) {
    super(OrangicErrorKind.RateLimit, message, details);
    this.name = 'RateLimitError';
  }
}

/**
 * Raised for every other failed API response.
 */
export class ApiError extends OrangicError {
  constructor(message: string, details?: OrangicErrorDetails) {
    super(OrangicErrorKind.Api, message, details);
    this.name = 'ApiError';
  }
}

/**
 * The parts of an HTTP response the classifier looks at.
 */
export interface ClassifiableResponse {
  /** HTTP status code. */
  status: number;
  /** Raw response body. */
  body: string;
  /** Lower-cased response headers. */
  headers?: Record<string, string>;
  /** Request ID from headers. */
  requestId?: string;
}

/**
 * Error body shapes the API is known to send. The flat form is tried first.
 */
const errorBodySchema = z.union([
  z.object({ error: z.string() }),
  z.object({ error: z.object({ message: z.string() }) }),
]);

/**
 * Returns true when a status code denotes a failed response.
 */
export function isErrorStatus(status: number): boolean {
  return status >= 400;
}

/**
 * Extracts a human readable message from an error response body: a flat
 * `error` string, then a nested `error.message`, then the raw body. An empty
 * body yields `HTTP <status>` so the message is never blank.
 */
export function extractErrorMessage(status: number, body: string): string {
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch {
    decoded = undefined;
  }

  const parsed = errorBodySchema.safeParse(decoded);
  if (parsed.success) {
    const { error } = parsed.data;
    return typeof error === 'string' ? error : error.message;
  }

  return body.length > 0 ? body : `HTTP ${status}`;
}

/**
 * Throws the typed error matching a failed response. Responses below 400
 * pass through untouched.
 */
export function raiseForStatus(response: ClassifiableResponse): void {
  const { status } = response;
  if (!isErrorStatus(status)) {
    return;
  }

  const message = extractErrorMessage(status, response.body);
  const details: OrangicErrorDetails = { statusCode: status, requestId: response.requestId };

  switch (status) {
    case 401:
      throw new AuthenticationError(message, details);
    case 429:
      throw new RateLimitError(message, {
        ...details,
        retryAfter: parseRetryAfter(response.headers?.['retry-after']),
      });
    default:
      throw new ApiError(message, details);
  }
}

function parseRetryAfter(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = parseInt(value, 10);
  return isNaN(seconds) ? undefined : seconds;
}

/**
 * Type guard for OrangicError.
 */
export function isOrangicError(error: unknown): error is OrangicError {
  return error instanceof OrangicError;
}

/**
 * Checks if an error is worth retrying. Connection failures surfaced by the
 * transport (no response received) count as retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (isOrangicError(error)) {
    return error.isRetryable();
  }
  return axios.isAxiosError(error) && error.response === undefined;
}
