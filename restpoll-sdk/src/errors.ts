/**
 * REST Client Error Types
 */

import type { Status } from './types';

/**
 * Base error class for all REST client errors
 */
export class RestClientError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;

  constructor(message: string, code: string, statusCode?: number) {
    super(message);
    this.name = 'RestClientError';
    this.code = code;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, RestClientError.prototype);
  }
}

/**
 * Error thrown when client configuration is invalid (e.g. a malformed base URL)
 */
export class ConfigurationError extends RestClientError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error recorded while a request was being built and reported by `do()`
 */
export class RequestBuildError extends RestClientError {
  constructor(message: string) {
    super(message, 'REQUEST_BUILD_ERROR');
    this.name = 'RequestBuildError';
    Object.setPrototypeOf(this, RequestBuildError.prototype);
  }
}

/**
 * Error thrown when the server could not be reached or no response arrived
 */
export class TransportError extends RestClientError {
  public readonly originalError: unknown;

  constructor(message: string, originalError: unknown) {
    super(message, 'NETWORK_ERROR');
    this.name = 'TransportError';
    this.originalError = originalError;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Error thrown when a response body cannot be decoded by the codec
 */
export class DecodeError extends RestClientError {
  public readonly body: string;

  constructor(message: string, body: string, statusCode?: number) {
    super(message, 'DECODE_ERROR', statusCode);
    this.name = 'DecodeError';
    this.body = body;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Error thrown for a non-2xx response that carries no status object
 */
export class UnexpectedStatusError extends RestClientError {
  public readonly body: string;

  constructor(statusCode: number, body: string) {
    super(`Unexpected status code ${statusCode}: ${body}`, 'UNEXPECTED_STATUS', statusCode);
    this.name = 'UnexpectedStatusError';
    this.body = body;
    Object.setPrototypeOf(this, UnexpectedStatusError.prototype);
  }
}

/**
 * Error thrown when the server reports a failed status
 */
export class StatusError extends RestClientError {
  public readonly status: Status;

  constructor(status: Status, statusCode?: number) {
    super(
      status.message ?? `Request failed with status ${status.status}`,
      status.reason ?? 'STATUS_FAILURE',
      status.code ?? statusCode
    );
    this.name = 'StatusError';
    this.status = status;
    Object.setPrototypeOf(this, StatusError.prototype);
  }
}

export function isStatusError(error: unknown): error is StatusError {
  return error instanceof StatusError;
}

/**
 * True when the error is a status error with the given reason, e.g. `NotFound`
 */
export function hasReason(error: unknown, reason: string): boolean {
  return isStatusError(error) && error.status.reason === reason;
}
