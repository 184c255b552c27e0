/**
 * ApiError — Structured HTTP error class for the governance API.
 *
 * Extends native Error to keep `.stack` for monitoring while carrying
 * the HTTP `status` and a structured `body`. Route handlers match with
 * `ApiError.isApiError(err)`.
 *
 * Governance errors are converted with toApiError() from
 * services/governance-errors.ts, re-exported here.
 */
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ErrorResponse } from './types.js';

/**
 * Error body with optional diagnostic fields beyond ErrorResponse
 * (e.g. violation lists from validators).
 */
export type ApiErrorBody = ErrorResponse & Record<string, unknown>;

export class ApiError extends Error {
  readonly status: ContentfulStatusCode;
  readonly body: ApiErrorBody;

  /**
   * @param status - HTTP status code (e.g., 400, 404, 409, 503)
   * @param body - Structured error body with `error` and `message` fields
   */
  constructor(status: ContentfulStatusCode, body: ApiErrorBody) {
    super(`ApiError(${status}): ${body.message}`);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;

    // Ensure prototype chain is correct for instanceof checks
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  override toString(): string {
    return `ApiError(${this.status}): ${this.body.error} — ${this.body.message}`;
  }

  static isApiError(err: unknown): err is ApiError {
    return err instanceof ApiError;
  }
}

export { toApiError } from './services/governance-errors.js';
