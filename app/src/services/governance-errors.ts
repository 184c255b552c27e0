/**
 * Governance Errors — error taxonomy for the governance engine.
 *
 * Only exceptional conditions are errors. A policy denial is an expected
 * outcome and travels as data (see `Decision` in admission-validator.ts).
 *
 * Variants and their HTTP mappings:
 * - ValidationError → 400 (malformed input, never retried)
 * - NotFoundError → 404
 * - InvalidStateTransition → 409 (state left unchanged)
 * - TransientInfraError → 503 (retryable: adapter I/O, timeouts, version conflicts)
 * - ConfigurationError → 503 (policy unusable, components fail closed)
 */
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ApiError } from '../errors.js';
import type { ApiErrorBody } from '../errors.js';

export type GovernanceErrorType =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'TRANSIENT_INFRA'
  | 'CONFIGURATION';

export abstract class GovernanceError extends Error {
  abstract readonly type: GovernanceErrorType;
  abstract readonly retryable: boolean;

  protected constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    // Keep instanceof working for subclasses of a built-in
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends GovernanceError {
  readonly type = 'VALIDATION' as const;
  readonly retryable = false;
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [message]) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class NotFoundError extends GovernanceError {
  readonly type = 'NOT_FOUND' as const;
  readonly retryable = false;
  readonly resource: string;
  readonly resourceId: string;

  constructor(resource: string, resourceId: string) {
    super(`${resource} not found: ${resourceId}`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.resourceId = resourceId;
  }
}

export class InvalidStateTransition extends GovernanceError {
  readonly type = 'INVALID_TRANSITION' as const;
  readonly retryable = false;
  readonly machine: string;
  readonly from: string;
  readonly to: string;

  constructor(machine: string, from: string, to: string, message?: string) {
    super(message ?? `Invalid transition ${from} → ${to} in ${machine}`);
    this.name = 'InvalidStateTransition';
    this.machine = machine;
    this.from = from;
    this.to = to;
  }
}

export class TransientInfraError extends GovernanceError {
  readonly type = 'TRANSIENT_INFRA' as const;
  readonly retryable = true;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransientInfraError';
  }
}

/** Optimistic concurrency failure: the record changed since it was read. */
export class VersionConflictError extends TransientInfraError {
  readonly resourceId: string;
  readonly expectedVersion: number;
  readonly actualVersion: number | null;

  constructor(resourceId: string, expectedVersion: number, actualVersion: number | null) {
    super(
      `Version conflict for ${resourceId}: expected ${expectedVersion}, found ${actualVersion ?? 'none'}`,
    );
    this.name = 'VersionConflictError';
    this.resourceId = resourceId;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export class AdapterTimeoutError extends TransientInfraError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'AdapterTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigurationError extends GovernanceError {
  readonly type = 'CONFIGURATION' as const;
  readonly retryable = false;
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function isGovernanceError(err: unknown): err is GovernanceError {
  return err instanceof GovernanceError;
}

export function isTransient(err: unknown): boolean {
  return err instanceof TransientInfraError;
}

// ---------------------------------------------------------------------------
// HTTP Status Mapping
// ---------------------------------------------------------------------------

export const ERROR_STATUS_MAP: Readonly<Record<GovernanceErrorType, ContentfulStatusCode>> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  TRANSIENT_INFRA: 503,
  CONFIGURATION: 503,
} as const;

const ERROR_CODES: Readonly<Record<GovernanceErrorType, string>> = {
  VALIDATION: 'invalid_request',
  NOT_FOUND: 'not_found',
  INVALID_TRANSITION: 'invalid_transition',
  TRANSIENT_INFRA: 'service_unavailable',
  CONFIGURATION: 'policy_unavailable',
};

/**
 * Convert a GovernanceError to an ApiError with the mapped HTTP status.
 * Variant-specific fields are kept in the body for diagnostics.
 */
export function toApiError(err: GovernanceError): ApiError {
  const body: ApiErrorBody = {
    error: ERROR_CODES[err.type],
    message: err.message,
    retryable: err.retryable,
  };

  if (err instanceof ValidationError) {
    body.violations = [...err.issues];
  } else if (err instanceof InvalidStateTransition) {
    body.from = err.from;
    body.to = err.to;
    body.machine = err.machine;
  }

  return new ApiError(ERROR_STATUS_MAP[err.type], body);
}
