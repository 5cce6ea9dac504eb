/**
 * Relay error taxonomy
 *
 * Transient conditions are contained by the Delivery Worker and Identity
 * Resolver. Only terminal outcomes reach the operator channel.
 *
 * @module utils/errors
 */

/**
 * Network-level failure that is expected to clear by itself (timeout,
 * refused connection, 5xx, dropped hub link).
 */
export class TransientNetworkError extends Error {
  public readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'TransientNetworkError';
    this.cause = cause;
    Object.setPrototypeOf(this, TransientNetworkError.prototype);
  }
}

/**
 * The hub provisioning capability could not be reached. Resolution should be
 * retried later; an identity must not be fabricated locally.
 */
export class ProvisioningUnavailableError extends Error {
  public readonly identityId: string;
  public readonly httpStatus?: number;

  constructor(identityId: string, message: string, httpStatus?: number) {
    super(message);
    this.name = 'ProvisioningUnavailableError';
    this.identityId = identityId;
    this.httpStatus = httpStatus;
    Object.setPrototypeOf(this, ProvisioningUnavailableError.prototype);
  }
}

/**
 * The scanned code can never become an identity. Not retried, not enqueued.
 */
export class InvalidCodeError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'InvalidCodeError';
    this.code = code;
    Object.setPrototypeOf(this, InvalidCodeError.prototype);
  }
}

/**
 * Raised once at startup when the merged configuration fails validation
 */
export class ConfigValidationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

/**
 * Error raised by the backend API client. Carries the HTTP status when the
 * server answered at all.
 */
export class BackendApiError extends Error {
  public readonly httpStatus?: number;

  constructor(message: string, httpStatus?: number) {
    super(message);
    this.name = 'BackendApiError';
    this.httpStatus = httpStatus;
    Object.setPrototypeOf(this, BackendApiError.prototype);
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
