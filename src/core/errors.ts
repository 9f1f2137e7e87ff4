/**
 * Gateway Error Handling
 * Typed failures for configuration, storage, transport and remote responses
 */

import { ZodError } from 'zod';
import { v4 as uuid } from 'uuid';

// ============================================================================
// ERROR CODES
// ============================================================================

export const ErrorCodes = {
  // Configuration
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  MISSING_CREDENTIAL: 'MISSING_CREDENTIAL',

  // Validation
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Durable state
  STORAGE_ERROR: 'STORAGE_ERROR',

  // Downstream
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  REMOTE_ERROR: 'REMOTE_ERROR',

  // Everything else
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class GatewayError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCodes.CONFIGURATION_ERROR) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }

  static fromZod(error: ZodError): ConfigurationError {
    const issues = error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    const names = issues.map(issue => issue.path).join(', ');
    return new ConfigurationError(`Invalid configuration: ${names}`, { issues });
  }
}

/**
 * Raised before any network call when an account-scoped request is made
 * without an account token configured.
 */
export class MissingCredentialError extends ConfigurationError {
  constructor(message = 'SPACETRADERS_API_KEY is not set; account-scoped requests need the account token') {
    super(message, undefined, ErrorCodes.MISSING_CREDENTIAL);
    this.name = 'MissingCredentialError';
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.VALIDATION_ERROR, message, details);
    this.name = 'ValidationError';
  }

  static fromZod(error: ZodError): ValidationError {
    const issues = error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    const summary = issues
      .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    return new ValidationError(`Invalid arguments: ${summary}`, { issues });
  }
}

export class StorageError extends GatewayError {
  constructor(public path: string, message: string, cause?: unknown) {
    super(ErrorCodes.STORAGE_ERROR, message, { path }, { cause });
    this.name = 'StorageError';
  }
}

export class TransportError extends GatewayError {
  constructor(public method: string, public url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCodes.TRANSPORT_ERROR, `${method} ${url} failed: ${reason}`, { method, url }, { cause });
    this.name = 'TransportError';
  }
}

export class RemoteError extends GatewayError {
  constructor(
    public status: number,
    message: string,
    public remoteCode?: number
  ) {
    super(
      ErrorCodes.REMOTE_ERROR,
      message,
      remoteCode === undefined ? { status } : { status, remoteCode }
    );
    this.name = 'RemoteError';
  }
}

// ============================================================================
// ERROR DESCRIPTION HELPER
// ============================================================================

/**
 * Turn any thrown value into a single line for a tool or CLI user.
 * Gateway errors are shown as-is; anything else is logged with an id and
 * reported without internal detail.
 */
export function describeError(error: unknown, requestId?: string): string {
  if (error instanceof GatewayError) {
    return error.message;
  }

  const rid = requestId || uuid().slice(0, 8);
  console.error(`[${rid}] Internal error:`, error);
  return `${ErrorCodes.INTERNAL_ERROR}: An internal error occurred (request ${rid})`;
}
