/**
 * Typed error model.
 *
 * Failures are described by a TypedError value with a namespaced code,
 * a retry hint, and suggested fixes. Code paths that must throw wrap the
 * value in one of the Error subclasses below so callers can still reach
 * the structured form through `typedError`.
 */

/** Typed suggested fix. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code: GENERATION, VALIDATION, CONFIG or IO, then a detail (e.g., "IO.FILE_APPEND"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same operation may succeed if simply repeated. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Extract a message from an unknown thrown value. */
export function describeCause(cause: unknown): string {
  if (typeof cause === 'object' && cause !== null && 'message' in cause && typeof cause.message === 'string') {
    return cause.message;
  }
  return String(cause);
}

// --- Common error factory functions ---

export function displayNameExhaustedError(attempts: number, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'GENERATION.DISPLAY_NAME_EXHAUSTED',
    message: `No valid display name found after ${attempts} attempts`,
    retryable: true,
    details: { attempts, ...details },
    suggestedFixes: [
      { type: 'RETRY', params: {}, description: 'Retry generation with fresh random names' },
      {
        type: 'INCREASE_ATTEMPTS',
        params: { maxDisplayNameAttempts: attempts * 2 },
        description: 'Raise the display name attempt budget',
      },
    ],
  });
}

export function accountValidationError(errors: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.ACCOUNT',
    message: `Generated account failed validation: ${errors.join('; ')}`,
    retryable: false,
    details: { errors },
  });
}

export function invalidEmailError(email: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.EMAIL',
    message: `Invalid email address: "${email}"`,
    retryable: false,
    suggestedFixes: [
      { type: 'PASTE_EMAIL', params: {}, description: 'Paste the full address shown by the temp-mail page' },
    ],
  });
}

export function configValueError(key: string, value: string, expected: string): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID_VALUE',
    message: `Invalid value for ${key}: "${value}" (expected ${expected})`,
    retryable: false,
    details: { key, value, expected },
    suggestedFixes: [{ type: 'FIX_ENV', params: { key }, description: `Correct or unset ${key}` }],
  });
}

export function fileAppendError(filePath: string, cause: unknown): TypedError {
  return createTypedError({
    code: 'IO.FILE_APPEND',
    message: `Could not write to ${filePath}: ${describeCause(cause)}`,
    retryable: true,
    details: { filePath },
    suggestedFixes: [
      { type: 'CHECK_PERMISSIONS', params: { filePath }, description: `Check that ${filePath} is writable` },
    ],
  });
}

export function clipboardError(cause: unknown): TypedError {
  return createTypedError({
    code: 'IO.CLIPBOARD',
    message: `Clipboard unavailable: ${describeCause(cause)}`,
    retryable: false,
  });
}

/** Thrown when a constrained random field cannot be produced. */
export class GenerationError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'GenerationError';
  }
}

/** Thrown when configuration cannot be loaded or fails validation. */
export class ConfigError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ConfigError';
  }
}

/** Thrown when an account record cannot be persisted. */
export class StorageError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'StorageError';
  }
}
