/**
 * Error taxonomy shared by all snaptrail packages
 */

export type SnapTrailErrorCode =
  | 'VALIDATION_ERROR'
  | 'ENGINE_ERROR'
  | 'STORAGE_ERROR'
  | 'REFERENCE_ERROR'
  | 'INVALID_STATE'
  | 'CONFIG_ERROR';

export interface SnapTrailErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class: every error carries a stable code plus optional details
 */
export class SnapTrailError extends Error {
  readonly code: SnapTrailErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: SnapTrailErrorCode, message: string, options: SnapTrailErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options.details;
  }
}

/**
 * Bad caller input: missing source path, non-empty restore target, empty policy.
 * Raised before any engine call.
 */
export class ValidationError extends SnapTrailError {
  constructor(message: string, options?: SnapTrailErrorOptions) {
    super('VALIDATION_ERROR', message, options);
  }
}

/**
 * Engine invocation failed or produced output we could not interpret
 */
export class EngineError extends SnapTrailError {
  readonly command?: string;
  readonly stderr?: string;

  constructor(
    message: string,
    options: SnapTrailErrorOptions & { command?: string; stderr?: string } = {}
  ) {
    super('ENGINE_ERROR', message, options);
    this.command = options.command;
    this.stderr = options.stderr;
  }
}

/**
 * Metadata persistence failed
 */
export class StorageError extends SnapTrailError {
  constructor(message: string, options?: SnapTrailErrorOptions) {
    super('STORAGE_ERROR', message, options);
  }
}

export type RefFailureReason = 'not-found' | 'invalid';

/**
 * A snapshot reference could not be resolved
 */
export class SnapshotRefError extends SnapTrailError {
  readonly ref: string;
  readonly reason: RefFailureReason;

  constructor(ref: string, reason: RefFailureReason, message: string) {
    super('REFERENCE_ERROR', `${message} (ref: "${ref}")`, { details: { ref, reason } });
    this.ref = ref;
    this.reason = reason;
  }
}

/**
 * Operation not allowed in the current state (e.g. forcing a snapshot with nothing pending)
 */
export class InvalidStateError extends SnapTrailError {
  constructor(message: string, options?: SnapTrailErrorOptions) {
    super('INVALID_STATE', message, options);
  }
}

/**
 * Configuration file or value is unusable
 */
export class ConfigError extends SnapTrailError {
  constructor(message: string, options?: SnapTrailErrorOptions) {
    super('CONFIG_ERROR', message, options);
  }
}

export function isSnapTrailError(error: unknown): error is SnapTrailError {
  return error instanceof SnapTrailError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
