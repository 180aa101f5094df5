/**
 * Error taxonomy for a migration run.
 *
 * Per-track failures never surface as errors (they become Unmatched outcomes),
 * per-job errors fail a single job, and only the auth errors below halt the run.
 */

export class MigrationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Refresh token revoked or rejected; interactive authorization must be re-run. */
export class AuthExpiredError extends MigrationError {}

/** Network failure or 5xx from the accounts service; safe to retry. */
export class AuthTransientError extends MigrationError {}

/** No usable credential and no way to obtain one without the user. */
export class AuthorizationRequiredError extends MigrationError {}

export class SourceNotFoundError extends MigrationError {
  readonly playlistId: string;

  constructor(playlistId: string, message = `source playlist ${playlistId} not found`) {
    super(message);
    this.playlistId = playlistId;
  }
}

export class SourceApiError extends MigrationError {
  readonly status: number | null;
  readonly transient: boolean;

  constructor(message: string, status: number | null, transient: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
    this.transient = transient;
  }
}

export class TargetApiError extends MigrationError {
  readonly status: number | null;
  readonly transient: boolean;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    details: { status: number | null; transient: boolean; retryAfterMs?: number },
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.status = details.status;
    this.transient = details.transient;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/** Target playlist exists but only part of the tracks could be appended. */
export class PartialAppendError extends MigrationError {
  readonly appended: number;
  readonly total: number;

  constructor(appended: number, total: number, options?: { cause?: unknown }) {
    super(`append failed after ${appended} of ${total} tracks`, options);
    this.appended = appended;
    this.total = total;
  }
}

export class ConfigError extends MigrationError {}

export function isTransientError(error: unknown): boolean {
  if (error instanceof AuthTransientError) {
    return true;
  }
  if (error instanceof TargetApiError || error instanceof SourceApiError) {
    return error.transient;
  }
  return false;
}

export function retryAfterOf(error: unknown): number | undefined {
  return error instanceof TargetApiError ? error.retryAfterMs : undefined;
}

export function isRunHaltingError(error: unknown): boolean {
  return error instanceof AuthExpiredError || error instanceof AuthorizationRequiredError;
}
