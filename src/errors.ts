/**
 * Fatal conditions of a sync run. Each carries the process exit code the
 * CLI reports for it; anything that is not a SyncError exits with 1.
 */
export class SyncError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Missing vault/item settings and no terminal to ask for them. */
export class ConfigError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, options);
  }
}

/** Credentials or one-time code rejected, or sign-in never completed. */
export class AuthError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 3, options);
  }
}

/** Signed in, but no child identities or no CSRF cookie could be found. */
export class SessionError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 4, options);
  }
}

/** A weekly-activity call kept failing after every retry. */
export class FetchError extends SyncError {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, 5, options);
    this.status = status;
  }
}

/** The canonical file exists but cannot be read back as a store. */
export class StoreError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 6, options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
