export class LauncherError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fatal at startup: the process reports it and exits non-zero. */
export class ConfigurationError extends LauncherError {}

/** Scoped to one search; surfaced in the status line. */
export class SearchIOError extends LauncherError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/** A usage-store write failed; the launch simply isn't remembered. */
export class PersistenceError extends LauncherError {}

/** The process or editor could not be spawned. */
export class LaunchError extends LauncherError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error || 'Unknown error');
}
