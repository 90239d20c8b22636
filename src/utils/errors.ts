/**
 * Error taxonomy
 *
 * ConfigurationError aborts before anything is fetched. RetrievalError and
 * PersistenceError on an item file are recovered by the runner (item skipped,
 * batch continues). A PersistenceError on the run log is fatal.
 */

export type RetrievalFailureReason = "timeout" | "network" | "http-status";

export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
  }
}

export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly source?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class RetrievalError extends AppError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly reason: RetrievalFailureReason,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RetrievalError";
  }
}

export class PersistenceError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}
