/**
 * Domain error model — base and concrete error types.
 * Framework-independent. No business logic.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a caller breaks a precondition (e.g. empty username). */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when the cache file cannot be written or removed. In-memory state is kept. */
export class CacheWriteError extends DomainError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write scrobble cache ${path}: ${reason}`, { path }, { cause });
    this.path = path;
  }
}
