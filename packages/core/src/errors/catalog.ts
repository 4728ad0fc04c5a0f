/**
 * Typed error catalog for the seeding engine.
 *
 * Only `ConfigError` (and `SchedulerStateError` on misuse) escapes
 * `TaskScheduler.execute`. Everything else is recovered and counted where it
 * occurs: item errors inside the batch, batch panics at the worker pool
 * boundary, directory errors at the identity layer.
 */

export class EngineError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Recovered inside a batch

export class ItemError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ITEM_FAILED", message, details);
  }
}

export class BatchPanicError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("BATCH_PANIC", message, details);
  }
}

// Directory / identity

export class CacheUnavailableError extends EngineError {
  constructor(details?: Record<string, unknown>) {
    super("CACHE_UNAVAILABLE", "No fresh directory data for group", details);
  }
}

export class DirectoryUnavailableError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("DIRECTORY_UNAVAILABLE", message, details);
  }
}

// Surfaced to the caller

export class ConfigError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIG_INVALID", message, details);
  }
}

export class SchedulerStateError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_STATE", message, details);
  }
}

export class PlanError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PLAN_INVALID", message, details);
  }
}

/** Best-effort message extraction for values caught from `catch`. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Node errno code (`EEXIST`, `ENOENT`, ...) if the value carries one. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
