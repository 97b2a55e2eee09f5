/**
 * Error types that cross module boundaries.
 *
 * Expected domain outcomes (unknown room, wrong password, not a member, bad input,
 * stale buttons) are result values, not exceptions; see types.ts.
 */

export class TodoBotError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Missing or malformed environment/configuration. Fatal at boot. */
export class ConfigurationError extends TodoBotError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("configuration", message, details);
  }
}

/** Persistence layer unreachable, or a constraint it enforces was violated. */
export class StoreError extends TodoBotError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("store", `${operation} failed: ${reason}`, { operation });
    this.operation = operation;
  }
}
