/**
 * Error hierarchy for metaskill.
 *
 * MetaskillError (base)
 * ├── ConfigError
 * ├── DocumentError
 * │   ├── DocumentParseError
 * │   └── DocumentValidationError
 * ├── McpConfigError
 * └── UnknownCommandError
 */

export class MetaskillError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MetaskillError";
  }
}

export class ConfigError extends MetaskillError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ── Documents ────────────────────────────────────

export class DocumentError extends MetaskillError {
  constructor(message: string) {
    super(message);
    this.name = "DocumentError";
  }
}

export class DocumentParseError extends DocumentError {
  constructor(message: string) {
    super(message);
    this.name = "DocumentParseError";
  }
}

/** Raised when a rendered or parsed document breaks a naming/schema rule. */
export class DocumentValidationError extends DocumentError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join("; ")}` : message);
    this.name = "DocumentValidationError";
    this.problems = problems;
  }
}

// ── MCP & CLI ───────────────────────────────

export class McpConfigError extends MetaskillError {
  constructor(message: string) {
    super(message);
    this.name = "McpConfigError";
  }
}

export class UnknownCommandError extends MetaskillError {
  constructor(command: string) {
    super(`Unknown command: /${command}`);
    this.name = "UnknownCommandError";
  }
}

// ── Utilities ───────────────────────────────────

/**
 * Extract a loggable string from an unknown caught value.
 *
 * Error objects have non-enumerable `message` and `stack` properties,
 * so `JSON.stringify(err)` returns `"{}"`. pino serializes log fields
 * via JSON before sending them to the transport worker thread, which
 * means `logger.warn({ error: err })` loses all error information.
 *
 * Use this helper everywhere an error is passed to logger fields:
 *   `logger.warn({ error: errorToString(err) }, "something_failed")`
 */
export function errorToString(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
