/**
 * Error types for chunkwise.
 *
 * Every error raised across a public boundary extends CLIError so the CLI
 * can render a hint and pick an exit code without knowing the concrete
 * class. Library callers get `instanceof`-checkable classes with the
 * structured fields they need (document path, token counts, ...).
 */

/**
 * Base class for all chunkwise errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks once compiled down
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3.
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration problems: bad TOML, values outside their range,
 * or combinations that cannot work together (overlap >= chunk size).
 *
 * Fatal at startup. Exit code 2.
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: chunkwise config list  to see the effective settings', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails (zod issues flattened to strings).
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Chunking a single document failed for a reason other than a parse error.
 *
 * The factory catches these, records them against the document and carries
 * on with the rest of the run.
 */
export class DocumentProcessingError extends CLIError {
  public readonly documentPath: string;
  public override readonly cause?: unknown;

  constructor(documentPath: string, reason: string, cause?: unknown) {
    super(`Failed to chunk ${documentPath}: ${reason}`, undefined, 1);
    this.name = 'DocumentProcessingError';
    this.documentPath = documentPath;
    this.cause = cause;
  }
}

/**
 * Raised by an embedding sink when a batch exceeds the service's token
 * budget. The batch planner reacts by halving the batch.
 */
export class TokenLimitExceededError extends CLIError {
  /** Token count the service reported or the planner estimated, if known */
  public readonly tokens?: number;
  public readonly limit?: number;

  constructor(message: string, details: { tokens?: number; limit?: number } = {}) {
    super(message, 'Lower max_tokens_per_batch in config.toml', 6);
    this.name = 'TokenLimitExceededError';
    this.tokens = details.tokens;
    this.limit = details.limit;
  }
}

/**
 * A dispatched batch did not settle within `dispatch_timeout_ms`.
 */
export class DispatchTimeoutError extends CLIError {
  constructor(timeoutMs: number) {
    super(
      `Batch dispatch timed out after ${timeoutMs}ms`,
      'Raise dispatch_timeout_ms in the [batching] config',
      1
    );
    this.name = 'DispatchTimeoutError';
  }
}

/**
 * The embedding collaborator cannot be reached at all. Not retried; the
 * run is aborted.
 *
 * Exit code 5.
 */
export class CollaboratorUnavailableError extends CLIError {
  public override readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message, 'Check that the output destination is reachable and writable', 5);
    this.name = 'CollaboratorUnavailableError';
    this.cause = cause;
  }
}

/**
 * Thrown when a run is cancelled through its AbortSignal.
 */
export class CancelledError extends CLIError {
  constructor(stage: string) {
    super(`Cancelled during ${stage}`, undefined, 130);
    this.name = 'CancelledError';
  }
}
