/**
 * Error handling for Curricula
 * Custom error types with context and recovery information
 */

/**
 * Base error class for Curricula
 */
export class WorkflowError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "WorkflowError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, WorkflowError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Generation backend error for a single attempt
 */
export class ProviderError extends WorkflowError {
  readonly provider: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      provider: string;
      statusCode?: number;
      retryable?: boolean;
      cause?: unknown;
      code?: string;
    },
  ) {
    super(message, {
      code: options.code ?? "PROVIDER_ERROR",
      context: { provider: options.provider, statusCode: options.statusCode },
      recoverable: options.retryable ?? false,
      suggestion: options.retryable
        ? "The request can be retried"
        : "Check your API key and backend configuration",
      cause: options.cause,
    });
    this.name = "ProviderError";
    this.provider = options.provider;
    this.statusCode = options.statusCode;
  }
}

/**
 * A backend answered, but the text could not be turned into the expected artifact.
 * Counts as a failed attempt and is always retryable.
 */
export class MalformedOutputError extends ProviderError {
  readonly rawOutput: string;

  constructor(
    message: string,
    options: {
      provider: string;
      rawOutput: string;
      cause?: unknown;
    },
  ) {
    super(message, {
      provider: options.provider,
      retryable: true,
      cause: options.cause,
      code: "MALFORMED_OUTPUT",
    });
    this.name = "MalformedOutputError";
    this.rawOutput = options.rawOutput;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends WorkflowError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: unknown;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: "Check your .curricula/config.json for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Validation error
 */
export class ValidationError extends WorkflowError {
  readonly field?: string;
  readonly issues: ValidationIssue[];

  constructor(
    message: string,
    options: {
      field?: string;
      issues?: ValidationIssue[];
      cause?: unknown;
    } = {},
  ) {
    super(message, {
      code: "VALIDATION_ERROR",
      context: { field: options.field, issues: options.issues },
      recoverable: false,
      suggestion: "Check the input data format",
      cause: options.cause,
    });
    this.name = "ValidationError";
    this.field = options.field;
    this.issues = options.issues ?? [];
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Timeout error
 */
export class TimeoutError extends WorkflowError {
  readonly timeoutMs: number;
  readonly operation: string;

  constructor(
    message: string,
    options: {
      timeoutMs: number;
      operation: string;
    },
  ) {
    super(message, {
      code: "TIMEOUT_ERROR",
      context: { timeoutMs: options.timeoutMs, operation: options.operation },
      recoverable: true,
      suggestion: "Try increasing workflow.timeout in config or lowering maxTokens",
    });
    this.name = "TimeoutError";
    this.timeoutMs = options.timeoutMs;
    this.operation = options.operation;
  }
}

/**
 * One failed attempt against a backend
 */
export interface AttemptRecord {
  attempt: number;
  backend: string;
  model: string;
  error: string;
  code: string;
  durationMs: number;
}

/**
 * Every attempt of the gateway plan failed
 */
export class ExhaustedRetriesError extends WorkflowError {
  readonly profile: string;
  readonly attempts: AttemptRecord[];
  readonly lastOutput?: string;

  constructor(
    message: string,
    options: {
      profile: string;
      attempts: AttemptRecord[];
      lastOutput?: string;
      cause?: unknown;
      code?: string;
      context?: Record<string, unknown>;
    },
  ) {
    super(message, {
      code: options.code ?? "EXHAUSTED_RETRIES",
      context: {
        profile: options.profile,
        attempts: options.attempts.length,
        ...options.context,
      },
      recoverable: false,
      suggestion:
        "All configured backends failed. Check API keys and backend status, then resume the session.",
      cause: options.cause,
    });
    this.name = "ExhaustedRetriesError";
    this.profile = options.profile;
    this.attempts = options.attempts;
    this.lastOutput = options.lastOutput;
  }
}

/**
 * A specialist role could not produce its artifact
 */
export class GenerationError extends ExhaustedRetriesError {
  readonly role: string;
  readonly taskType: string;

  constructor(
    message: string,
    options: {
      role: string;
      taskType: string;
      exhausted: ExhaustedRetriesError;
    },
  ) {
    super(message, {
      code: "GENERATION_ERROR",
      profile: options.exhausted.profile,
      attempts: options.exhausted.attempts,
      lastOutput: options.exhausted.lastOutput,
      cause: options.exhausted,
      context: { role: options.role, taskType: options.taskType },
    });
    this.name = "GenerationError";
    this.role = options.role;
    this.taskType = options.taskType;
  }
}

/**
 * A phase was entered without the artifacts it consumes
 */
export class DependencyMissingError extends WorkflowError {
  readonly phase: string;
  readonly missing: string[];

  constructor(phase: string, missing: string[]) {
    super(`Phase '${phase}' is missing required inputs: ${missing.join(", ")}`, {
      code: "DEPENDENCY_MISSING",
      context: { phase, missing },
      recoverable: false,
      suggestion: "This indicates an orchestration bug. Please report it with the session log.",
    });
    this.name = "DependencyMissingError";
    this.phase = phase;
    this.missing = missing;
  }
}

/**
 * The quality gate still failed after the last permitted loop-back
 */
export class IterationLimitError extends WorkflowError {
  readonly iterations: number;
  readonly score: number;
  readonly threshold: number;

  constructor(options: { iterations: number; score: number; threshold: number }) {
    super(
      `Quality ${options.score} is below ${options.threshold} after ${options.iterations} iteration(s)`,
      {
        code: "ITERATION_LIMIT",
        context: { ...options },
        recoverable: true,
        suggestion: "Raise workflow.maxIterations or lower workflow.qualityThreshold",
      },
    );
    this.name = "IterationLimitError";
    this.iterations = options.iterations;
    this.score = options.score;
    this.threshold = options.threshold;
  }
}

/**
 * The caller aborted the run
 */
export class CancelledError extends WorkflowError {
  constructor(message = "Workflow run was cancelled", options: { phase?: string } = {}) {
    super(message, {
      code: "CANCELLED",
      context: { phase: options.phase },
      recoverable: true,
      suggestion: "Resume the session to continue from its last checkpoint",
    });
    this.name = "CancelledError";
  }
}

/**
 * Unknown or busy session
 */
export class SessionError extends WorkflowError {
  readonly sessionId: string;

  constructor(message: string, options: { sessionId: string }) {
    super(message, {
      code: "SESSION_ERROR",
      context: { sessionId: options.sessionId },
      recoverable: false,
    });
    this.name = "SessionError";
    this.sessionId = options.sessionId;
  }
}

/**
 * Checkpoint/recovery error
 */
export class RecoveryError extends WorkflowError {
  readonly sessionId?: string;

  constructor(
    message: string,
    options: {
      sessionId?: string;
      cause?: unknown;
    } = {},
  ) {
    super(message, {
      code: "RECOVERY_ERROR",
      context: { sessionId: options.sessionId },
      recoverable: false,
      suggestion: "Start a new session instead",
      cause: options.cause,
    });
    this.name = "RecoveryError";
    this.sessionId = options.sessionId;
  }
}

/**
 * Check if error is a workflow error
 */
export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  PROVIDER_ERROR: "Check your API keys and backend configuration.",
  MALFORMED_OUTPUT: "The backend returned output that is not a valid artifact. Try another model.",
  CONFIG_ERROR: "Check your .curricula/config.json or run 'curricula config' to inspect it.",
  VALIDATION_ERROR: "Check the input data format. See 'curricula --help' for usage.",
  TIMEOUT_ERROR: "Operation timed out. Try increasing the timeout in config.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Run again with CURRICULA_LOG_LEVEL=debug.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof WorkflowError) {
    let message = `[${error.code}] ${error.message}`;
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}
