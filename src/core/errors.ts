/**
 * Error definitions for Pipewright
 * Provides the structured error hierarchy for all orchestrator operations
 */

/** Base error class for all Pipewright errors */
export class PipewrightError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'PipewrightError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipewrightError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** A retrieval tier produced nothing usable; the selector falls through to the next tier */
export class RetrievalMissError extends PipewrightError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'RETRIEVAL_MISS', context, options)
    this.name = 'RetrievalMissError'
  }
}

/** The generative model failed to produce a usable artifact */
export class GenerationFailureError extends PipewrightError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'GENERATION_FAILURE', context, options)
    this.name = 'GenerationFailureError'
  }
}

/** A pipeline or image-build definition is structurally malformed */
export class ValidationFailureError extends PipewrightError {
  public readonly issues: string[]

  constructor(message: string, issues: string[] = [], context: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_FAILURE', { issues, ...context })
    this.name = 'ValidationFailureError'
    this.issues = issues
  }
}

/** Writing the artifact to version control failed - fatal to the workflow */
export class CommitFailureError extends PipewrightError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'COMMIT_FAILURE', context, options)
    this.name = 'CommitFailureError'
  }
}

/** A single status poll failed; the next scheduled poll retries */
export class PollingTransientError extends PipewrightError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'POLLING_TRANSIENT', context, options)
    this.name = 'PollingTransientError'
  }
}

/** The triggered execution finished in FAILED state */
export class ExecutionFailedError extends PipewrightError {
  constructor(executionId: string | null, context: Record<string, unknown> = {}) {
    super(`Execution ${executionId ?? '(unresolved)'} failed`, 'EXECUTION_FAILED', {
      executionId,
      ...context,
    })
    this.name = 'ExecutionFailedError'
  }
}

/** The self-healing retry budget has been spent */
export class MaxAttemptsExhaustedError extends PipewrightError {
  constructor(maxAttempts: number, context: Record<string, unknown> = {}) {
    super(
      `Pipeline still failing after ${String(maxAttempts)} fix attempts`,
      'MAX_ATTEMPTS_EXHAUSTED',
      { maxAttempts, ...context }
    )
    this.name = 'MaxAttemptsExhaustedError'
  }
}

/** The monitor's wall-clock budget ran out before a terminal state */
export class MonitorTimeoutError extends PipewrightError {
  constructor(polls: number, context: Record<string, unknown> = {}) {
    super(`Execution did not finish within ${String(polls)} polls`, 'MONITOR_TIMEOUT', {
      polls,
      ...context,
    })
    this.name = 'MonitorTimeoutError'
  }
}

/** The workflow was cancelled between polls */
export class WorkflowAbortedError extends PipewrightError {
  constructor(message = 'Workflow aborted', context: Record<string, unknown> = {}) {
    super(message, 'WORKFLOW_ABORTED', context)
    this.name = 'WorkflowAbortedError'
  }
}

/** A repository or resource could not be reached */
export class NotFoundError extends PipewrightError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'NOT_FOUND', context, options)
    this.name = 'NotFoundError'
  }
}

/** The generative model endpoint is unreachable or returned an error */
export class ModelUnavailableError extends PipewrightError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'MODEL_UNAVAILABLE', context, options)
    this.name = 'ModelUnavailableError'
  }
}

/** The generative model did not answer within its timeout */
export class ModelTimeoutError extends PipewrightError {
  constructor(timeoutMs: number, context: Record<string, unknown> = {}) {
    super(`Model call timed out after ${String(timeoutMs)}ms`, 'MODEL_TIMEOUT', {
      timeoutMs,
      ...context,
    })
    this.name = 'ModelTimeoutError'
  }
}

/** Error thrown by a template store backend */
export class StoreError extends PipewrightError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'STORE_ERROR', context, options)
    this.name = 'StoreError'
  }
}

/** Error thrown by the version-control client */
export class VcsError extends PipewrightError {
  public readonly status: number | undefined

  constructor(message: string, status?: number, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'VCS_ERROR', { status, ...context }, options)
    this.name = 'VcsError'
    this.status = status
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends PipewrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Render any thrown value as a message string */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
