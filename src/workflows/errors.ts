/** Failure of a workflow invocation, carrying the HTTP-style status the caller sees. */
export class WorkflowError extends Error {
  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WorkflowError";
  }
}

/** Missing or invalid input, environment or repository target. Never retried. */
export class ConfigurationError extends WorkflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 400, options);
    this.name = "ConfigurationError";
  }
}

export class ExecutionError extends WorkflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, options);
    this.name = "ExecutionError";
  }
}

/** A collaborator write answered with an embedded failure indicator. */
export class WriteConfirmationError extends ExecutionError {
  constructor(
    readonly action: string,
    readonly summary: string,
  ) {
    super(`${action} failed: ${summary}`);
    this.name = "WriteConfirmationError";
  }
}

export class ModelInvocationError extends ExecutionError {
  constructor(
    readonly model: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ModelInvocationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
