/**
 * Error taxonomy for the workflow graph.
 *
 * Every error carries a stable `code` so callers can branch without
 * `instanceof` checks across package boundaries.
 */

export class WorkflowGraphError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
    },
  ) {
    super(message);
    this.name = "WorkflowGraphError";
    this.code = code;
    this.context = options?.context;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** A referenced workflow, task or tool does not exist. */
export class NotFoundError extends WorkflowGraphError {
  public readonly kind: string;
  public readonly key: string;

  constructor(kind: string, key: string, message?: string, code = "NOT_FOUND") {
    super(message ?? `${kind} not found: ${key}`, code, { context: { kind, key } });
    this.name = "NotFoundError";
    this.kind = kind;
    this.key = key;
  }
}

export class WorkflowNotFoundError extends NotFoundError {
  constructor(workflowName: string) {
    super("Workflow", workflowName, `Workflow not found: ${workflowName}`, "WORKFLOW_NOT_FOUND");
    this.name = "WorkflowNotFoundError";
  }
}

/** A write would break a uniqueness invariant (name, order, single USES). */
export class ConstraintViolationError extends WorkflowGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONSTRAINT_VIOLATION", { context });
    this.name = "ConstraintViolationError";
  }
}

export class ValidationError extends WorkflowGraphError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, "VALIDATION_ERROR", { context: field ? { field } : undefined });
    this.name = "ValidationError";
    this.field = field;
  }
}

export class ConfigError extends WorkflowGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context });
    this.name = "ConfigError";
  }
}

export class EmbeddingServiceError extends WorkflowGraphError {
  public readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, "EMBEDDING_SERVICE_ERROR", {
      cause: options?.cause,
      context: options?.statusCode !== undefined ? { statusCode: options.statusCode } : undefined,
    });
    this.name = "EmbeddingServiceError";
    this.statusCode = options?.statusCode;
  }
}

export class EmptyWorkflowError extends WorkflowGraphError {
  constructor(workflowName: string) {
    super(`Workflow has no tasks: ${workflowName}`, "EMPTY_WORKFLOW", {
      context: { workflow: workflowName },
    });
    this.name = "EmptyWorkflowError";
  }
}

/** Two CONTAINS edges of one workflow share an order value. */
export class AmbiguousOrderError extends WorkflowGraphError {
  public readonly order: number;

  constructor(workflowName: string, order: number, taskNames: string[]) {
    super(
      `Workflow ${workflowName} has more than one task at order ${order}: ${taskNames.join(", ")}`,
      "AMBIGUOUS_ORDER",
      { context: { workflow: workflowName, order, tasks: taskNames } },
    );
    this.name = "AmbiguousOrderError";
    this.order = order;
  }
}

export class ToolUnresolvedError extends WorkflowGraphError {
  public readonly taskName: string;
  public readonly toolName?: string;

  constructor(taskName: string, toolName?: string, reason?: string) {
    super(
      toolName
        ? `Tool ${toolName} for task ${taskName} could not be resolved${reason ? `: ${reason}` : ""}`
        : `Task ${taskName} has no tool${reason ? `: ${reason}` : ""}`,
      "TOOL_UNRESOLVED",
      { context: { task: taskName, tool: toolName } },
    );
    this.name = "ToolUnresolvedError";
    this.taskName = taskName;
    this.toolName = toolName;
  }
}

/** Wraps the error a tool raised (or a timeout) while running a task. */
export class ToolExecutionError extends WorkflowGraphError {
  public readonly taskName: string;
  public readonly toolName: string;

  constructor(taskName: string, toolName: string, cause: unknown) {
    super(
      `Error executing task ${taskName} (tool ${toolName}): ${describeError(cause)}`,
      "TOOL_EXECUTION_ERROR",
      { cause, context: { task: taskName, tool: toolName } },
    );
    this.name = "ToolExecutionError";
    this.taskName = taskName;
    this.toolName = toolName;
  }
}

export class ToolTimeoutError extends WorkflowGraphError {
  public readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super(`Tool ${toolName} did not finish within ${timeoutMs}ms`, "TOOL_TIMEOUT", {
      context: { tool: toolName, timeoutMs },
    });
    this.name = "ToolTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function isWorkflowGraphError(error: unknown): error is WorkflowGraphError {
  return error instanceof WorkflowGraphError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : String(error);
}

/** Wrap an unknown error into a WorkflowGraphError. */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): WorkflowGraphError {
  if (isWorkflowGraphError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new WorkflowGraphError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new WorkflowGraphError(
    typeof error === "string" ? error : defaultMessage,
    "UNKNOWN_ERROR",
  );
}
