/**
 * ExecutionEngine -- runs a workflow's tasks in CONTAINS order.
 *
 * Each task's tool receives the full accumulated context and returns the keys
 * it adds or overwrites; the next context is a new frozen object with those
 * keys merged in (last write wins). The first failure stops the run and is
 * returned, not thrown, together with the context as it stood at that point.
 */

import { randomUUID } from "node:crypto";
import {
  AmbiguousOrderError,
  EmptyWorkflowError,
  NotFoundError,
  ToolExecutionError,
  ToolTimeoutError,
  ToolUnresolvedError,
  WorkflowGraphError,
  WorkflowNotFoundError,
  wrapError,
} from "../errors.js";
import type { OrderedTask, ToolEntity } from "../graph/types.js";
import { getLogger } from "../util/logger.js";
import type { ExecutionContext, Invocable, ToolResolver } from "./registry.js";
import type {
  ExecutionGraph,
  ExecutionOptions,
  ExecutionResult,
  ExecutionState,
  FailedExecution,
  FailedTask,
  TaskRun,
} from "./types.js";

const log = getLogger("execution-engine");

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

async function callWithTimeout(
  tool: Invocable,
  context: ExecutionContext,
  timeoutMs: number | undefined,
): Promise<unknown> {
  // Run through a promise so synchronous throws are caught like rejections.
  const call = Promise.resolve().then(() => tool.call(context));
  if (timeoutMs === undefined) return call;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ToolTimeoutError(tool.name, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Sort by order and reject ties; the store should never return one. */
function checkOrder(workflowName: string, tasks: OrderedTask[]): OrderedTask[] {
  const sorted = [...tasks].sort((a, b) => a.order - b.order);
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].order === sorted[i - 1].order) {
      const order = sorted[i].order;
      const names = sorted.filter((t) => t.order === order).map((t) => t.task.name);
      throw new AmbiguousOrderError(workflowName, order, names);
    }
  }
  return sorted;
}

export class ExecutionEngine {
  private emptyWorkflowPolicy: "reject" | "succeed";

  constructor(
    private graph: ExecutionGraph,
    private tools: ToolResolver,
    private options: ExecutionOptions = {},
  ) {
    this.emptyWorkflowPolicy = options.emptyWorkflowPolicy ?? "reject";
  }

  async execute(
    workflowName: string,
    initialContext: Record<string, unknown> = {},
  ): Promise<ExecutionResult> {
    const executionId = randomUUID();
    const startedAt = Date.now();
    const steps: TaskRun[] = [];
    let context: ExecutionContext = Object.freeze({ ...initialContext });

    const fail = (error: WorkflowGraphError, failedTask?: FailedTask): FailedExecution => {
      this.transition(executionId, { phase: "failed", error });
      log.warn(
        { executionId, workflow: workflowName, code: error.code, task: failedTask?.name, err: error },
        "workflow execution failed",
      );
      return {
        status: "failed",
        executionId,
        workflowName,
        failedTask,
        partialContext: context,
        error,
        steps,
        durationMs: Date.now() - startedAt,
      };
    };

    // Resolving
    this.transition(executionId, { phase: "resolving" });
    let tasks: OrderedTask[];
    try {
      tasks = checkOrder(workflowName, this.graph.getOrderedTasks(workflowName));
    } catch (e) {
      if (e instanceof NotFoundError && e.kind === "Workflow" && !(e instanceof WorkflowNotFoundError)) {
        return fail(new WorkflowNotFoundError(workflowName));
      }
      return fail(wrapError(e));
    }

    if (tasks.length === 0 && this.emptyWorkflowPolicy === "reject") {
      return fail(new EmptyWorkflowError(workflowName));
    }

    log.info({ executionId, workflow: workflowName, tasks: tasks.length }, "workflow execution started");

    // Running
    for (let index = 0; index < tasks.length; index++) {
      const { task, order } = tasks[index];
      this.transition(executionId, { phase: "running", taskIndex: index, taskName: task.name });

      let tool: ToolEntity;
      try {
        tool = this.graph.getToolForTask(task.name);
      } catch (e) {
        if (e instanceof NotFoundError) {
          return fail(
            new ToolUnresolvedError(task.name, task.toolName || undefined, e.message),
            { index, name: task.name, toolName: task.toolName || undefined },
          );
        }
        return fail(wrapError(e), { index, name: task.name });
      }

      const invocable = this.tools.resolve(tool.callable);
      if (!invocable) {
        return fail(
          new ToolUnresolvedError(task.name, tool.name, `no registered implementation for "${tool.callable}"`),
          { index, name: task.name, toolName: tool.name },
        );
      }

      const stepStart = Date.now();
      let output: unknown;
      try {
        output = await callWithTimeout(invocable, context, this.options.toolTimeoutMs);
        if (!isPlainObject(output)) {
          throw new TypeError(`tool returned ${output === null ? "null" : typeof output} instead of an object`);
        }
      } catch (e) {
        steps.push({
          index,
          taskName: task.name,
          toolName: tool.name,
          order,
          status: "failed",
          durationMs: Date.now() - stepStart,
          outputKeys: [],
        });
        return fail(new ToolExecutionError(task.name, tool.name, e), {
          index,
          name: task.name,
          toolName: tool.name,
        });
      }

      context = Object.freeze({ ...context, ...output });
      steps.push({
        index,
        taskName: task.name,
        toolName: tool.name,
        order,
        status: "completed",
        durationMs: Date.now() - stepStart,
        outputKeys: Object.keys(output),
      });
      log.debug({ executionId, task: task.name, tool: tool.name, index }, "task completed");
    }

    this.transition(executionId, { phase: "completed" });
    const durationMs = Date.now() - startedAt;
    log.info({ executionId, workflow: workflowName, durationMs }, "workflow execution completed");
    return {
      status: "completed",
      executionId,
      workflowName,
      context,
      steps,
      durationMs,
    };
  }

  private transition(executionId: string, state: ExecutionState): void {
    this.options.onTransition?.(executionId, state);
  }
}
