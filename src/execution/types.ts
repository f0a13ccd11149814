import type { EmptyWorkflowPolicy } from "../config.js";
import type { WorkflowGraphError } from "../errors.js";
import type { GraphStore } from "../graph/types.js";
import type { ExecutionContext } from "./registry.js";

/** The part of the graph the engine reads. */
export type ExecutionGraph = Pick<GraphStore, "getOrderedTasks" | "getToolForTask">;

/** Execution state machine: resolving -> running(i) -> completed | failed */
export type ExecutionState =
  | { phase: "resolving" }
  | { phase: "running"; taskIndex: number; taskName: string }
  | { phase: "completed" }
  | { phase: "failed"; error: WorkflowGraphError };

export interface ExecutionOptions {
  /** What a workflow with zero tasks does. Default: "reject" */
  emptyWorkflowPolicy?: EmptyWorkflowPolicy;
  /** Per-tool timeout in ms. Unset means no timeout. */
  toolTimeoutMs?: number;
  /** Called on every state transition of every run */
  onTransition?: (executionId: string, state: ExecutionState) => void;
}

/** Record of one task that ran (or failed) */
export interface TaskRun {
  index: number;
  taskName: string;
  toolName: string;
  order: number;
  status: "completed" | "failed";
  durationMs: number;
  /** Keys the tool returned; empty when it failed */
  outputKeys: string[];
}

export interface FailedTask {
  index: number;
  name: string;
  /** Absent when the tool could not be resolved at all */
  toolName?: string;
}

interface ExecutionBase {
  executionId: string;
  workflowName: string;
  steps: TaskRun[];
  durationMs: number;
}

export interface CompletedExecution extends ExecutionBase {
  status: "completed";
  context: ExecutionContext;
}

export interface FailedExecution extends ExecutionBase {
  status: "failed";
  /** Absent when the run failed before any task (not found, empty, ambiguous order) */
  failedTask?: FailedTask;
  /** Context as it stood when the run stopped */
  partialContext: ExecutionContext;
  error: WorkflowGraphError;
}

export type ExecutionResult = CompletedExecution | FailedExecution;
