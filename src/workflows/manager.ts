/**
 * WorkflowManager -- public API over the graph store, indexer, retrieval and
 * execution engines.
 *
 * Create paths validate and check references first, embed second, and then
 * write the node, its relationships and its index entries in one transaction,
 * so a failure at any step leaves nothing behind. Writes to one name are
 * serialized through a KeyedLock.
 */

import type { Embedder } from "../embedding/client.js";
import {
  ConstraintViolationError,
  NotFoundError,
  ValidationError,
} from "../errors.js";
import { ExecutionEngine } from "../execution/engine.js";
import type { ToolResolver } from "../execution/registry.js";
import type { ExecutionOptions, ExecutionResult } from "../execution/types.js";
import { KeyedLock } from "../graph/lock.js";
import type {
  EntityByLabel,
  GraphStore,
  NodeLabel,
  TaskEntity,
  ToolEntity,
  WorkflowEntity,
} from "../graph/types.js";
import { Indexer, indexText, type IndexerOptions } from "../indexer/indexer.js";
import { RetrievalEngine, type RetrievalOptions } from "../retrieval/engine.js";
import { getLogger } from "../util/logger.js";
import type {
  CreateTaskInput,
  CreateToolInput,
  CreateWorkflowInput,
  SearchDetailsByLabel,
  SearchResult,
  TaskDetails,
  WorkflowDetails,
  WorkflowStep,
} from "./types.js";

const log = getLogger("workflow-manager");

export interface WorkflowManagerOptions {
  store: GraphStore;
  embedder: Embedder;
  tools: ToolResolver;
  indexing?: Partial<IndexerOptions>;
  retrieval?: Partial<RetrievalOptions>;
  execution?: ExecutionOptions;
  /** Used by search() when no topK is given. Default 5 */
  defaultTopK?: number;
}

function requireName(name: string, field: string): void {
  if (typeof name !== "string" || name.trim().length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`, field);
  }
}

export class WorkflowManager {
  private store: GraphStore;
  private indexer: Indexer;
  private retrieval: RetrievalEngine;
  private engine: ExecutionEngine;
  private locks = new KeyedLock();
  private defaultTopK: number;
  private closed = false;

  private readonly searchDetails: { [L in NodeLabel]: (name: string) => SearchDetailsByLabel[L] } = {
    Workflow: (name) => ({ tasks: this.workflowSteps(name) }),
    Task: (name) => ({
      toolName: this.resolveTool(name)?.name ?? null,
      workflows: this.store.getWorkflowsContaining(name),
    }),
    Tool: (name) => ({ usedByTasks: this.store.getTasksUsing(name) }),
  };

  constructor(options: WorkflowManagerOptions) {
    this.store = options.store;
    this.indexer = new Indexer(options.store, options.embedder, {
      skipIndexOnEmbeddingFailure: options.indexing?.skipIndexOnEmbeddingFailure ?? false,
    });
    this.retrieval = new RetrievalEngine(options.store, options.embedder, options.retrieval);
    this.engine = new ExecutionEngine(options.store, options.tools, options.execution);
    this.defaultTopK = options.defaultTopK ?? 5;
  }

  // ---------------------------------------------------------------------------
  // Tools
  // ---------------------------------------------------------------------------

  /** Create a tool, or update the description of an existing one. */
  async createTool(input: CreateToolInput): Promise<ToolEntity> {
    requireName(input.name, "name");
    const callable = input.callable ?? input.name;

    return this.locks.run(`Tool:${input.name}`, async () => {
      const existing = this.store.getEntity("Tool", input.name);
      if (existing && existing.callable !== callable) {
        throw new ConstraintViolationError(
          `Tool ${input.name} is bound to "${existing.callable}"; the callable reference cannot change`,
          { tool: input.name, callable: existing.callable, requested: callable },
        );
      }

      const entry = await this.indexer.prepare("Tool", input.name, indexText(input.name, input.description));
      this.store.transaction(() => {
        this.store.upsertNode("Tool", input.name, { description: input.description, callable });
        this.indexer.apply(entry);
      });

      log.info({ name: input.name, updated: existing !== undefined }, existing ? "tool updated" : "tool created");
      return this.requireEntity("Tool", input.name);
    });
  }

  getTool(name: string): ToolEntity | undefined {
    return this.store.getEntity("Tool", name);
  }

  listTools(): ToolEntity[] {
    return this.store.listEntities("Tool");
  }

  /** Delete a tool. Tasks that used it stay, and fail as unresolved if run. */
  async deleteTool(name: string): Promise<boolean> {
    return this.locks.run(`Tool:${name}`, async () => {
      const orphaned = this.store.getTasksUsing(name);
      const deleted = this.store.deleteNode("Tool", name);
      if (deleted && orphaned.length > 0) {
        log.warn({ tool: name, tasks: orphaned }, "deleted tool was still used by tasks");
      }
      return deleted;
    });
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  /** Create a task bound to an existing tool, or update an existing task in place. */
  async createTask(input: CreateTaskInput): Promise<TaskEntity> {
    requireName(input.name, "name");
    requireName(input.toolName, "toolName");

    return this.locks.run(`Task:${input.name}`, async () => {
      if (!this.store.getNode("Tool", input.toolName)) {
        throw new NotFoundError("Tool", input.toolName);
      }
      const existed = this.store.getNode("Task", input.name) !== undefined;

      const entry = await this.indexer.prepare("Task", input.name, indexText(input.name, input.description));
      this.store.transaction(() => {
        this.store.upsertNode("Task", input.name, {
          description: input.description,
          toolName: input.toolName,
        });
        this.store.upsertRelationship(input.name, input.toolName, "USES");
        this.indexer.apply(entry);
      });

      log.info({ name: input.name, tool: input.toolName }, existed ? "task updated" : "task created");
      return this.requireEntity("Task", input.name);
    });
  }

  getTask(name: string): TaskDetails | undefined {
    const task = this.store.getEntity("Task", name);
    if (!task) return undefined;

    return { task, tool: this.resolveTool(name), workflows: this.store.getWorkflowsContaining(name) };
  }

  listTasks(): TaskEntity[] {
    return this.store.listEntities("Task");
  }

  /** Delete a task that no workflow contains. */
  async deleteTask(name: string): Promise<boolean> {
    return this.locks.run(`Task:${name}`, async () => {
      const containing = this.store.getWorkflowsContaining(name);
      if (containing.length > 0) {
        throw new ConstraintViolationError(
          `Task ${name} is still used by workflow(s): ${[...new Set(containing.map((c) => c.workflow))].join(", ")}`,
          { task: name, workflows: containing.map((c) => c.workflow) },
        );
      }
      return this.store.deleteNode("Task", name);
    });
  }

  // ---------------------------------------------------------------------------
  // Workflows
  // ---------------------------------------------------------------------------

  /**
   * Create a workflow from existing tasks, or replace the description and
   * task list of an existing one. Orders must be unique integers.
   */
  async createWorkflow(input: CreateWorkflowInput): Promise<WorkflowEntity> {
    requireName(input.name, "name");

    const seen = new Map<number, string>();
    for (const ref of input.tasks) {
      requireName(ref.name, "tasks[].name");
      if (!Number.isInteger(ref.order)) {
        throw new ValidationError(`Order of task ${ref.name} must be an integer, got ${ref.order}`, "tasks[].order");
      }
      const taken = seen.get(ref.order);
      if (taken !== undefined) {
        throw new ConstraintViolationError(
          `Workflow ${input.name} gives order ${ref.order} to both ${taken} and ${ref.name}`,
          { workflow: input.name, order: ref.order, tasks: [taken, ref.name] },
        );
      }
      seen.set(ref.order, ref.name);
    }

    return this.locks.run(`Workflow:${input.name}`, async () => {
      for (const ref of input.tasks) {
        if (!this.store.getNode("Task", ref.name)) {
          throw new NotFoundError("Task", ref.name);
        }
      }
      const existed = this.store.getNode("Workflow", input.name) !== undefined;

      const entry = await this.indexer.prepare(
        "Workflow",
        input.name,
        indexText(input.name, input.description),
      );
      this.store.transaction(() => {
        this.store.upsertNode("Workflow", input.name, { description: input.description });
        this.store.removeRelationships(input.name, "CONTAINS");
        for (const ref of input.tasks) {
          this.store.upsertRelationship(input.name, ref.name, "CONTAINS", { order: ref.order });
        }
        this.indexer.apply(entry);
      });

      log.info(
        { name: input.name, tasks: input.tasks.length },
        existed ? "workflow updated" : "workflow created",
      );
      return this.requireEntity("Workflow", input.name);
    });
  }

  /** Insert a task at `order`; an occupied slot and everything after it move up by one. */
  async addTaskToWorkflow(workflowName: string, taskName: string, order: number): Promise<void> {
    await this.locks.run(`Workflow:${workflowName}`, async () => {
      this.store.insertContainsAt(workflowName, taskName, order);
      log.info({ workflow: workflowName, task: taskName, order }, "task added to workflow");
    });
  }

  /** Remove every occurrence of a task from a workflow. */
  async removeTaskFromWorkflow(workflowName: string, taskName: string): Promise<boolean> {
    return this.locks.run(`Workflow:${workflowName}`, async () => {
      const removed = this.store.removeRelationships(workflowName, "CONTAINS", taskName);
      if (removed > 0) {
        log.info({ workflow: workflowName, task: taskName }, "task removed from workflow");
      }
      return removed > 0;
    });
  }

  getWorkflow(name: string): WorkflowDetails | undefined {
    const workflow = this.store.getEntity("Workflow", name);
    if (!workflow) return undefined;

    return { workflow, tasks: this.workflowSteps(name) };
  }

  listWorkflows(): WorkflowEntity[] {
    return this.store.listEntities("Workflow");
  }

  async deleteWorkflow(name: string): Promise<boolean> {
    return this.locks.run(`Workflow:${name}`, async () => this.store.deleteNode("Workflow", name));
  }

  // ---------------------------------------------------------------------------
  // Execution, search, indexing
  // ---------------------------------------------------------------------------

  executeWorkflow(name: string, context: Record<string, unknown> = {}): Promise<ExecutionResult> {
    return this.engine.execute(name, context);
  }

  /** Hybrid search over one kind of entity. Each hit carries its relations under `details`. */
  async search<L extends NodeLabel>(
    kind: L,
    query: string,
    topK: number = this.defaultTopK,
  ): Promise<Array<SearchResult<L>>> {
    const hits = await this.retrieval.search(kind, query, topK);
    const results: Array<SearchResult<L>> = [];
    for (const hit of hits) {
      // Deleted since retrieval read it.
      if (!this.store.getNode(kind, hit.entity.name)) continue;
      results.push({ ...hit, details: this.searchDetails[kind](hit.entity.name) });
    }
    return results;
  }

  /** Recompute an entity's embedding and full-text entry from its stored text. */
  async reindex(kind: NodeLabel, name: string): Promise<number[] | null> {
    return this.locks.run(`${kind}:${name}`, async () => {
      const entity = this.requireEntity(kind, name);
      return this.indexer.index(kind, name, indexText(entity.name, entity.description));
    });
  }

  /** Release the store. Safe to call more than once. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.store.close();
    log.info("workflow manager closed");
  }

  private workflowSteps(name: string): WorkflowStep[] {
    return this.store.getOrderedTasks(name).map(({ order, task }) => ({
      order,
      name: task.name,
      description: task.description,
      toolName: task.toolName,
    }));
  }

  private resolveTool(taskName: string): ToolEntity | null {
    try {
      return this.store.getToolForTask(taskName);
    } catch (e) {
      if (e instanceof NotFoundError) return null;
      throw e;
    }
  }

  private requireEntity<L extends NodeLabel>(kind: L, name: string): EntityByLabel[L] {
    const entity = this.store.getEntity(kind, name);
    if (!entity) throw new NotFoundError(kind, name);
    return entity;
  }
}
