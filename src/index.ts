import { loadConfig, parseDuration, type WorkflowGraphConfig } from "./config.js";
import { OpenAIEmbedder, type Embedder } from "./embedding/client.js";
import type { ExecutionOptions } from "./execution/types.js";
import type { ToolResolver } from "./execution/registry.js";
import { SqliteGraphStore } from "./graph/store.js";
import { initLogger, getLogger } from "./util/logger.js";
import { WorkflowManager } from "./workflows/manager.js";

export interface CreateWorkflowManagerOptions {
  /** Resolves tool callables to implementations */
  tools: ToolResolver;
  /** Defaults to loadConfig() */
  config?: WorkflowGraphConfig;
  /** Defaults to an OpenAIEmbedder over config.embedding */
  embedder?: Embedder;
  /** Observes execution state transitions */
  onTransition?: ExecutionOptions["onTransition"];
}

/** Wire a WorkflowManager from config: SQLite store, embedding client, engines. */
export function createWorkflowManager(options: CreateWorkflowManagerOptions): WorkflowManager {
  const config = options.config ?? loadConfig();
  initLogger(config.log.level);

  const store = new SqliteGraphStore({
    path: config.database.path,
    dimensions: config.embedding.dimensions,
  });

  const manager = new WorkflowManager({
    store,
    embedder: options.embedder ?? new OpenAIEmbedder(config.embedding),
    tools: options.tools,
    indexing: config.indexing,
    retrieval: {
      weights: {
        vector: config.retrieval.vectorWeight,
        fulltext: config.retrieval.fulltextWeight,
      },
      degradeOnError: config.retrieval.degradeOnError,
    },
    execution: {
      emptyWorkflowPolicy: config.execution.emptyWorkflowPolicy,
      toolTimeoutMs: config.execution.toolTimeout
        ? parseDuration(config.execution.toolTimeout)
        : undefined,
      onTransition: options.onTransition,
    },
    defaultTopK: config.retrieval.defaultTopK,
  });

  getLogger("workflow-graph").info({ database: config.database.path }, "workflow manager ready");
  return manager;
}

export { WorkflowManager, type WorkflowManagerOptions } from "./workflows/manager.js";
export * from "./workflows/types.js";
export {
  loadConfig,
  resolveConfig,
  parseDuration,
  getConfigDir,
  getConfigPath,
  DEFAULTS,
  type WorkflowGraphConfig,
  type EmptyWorkflowPolicy,
} from "./config.js";
export { SqliteGraphStore, toFulltextQuery, type SqliteGraphStoreOptions } from "./graph/store.js";
export { KeyedLock } from "./graph/lock.js";
export * from "./graph/types.js";
export { OpenAIEmbedder, type Embedder } from "./embedding/client.js";
export { Indexer, indexText, type IndexEntry, type IndexerOptions } from "./indexer/indexer.js";
export {
  RetrievalEngine,
  mergeCandidates,
  DEFAULT_WEIGHTS,
  type RetrievalOptions,
  type SearchHit,
  type SearchWeights,
  type RankedKey,
} from "./retrieval/engine.js";
export { ExecutionEngine } from "./execution/engine.js";
export {
  ToolRegistry,
  defineTool,
  type ExecutionContext,
  type Invocable,
  type ToolOutput,
  type ToolResolver,
} from "./execution/registry.js";
export * from "./execution/types.js";
export * from "./errors.js";
export { initLogger, getLogger } from "./util/logger.js";
