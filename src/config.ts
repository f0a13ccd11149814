import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { ConfigError } from "./errors.js";

export interface DatabaseConfig {
  /** SQLite file path, or ":memory:" */
  path: string;
}

export interface EmbeddingConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  /** Vector length the model produces; fixes the size of the vector indexes. */
  dimensions: number;
}

export interface IndexingConfig {
  /** Commit entities without an embedding when the embedding service fails. */
  skipIndexOnEmbeddingFailure: boolean;
}

export interface RetrievalConfig {
  vectorWeight: number;
  fulltextWeight: number;
  /** Treat a failing signal as empty instead of failing the search. */
  degradeOnError: boolean;
  defaultTopK: number;
}

export type EmptyWorkflowPolicy = "reject" | "succeed";

export interface ExecutionConfig {
  emptyWorkflowPolicy: EmptyWorkflowPolicy;
  /** Per-tool timeout like "30s"; unset means tools may run indefinitely. */
  toolTimeout?: string;
}

export interface LogConfig {
  level: string;
}

export interface WorkflowGraphConfig {
  database: DatabaseConfig;
  embedding: EmbeddingConfig;
  indexing: IndexingConfig;
  retrieval: RetrievalConfig;
  execution: ExecutionConfig;
  log: LogConfig;
}

const CONFIG_DIR = join(homedir(), ".workflow-graph");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export const DEFAULTS: WorkflowGraphConfig = {
  database: {
    path: join(CONFIG_DIR, "graph.db"),
  },
  embedding: {
    baseUrl: "http://localhost:11434/v1",
    apiKey: "ollama",
    model: "nomic-embed-text:v1.5",
    dimensions: 768,
  },
  indexing: {
    skipIndexOnEmbeddingFailure: false,
  },
  retrieval: {
    vectorWeight: 0.5,
    fulltextWeight: 0.5,
    degradeOnError: false,
    defaultTopK: 5,
  },
  execution: {
    emptyWorkflowPolicy: "reject",
  },
  log: {
    level: "info",
  },
};

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEmptyWorkflowPolicy(value: string): value is EmptyWorkflowPolicy {
  return value === "reject" || value === "succeed";
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`Config section '${name}' must be an object`, { field: name });
  }
  return value;
}

function readString(obj: Record<string, unknown>, key: string, fallback: string, path: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`Config '${path}.${key}' must be a non-empty string`, { field: `${path}.${key}` });
  }
  return value;
}

function readNumber(obj: Record<string, unknown>, key: string, fallback: number, path: string): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`Config '${path}.${key}' must be a number`, { field: `${path}.${key}` });
  }
  return value;
}

function readBoolean(obj: Record<string, unknown>, key: string, fallback: boolean, path: string): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Config '${path}.${key}' must be a boolean`, { field: `${path}.${key}` });
  }
  return value;
}

/**
 * Build a config from parsed JSON plus environment overrides.
 * Missing fields fall back to DEFAULTS.
 */
export function resolveConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): WorkflowGraphConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("Config root must be a JSON object");
  }

  const database = section(raw, "database");
  const embedding = section(raw, "embedding");
  const indexing = section(raw, "indexing");
  const retrieval = section(raw, "retrieval");
  const execution = section(raw, "execution");
  const log = section(raw, "log");

  const policy = readString(execution, "emptyWorkflowPolicy", DEFAULTS.execution.emptyWorkflowPolicy, "execution");
  if (!isEmptyWorkflowPolicy(policy)) {
    throw new ConfigError(
      `Config 'execution.emptyWorkflowPolicy' must be "reject" or "succeed", got "${policy}"`,
      { field: "execution.emptyWorkflowPolicy" },
    );
  }

  const toolTimeout =
    execution.toolTimeout === undefined
      ? undefined
      : readString(execution, "toolTimeout", "", "execution");

  const config: WorkflowGraphConfig = {
    database: {
      path: env.WORKFLOW_GRAPH_DB ?? readString(database, "path", DEFAULTS.database.path, "database"),
    },
    embedding: {
      baseUrl: env.EMBEDDER_BASE_URL ?? readString(embedding, "baseUrl", DEFAULTS.embedding.baseUrl, "embedding"),
      apiKey: env.EMBEDDER_API_KEY ?? readString(embedding, "apiKey", DEFAULTS.embedding.apiKey, "embedding"),
      model: env.EMBEDDER_MODEL ?? readString(embedding, "model", DEFAULTS.embedding.model, "embedding"),
      dimensions: readNumber(embedding, "dimensions", DEFAULTS.embedding.dimensions, "embedding"),
    },
    indexing: {
      skipIndexOnEmbeddingFailure: readBoolean(
        indexing,
        "skipIndexOnEmbeddingFailure",
        DEFAULTS.indexing.skipIndexOnEmbeddingFailure,
        "indexing",
      ),
    },
    retrieval: {
      vectorWeight: readNumber(retrieval, "vectorWeight", DEFAULTS.retrieval.vectorWeight, "retrieval"),
      fulltextWeight: readNumber(retrieval, "fulltextWeight", DEFAULTS.retrieval.fulltextWeight, "retrieval"),
      degradeOnError: readBoolean(retrieval, "degradeOnError", DEFAULTS.retrieval.degradeOnError, "retrieval"),
      defaultTopK: readNumber(retrieval, "defaultTopK", DEFAULTS.retrieval.defaultTopK, "retrieval"),
    },
    execution: {
      emptyWorkflowPolicy: policy,
      toolTimeout,
    },
    log: {
      level: env.LOG_LEVEL ?? readString(log, "level", DEFAULTS.log.level, "log"),
    },
  };

  validateConfig(config);
  return config;
}

function validateConfig(config: WorkflowGraphConfig): void {
  const { dimensions } = config.embedding;
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new ConfigError(`Config 'embedding.dimensions' must be a positive integer, got ${dimensions}`, {
      field: "embedding.dimensions",
    });
  }

  const { vectorWeight, fulltextWeight, defaultTopK } = config.retrieval;
  if (vectorWeight < 0 || fulltextWeight < 0) {
    throw new ConfigError("Config retrieval weights must not be negative", { field: "retrieval" });
  }
  if (vectorWeight + fulltextWeight === 0) {
    throw new ConfigError("Config retrieval weights must not both be zero", { field: "retrieval" });
  }
  if (!Number.isInteger(defaultTopK) || defaultTopK <= 0) {
    throw new ConfigError(`Config 'retrieval.defaultTopK' must be a positive integer, got ${defaultTopK}`, {
      field: "retrieval.defaultTopK",
    });
  }

  if (config.execution.toolTimeout !== undefined) {
    let timeoutMs: number;
    try {
      timeoutMs = parseDuration(config.execution.toolTimeout);
    } catch (e) {
      throw new ConfigError(e instanceof Error ? e.message : String(e), { field: "execution.toolTimeout" });
    }
    if (timeoutMs === 0) {
      throw new ConfigError(
        `Config 'execution.toolTimeout' must be greater than zero, got "${config.execution.toolTimeout}"`,
        { field: "execution.toolTimeout" },
      );
    }
  }

  if (!LOG_LEVELS.includes(config.log.level)) {
    throw new ConfigError(`Config 'log.level' must be one of ${LOG_LEVELS.join(", ")}`, { field: "log.level" });
  }
}

/**
 * Load config from `path` (or ~/.workflow-graph/config.json).
 * An explicit path must exist; the default path may be absent, in which
 * case defaults and environment overrides apply.
 */
export function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): WorkflowGraphConfig {
  const configPath = path ?? CONFIG_PATH;

  if (!existsSync(configPath)) {
    if (path) {
      throw new ConfigError(`Config file not found at ${configPath}`, { path: configPath });
    }
    return resolveConfig({}, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    throw new ConfigError(
      `Failed to parse config at ${configPath}: ${e instanceof Error ? e.message : e}`,
      { path: configPath },
    );
  }

  return resolveConfig(raw, env);
}

/** Parse duration string like "24h", "30m", "7d" to milliseconds */
export function parseDuration(duration: string): number {
  const match = duration.match(/^(\d+)\s*(ms|s|m|h|d)$/);
  if (!match) {
    throw new Error(
      `Invalid duration: ${duration}. Use format like "24h", "30m", "7d"`,
    );
  }
  const value = parseInt(match[1], 10);
  const unit = match[2];
  const multipliers: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60_000,
    h: 3_600_000,
    d: 86_400_000,
  };
  return value * multipliers[unit];
}
