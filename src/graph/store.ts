/**
 * SqliteGraphStore -- property graph over SQLite.
 *
 * Nodes and relationships are plain tables; relationships cascade away with
 * either endpoint. Each label gets a sqlite-vec index (`<label>Embedding`) and
 * an FTS5 index (`<label>Fulltext`) keyed by node name.
 */

import Database from "better-sqlite3";
import * as sqliteVec from "sqlite-vec";
import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import {
  ConstraintViolationError,
  NotFoundError,
  ValidationError,
  WorkflowNotFoundError,
} from "../errors.js";
import { getLogger } from "../util/logger.js";
import {
  NODE_LABELS,
  RELATIONSHIP_ENDPOINTS,
  type EntityByLabel,
  type GraphNode,
  type GraphStore,
  type NodeLabel,
  type NodeProperties,
  type OrderedTask,
  type PropertyValue,
  type RelationshipProperties,
  type RelationshipType,
  type ScoredKey,
  type TaskEntity,
  type ToolEntity,
  type WorkflowEntity,
} from "./types.js";

const log = getLogger("graph-store");

/** sqlite-vec refuses KNN queries with a larger k. */
const MAX_KNN_K = 4096;

const INDEX_NAMES: Record<NodeLabel, { vector: string; fulltext: string }> = {
  Workflow: { vector: "workflowEmbedding", fulltext: "workflowFulltext" },
  Task: { vector: "taskEmbedding", fulltext: "taskFulltext" },
  Tool: { vector: "toolEmbedding", fulltext: "toolFulltext" },
};

interface NodeRow {
  id: string;
  label: string;
  name: string;
  properties: string;
  embedding: Buffer | null;
  created_at: string;
  updated_at: string;
}

interface OrderedNodeRow extends NodeRow {
  ordinal: number;
}

export interface SqliteGraphStoreOptions {
  /** SQLite file path, or ":memory:" */
  path: string;
  /** Vector length of every stored embedding. */
  dimensions: number;
}

function encodeEmbedding(vector: number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

function decodeEmbedding(blob: Buffer): number[] {
  const bytes = new Uint8Array(blob);
  return Array.from(new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4)));
}

function isPropertyValue(value: unknown): value is PropertyValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function parseProperties(json: string): NodeProperties {
  const parsed: unknown = JSON.parse(json);
  const props: NodeProperties = {};
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return props;
  for (const [k, v] of Object.entries(parsed)) {
    if (isPropertyValue(v)) props[k] = v;
  }
  return props;
}

function stringProp(node: GraphNode, name: string, fallback = ""): string {
  const value = node.properties[name];
  return typeof value === "string" ? value : fallback;
}

function toWorkflow(node: GraphNode): WorkflowEntity {
  return {
    id: node.id,
    name: node.key,
    description: stringProp(node, "description"),
    embedding: node.embedding,
    createdAt: node.createdAt,
    updatedAt: node.updatedAt,
  };
}

function toTask(node: GraphNode): TaskEntity {
  return {
    id: node.id,
    name: node.key,
    description: stringProp(node, "description"),
    toolName: stringProp(node, "toolName"),
    embedding: node.embedding,
    createdAt: node.createdAt,
    updatedAt: node.updatedAt,
  };
}

function toTool(node: GraphNode): ToolEntity {
  return {
    id: node.id,
    name: node.key,
    description: stringProp(node, "description"),
    callable: stringProp(node, "callable", node.key),
    embedding: node.embedding,
    createdAt: node.createdAt,
    updatedAt: node.updatedAt,
  };
}

const CONVERTERS: { [L in NodeLabel]: (node: GraphNode) => EntityByLabel[L] } = {
  Workflow: toWorkflow,
  Task: toTask,
  Tool: toTool,
};

// Han, kana and Hangul are written without spaces; unicode61 would read a
// whole run as one token.
const IDEOGRAPH = /([\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}])/gu;

/** Put each ideograph in a token of its own. */
export function segmentIdeographs(text: string): string {
  return text.replace(IDEOGRAPH, " $1 ").replace(/\s+/g, " ").trim();
}

/**
 * Turn free text into an FTS5 query that ORs its word tokens together.
 * A word containing ideographs becomes a phrase of single characters, so it
 * matches that run anywhere in the indexed text.
 * Returns null when the text has no word characters.
 */
export function toFulltextQuery(text: string): string | null {
  const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu);
  if (!tokens) return null;
  return [...new Set(tokens)].map((t) => `"${segmentIdeographs(t)}"`).join(" OR ");
}

export class SqliteGraphStore implements GraphStore {
  private db: Database.Database;
  readonly dimensions: number;

  constructor(options: SqliteGraphStoreOptions) {
    if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
      throw new ValidationError(
        `Embedding dimensions must be a positive integer, got ${options.dimensions}`,
        "dimensions",
      );
    }
    this.dimensions = options.dimensions;

    if (options.path !== ":memory:") {
      mkdirSync(dirname(options.path), { recursive: true });
    }

    this.db = new Database(options.path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    sqliteVec.load(this.db);

    this.migrate();
    log.info({ path: options.path, dimensions: this.dimensions }, "graph store initialized");
  }

  /** Expose the underlying database (tests, diagnostics) */
  getDb(): Database.Database {
    return this.db;
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS nodes (
        id TEXT PRIMARY KEY,
        label TEXT NOT NULL,
        name TEXT NOT NULL,
        properties TEXT NOT NULL DEFAULT '{}',
        embedding BLOB,
        created_at TEXT DEFAULT (datetime('now')),
        updated_at TEXT DEFAULT (datetime('now')),
        UNIQUE (label, name)
      );

      CREATE TABLE IF NOT EXISTS relationships (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        type TEXT NOT NULL,
        from_id TEXT NOT NULL REFERENCES nodes(id) ON DELETE CASCADE,
        to_id TEXT NOT NULL REFERENCES nodes(id) ON DELETE CASCADE,
        ordinal INTEGER,
        created_at TEXT DEFAULT (datetime('now'))
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_contains_order
        ON relationships(from_id, ordinal) WHERE type = 'CONTAINS';
      CREATE UNIQUE INDEX IF NOT EXISTS idx_uses_single
        ON relationships(from_id) WHERE type = 'USES';
      CREATE INDEX IF NOT EXISTS idx_relationships_to ON relationships(to_id, type);
    `);

    for (const label of NODE_LABELS) {
      const { vector, fulltext } = INDEX_NAMES[label];
      this.db.exec(`
        CREATE VIRTUAL TABLE IF NOT EXISTS ${fulltext} USING fts5(
          name UNINDEXED,
          text
        );

        CREATE VIRTUAL TABLE IF NOT EXISTS ${vector} USING vec0(
          name TEXT PRIMARY KEY,
          embedding FLOAT[${this.dimensions}] distance_metric=cosine
        );
      `);
    }
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ---------------------------------------------------------------------------
  // Nodes
  // ---------------------------------------------------------------------------

  getNode(label: NodeLabel, key: string): GraphNode | undefined {
    const row = this.db
      .prepare<[string, string], NodeRow>("SELECT * FROM nodes WHERE label = ? AND name = ?")
      .get(label, key);
    return row ? this.rowToNode(row, label) : undefined;
  }

  getEntity<L extends NodeLabel>(label: L, key: string): EntityByLabel[L] | undefined {
    const node = this.getNode(label, key);
    return node ? CONVERTERS[label](node) : undefined;
  }

  listEntities<L extends NodeLabel>(label: L): EntityByLabel[L][] {
    const rows = this.db
      .prepare<[string], NodeRow>("SELECT * FROM nodes WHERE label = ? ORDER BY name ASC")
      .all(label);
    return rows.map((row) => CONVERTERS[label](this.rowToNode(row, label)));
  }

  countNodes(label: NodeLabel): number {
    const row = this.db
      .prepare<[string], { count: number }>("SELECT COUNT(*) AS count FROM nodes WHERE label = ?")
      .get(label);
    return row?.count ?? 0;
  }

  upsertNode(label: NodeLabel, key: string, properties: NodeProperties): GraphNode {
    if (key.trim().length === 0) {
      throw new ValidationError(`${label} name must not be empty`, "name");
    }

    const existing = this.getNode(label, key);
    if (existing) {
      const merged = { ...existing.properties, ...properties };
      this.db
        .prepare("UPDATE nodes SET properties = ?, updated_at = datetime('now') WHERE id = ?")
        .run(JSON.stringify(merged), existing.id);
      log.debug({ label, name: key }, "node updated");
    } else {
      this.db
        .prepare("INSERT INTO nodes (id, label, name, properties) VALUES (?, ?, ?, ?)")
        .run(randomUUID(), label, key, JSON.stringify(properties));
      log.debug({ label, name: key }, "node created");
    }

    return this.requireNode(label, key);
  }

  /** Delete a node; its relationships and index entries go with it. */
  deleteNode(label: NodeLabel, key: string): boolean {
    const node = this.getNode(label, key);
    if (!node) return false;

    const { vector, fulltext } = INDEX_NAMES[label];
    this.transaction(() => {
      this.db.prepare("DELETE FROM nodes WHERE id = ?").run(node.id);
      this.db.prepare(`DELETE FROM ${vector} WHERE name = ?`).run(key);
      this.db.prepare(`DELETE FROM ${fulltext} WHERE name = ?`).run(key);
    });
    log.info({ label, name: key }, "node deleted");
    return true;
  }

  // ---------------------------------------------------------------------------
  // Index writes
  // ---------------------------------------------------------------------------

  /** Store (or with null, clear) a node's embedding and its vector index entry. */
  writeEmbedding(label: NodeLabel, key: string, vector: number[] | null): void {
    const node = this.requireNode(label, key);
    if (vector && vector.length !== this.dimensions) {
      throw new ConstraintViolationError(
        `Embedding for ${label} ${key} has ${vector.length} dimensions, index expects ${this.dimensions}`,
        { label, key, dimensions: vector.length },
      );
    }

    const table = INDEX_NAMES[label].vector;
    this.transaction(() => {
      this.db
        .prepare("UPDATE nodes SET embedding = ?, updated_at = datetime('now') WHERE id = ?")
        .run(vector ? encodeEmbedding(vector) : null, node.id);
      this.db.prepare(`DELETE FROM ${table} WHERE name = ?`).run(key);
      if (vector) {
        this.db
          .prepare(`INSERT INTO ${table} (name, embedding) VALUES (?, ?)`)
          .run(key, new Float32Array(vector));
      }
    });
  }

  writeFulltext(label: NodeLabel, key: string, text: string): void {
    this.requireNode(label, key);
    const table = INDEX_NAMES[label].fulltext;
    this.transaction(() => {
      this.db.prepare(`DELETE FROM ${table} WHERE name = ?`).run(key);
      this.db.prepare(`INSERT INTO ${table} (name, text) VALUES (?, ?)`).run(key, segmentIdeographs(text));
    });
  }

  // ---------------------------------------------------------------------------
  // Relationships
  // ---------------------------------------------------------------------------

  upsertRelationship(
    fromKey: string,
    toKey: string,
    type: RelationshipType,
    properties?: RelationshipProperties,
  ): void {
    const [fromLabel, toLabel] = RELATIONSHIP_ENDPOINTS[type];
    const from = this.requireNode(fromLabel, fromKey);
    const to = this.requireNode(toLabel, toKey);

    if (type === "USES") {
      this.transaction(() => {
        this.db.prepare("DELETE FROM relationships WHERE from_id = ? AND type = 'USES'").run(from.id);
        this.db
          .prepare("INSERT INTO relationships (type, from_id, to_id) VALUES ('USES', ?, ?)")
          .run(from.id, to.id);
      });
      log.debug({ task: fromKey, tool: toKey }, "USES relationship set");
      return;
    }

    const order = assertOrder(properties?.order);
    const holder = this.db
      .prepare<[string, number], { to_id: string; name: string }>(
        `SELECT r.to_id, n.name FROM relationships r
         JOIN nodes n ON n.id = r.to_id
         WHERE r.from_id = ? AND r.type = 'CONTAINS' AND r.ordinal = ?`,
      )
      .get(from.id, order);

    if (holder) {
      if (holder.to_id === to.id) return;
      throw new ConstraintViolationError(
        `Order ${order} in workflow ${fromKey} is already taken by task ${holder.name}`,
        { workflow: fromKey, order, task: toKey, existingTask: holder.name },
      );
    }

    this.db
      .prepare("INSERT INTO relationships (type, from_id, to_id, ordinal) VALUES ('CONTAINS', ?, ?, ?)")
      .run(from.id, to.id, order);
    log.debug({ workflow: fromKey, task: toKey, order }, "CONTAINS relationship created");
  }

  /**
   * Insert a CONTAINS edge at `order`. When that slot is taken, it and every
   * later slot move up by one; a free slot is filled without shifting.
   */
  insertContainsAt(workflowName: string, taskName: string, order: number): void {
    const position = assertOrder(order);
    const workflow = this.requireWorkflow(workflowName);
    this.requireNode("Task", taskName);

    this.transaction(() => {
      const occupied = this.db
        .prepare<[string, number], { id: number }>(
          "SELECT id FROM relationships WHERE from_id = ? AND type = 'CONTAINS' AND ordinal = ?",
        )
        .get(workflow.id, position);

      if (!occupied) {
        this.upsertRelationship(workflowName, taskName, "CONTAINS", { order: position });
        return;
      }

      const later = this.db
        .prepare<[string, number], { id: number; ordinal: number }>(
          `SELECT id, ordinal FROM relationships
           WHERE from_id = ? AND type = 'CONTAINS' AND ordinal >= ?
           ORDER BY ordinal DESC`,
        )
        .all(workflow.id, position);

      // Shift from the top down so the unique index never sees a duplicate.
      const shift = this.db.prepare("UPDATE relationships SET ordinal = ? WHERE id = ?");
      for (const rel of later) {
        shift.run(rel.ordinal + 1, rel.id);
      }

      this.upsertRelationship(workflowName, taskName, "CONTAINS", { order: position });
    });
  }

  /** Remove relationships of `type` leaving `fromKey` (optionally only those to `toKey`). */
  removeRelationships(fromKey: string, type: RelationshipType, toKey?: string): number {
    const [fromLabel, toLabel] = RELATIONSHIP_ENDPOINTS[type];
    const from = this.requireNode(fromLabel, fromKey);

    if (toKey === undefined) {
      return this.db
        .prepare("DELETE FROM relationships WHERE from_id = ? AND type = ?")
        .run(from.id, type).changes;
    }

    const to = this.getNode(toLabel, toKey);
    if (!to) return 0;
    return this.db
      .prepare("DELETE FROM relationships WHERE from_id = ? AND type = ? AND to_id = ?")
      .run(from.id, type, to.id).changes;
  }

  getOrderedTasks(workflowName: string): OrderedTask[] {
    const workflow = this.requireWorkflow(workflowName);
    const rows = this.db
      .prepare<[string], OrderedNodeRow>(
        `SELECT r.ordinal, n.* FROM relationships r
         JOIN nodes n ON n.id = r.to_id
         WHERE r.from_id = ? AND r.type = 'CONTAINS'
         ORDER BY r.ordinal ASC, n.name ASC`,
      )
      .all(workflow.id);

    return rows.map((row) => ({
      order: row.ordinal,
      task: toTask(this.rowToNode(row, "Task")),
    }));
  }

  getToolForTask(taskName: string): ToolEntity {
    const task = this.requireNode("Task", taskName);
    const row = this.db
      .prepare<[string], NodeRow>(
        `SELECT n.* FROM relationships r
         JOIN nodes n ON n.id = r.to_id
         WHERE r.from_id = ? AND r.type = 'USES'`,
      )
      .get(task.id);

    if (!row) {
      throw new NotFoundError(
        "Tool",
        stringProp(task, "toolName"),
        `Task ${taskName} has no USES relationship to a tool`,
      );
    }
    return toTool(this.rowToNode(row, "Tool"));
  }

  getWorkflowsContaining(taskName: string): Array<{ workflow: string; order: number }> {
    return this.db
      .prepare<[string], { workflow: string; ordinal: number }>(
        `SELECT w.name AS workflow, r.ordinal FROM relationships r
         JOIN nodes w ON w.id = r.from_id
         JOIN nodes t ON t.id = r.to_id
         WHERE r.type = 'CONTAINS' AND t.label = 'Task' AND t.name = ?
         ORDER BY w.name ASC, r.ordinal ASC`,
      )
      .all(taskName)
      .map((row) => ({ workflow: row.workflow, order: row.ordinal }));
  }

  getTasksUsing(toolName: string): string[] {
    return this.db
      .prepare<[string], { name: string }>(
        `SELECT t.name FROM relationships r
         JOIN nodes t ON t.id = r.from_id
         JOIN nodes tool ON tool.id = r.to_id
         WHERE r.type = 'USES' AND tool.label = 'Tool' AND tool.name = ?
         ORDER BY t.name ASC`,
      )
      .all(toolName)
      .map((row) => row.name);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Nearest neighbours by cosine distance, scored 1 (same direction) to 0 (opposite). */
  queryByEmbeddingSimilarity(label: NodeLabel, vector: number[], topK: number): ScoredKey[] {
    if (topK <= 0) return [];
    if (vector.length !== this.dimensions) {
      throw new ConstraintViolationError(
        `Query vector has ${vector.length} dimensions, index expects ${this.dimensions}`,
        { label, dimensions: vector.length },
      );
    }

    const rows = this.db
      .prepare<[Float32Array, number], { name: string; distance: number }>(
        `SELECT name, distance FROM ${INDEX_NAMES[label].vector}
         WHERE embedding MATCH ? AND k = ?
         ORDER BY distance`,
      )
      .all(new Float32Array(vector), Math.min(topK, MAX_KNN_K));

    return rows.map((row) => ({
      key: row.name,
      score: Number.isFinite(row.distance) ? clamp01(1 - row.distance / 2) : 0,
    }));
  }

  /** BM25 matches, scored relative to the best match (which scores 1). */
  queryByFulltext(label: NodeLabel, text: string, topK: number): ScoredKey[] {
    if (topK <= 0) return [];
    const match = toFulltextQuery(text);
    if (!match) return [];

    const table = INDEX_NAMES[label].fulltext;
    const rows = this.db
      .prepare<[string, number], { name: string; relevance: number }>(
        `SELECT name, bm25(${table}) AS relevance FROM ${table}
         WHERE ${table} MATCH ?
         ORDER BY relevance ASC, name ASC
         LIMIT ?`,
      )
      .all(match, topK);

    if (rows.length === 0) return [];
    // bm25() is negative, more negative meaning more relevant.
    const best = rows[0].relevance;
    return rows.map((row) => ({
      key: row.name,
      score: best < 0 ? clamp01(row.relevance / best) : 1,
    }));
  }

  close(): void {
    if (!this.db.open) return;
    this.db.close();
    log.info("graph store closed");
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private requireNode(label: NodeLabel, key: string): GraphNode {
    const node = this.getNode(label, key);
    if (!node) throw new NotFoundError(label, key);
    return node;
  }

  private requireWorkflow(name: string): GraphNode {
    const node = this.getNode("Workflow", name);
    if (!node) throw new WorkflowNotFoundError(name);
    return node;
  }

  private rowToNode(row: NodeRow, label: NodeLabel): GraphNode {
    return {
      id: row.id,
      label,
      key: row.name,
      properties: parseProperties(row.properties),
      embedding: row.embedding ? decodeEmbedding(row.embedding) : null,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

function assertOrder(order: number | undefined): number {
  if (order === undefined || !Number.isInteger(order)) {
    throw new ValidationError(`CONTAINS order must be an integer, got ${order}`, "order");
  }
  return order;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
