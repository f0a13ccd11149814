/**
 * Indexer -- keeps an entity's embedding and full-text entry in step with its
 * name and description.
 *
 * Indexing is split in two so callers can embed (async) before opening a
 * synchronous SQLite transaction: `prepare` talks to the embedding service,
 * `apply` writes to the store.
 */

import type { Embedder } from "../embedding/client.js";
import type { GraphStore, NodeLabel } from "../graph/types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("indexer");

export interface IndexerOptions {
  /** Commit without an embedding when the embedding service fails. */
  skipIndexOnEmbeddingFailure: boolean;
}

export interface IndexEntry {
  kind: NodeLabel;
  key: string;
  text: string;
  /** null when embedding failed and the failure was accepted */
  embedding: number[] | null;
}

/** The text an entity is embedded and full-text indexed under. */
export function indexText(name: string, description: string): string {
  return `${name} ${description}`.trim();
}

export class Indexer {
  constructor(
    private store: GraphStore,
    private embedder: Embedder,
    private options: IndexerOptions,
  ) {}

  async prepare(kind: NodeLabel, key: string, text: string): Promise<IndexEntry> {
    try {
      const embedding = await this.embedder.embed(text);
      return { kind, key, text, embedding };
    } catch (e) {
      if (!this.options.skipIndexOnEmbeddingFailure) throw e;
      log.warn({ err: e, kind, key }, "embedding failed, committing without vector index entry");
      return { kind, key, text, embedding: null };
    }
  }

  /** Write a prepared entry. The node must exist. */
  apply(entry: IndexEntry): void {
    this.store.writeEmbedding(entry.kind, entry.key, entry.embedding);
    this.store.writeFulltext(entry.kind, entry.key, entry.text);
  }

  /** Embed `text` and index it for an existing node in one step. */
  async index(kind: NodeLabel, key: string, text: string): Promise<number[] | null> {
    const entry = await this.prepare(kind, key, text);
    this.store.transaction(() => this.apply(entry));
    log.info({ kind, key, embedded: entry.embedding !== null }, "entity indexed");
    return entry.embedding;
  }
}
