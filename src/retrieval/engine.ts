/**
 * RetrievalEngine -- hybrid search over workflows, tasks and tools.
 *
 * The vector and full-text signals are queried independently, merged by key
 * as a weighted sum (a signal that missed a key contributes 0), then ranked
 * by combined score with ties broken by ascending name.
 */

import type { Embedder } from "../embedding/client.js";
import { ValidationError } from "../errors.js";
import type { EntityByLabel, GraphStore, NodeLabel, ScoredKey } from "../graph/types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("retrieval");

export interface SearchWeights {
  vector: number;
  fulltext: number;
}

export interface RetrievalOptions {
  weights: SearchWeights;
  /** Log and skip a failing signal instead of failing the search. */
  degradeOnError: boolean;
}

export interface SearchHit<T> {
  entity: T;
  score: number;
  vectorScore: number;
  fulltextScore: number;
}

export interface RankedKey {
  key: string;
  score: number;
  vectorScore: number;
  fulltextScore: number;
}

export const DEFAULT_WEIGHTS: SearchWeights = { vector: 0.5, fulltext: 0.5 };

/**
 * Merge two candidate lists into one ranking of at most `topK` keys.
 * Exported separately so ranking is testable without a store.
 */
export function mergeCandidates(
  vectorHits: ScoredKey[],
  fulltextHits: ScoredKey[],
  weights: SearchWeights,
  topK: number,
): RankedKey[] {
  const merged = new Map<string, { vector: number; fulltext: number }>();

  for (const hit of vectorHits) {
    const entry = merged.get(hit.key) ?? { vector: 0, fulltext: 0 };
    entry.vector = Math.max(entry.vector, hit.score);
    merged.set(hit.key, entry);
  }
  for (const hit of fulltextHits) {
    const entry = merged.get(hit.key) ?? { vector: 0, fulltext: 0 };
    entry.fulltext = Math.max(entry.fulltext, hit.score);
    merged.set(hit.key, entry);
  }

  return [...merged.entries()]
    .map(([key, s]) => ({
      key,
      score: weights.vector * s.vector + weights.fulltext * s.fulltext,
      vectorScore: s.vector,
      fulltextScore: s.fulltext,
    }))
    .sort((a, b) => b.score - a.score || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .slice(0, topK);
}

export class RetrievalEngine {
  private options: RetrievalOptions;

  constructor(
    private store: GraphStore,
    private embedder: Embedder,
    options?: Partial<RetrievalOptions>,
  ) {
    this.options = {
      weights: options?.weights ?? DEFAULT_WEIGHTS,
      degradeOnError: options?.degradeOnError ?? false,
    };
    const { vector, fulltext } = this.options.weights;
    if (vector < 0 || fulltext < 0 || vector + fulltext === 0) {
      throw new ValidationError(
        `Search weights must be non-negative and not both zero, got ${vector}/${fulltext}`,
        "weights",
      );
    }
  }

  async search<L extends NodeLabel>(
    kind: L,
    query: string,
    topK: number,
  ): Promise<Array<SearchHit<EntityByLabel[L]>>> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`, "topK");
    }

    const vectorHits = await this.vectorCandidates(kind, query, topK);
    const fulltextHits = this.fulltextCandidates(kind, query, topK, vectorHits.failed);

    const ranked = mergeCandidates(vectorHits.hits, fulltextHits, this.options.weights, topK);

    const results: Array<SearchHit<EntityByLabel[L]>> = [];
    for (const r of ranked) {
      const entity = this.store.getEntity(kind, r.key);
      // The node can vanish between the index query and this read.
      if (!entity) continue;
      results.push({
        entity,
        score: r.score,
        vectorScore: r.vectorScore,
        fulltextScore: r.fulltextScore,
      });
    }

    log.debug(
      { kind, query, topK, vector: vectorHits.hits.length, fulltext: fulltextHits.length, results: results.length },
      "search complete",
    );
    return results;
  }

  private async vectorCandidates(
    kind: NodeLabel,
    query: string,
    topK: number,
  ): Promise<{ hits: ScoredKey[]; failed: boolean }> {
    try {
      const embedding = await this.embedder.embed(query);
      return { hits: this.store.queryByEmbeddingSimilarity(kind, embedding, topK), failed: false };
    } catch (e) {
      if (!this.options.degradeOnError) throw e;
      log.warn({ err: e, kind }, "vector search unavailable, using full-text only");
      return { hits: [], failed: true };
    }
  }

  private fulltextCandidates(
    kind: NodeLabel,
    query: string,
    topK: number,
    vectorFailed: boolean,
  ): ScoredKey[] {
    try {
      return this.store.queryByFulltext(kind, query, topK);
    } catch (e) {
      // With both signals gone there is nothing to degrade to.
      if (!this.options.degradeOnError || vectorFailed) throw e;
      log.warn({ err: e, kind }, "full-text search unavailable, using vectors only");
      return [];
    }
  }
}
