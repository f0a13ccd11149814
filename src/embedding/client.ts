import type { EmbeddingConfig } from "../config.js";
import { EmbeddingServiceError } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("embedding");

/** Longest input sent to the embedding endpoint, in characters. */
const MAX_INPUT_CHARS = 8000;

/** Text -> vector collaborator shared by indexing and search. */
export interface Embedder {
  embed(text: string): Promise<number[]>;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number" && Number.isFinite(v));
}

function extractEmbedding(body: unknown): number[] | undefined {
  if (typeof body !== "object" || body === null || !("data" in body)) return undefined;
  const data = body.data;
  if (!Array.isArray(data) || data.length === 0) return undefined;
  const first: unknown = data[0];
  if (typeof first !== "object" || first === null || !("embedding" in first)) return undefined;
  return isNumberArray(first.embedding) ? first.embedding : undefined;
}

/** Client for an OpenAI-compatible `/embeddings` endpoint (OpenAI, Ollama, vLLM, ...). */
export class OpenAIEmbedder implements Embedder {
  private endpoint: string;

  constructor(private config: EmbeddingConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, "")}/embeddings`;
  }

  async embed(text: string): Promise<number[]> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          input: text.slice(0, MAX_INPUT_CHARS),
          model: this.config.model,
        }),
      });
    } catch (e) {
      log.error({ err: e, endpoint: this.endpoint }, "embedding request failed");
      throw new EmbeddingServiceError(
        `Embedding request to ${this.endpoint} failed: ${e instanceof Error ? e.message : e}`,
        { cause: e },
      );
    }

    if (!response.ok) {
      const err = await response.text();
      throw new EmbeddingServiceError(`Embedding API error ${response.status}: ${err}`, {
        statusCode: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (e) {
      throw new EmbeddingServiceError("Embedding API returned invalid JSON", { cause: e });
    }

    const embedding = extractEmbedding(body);
    if (!embedding) {
      throw new EmbeddingServiceError("Embedding API response has no embedding vector");
    }
    if (embedding.length !== this.config.dimensions) {
      throw new EmbeddingServiceError(
        `Embedding model ${this.config.model} returned ${embedding.length} dimensions, expected ${this.config.dimensions}`,
      );
    }

    log.debug({ model: this.config.model, chars: text.length }, "text embedded");
    return embedding;
  }
}
