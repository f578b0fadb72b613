import { EncodingFailedError, errorMessage } from "@/memory/errors";
import type { Embedder } from "@/embedding/types";

const REQUEST_TIMEOUT_MS = 15000;

export type OpenAIEmbedderOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  dimensions: number;
  fetch?: typeof fetch;
  timeoutMs?: number;
};

type EmbeddingItem = {
  index: number;
  embedding: number[];
};

function parseItems(payload: unknown): EmbeddingItem[] {
  if (!payload || typeof payload !== "object" || !("data" in payload) || !Array.isArray(payload.data)) {
    throw new EncodingFailedError("embedding response has no data array");
  }
  const data: unknown[] = payload.data;
  const items: EmbeddingItem[] = [];
  for (const entry of data) {
    if (!entry || typeof entry !== "object" || !("embedding" in entry) || !Array.isArray(entry.embedding)) {
      throw new EncodingFailedError("embedding response item has no vector");
    }
    const raw: unknown[] = entry.embedding;
    const embedding = raw.filter((v): v is number => typeof v === "number");
    if (embedding.length === 0 || embedding.length !== raw.length) {
      throw new EncodingFailedError("embedding response item has an empty or non-numeric vector");
    }
    const index = "index" in entry && typeof entry.index === "number" ? entry.index : items.length;
    items.push({ index, embedding });
  }
  return items;
}

/** Embeddings over an OpenAI-compatible `/embeddings` endpoint. */
export class OpenAIEmbedder implements Embedder {
  readonly name: string;
  readonly dimensions: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAIEmbedderOptions) {
    this.name = `openai:${options.model}`;
    this.dimensions = options.dimensions;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async encode(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.encodeBatch([text], signal);
    return vector;
  }

  async encodeBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (!this.options.apiKey) throw new EncodingFailedError("missing_api_key");
    signal?.throwIfAborted();

    const controller = new AbortController();
    const abort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", abort, { once: true });
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs ?? REQUEST_TIMEOUT_MS);

    let payload: unknown;
    try {
      const res = await this.fetchImpl(`${this.options.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: this.options.model, input: texts }),
        signal: controller.signal,
      });
      if (!res.ok) {
        throw new EncodingFailedError(`embedding request failed: http_${res.status}`);
      }
      payload = await res.json();
    } catch (error) {
      if (error instanceof EncodingFailedError) throw error;
      signal?.throwIfAborted();
      throw new EncodingFailedError(`embedding request failed: ${errorMessage(error, "request_failed")}`, error);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", abort);
    }

    const items = parseItems(payload).sort((a, b) => a.index - b.index);
    if (items.length !== texts.length) {
      throw new EncodingFailedError(`expected ${texts.length} embeddings, got ${items.length}`);
    }
    for (const item of items) {
      if (item.embedding.length !== this.dimensions) {
        throw new EncodingFailedError(`model ${this.options.model} produced ${item.embedding.length} dimensions, expected ${this.dimensions}`);
      }
    }
    return items.map((item) => item.embedding);
  }
}
