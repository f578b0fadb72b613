import { GoogleGenAI } from "@google/genai";
import type { Embedder } from "@/embedding/types";
import { EncodingFailedError, errorMessage } from "@/memory/errors";

/** The slice of the `@google/genai` models API this embedder calls. */
export type GeminiEmbedClient = {
  embedContent(params: { model: string; contents: string[] }): Promise<{
    embeddings?: Array<{ values?: number[] }>;
  }>;
};

export type GeminiEmbedderOptions = {
  apiKey: string;
  model: string;
  dimensions: number;
  client?: GeminiEmbedClient;
};

/** Embeddings through the Gemini API. */
export class GeminiEmbedder implements Embedder {
  readonly name: string;
  readonly dimensions: number;
  private client: GeminiEmbedClient | null;

  constructor(private readonly options: GeminiEmbedderOptions) {
    this.name = `gemini:${options.model}`;
    this.dimensions = options.dimensions;
    this.client = options.client ?? null;
  }

  private getClient(): GeminiEmbedClient {
    if (!this.client) {
      if (!this.options.apiKey) throw new EncodingFailedError("missing_api_key");
      this.client = new GoogleGenAI({ apiKey: this.options.apiKey }).models;
    }
    return this.client;
  }

  async encode(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.encodeBatch([text], signal);
    return vector;
  }

  async encodeBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    const client = this.getClient();
    signal?.throwIfAborted();

    let response: Awaited<ReturnType<GeminiEmbedClient["embedContent"]>>;
    try {
      response = await client.embedContent({ model: this.options.model, contents: texts });
    } catch (error) {
      throw new EncodingFailedError(`embedding request failed: ${errorMessage(error, "request_failed")}`, error);
    }
    signal?.throwIfAborted();

    const vectors = (response.embeddings ?? []).map((e) => e.values ?? []);
    if (vectors.length !== texts.length) {
      throw new EncodingFailedError(`expected ${texts.length} embeddings, got ${vectors.length}`);
    }
    for (const vector of vectors) {
      if (vector.length === 0) throw new EncodingFailedError("embedding response item has an empty vector");
      if (vector.length !== this.dimensions) {
        throw new EncodingFailedError(`model ${this.options.model} produced ${vector.length} dimensions, expected ${this.dimensions}`);
      }
    }
    return vectors;
  }
}
