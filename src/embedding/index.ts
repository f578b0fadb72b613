import type { AppConfig } from "@/config";
import { GeminiEmbedder } from "@/embedding/gemini";
import { OpenAIEmbedder } from "@/embedding/openai";
import type { Embedder } from "@/embedding/types";

export type { Embedder } from "@/embedding/types";
export { GeminiEmbedder } from "@/embedding/gemini";
export { OpenAIEmbedder } from "@/embedding/openai";

export function createEmbedder(config: Pick<AppConfig, "embedding" | "storage">): Embedder {
  const { embedding, storage } = config;
  if (embedding.provider === "gemini") {
    return new GeminiEmbedder({ apiKey: embedding.apiKey, model: embedding.model, dimensions: storage.dimensions });
  }
  return new OpenAIEmbedder({
    apiKey: embedding.apiKey,
    baseUrl: embedding.baseUrl,
    model: embedding.model,
    dimensions: storage.dimensions,
  });
}
