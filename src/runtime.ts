import { mkdirSync } from "fs";
import { dirname } from "path";
import { getConfig, type AppConfig } from "@/config";
import { createEmbedder } from "@/embedding";
import type { Embedder } from "@/embedding/types";
import { log } from "@/logger";
import { MemoryService } from "@/memory/service";
import { SqliteMemoryStore } from "@/store/db";

export type Runtime = {
  config: AppConfig;
  store: SqliteMemoryStore;
  embedder: Embedder;
  service: MemoryService;
  close(): void;
};

/** Builds the store, embedder and service once; everything else receives them from here. */
export function createRuntime(config: AppConfig = getConfig()): Runtime {
  if (config.storage.path !== ":memory:") {
    mkdirSync(dirname(config.storage.path), { recursive: true });
  }
  const store = new SqliteMemoryStore({
    path: config.storage.path,
    dimensions: config.storage.dimensions,
    ann: config.storage.ann,
  });
  const embedder = createEmbedder(config);
  const service = new MemoryService({
    store,
    embedder,
    settings: {
      defaultLimit: config.search.defaultLimit,
      decayRate: config.search.decayRate,
      decayRatio: config.search.decayRatio,
      fetchMultiplier: config.search.fetchMultiplier,
      maxFetch: config.search.maxFetch,
      manualThreshold: config.classifier.manualThreshold,
    },
  });
  log.debug({ storage: config.storage.path, ann: store.ann, embedder: embedder.name }, "runtime ready");
  return { config, store, embedder, service, close: () => store.close() };
}
