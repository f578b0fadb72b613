import test from "node:test";
import assert from "node:assert/strict";
import { join } from "path";
import { resolveConfig } from "@/config";

const HOME = "/tmp/recollect-home";

test("resolveConfig fills every default", () => {
  assert.deepEqual(resolveConfig({}, {}, HOME), {
    logLevel: "info",
    server: { host: "127.0.0.1", port: 8765 },
    storage: { path: join(HOME, "memory.db"), dimensions: 1536, ann: true },
    embedding: {
      provider: "openai",
      model: "text-embedding-3-small",
      apiKey: "",
      baseUrl: "https://api.openai.com/v1",
    },
    search: { defaultLimit: 10, decayRate: 0.1, decayRatio: 0.3, fetchMultiplier: 3, maxFetch: 300 },
    classifier: { manualThreshold: 0.6 },
  });
});

test("environment selects the gemini provider and its defaults", () => {
  const config = resolveConfig(
    {},
    { EMBEDDING_PROVIDER: "Gemini", GEMINI_API_KEY: "test-secret", OPENAI_API_KEY: "other-secret", RECOLLECT_PORT: "9000" },
    HOME,
  );
  assert.equal(config.embedding.provider, "gemini");
  assert.equal(config.embedding.model, "text-embedding-004");
  assert.equal(config.embedding.apiKey, "test-secret");
  assert.equal(config.storage.dimensions, 768);
  assert.equal(config.server.port, 9000);
});

test("the openai key comes from OPENAI_API_KEY", () => {
  assert.equal(resolveConfig({}, { OPENAI_API_KEY: "test-secret" }, HOME).embedding.apiKey, "test-secret");
});

test("config.toml values override the defaults", () => {
  const config = resolveConfig(
    {
      log_level: "WARN",
      server: { port: 7000 },
      storage: { path: "/data/m.db", ann: false },
      search: { decay_ratio: 0.5 },
      classifier: { manual_threshold: 0.4 },
    },
    {},
    HOME,
  );
  assert.equal(config.logLevel, "warn");
  assert.equal(config.server.port, 7000);
  assert.equal(config.storage.path, "/data/m.db");
  assert.equal(config.storage.ann, false);
  assert.equal(config.search.decayRatio, 0.5);
  assert.equal(config.classifier.manualThreshold, 0.4);
});

test("relative storage paths live under the home directory", () => {
  assert.equal(resolveConfig({ storage: { path: "db/mem.db" } }, {}, HOME).storage.path, join(HOME, "db/mem.db"));
  assert.equal(resolveConfig({ storage: { path: ":memory:" } }, {}, HOME).storage.path, ":memory:");
});

test("config log_level wins over LOG_LEVEL", () => {
  assert.equal(resolveConfig({ log_level: "error" }, { LOG_LEVEL: "debug" }, HOME).logLevel, "error");
  assert.equal(resolveConfig({}, { LOG_LEVEL: "debug" }, HOME).logLevel, "debug");
  assert.equal(resolveConfig({}, { LOG_LEVEL: "" }, HOME).logLevel, "info");
});

test("the api key placeholder counts as unset", () => {
  assert.equal(resolveConfig({ embedding: { api_key: "sk-" } }, {}, HOME).embedding.apiKey, "");
  assert.equal(resolveConfig({ embedding: { api_key: "test-secret" } }, { OPENAI_API_KEY: "sk-" }, HOME).embedding.apiKey, "test-secret");
});

test("base url trailing slashes are stripped", () => {
  assert.equal(resolveConfig({}, { OPENAI_BASE_URL: "https://embeddings.test/v1//" }, HOME).embedding.baseUrl, "https://embeddings.test/v1");
});

test("invalid values are rejected", () => {
  assert.throws(() => resolveConfig({ search: { decay_ratio: 1.5 } }, {}, HOME), /invalid_config: search.decay_ratio must be within \[0, 1\]/);
  assert.throws(() => resolveConfig({ embedding: { provider: "cohere" } }, {}, HOME), /invalid_config: unknown embedding provider "cohere"/);
  assert.throws(() => resolveConfig({ server: { port: "80" } }, {}, HOME), /invalid_config: port must be a number/);
  assert.throws(() => resolveConfig({}, { RECOLLECT_PORT: "0" }, HOME), /invalid_config: server.port must be an integer within \[1, 65535\]/);
});
