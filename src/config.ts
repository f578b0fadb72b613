import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse } from "@iarna/toml";
import { getHomeDir } from "@/home";

export type EmbeddingProvider = "openai" | "gemini";

export type AppConfig = {
  logLevel: string;
  server: {
    host: string;
    port: number;
  };
  storage: {
    path: string;
    dimensions: number;
    ann: boolean;
  };
  embedding: {
    provider: EmbeddingProvider;
    model: string;
    apiKey: string;
    baseUrl: string;
  };
  search: {
    defaultLimit: number;
    decayRate: number;
    decayRatio: number;
    fetchMultiplier: number;
    maxFetch: number;
  };
  classifier: {
    manualThreshold: number;
  };
};

type RawTable = Record<string, unknown>;
type Env = Record<string, string | undefined>;

const GEMINI_MODEL = "text-embedding-004";
const GEMINI_DIMENSIONS = 768;
const OPENAI_MODEL = "text-embedding-3-small";
const OPENAI_DIMENSIONS = 1536;
const OPENAI_BASE_URL = "https://api.openai.com/v1";

function table(raw: RawTable, key: string): RawTable {
  const value = raw[key];
  return value !== null && typeof value === "object" && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

function readString(section: RawTable, key: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new Error(`invalid_config: ${key} must be a string`);
  return value.trim() || undefined;
}

function readNumber(section: RawTable, key: string): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) throw new Error(`invalid_config: ${key} must be a number`);
  return value;
}

function readBoolean(section: RawTable, key: string): boolean | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new Error(`invalid_config: ${key} must be a boolean`);
  return value;
}

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new Error(`invalid_config: ${key} must be a number`);
  return value;
}

function normalizeApiKey(raw: string | undefined): string {
  const v = (raw ?? "").trim();
  if (!v) return "";
  // Template placeholder; treat as not configured.
  if (v === "sk-") return "";
  return v;
}

function checkRange(name: string, value: number, min: number, max: number, integer = false): number {
  if (value < min || value > max || (integer && !Number.isInteger(value))) {
    throw new Error(`invalid_config: ${name} must be ${integer ? "an integer " : ""}within [${min}, ${max}]`);
  }
  return value;
}

function parseProvider(value: string | undefined): EmbeddingProvider {
  const provider = (value ?? "openai").toLowerCase();
  if (provider === "openai" || provider === "gemini") return provider;
  throw new Error(`invalid_config: unknown embedding provider "${provider}"`);
}

/** Builds the effective configuration from a parsed config.toml and the environment. */
export function resolveConfig(raw: RawTable, env: Env, homeDir: string): AppConfig {
  const server = table(raw, "server");
  const storage = table(raw, "storage");
  const embedding = table(raw, "embedding");
  const search = table(raw, "search");
  const classifier = table(raw, "classifier");

  const provider = parseProvider(env.EMBEDDING_PROVIDER?.trim() || readString(embedding, "provider"));
  const storagePath = readString(storage, "path") ?? "memory.db";

  return {
    logLevel: (readString(raw, "log_level") || env.LOG_LEVEL?.trim() || "info").toLowerCase(),
    server: {
      host: readString(server, "host") ?? "127.0.0.1",
      port: checkRange("server.port", envNumber(env, "RECOLLECT_PORT") ?? readNumber(server, "port") ?? 8765, 1, 65535, true),
    },
    storage: {
      path: storagePath === ":memory:" || isAbsolute(storagePath) ? storagePath : join(homeDir, storagePath),
      dimensions: checkRange(
        "storage.dimensions",
        readNumber(storage, "dimensions") ?? (provider === "gemini" ? GEMINI_DIMENSIONS : OPENAI_DIMENSIONS),
        1,
        8192,
        true,
      ),
      ann: readBoolean(storage, "ann") ?? true,
    },
    embedding: {
      provider,
      model: env.EMBEDDING_MODEL?.trim() || readString(embedding, "model") || (provider === "gemini" ? GEMINI_MODEL : OPENAI_MODEL),
      apiKey: normalizeApiKey(provider === "gemini" ? env.GEMINI_API_KEY : env.OPENAI_API_KEY) || normalizeApiKey(readString(embedding, "api_key")),
      baseUrl: (env.OPENAI_BASE_URL?.trim() || readString(embedding, "base_url") || OPENAI_BASE_URL).replace(/\/+$/, ""),
    },
    search: {
      defaultLimit: checkRange("search.default_limit", readNumber(search, "default_limit") ?? 10, 1, 100, true),
      decayRate: checkRange("search.decay_rate", readNumber(search, "decay_rate") ?? 0.1, 0, 10),
      decayRatio: checkRange("search.decay_ratio", readNumber(search, "decay_ratio") ?? 0.3, 0, 1),
      fetchMultiplier: checkRange("search.fetch_multiplier", readNumber(search, "fetch_multiplier") ?? 3, 1, 20, true),
      maxFetch: checkRange("search.max_fetch", readNumber(search, "max_fetch") ?? 300, 1, 10000, true),
    },
    classifier: {
      manualThreshold: checkRange("classifier.manual_threshold", readNumber(classifier, "manual_threshold") ?? 0.6, 0, 1),
    },
  };
}

let _config: AppConfig | null = null;

function loadRawConfig(): RawTable {
  const configPath = join(getHomeDir(), "config.toml");
  if (!existsSync(configPath)) return {};
  return parse(readFileSync(configPath, "utf-8"));
}

export function getConfig(): AppConfig {
  if (_config) return _config;
  _config = resolveConfig(loadRawConfig(), process.env, getHomeDir());
  return _config;
}

export function getLogLevel(): string {
  return getConfig().logLevel;
}
