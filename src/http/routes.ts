import { DEFAULT_MANUAL_THRESHOLD } from "@/classify";
import { log } from "@/logger";
import { asObject, normalizeCategory, normalizeContext, optionalString } from "@/memory/context";
import { InvalidRequestError, MemoryError, type MemoryErrorCode } from "@/memory/errors";
import { MAX_SEARCH_LIMIT, type MemoryService, type MultiSearchOptions, type RememberResult, type SearchOptions } from "@/memory/service";
import type { ClassificationContext, MemoryCategory, SearchHit } from "@/memory/types";
import type { CoordinatedSearch } from "@/retrieval/coordinator";
import { parseTimestamp } from "@/retrieval/decay";
import type { SearchFilters } from "@/store/types";

type JsonObject = Record<string, unknown>;

export type ApiRequest = {
  method: string;
  url: string;
  headers: Record<string, string | string[] | undefined>;
  body: unknown;
};

export type ApiResponse = {
  status: number;
  body: JsonObject;
};

const MAX_BATCH_SIZE = 100;
const MAX_WEIGHT = 2;

const STATUS_BY_CODE: Record<MemoryErrorCode, number> = {
  invalid_request: 400,
  not_found: 404,
  storage_unavailable: 502,
  encoding_failed: 502,
};

function ok(body: JsonObject): ApiResponse {
  return { status: 200, body };
}

function requireString(v: unknown, field: string): string {
  const value = optionalString(v, field);
  if (!value) throw new InvalidRequestError(`${field} is required`);
  return value;
}

function optionalNumber(v: unknown, field: string): number | undefined {
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) throw new InvalidRequestError(`${field} must be a number`);
  return v;
}

function normalizeLinks(v: unknown): string[] | undefined {
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v) || !v.every((link): link is string => typeof link === "string")) {
    throw new InvalidRequestError("links must be an array of strings");
  }
  return v;
}

function headerValue(headers: ApiRequest["headers"], name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function queryNumber(
  params: URLSearchParams,
  key: string,
  range: { min: number; max: number; integer?: boolean },
): number | undefined {
  const raw = params.get(key);
  if (raw === null || raw.trim() === "") return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < range.min || n > range.max || (range.integer && !Number.isInteger(n))) {
    throw new InvalidRequestError(`${key} must be ${range.integer ? "an integer " : ""}within [${range.min}, ${range.max}]`);
  }
  return n;
}

function queryBoolean(params: URLSearchParams, key: string): boolean {
  const raw = params.get(key)?.trim().toLowerCase();
  if (raw === undefined || raw === "" || raw === "false" || raw === "0") return false;
  if (raw === "true" || raw === "1") return true;
  throw new InvalidRequestError(`${key} must be true or false`);
}

function queryTimestamp(params: URLSearchParams, key: string): Date | undefined {
  const raw = params.get(key);
  if (raw === null || raw.trim() === "") return undefined;
  const parsed = parseTimestamp(raw);
  if (!parsed) throw new InvalidRequestError(`${key} must be an ISO-8601 timestamp`);
  return parsed;
}

function userIdFrom(req: ApiRequest, params: URLSearchParams, body?: JsonObject): string {
  const userId = headerValue(req.headers, "x-user-id") ?? params.get("user_id") ?? body?.user_id;
  return requireString(userId, "user_id");
}

function searchOptionsFrom(params: URLSearchParams): SearchOptions {
  const decayRate = queryNumber(params, "decay_rate", { min: 0, max: 10 });
  const decayRatio = queryNumber(params, "decay_ratio", { min: 0, max: 1 });
  const referenceTime = queryTimestamp(params, "reference_time");
  const decayOn = queryBoolean(params, "decay") || decayRate !== undefined || decayRatio !== undefined || referenceTime !== undefined;
  const filters: SearchFilters = {
    source: params.get("source")?.trim() || undefined,
    speaker: params.get("speaker")?.trim() || undefined,
    factType: params.get("fact_type")?.trim() || undefined,
    timeRange: params.has("from") || params.has("to")
      ? { from: params.get("from") ?? undefined, to: params.get("to") ?? undefined }
      : undefined,
  };
  return {
    limit: queryNumber(params, "limit", { min: 1, max: MAX_SEARCH_LIMIT, integer: true }),
    minScore: queryNumber(params, "similarity_threshold", { min: 0, max: 1 }),
    decay: decayOn ? { rate: decayRate, ratio: decayRatio, referenceTime } : false,
    filters,
  };
}

function hitJson(hit: SearchHit): JsonObject {
  const { record } = hit;
  const attributes = record.category === "episodic" ? record.episodic : record.semantic;
  return {
    id: record.id,
    collection: hit.collection,
    text: record.text,
    score: hit.adjustedScore,
    rawScore: hit.rawScore,
    recency: hit.recency,
    timestamp: record.timestamp,
    importance: record.importance,
    source: record.source,
    ...attributes,
  };
}

function searchJson(query: string, result: CoordinatedSearch, startedAt: number): JsonObject {
  return {
    query,
    results: result.hits.map(hitJson),
    failedCollections: result.failures,
    collectionStats: result.collectionCounts,
    totalResults: result.hits.length,
    queryTimeMs: Date.now() - startedAt,
    appliedWeights: result.appliedWeights,
  };
}

function batchFrom(body: JsonObject): { texts: string[]; contexts?: ClassificationContext[] } {
  if (!Array.isArray(body.texts) || body.texts.length === 0) {
    throw new InvalidRequestError("texts must be a non-empty array");
  }
  const rawTexts: unknown[] = body.texts;
  if (rawTexts.length > MAX_BATCH_SIZE) throw new InvalidRequestError(`at most ${MAX_BATCH_SIZE} texts per batch`);
  const texts = rawTexts.map((t, i) => requireString(t, `texts[${i}]`));
  const rawContexts: unknown[] | undefined = Array.isArray(body.contexts) ? body.contexts : undefined;
  return { texts, contexts: rawContexts?.map((c) => normalizeContext(c)) };
}

function parseCollections(raw: string | null): MemoryCategory[] | undefined {
  if (raw === null || raw.trim() === "") return undefined;
  return raw.split(",").map((c) => normalizeCategory(c.trim()));
}

function match(pathname: string, pattern: RegExp): string[] | null {
  const m = pattern.exec(pathname);
  if (!m) return null;
  try {
    return m.slice(1).map((part) => decodeURIComponent(part));
  } catch {
    throw new InvalidRequestError(`malformed path: ${pathname}`);
  }
}

async function rememberFrom(
  service: MemoryService,
  req: ApiRequest,
  params: URLSearchParams,
  body: JsonObject,
  category: MemoryCategory | "auto",
): Promise<RememberResult> {
  return service.remember({
    userId: userIdFrom(req, params, body),
    text: requireString(body.text, "text"),
    category,
    context: normalizeContext(body.context),
    details: body.details === undefined || body.details === null ? null : asObject(body.details),
    links: normalizeLinks(body.links),
    timestamp: optionalString(body.timestamp, "timestamp"),
    importance: optionalNumber(body.importance, "importance"),
    source: optionalString(body.source, "source"),
  });
}

async function route(service: MemoryService, req: ApiRequest): Promise<ApiResponse | null> {
  const method = req.method.toUpperCase();
  const url = new URL(req.url, "http://localhost");
  const { pathname, searchParams: params } = url;
  const body = asObject(req.body);
  let m: string[] | null;

  if (method === "GET" && pathname === "/api/health") {
    return ok({ status: "ok", embedder: service.embedderName });
  }

  if (method === "POST" && pathname === "/api/memory") {
    return ok({ ...(await rememberFrom(service, req, params, body, "auto")) });
  }

  if (method === "POST" && (m = match(pathname, /^\/api\/memory\/([^/]+)$/))) {
    return ok({ ...(await rememberFrom(service, req, params, body, normalizeCategory(m[0]))) });
  }

  if (method === "GET" && pathname === "/api/memory/search/multi") {
    const startedAt = Date.now();
    const query = requireString(params.get("query"), "query");
    const userId = userIdFrom(req, params);
    const options: MultiSearchOptions = {
      ...searchOptionsFrom(params),
      collections: parseCollections(params.get("collections")),
      weights: {
        episodic: queryNumber(params, "episodic_weight", { min: 0, max: MAX_WEIGHT }),
        semantic: queryNumber(params, "semantic_weight", { min: 0, max: MAX_WEIGHT }),
      },
    };
    if (queryBoolean(params, "use_query_weights")) {
      const result = await service.searchWithQueryWeights(query, userId, options);
      return ok({
        ...searchJson(query, result, startedAt),
        queryClassification: {
          category: result.classification.predictedCategory,
          confidence: result.classification.confidence,
        },
      });
    }
    const result = await service.searchMulti(query, userId, options);
    return ok(searchJson(query, result, startedAt));
  }

  if (method === "GET" && (m = match(pathname, /^\/api\/memory\/([^/]+)\/search$/))) {
    const startedAt = Date.now();
    const category = normalizeCategory(m[0]);
    const query = requireString(params.get("query"), "query");
    const result = await service.searchSingle(query, userIdFrom(req, params), category, searchOptionsFrom(params));
    return ok(searchJson(query, result, startedAt));
  }

  if (method === "GET" && (m = match(pathname, /^\/api\/records\/([^/]+)$/))) {
    const { embedding: _embedding, ...record } = await service.getMemory(m[0]);
    return ok({ ...record });
  }

  if (method === "POST" && pathname === "/api/classify") {
    const outcome = service.classify(requireString(body.text, "text"), normalizeContext(body.context));
    return ok({
      ...outcome.result,
      explanation: outcome.explanation,
      needsManualReview: outcome.needsManualReview,
    });
  }

  if (method === "POST" && pathname === "/api/classify/batch") {
    const { texts, contexts } = batchFrom(body);
    const batch = service.classifyBatch(texts, contexts);
    return ok({
      results: batch.items.map((item) => ({ text: item.text, ...item.result, explanation: item.explanation })),
      statistics: batch.statistics,
    });
  }

  if (method === "POST" && pathname === "/api/classify/analyze-patterns") {
    const { texts, contexts } = batchFrom(body);
    return ok({ ...service.analyzePatterns(texts, contexts) });
  }

  if (method === "GET" && pathname === "/api/classify/confidence-threshold") {
    return ok({
      threshold: service.settings.manualThreshold,
      defaultThreshold: DEFAULT_MANUAL_THRESHOLD,
      description: "classifications below this confidence should be confirmed manually",
    });
  }

  if (method === "POST" && pathname === "/api/classify/validate") {
    const validation = service.validateClassification(
      requireString(body.text, "text"),
      normalizeCategory(body.expected_category ?? body.expectedCategory),
      normalizeContext(body.context),
    );
    return ok({ ...validation });
  }

  if (method === "GET" && (m = match(pathname, /^\/api\/users\/([^/]+)\/stats$/))) {
    return ok({ ...(await service.getUserSummary(m[0])) });
  }

  if (method === "GET" && (m = match(pathname, /^\/api\/users\/([^/]+)\/classification-analysis$/))) {
    return ok({ ...(await service.getClassificationAnalysis(m[0])) });
  }

  if (method === "GET" && (m = match(pathname, /^\/api\/users\/([^/]+)\/profile$/))) {
    return ok({ ...(await service.getUserProfile(m[0])) });
  }

  if (method === "DELETE" && (m = match(pathname, /^\/api\/users\/([^/]+)\/memories$/))) {
    const raw = params.get("category");
    const category = raw === null || raw.trim() === "" ? undefined : normalizeCategory(raw.trim());
    return ok({ ...(await service.deleteUserMemories(m[0], category)) });
  }

  if (method === "POST" && (m = match(pathname, /^\/api\/admin\/collections\/([^/]+)\/reset$/))) {
    const category = normalizeCategory(m[0]);
    await service.resetCollection(category);
    return ok({ collection: category, reset: true });
  }

  if (method === "GET" && (m = match(pathname, /^\/api\/admin\/collections\/([^/]+)\/stats$/))) {
    return ok({ ...(await service.getCollectionStats(normalizeCategory(m[0]))) });
  }

  return null;
}

/** Dispatches one decoded request; never throws. */
export async function handleRequest(service: MemoryService, req: ApiRequest): Promise<ApiResponse> {
  try {
    const response = await route(service, req);
    return response ?? { status: 404, body: { error: "not_found", message: `no route for ${req.method} ${req.url}` } };
  } catch (error) {
    if (error instanceof MemoryError) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) log.error({ err: error, url: req.url }, "request failed");
      return { status, body: { error: error.code, message: error.message } };
    }
    log.error({ err: error, url: req.url }, "unhandled request error");
    return { status: 500, body: { error: "internal_error", message: error instanceof Error ? error.message : "internal_error" } };
  }
}
