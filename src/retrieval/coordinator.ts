import { log } from "@/logger";
import { InvalidRequestError, errorMessage } from "@/memory/errors";
import { NEUTRAL_WEIGHTS } from "@/memory/types";
import type { CollectionWeightMap, MemoryCategory, SearchHit } from "@/memory/types";
import { parseTimestamp, timeDecay } from "@/retrieval/decay";
import type { MemoryStore, SearchFilters, StoredHit } from "@/store/types";

export const DEFAULT_FETCH_MULTIPLIER = 3;
export const DEFAULT_MAX_FETCH = 300;

export type DecayOptions = {
  /** Exponential decay per day; 0 disables decay but keeps the blend. */
  rate: number;
  /** Share of the final score taken by recency, in [0, 1]. */
  ratio: number;
  referenceTime?: Date;
};

export type CoordinatedSearchRequest = {
  queryEmbedding: number[];
  userId: string;
  collections: MemoryCategory[];
  limit: number;
  weights?: Partial<CollectionWeightMap>;
  decay?: DecayOptions | null;
  minScore?: number;
  filters?: SearchFilters;
  signal?: AbortSignal;
  fetchMultiplier?: number;
  maxFetch?: number;
};

export type CollectionOutcome =
  | { ok: true; collection: MemoryCategory; hits: SearchHit[] }
  | { ok: false; collection: MemoryCategory; error: string };

export type CollectionFailure = {
  collection: MemoryCategory;
  error: string;
};

export type CoordinatedSearch = {
  hits: SearchHit[];
  failures: CollectionFailure[];
  collectionCounts: Record<MemoryCategory, number>;
  appliedWeights: CollectionWeightMap;
};

export function resolveWeights(weights?: Partial<CollectionWeightMap>): CollectionWeightMap {
  const resolved: CollectionWeightMap = { ...NEUTRAL_WEIGHTS };
  for (const [category, value] of Object.entries(weights ?? {})) {
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidRequestError(`weight for ${category} must be a non-negative number`);
    }
    if (category === "episodic" || category === "semantic") resolved[category] = value;
  }
  return resolved;
}

function validateDecay(decay: DecayOptions): void {
  if (!Number.isFinite(decay.rate) || decay.rate < 0) {
    throw new InvalidRequestError("decay rate must be a non-negative number");
  }
  if (!Number.isFinite(decay.ratio) || decay.ratio < 0 || decay.ratio > 1) {
    throw new InvalidRequestError("decay ratio must be within [0, 1]");
  }
}

function fetchLimit(request: CoordinatedSearchRequest, collections: MemoryCategory[], weights: CollectionWeightMap): number {
  const weighted = collections.some((c) => weights[c] !== NEUTRAL_WEIGHTS[c]);
  const reorders = Boolean(request.decay) || (request.minScore ?? 0) > 0 || weighted;
  if (!reorders) return request.limit;
  const multiplier = request.fetchMultiplier ?? DEFAULT_FETCH_MULTIPLIER;
  const maxFetch = request.maxFetch ?? DEFAULT_MAX_FETCH;
  return Math.max(request.limit, Math.min(request.limit * multiplier, maxFetch));
}

/** Weight then, when decay is requested, blend with the record's recency. */
export function adjustHit(
  hit: StoredHit,
  collection: MemoryCategory,
  weight: number,
  decay: DecayOptions | null | undefined,
  referenceTime: Date,
): SearchHit {
  const weighted = hit.score * weight;
  if (!decay) {
    return { record: hit.record, collection, rawScore: hit.score, adjustedScore: weighted, recency: null };
  }
  const itemTime = parseTimestamp(hit.record.timestamp);
  if (!itemTime) {
    return { record: hit.record, collection, rawScore: hit.score, adjustedScore: weighted, recency: null };
  }
  const recency = timeDecay(itemTime, referenceTime, decay.rate);
  return {
    record: hit.record,
    collection,
    rawScore: hit.score,
    adjustedScore: (1 - decay.ratio) * weighted + decay.ratio * recency,
    recency,
  };
}

async function searchOne(
  store: MemoryStore,
  request: CoordinatedSearchRequest,
  collection: MemoryCategory,
  limit: number,
  weight: number,
  referenceTime: Date,
): Promise<SearchHit[]> {
  const stored = await store.search({
    vector: request.queryEmbedding,
    userId: request.userId,
    collection,
    limit,
    filters: request.filters,
    signal: request.signal,
  });
  const minScore = request.minScore ?? 0;
  return stored
    .filter((hit) => hit.score >= minScore)
    .map((hit) => adjustHit(hit, collection, weight, request.decay, referenceTime));
}

/**
 * Fans one similarity query out per collection, re-scores every hit and merges
 * them into a single ranking. A failing collection is reported in `failures`
 * and never cancels its siblings; an invalid request is thrown instead.
 */
export async function searchCollections(
  store: MemoryStore,
  request: CoordinatedSearchRequest,
): Promise<CoordinatedSearch> {
  const appliedWeights = resolveWeights(request.weights);
  if (request.decay) validateDecay(request.decay);
  request.signal?.throwIfAborted();

  const collections = [...new Set(request.collections)];
  const collectionCounts: Record<MemoryCategory, number> = { episodic: 0, semantic: 0 };
  if (collections.length === 0 || request.limit <= 0) {
    return { hits: [], failures: [], collectionCounts, appliedWeights };
  }

  const limit = fetchLimit(request, collections, appliedWeights);
  const referenceTime = request.decay?.referenceTime ?? new Date();

  const settled = await Promise.allSettled(
    collections.map((collection) =>
      searchOne(store, request, collection, limit, appliedWeights[collection], referenceTime),
    ),
  );
  request.signal?.throwIfAborted();
  for (const result of settled) {
    if (result.status === "rejected" && result.reason instanceof InvalidRequestError) throw result.reason;
  }

  const outcomes: CollectionOutcome[] = settled.map((result, index) => {
    const collection = collections[index];
    if (result.status === "fulfilled") return { ok: true, collection, hits: result.value };
    return { ok: false, collection, error: errorMessage(result.reason, "collection_search_failed") };
  });

  const failures: CollectionFailure[] = [];
  const merged: SearchHit[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      merged.push(...outcome.hits);
      continue;
    }
    log.warn({ collection: outcome.collection, userId: request.userId, error: outcome.error }, "collection search failed");
    failures.push({ collection: outcome.collection, error: outcome.error });
  }

  // Array.prototype.sort is stable: equal scores keep per-collection order.
  const hits = merged.sort((a, b) => b.adjustedScore - a.adjustedScore).slice(0, request.limit);
  for (const hit of hits) collectionCounts[hit.collection]++;

  return { hits, failures, collectionCounts, appliedWeights };
}
