import {
  DEFAULT_MANUAL_THRESHOLD,
  analyzePatterns,
  classifyBatch,
  classifyMemory,
  explainClassification,
  shouldRequestManualClassification,
  validateClassification,
  type BatchClassification,
  type ClassificationValidation,
  type PatternAnalysis,
} from "@/classify";
import type { Embedder } from "@/embedding/types";
import { log } from "@/logger";
import { InvalidRequestError, NotFoundError, StorageUnavailableError } from "@/memory/errors";
import { PROFILE_QUERY, buildProfile, type UserProfile } from "@/memory/profile";
import { MEMORY_CATEGORIES } from "@/memory/types";
import type {
  ClassificationContext,
  ClassificationResult,
  CollectionWeightMap,
  MemoryCategory,
  MemoryRecord,
  NewMemoryRecord,
} from "@/memory/types";
import { searchCollections, type CoordinatedSearch, type DecayOptions } from "@/retrieval/coordinator";
import { parseTimestamp } from "@/retrieval/decay";
import { deriveQueryWeights } from "@/retrieval/weights";
import type { CollectionStats, MemoryStore, SearchFilters } from "@/store/types";

const MAX_BATCH_SIZE = 100;
const DOMINANT_RATIO = 0.7;
const PROFILE_SEARCH_LIMIT = 20;
const USER_ID_PATTERN = /^[A-Za-z0-9_-]{1,50}$/;
const MAX_TEXT_LENGTH = 10000;
export const MAX_SEARCH_LIMIT = 100;

export type ServiceSettings = {
  defaultLimit: number;
  decayRate: number;
  decayRatio: number;
  fetchMultiplier: number;
  maxFetch: number;
  manualThreshold: number;
};

export const DEFAULT_SERVICE_SETTINGS: ServiceSettings = {
  defaultLimit: 10,
  decayRate: 0.1,
  decayRatio: 0.3,
  fetchMultiplier: 3,
  maxFetch: 300,
  manualThreshold: DEFAULT_MANUAL_THRESHOLD,
};

export type RememberInput = {
  userId: string;
  text: string;
  /** Omit or pass "auto" to let the classifier pick the collection. */
  category?: MemoryCategory | "auto";
  context?: ClassificationContext;
  /** Free-form situational details stored with episodic memories. */
  details?: Record<string, unknown> | null;
  links?: string[];
  timestamp?: string;
  importance?: number;
  source?: string;
  signal?: AbortSignal;
};

export type RememberResult = {
  id: string;
  category: MemoryCategory;
  timestamp: string;
  classification: ClassificationResult | null;
  explanation: string | null;
  needsManualReview: boolean;
};

export type SearchOptions = {
  limit?: number;
  weights?: Partial<CollectionWeightMap>;
  /** `true` uses the configured rate and ratio. */
  decay?: boolean | Partial<DecayOptions>;
  minScore?: number;
  filters?: SearchFilters;
  signal?: AbortSignal;
};

export type MultiSearchOptions = SearchOptions & {
  collections?: MemoryCategory[];
};

export type QueryWeightedSearch = CoordinatedSearch & {
  classification: ClassificationResult;
};

export type ClassifyOutcome = {
  result: ClassificationResult;
  explanation: string;
  needsManualReview: boolean;
};

export type UserSummary = {
  userId: string;
  counts: Record<MemoryCategory, number>;
  total: number;
  ratios: Record<MemoryCategory, number>;
  manualThreshold: number;
};

export type ClassificationAnalysis = {
  userId: string;
  total: number;
  /** Ratios rounded to three decimals. */
  ratios: Record<MemoryCategory, number>;
  /** null when the user has no memories yet. */
  memoryTypePreference: MemoryCategory | null;
  analysis: string;
  recommendations: string[];
};

export type UserDeletion = {
  userId: string;
  deleted: Record<MemoryCategory, number>;
  totalDeleted: number;
  remaining: Record<MemoryCategory, number>;
};

export type MemoryServiceDeps = {
  store: MemoryStore;
  embedder: Embedder;
  settings?: Partial<ServiceSettings>;
};

export function assertUserId(userId: string): string {
  if (!USER_ID_PATTERN.test(userId)) {
    throw new InvalidRequestError("user id must be 1-50 characters of letters, digits, '_' or '-'");
  }
  return userId;
}

function requireText(text: string, label: string): string {
  const trimmed = text.trim();
  if (!trimmed) throw new InvalidRequestError(`${label} must not be empty`);
  if (trimmed.length > MAX_TEXT_LENGTH) throw new InvalidRequestError(`${label} exceeds ${MAX_TEXT_LENGTH} characters`);
  return trimmed;
}

function normalizeBound(value: string | undefined, label: string): string | undefined {
  if (value === undefined || !value.trim()) return undefined;
  const parsed = parseTimestamp(value);
  if (!parsed) throw new InvalidRequestError(`invalid ${label} timestamp: ${value}`);
  return parsed.toISOString();
}

/** Rejects malformed time bounds before any collection is queried. */
function normalizeFilters(filters: SearchFilters | undefined): SearchFilters | undefined {
  if (!filters?.timeRange) return filters;
  return {
    ...filters,
    timeRange: {
      from: normalizeBound(filters.timeRange.from, "from"),
      to: normalizeBound(filters.timeRange.to, "to"),
    },
  };
}

function requireBatch(texts: string[], contexts?: Array<ClassificationContext | undefined>): string[] {
  if (texts.length === 0) throw new InvalidRequestError("texts must not be empty");
  if (texts.length > MAX_BATCH_SIZE) throw new InvalidRequestError(`at most ${MAX_BATCH_SIZE} texts per batch`);
  if (contexts && contexts.length !== texts.length) {
    throw new InvalidRequestError("contexts must match texts one to one");
  }
  return texts.map((text) => requireText(text, "text"));
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function zeroCounts(): Record<MemoryCategory, number> {
  return { episodic: 0, semantic: 0 };
}

export class MemoryService {
  private readonly store: MemoryStore;
  private readonly embedder: Embedder;
  readonly settings: ServiceSettings;

  constructor(deps: MemoryServiceDeps) {
    this.store = deps.store;
    this.embedder = deps.embedder;
    this.settings = { ...DEFAULT_SERVICE_SETTINGS, ...deps.settings };
  }

  get embedderName(): string {
    return this.embedder.name;
  }

  async remember(input: RememberInput): Promise<RememberResult> {
    const userId = assertUserId(input.userId);
    const text = requireText(input.text, "text");
    const importance = input.importance ?? 0.5;
    if (!Number.isFinite(importance) || importance < 0 || importance > 1) {
      throw new InvalidRequestError("importance must be within [0, 1]");
    }
    let timestamp = new Date().toISOString();
    if (input.timestamp !== undefined) {
      const parsed = parseTimestamp(input.timestamp);
      if (!parsed) throw new InvalidRequestError(`invalid timestamp: ${input.timestamp}`);
      timestamp = parsed.toISOString();
    }

    const context: ClassificationContext = input.context ?? {};
    const classification = input.category === undefined || input.category === "auto"
      ? classifyMemory(text, context)
      : null;
    const category = classification?.predictedCategory ?? (input.category === "semantic" ? "semantic" : "episodic");

    const embedding = await this.embedder.encode(text, input.signal);
    const base = {
      userId,
      text,
      embedding,
      timestamp,
      importance,
      source: input.source?.trim() || "conversation",
    };
    const record: NewMemoryRecord = category === "episodic"
      ? {
          ...base,
          category,
          episodic: {
            speaker: context.speaker ?? null,
            emotion: context.emotion ?? null,
            context: input.details ?? (context.conversationId ? { conversationId: context.conversationId } : null),
            links: input.links ?? [],
          },
        }
      : {
          ...base,
          category,
          semantic: {
            factType: context.factType ?? null,
            confidenceScore: classification?.confidence ?? 1,
          },
        };

    const id = await this.store.insert(record);
    const needsManualReview = classification
      ? shouldRequestManualClassification(classification, this.settings.manualThreshold)
      : false;
    log.info({ id, userId, category, confidence: classification?.confidence ?? null }, "memory stored");

    return {
      id,
      category,
      timestamp,
      classification,
      explanation: classification ? explainClassification(classification) : null,
      needsManualReview,
    };
  }

  private resolveLimit(limit: number | undefined): number {
    const resolved = limit ?? this.settings.defaultLimit;
    if (!Number.isInteger(resolved) || resolved < 1 || resolved > MAX_SEARCH_LIMIT) {
      throw new InvalidRequestError(`limit must be an integer within [1, ${MAX_SEARCH_LIMIT}]`);
    }
    return resolved;
  }

  private resolveDecay(decay: SearchOptions["decay"]): DecayOptions | null {
    if (!decay) return null;
    const overrides: Partial<DecayOptions> = decay === true ? {} : decay;
    return {
      rate: overrides.rate ?? this.settings.decayRate,
      ratio: overrides.ratio ?? this.settings.decayRatio,
      referenceTime: overrides.referenceTime,
    };
  }

  private async coordinate(
    query: string,
    userId: string,
    collections: MemoryCategory[],
    options: SearchOptions,
  ): Promise<CoordinatedSearch> {
    const text = requireText(query, "query");
    assertUserId(userId);
    const limit = this.resolveLimit(options.limit);
    const minScore = options.minScore ?? 0;
    if (!Number.isFinite(minScore) || minScore < -1 || minScore > 1) {
      throw new InvalidRequestError("minimum score must be within [-1, 1]");
    }

    const filters = normalizeFilters(options.filters);

    const queryEmbedding = await this.embedder.encode(text, options.signal);
    return searchCollections(this.store, {
      queryEmbedding,
      userId,
      collections,
      limit,
      weights: options.weights,
      decay: this.resolveDecay(options.decay),
      minScore,
      filters,
      signal: options.signal,
      fetchMultiplier: this.settings.fetchMultiplier,
      maxFetch: this.settings.maxFetch,
    });
  }

  searchSingle(query: string, userId: string, category: MemoryCategory, options: SearchOptions = {}): Promise<CoordinatedSearch> {
    return this.coordinate(query, userId, [category], options);
  }

  searchMulti(query: string, userId: string, options: MultiSearchOptions = {}): Promise<CoordinatedSearch> {
    const collections = options.collections ?? [...MEMORY_CATEGORIES];
    return this.coordinate(query, userId, collections, options);
  }

  /** Multi-collection search weighted toward the category the query itself reads as. */
  async searchWithQueryWeights(query: string, userId: string, options: MultiSearchOptions = {}): Promise<QueryWeightedSearch> {
    const classification = classifyMemory(requireText(query, "query"));
    const weights = deriveQueryWeights(classification);
    const result = await this.searchMulti(query, userId, { ...options, weights });
    return { ...result, classification };
  }

  classify(text: string, context?: ClassificationContext): ClassifyOutcome {
    const result = classifyMemory(requireText(text, "text"), context);
    return {
      result,
      explanation: explainClassification(result),
      needsManualReview: shouldRequestManualClassification(result, this.settings.manualThreshold),
    };
  }

  classifyBatch(texts: string[], contexts?: Array<ClassificationContext | undefined>): BatchClassification {
    return classifyBatch(requireBatch(texts, contexts), contexts);
  }

  analyzePatterns(texts: string[], contexts?: Array<ClassificationContext | undefined>): PatternAnalysis {
    return analyzePatterns(requireBatch(texts, contexts), contexts);
  }

  validateClassification(text: string, expected: MemoryCategory, context?: ClassificationContext): ClassificationValidation {
    return validateClassification(requireText(text, "text"), expected, context, this.settings.manualThreshold);
  }

  async getMemory(id: string): Promise<MemoryRecord> {
    const record = await this.store.get(requireText(id, "id"));
    if (!record) throw new NotFoundError(`memory not found: ${id}`);
    return record;
  }

  async getUserSummary(userId: string): Promise<UserSummary> {
    assertUserId(userId);
    const counts = zeroCounts();
    for (const category of MEMORY_CATEGORIES) {
      counts[category] = await this.store.count(userId, category);
    }
    const total = counts.episodic + counts.semantic;
    return {
      userId,
      counts,
      total,
      ratios: {
        episodic: total > 0 ? counts.episodic / total : 0,
        semantic: total > 0 ? counts.semantic / total : 0,
      },
      manualThreshold: this.settings.manualThreshold,
    };
  }

  async getClassificationAnalysis(userId: string): Promise<ClassificationAnalysis> {
    const summary = await this.getUserSummary(userId);
    const ratios = { episodic: round3(summary.ratios.episodic), semantic: round3(summary.ratios.semantic) };
    if (summary.total === 0) {
      return {
        userId,
        total: 0,
        ratios,
        memoryTypePreference: null,
        analysis: "no memories stored yet",
        recommendations: [
          "store a few conversations to build episodic memories",
          "add profile facts such as name or occupation as semantic memories",
        ],
      };
    }

    let analysis = "episodic and semantic memories are balanced";
    const recommendations: string[] = [];
    if (summary.ratios.episodic > DOMINANT_RATIO) {
      analysis = "memories are mostly personal experiences";
      recommendations.push("record more stable facts about the user as semantic memories");
    } else if (summary.ratios.semantic > DOMINANT_RATIO) {
      analysis = "memories are mostly facts and knowledge";
      recommendations.push("record more conversations and experiences as episodic memories");
    } else {
      recommendations.push("keep the current mix of experiences and facts");
    }

    return {
      userId,
      total: summary.total,
      ratios,
      memoryTypePreference: summary.ratios.episodic > summary.ratios.semantic ? "episodic" : "semantic",
      analysis,
      recommendations,
    };
  }

  /** Reads the user's profile facts out of the semantic collection. */
  async getUserProfile(userId: string, signal?: AbortSignal): Promise<UserProfile> {
    const { hits, failures } = await this.searchSingle(PROFILE_QUERY, userId, "semantic", {
      limit: PROFILE_SEARCH_LIMIT,
      minScore: -1,
      signal,
    });
    const [failure] = failures;
    if (failure) throw new StorageUnavailableError(failure.error);
    return buildProfile(userId, hits.map((hit) => hit.record));
  }

  async deleteUserMemories(userId: string, category?: MemoryCategory): Promise<UserDeletion> {
    assertUserId(userId);
    const deleted = zeroCounts();
    const remaining = zeroCounts();
    const targets = category ? [category] : [...MEMORY_CATEGORIES];
    for (const target of targets) {
      deleted[target] = await this.store.deleteByUser(userId, target);
    }
    for (const target of MEMORY_CATEGORIES) {
      remaining[target] = await this.store.count(userId, target);
    }
    const totalDeleted = deleted.episodic + deleted.semantic;
    log.info({ userId, category: category ?? "all", totalDeleted }, "user memories deleted");
    return { userId, deleted, totalDeleted, remaining };
  }

  resetCollection(category: MemoryCategory): Promise<void> {
    return this.store.reset(category);
  }

  getCollectionStats(category: MemoryCategory): Promise<CollectionStats> {
    return this.store.getStats(category);
  }
}
