export type MemoryCategory = "episodic" | "semantic";

export const MEMORY_CATEGORIES: readonly MemoryCategory[] = ["episodic", "semantic"];

export type FeatureName = "temporal" | "emotional" | "conversational" | "factual" | "profile";

export type FeatureVector = Record<FeatureName, number>;

export type ClassificationScores = Record<MemoryCategory, number>;

export type BusinessRuleId =
  | "short_text"
  | "explicit_fact_type"
  | "conversation_context"
  | "high_emotion"
  | "profile_information";

export type ClassificationResult = {
  predictedCategory: MemoryCategory;
  confidence: number;
  scores: ClassificationScores;
  features: FeatureVector;
  rulesApplied: BusinessRuleId[];
};

/** Free-form emotion payload, e.g. `{ valence: "positive", intensity: 0.7 }`. */
export type EmotionInfo = Record<string, unknown>;

/** Out-of-band hints that accompany a text at classification time. */
export type ClassificationContext = {
  factType?: string | null;
  conversationId?: string | null;
  speaker?: string | null;
  emotion?: EmotionInfo | null;
};

export type EpisodicAttributes = {
  speaker: string | null;
  emotion: EmotionInfo | null;
  context: Record<string, unknown> | null;
  links: string[];
};

export type SemanticAttributes = {
  factType: string | null;
  confidenceScore: number;
};

type MemoryRecordBase = {
  id: string;
  userId: string;
  text: string;
  embedding: number[] | null;
  timestamp: string;
  importance: number;
  source: string;
};

export type EpisodicMemoryRecord = MemoryRecordBase & {
  category: "episodic";
  episodic: EpisodicAttributes;
};

export type SemanticMemoryRecord = MemoryRecordBase & {
  category: "semantic";
  semantic: SemanticAttributes;
};

export type MemoryRecord = EpisodicMemoryRecord | SemanticMemoryRecord;

export type NewMemoryRecord =
  | Omit<EpisodicMemoryRecord, "id">
  | Omit<SemanticMemoryRecord, "id">;

export type SearchHit = {
  record: MemoryRecord;
  collection: MemoryCategory;
  rawScore: number;
  adjustedScore: number;
  /** Recency multiplier used for the blend; null when decay was off or the record had no usable timestamp. */
  recency: number | null;
};

export type CollectionWeightMap = Record<MemoryCategory, number>;

export const NEUTRAL_WEIGHTS: Readonly<CollectionWeightMap> = Object.freeze({
  episodic: 1,
  semantic: 1,
});

export function isMemoryCategory(value: unknown): value is MemoryCategory {
  return value === "episodic" || value === "semantic";
}
