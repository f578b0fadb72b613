import { describeRule, refineClassification } from "@/classify/rules";
import { scoreText } from "@/classify/scoring";
import type { ClassificationContext, ClassificationResult, FeatureName, FeatureVector, MemoryCategory } from "@/memory/types";

export { extractFeatures } from "@/classify/features";
export { scoreText } from "@/classify/scoring";
export { refineClassification } from "@/classify/rules";

export const DEFAULT_MANUAL_THRESHOLD = 0.6;
const HIGH_CONFIDENCE = 0.8;

export type ConfidenceLevel = "high" | "medium" | "low";

export type BatchClassification = {
  items: Array<{ text: string; result: ClassificationResult; explanation: string }>;
  statistics: {
    total: number;
    episodicCount: number;
    semanticCount: number;
    episodicRatio: number;
    semanticRatio: number;
    highConfidenceCount: number;
    lowConfidenceCount: number;
    averageConfidence: number;
  };
};

export type ClassificationValidation = {
  predictedCategory: MemoryCategory;
  expectedCategory: MemoryCategory;
  isCorrect: boolean;
  confidence: number;
  confidenceLevel: ConfidenceLevel;
  explanation: string;
  suggestions: string[];
};

/** Scores the text, then runs the business rules over the raw result. */
export function classifyMemory(text: string, context?: ClassificationContext): ClassificationResult {
  return refineClassification(text, context, scoreText(text, context));
}

export function confidenceLevel(confidence: number, threshold = DEFAULT_MANUAL_THRESHOLD): ConfidenceLevel {
  if (confidence >= HIGH_CONFIDENCE) return "high";
  if (confidence >= threshold) return "medium";
  return "low";
}

export function shouldRequestManualClassification(
  result: ClassificationResult,
  threshold = DEFAULT_MANUAL_THRESHOLD,
): boolean {
  return result.confidence < threshold;
}

export function explainClassification(result: ClassificationResult): string {
  const cues: string[] = [];
  const { features } = result;
  if (features.temporal > 0) cues.push(`${features.temporal} temporal`);
  if (features.emotional > 0) cues.push(`${features.emotional} emotional`);
  if (features.conversational > 0) cues.push(`${features.conversational} conversational`);
  if (features.factual > 0) cues.push(`${features.factual} factual`);
  if (features.profile > 0) cues.push(`${features.profile} profile`);

  let explanation = `${result.predictedCategory} (confidence ${result.confidence.toFixed(2)})`;
  explanation += cues.length > 0 ? ` from ${cues.join(", ")} cue(s)` : " from default rules";
  if (result.rulesApplied.length > 0) {
    explanation += `; rules: ${result.rulesApplied.map(describeRule).join(", ")}`;
  }
  return explanation;
}

export function classifyBatch(
  texts: string[],
  contexts?: Array<ClassificationContext | undefined>,
): BatchClassification {
  const items = texts.map((text, index) => {
    const result = classifyMemory(text, contexts?.[index]);
    return { text, result, explanation: explainClassification(result) };
  });

  const total = items.length;
  const episodicCount = items.filter((item) => item.result.predictedCategory === "episodic").length;
  const semanticCount = total - episodicCount;
  const confidenceSum = items.reduce((sum, item) => sum + item.result.confidence, 0);
  const denominator = Math.max(total, 1);

  return {
    items,
    statistics: {
      total,
      episodicCount,
      semanticCount,
      episodicRatio: episodicCount / denominator,
      semanticRatio: semanticCount / denominator,
      highConfidenceCount: items.filter((item) => item.result.confidence >= HIGH_CONFIDENCE).length,
      lowConfidenceCount: items.filter((item) => item.result.confidence < DEFAULT_MANUAL_THRESHOLD).length,
      averageConfidence: confidenceSum / denominator,
    },
  };
}

export function validateClassification(
  text: string,
  expectedCategory: MemoryCategory,
  context?: ClassificationContext,
  threshold = DEFAULT_MANUAL_THRESHOLD,
): ClassificationValidation {
  const result = classifyMemory(text, context);
  const isCorrect = result.predictedCategory === expectedCategory;
  const suggestions: string[] = [];

  if (!isCorrect) {
    suggestions.push(`predicted "${result.predictedCategory}" but expected "${expectedCategory}"`);
    suggestions.push(
      result.confidence >= 0.7
        ? "misclassified with high confidence; the pattern sets may need a new cue"
        : "misclassified with low confidence; extra context such as speaker or fact type may help",
    );
  }
  if (result.confidence < threshold) {
    suggestions.push("confidence is below the manual-classification threshold");
  }

  return {
    predictedCategory: result.predictedCategory,
    expectedCategory,
    isCorrect,
    confidence: result.confidence,
    confidenceLevel: confidenceLevel(result.confidence, threshold),
    explanation: explainClassification(result),
    suggestions,
  };
}

export type FeatureStats = {
  avg: number;
  max: number;
  min: number;
  /** Texts in which the feature matched at least once. */
  occurrences: number;
};

export type PatternAnalysis = {
  total: number;
  episodicCount: number;
  semanticCount: number;
  /** null when no text landed in the category. */
  episodicFeatureStats: Record<FeatureName, FeatureStats> | null;
  semanticFeatureStats: Record<FeatureName, FeatureStats> | null;
  identifiedPatterns: string[];
};

function featureStats(vectors: FeatureVector[]): Record<FeatureName, FeatureStats> | null {
  if (vectors.length === 0) return null;
  const statsFor = (name: FeatureName): FeatureStats => {
    const values = vectors.map((v) => v[name]);
    return {
      avg: values.reduce((sum, v) => sum + v, 0) / values.length,
      max: Math.max(...values),
      min: Math.min(...values),
      occurrences: values.filter((v) => v > 0).length,
    };
  };
  return {
    temporal: statsFor("temporal"),
    emotional: statsFor("emotional"),
    conversational: statsFor("conversational"),
    factual: statsFor("factual"),
    profile: statsFor("profile"),
  };
}

// A pattern is reported when the feature averages more than one cue per text.
const PATTERN_RULES: ReadonlyArray<{ category: MemoryCategory; feature: FeatureName; message: string }> = [
  { category: "episodic", feature: "emotional", message: "episodic texts often carry strong emotional wording" },
  { category: "episodic", feature: "temporal", message: "episodic texts frequently use time expressions" },
  { category: "semantic", feature: "factual", message: "semantic texts are dominated by factual wording" },
  { category: "semantic", feature: "profile", message: "semantic texts often include personal profile details" },
];

/** Classifies the texts and summarises which cues drove each category. */
export function analyzePatterns(texts: string[], contexts?: Array<ClassificationContext | undefined>): PatternAnalysis {
  const batch = classifyBatch(texts, contexts);
  const byCategory: Record<MemoryCategory, FeatureVector[]> = { episodic: [], semantic: [] };
  for (const item of batch.items) byCategory[item.result.predictedCategory].push(item.result.features);

  const stats: Record<MemoryCategory, Record<FeatureName, FeatureStats> | null> = {
    episodic: featureStats(byCategory.episodic),
    semantic: featureStats(byCategory.semantic),
  };
  const identifiedPatterns = PATTERN_RULES
    .filter((rule) => (stats[rule.category]?.[rule.feature].avg ?? 0) > 1)
    .map((rule) => rule.message);

  return {
    total: batch.statistics.total,
    episodicCount: batch.statistics.episodicCount,
    semanticCount: batch.statistics.semanticCount,
    episodicFeatureStats: stats.episodic,
    semanticFeatureStats: stats.semantic,
    identifiedPatterns,
  };
}
