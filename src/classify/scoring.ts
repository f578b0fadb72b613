import { extractFeatures } from "@/classify/features";
import { DECLARATIVE_ENDING, INTERROGATIVE_ENDING, INTERROGATIVE_LEXEME } from "@/classify/patterns";
import type {
  ClassificationContext,
  ClassificationResult,
  ClassificationScores,
  FeatureVector,
  MemoryCategory,
} from "@/memory/types";

const FEATURE_WEIGHTS = {
  temporal: 2,
  emotional: 3,
  conversational: 2,
  factual: 2,
  profile: 3,
} as const;

const CONVERSATION_HINT_BONUS = 2;
const EMOTION_HINT_BONUS = 3;
const FACT_TYPE_HINT_BONUS = 5;
const SHORT_TEXT_CHARS = 10;

function isPresent(value: unknown): boolean {
  if (typeof value === "string") return value.trim().length > 0;
  if (value && typeof value === "object") return Object.keys(value).length > 0;
  return false;
}

export function hasFactTypeHint(context?: ClassificationContext): boolean {
  return isPresent(context?.factType);
}

export function hasConversationHint(context?: ClassificationContext): boolean {
  return isPresent(context?.conversationId) || isPresent(context?.speaker);
}

export function hasEmotionHint(context?: ClassificationContext): boolean {
  return isPresent(context?.emotion);
}

function lexicalScores(features: FeatureVector): ClassificationScores {
  return {
    episodic:
      FEATURE_WEIGHTS.temporal * features.temporal +
      FEATURE_WEIGHTS.emotional * features.emotional +
      FEATURE_WEIGHTS.conversational * features.conversational,
    semantic:
      FEATURE_WEIGHTS.factual * features.factual +
      FEATURE_WEIGHTS.profile * features.profile,
  };
}

function applyHeuristics(text: string, scores: ClassificationScores): void {
  const trimmed = text.trim();
  if (!trimmed) return;
  if (INTERROGATIVE_ENDING.test(trimmed) || INTERROGATIVE_LEXEME.test(trimmed)) {
    scores.episodic += 2;
  }
  if (DECLARATIVE_ENDING.test(trimmed)) {
    scores.semantic += 1;
  }
  // code points, so a Hangul syllable counts once
  if ([...text].length < SHORT_TEXT_CHARS) {
    scores.episodic += 1;
  }
}

export function pickCategory(scores: ClassificationScores): { category: MemoryCategory; confidence: number } {
  // ties go to semantic
  const category: MemoryCategory = scores.episodic > scores.semantic ? "episodic" : "semantic";
  const total = scores.episodic + scores.semantic;
  return { category, confidence: scores[category] / Math.max(total, 1) };
}

/** Raw two-way classification before business rules. */
export function scoreText(text: string, context?: ClassificationContext): ClassificationResult {
  const features = extractFeatures(text);
  const scores = lexicalScores(features);

  if (hasConversationHint(context)) scores.episodic += CONVERSATION_HINT_BONUS;
  if (hasEmotionHint(context)) scores.episodic += EMOTION_HINT_BONUS;
  if (hasFactTypeHint(context)) scores.semantic += FACT_TYPE_HINT_BONUS;

  applyHeuristics(text, scores);

  const { category, confidence } = pickCategory(scores);
  return {
    predictedCategory: category,
    confidence,
    scores,
    features,
    rulesApplied: [],
  };
}
