import { hasConversationHint, hasFactTypeHint } from "@/classify/scoring";
import type {
  BusinessRuleId,
  ClassificationContext,
  ClassificationResult,
  FeatureVector,
  MemoryCategory,
} from "@/memory/types";

type RuleState = {
  category: MemoryCategory;
  confidence: number;
};

type RuleInput = {
  text: string;
  context?: ClassificationContext;
  features: FeatureVector;
};

type BusinessRule = {
  id: BusinessRuleId;
  description: string;
  /** Returns the new state when the rule fires, or null when it does not apply. */
  apply(input: RuleInput, state: RuleState): RuleState | null;
};

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

// Order is precedence: a later rule overrides an earlier one.
export const BUSINESS_RULES: readonly BusinessRule[] = [
  {
    id: "short_text",
    description: "short text leans episodic",
    apply: ({ text }, state) => {
      if (countWords(text) > 3 || state.confidence >= 0.7) return null;
      return { category: "episodic", confidence: Math.max(state.confidence, 0.7) };
    },
  },
  {
    id: "explicit_fact_type",
    description: "explicit fact type forces semantic",
    apply: ({ context }) => {
      if (!hasFactTypeHint(context)) return null;
      return { category: "semantic", confidence: 0.95 };
    },
  },
  {
    id: "conversation_context",
    description: "conversation or speaker context favours episodic",
    apply: ({ context }, state) => {
      if (!hasConversationHint(context)) return null;
      if (state.category === "episodic") {
        return { category: "episodic", confidence: Math.min(state.confidence + 0.2, 1) };
      }
      if (state.confidence < 0.8) return { category: "episodic", confidence: 0.75 };
      return state;
    },
  },
  {
    id: "high_emotion",
    description: "strong emotional wording favours episodic",
    apply: ({ features }, state) => {
      if (features.emotional < 2 || state.category !== "semantic") return null;
      if (state.confidence < 0.8) return { category: "episodic", confidence: 0.8 };
      return state;
    },
  },
  {
    id: "profile_information",
    description: "profile information forces semantic",
    apply: ({ features }, state) => {
      if (features.profile < 2) return null;
      return { category: "semantic", confidence: Math.min(state.confidence + 0.3, 1) };
    },
  },
];

export function describeRule(id: BusinessRuleId): string {
  return BUSINESS_RULES.find((rule) => rule.id === id)?.description ?? id;
}

export function refineClassification(
  text: string,
  context: ClassificationContext | undefined,
  result: ClassificationResult,
): ClassificationResult {
  let state: RuleState = { category: result.predictedCategory, confidence: result.confidence };
  const rulesApplied: BusinessRuleId[] = [...result.rulesApplied];
  const input: RuleInput = { text, context, features: result.features };

  for (const rule of BUSINESS_RULES) {
    const next = rule.apply(input, state);
    if (!next) continue;
    state = next;
    rulesApplied.push(rule.id);
  }

  return {
    ...result,
    predictedCategory: state.category,
    confidence: state.confidence,
    rulesApplied,
  };
}
