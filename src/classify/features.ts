import { FEATURE_NAMES, FEATURE_PATTERNS } from "@/classify/patterns";
import type { FeatureVector } from "@/memory/types";

export function emptyFeatures(): FeatureVector {
  return { temporal: 0, emotional: 0, conversational: 0, factual: 0, profile: 0 };
}

/**
 * Counts, per feature family, how many distinct matchers fire on the text.
 * A matcher that hits several times still counts once.
 */
export function extractFeatures(text: string): FeatureVector {
  const features = emptyFeatures();
  if (!text) return features;
  for (const name of FEATURE_NAMES) {
    let hits = 0;
    for (const pattern of FEATURE_PATTERNS[name]) {
      if (pattern.test(text)) hits++;
    }
    features[name] = hits;
  }
  return features;
}
