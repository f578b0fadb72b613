import { classifyMemory } from "@/classify";
import type { ClassificationResult, CollectionWeightMap } from "@/memory/types";

const WINNER_BOOST = 0.5;
const LOSER_PENALTY = 0.3;

/** Leans the collection weights toward the category the query itself reads as. */
export function deriveQueryWeights(classification: ClassificationResult): CollectionWeightMap {
  const { predictedCategory, confidence } = classification;
  const winner = 1 + WINNER_BOOST * confidence;
  const loser = 1 - LOSER_PENALTY * confidence;
  return predictedCategory === "episodic"
    ? { episodic: winner, semantic: loser }
    : { episodic: loser, semantic: winner };
}

export function queryWeights(query: string): { weights: CollectionWeightMap; classification: ClassificationResult } {
  const classification = classifyMemory(query);
  return { weights: deriveQueryWeights(classification), classification };
}
