import test from "node:test";
import assert from "node:assert/strict";
import {
  analyzePatterns,
  classifyBatch,
  classifyMemory,
  confidenceLevel,
  explainClassification,
  shouldRequestManualClassification,
  validateClassification,
} from "@/classify";
import { near } from "@/__tests__/helpers";

test("a short emotional diary line is episodic", () => {
  const result = classifyMemory("오늘 기분이 좋아");
  assert.equal(result.predictedCategory, "episodic");
  assert.ok(result.confidence >= 0.7);
  assert.deepEqual(result.rulesApplied, []);
});

test("an explicit fact type yields semantic at 0.95", () => {
  const result = classifyMemory("어제 친구랑 영화 봤어", { factType: "world_fact" });
  assert.equal(result.predictedCategory, "semantic");
  assert.equal(result.confidence, 0.95);
  assert.deepEqual(result.rulesApplied, ["explicit_fact_type"]);
});

test("profile cues override the short-text rule", () => {
  const result = classifyMemory("어제 취미 이름");
  assert.equal(result.predictedCategory, "semantic");
  assert.ok(near(result.confidence, 1));
  assert.deepEqual(result.rulesApplied, ["short_text", "profile_information"]);
});

test("confidence stays within [0, 1]", () => {
  for (const text of ["", "ㅋㅋ", "오늘 어제 내일 행복 슬퍼 화나 말했어", "is a the fact history capital"]) {
    const { confidence } = classifyMemory(text, { speaker: "bob", emotion: { valence: "positive" } });
    assert.ok(confidence >= 0 && confidence <= 1, `${text} -> ${confidence}`);
  }
});

test("confidenceLevel buckets by threshold", () => {
  assert.equal(confidenceLevel(0.8), "high");
  assert.equal(confidenceLevel(0.6), "medium");
  assert.equal(confidenceLevel(0.59), "low");
  assert.equal(confidenceLevel(0.5, 0.4), "medium");
});

test("manual classification is requested below the threshold", () => {
  assert.equal(shouldRequestManualClassification(classifyMemory("the quick brown fox jumps over the lazy dog")), true);
  assert.equal(shouldRequestManualClassification(classifyMemory("오늘 기분이 좋아")), false);
});

test("explainClassification lists cues", () => {
  assert.equal(
    explainClassification(classifyMemory("오늘 기분이 좋아")),
    "episodic (confidence 1.00) from 1 temporal, 1 emotional cue(s)",
  );
  assert.equal(
    explainClassification(classifyMemory("the quick brown fox jumps over the lazy dog")),
    "semantic (confidence 0.00) from default rules",
  );
});

test("classifyBatch reports statistics", () => {
  const batch = classifyBatch(["오늘 기분이 좋아", "the quick brown fox jumps over the lazy dog"]);
  assert.equal(batch.items.length, 2);
  assert.deepEqual(batch.statistics, {
    total: 2,
    episodicCount: 1,
    semanticCount: 1,
    episodicRatio: 0.5,
    semanticRatio: 0.5,
    highConfidenceCount: 1,
    lowConfidenceCount: 1,
    averageConfidence: 0.5,
  });
});

test("classifyBatch pairs contexts with texts by position", () => {
  const batch = classifyBatch(["어제 친구랑 영화 봤어", "어제 친구랑 영화 봤어"], [undefined, { factType: "world_fact" }]);
  assert.equal(batch.items[0].result.predictedCategory, "episodic");
  assert.equal(batch.items[1].result.confidence, 0.95);
});

test("classifyBatch of nothing has zeroed statistics", () => {
  const batch = classifyBatch([]);
  assert.equal(batch.statistics.total, 0);
  assert.equal(batch.statistics.averageConfidence, 0);
});

test("validateClassification flags a confident miss", () => {
  const validation = validateClassification("오늘 기분이 좋아", "semantic");
  assert.equal(validation.isCorrect, false);
  assert.equal(validation.predictedCategory, "episodic");
  assert.equal(validation.confidenceLevel, "high");
  assert.deepEqual(validation.suggestions, [
    'predicted "episodic" but expected "semantic"',
    "misclassified with high confidence; the pattern sets may need a new cue",
  ]);
});

test("validateClassification of a correct low-confidence result suggests review", () => {
  const validation = validateClassification("the quick brown fox jumps over the lazy dog", "semantic");
  assert.equal(validation.isCorrect, true);
  assert.equal(validation.confidenceLevel, "low");
  assert.deepEqual(validation.suggestions, ["confidence is below the manual-classification threshold"]);
});

test("classifying the same text twice gives the same result", () => {
  const context = { speaker: "bob", emotion: { valence: "positive" } };
  assert.deepEqual(classifyMemory("어제 친구랑 영화 봤어", context), classifyMemory("어제 친구랑 영화 봤어", context));
  assert.deepEqual(classifyMemory("서울은 한국의 수도이다"), classifyMemory("서울은 한국의 수도이다"));
});

test("analyzePatterns summarises feature use per category", () => {
  const analysis = analyzePatterns([
    "오늘 기분이 좋아",
    "오늘 행복한데 피곤해",
    "the quick brown fox jumps over the lazy dog",
  ]);
  assert.equal(analysis.total, 3);
  assert.equal(analysis.episodicCount, 2);
  assert.equal(analysis.semanticCount, 1);
  assert.deepEqual(analysis.episodicFeatureStats?.emotional, { avg: 1.5, max: 2, min: 1, occurrences: 2 });
  assert.deepEqual(analysis.episodicFeatureStats?.temporal, { avg: 1, max: 1, min: 1, occurrences: 2 });
  assert.deepEqual(analysis.semanticFeatureStats?.factual, { avg: 0, max: 0, min: 0, occurrences: 0 });
  assert.deepEqual(analysis.identifiedPatterns, ["episodic texts often carry strong emotional wording"]);
});

test("analyzePatterns leaves an empty category without statistics", () => {
  const analysis = analyzePatterns(["오늘 기분이 좋아"]);
  assert.equal(analysis.semanticCount, 0);
  assert.equal(analysis.semanticFeatureStats, null);
  assert.deepEqual(analysis.identifiedPatterns, []);
});
