import { InvalidRequestError } from "@/memory/errors";
import { MEMORY_CATEGORIES, isMemoryCategory } from "@/memory/types";
import type { ClassificationContext, EmotionInfo, MemoryCategory } from "@/memory/types";

export function asObject(v: unknown): Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : {};
}

export function optionalString(v: unknown, field: string): string | undefined {
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new InvalidRequestError(`${field} must be a string`);
  return v.trim() || undefined;
}

function emotionFrom(v: unknown): EmotionInfo {
  if (typeof v !== "object" || v === null || Array.isArray(v)) {
    throw new InvalidRequestError("context.emotion must be an object");
  }
  return asObject(v);
}

/** Accepts snake_case or camelCase hint keys from JSON input. */
export function normalizeContext(v: unknown): ClassificationContext {
  const raw = asObject(v);
  const emotion: EmotionInfo | null = raw.emotion === undefined || raw.emotion === null ? null : emotionFrom(raw.emotion);
  return {
    factType: optionalString(raw.fact_type ?? raw.factType, "context.fact_type") ?? null,
    conversationId: optionalString(raw.conversation_id ?? raw.conversationId, "context.conversation_id") ?? null,
    speaker: optionalString(raw.speaker, "context.speaker") ?? null,
    emotion,
  };
}

export function normalizeCategory(v: unknown): MemoryCategory {
  if (isMemoryCategory(v)) return v;
  throw new InvalidRequestError(`unknown category: ${String(v)}; expected one of ${MEMORY_CATEGORIES.join(", ")}`);
}
