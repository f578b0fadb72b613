import { InvalidArgumentError } from "commander";
import { normalizeContext } from "@/memory/context";
import { InvalidRequestError } from "@/memory/errors";
import type { ClassificationContext } from "@/memory/types";
import { parseTimestamp } from "@/retrieval/decay";

export function parseNumber(min: number, max: number, integer = false) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isFinite(n) || n < min || n > max || (integer && !Number.isInteger(n))) {
      throw new InvalidArgumentError(`expected ${integer ? "an integer" : "a number"} within [${min}, ${max}]`);
    }
    return n;
  };
}

export function parseDate(value: string): Date {
  const parsed = parseTimestamp(value);
  if (!parsed) throw new InvalidArgumentError("expected an ISO-8601 timestamp");
  return parsed;
}

export function parseContext(raw: string | undefined): ClassificationContext {
  if (raw === undefined) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new InvalidRequestError("--context must be valid JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InvalidRequestError("--context must be a JSON object");
  }
  return normalizeContext(parsed);
}
