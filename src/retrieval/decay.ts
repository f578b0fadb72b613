const MS_PER_DAY = 86_400_000;

/**
 * Recency multiplier in (0, 1]. Past and future items decay alike, since the
 * reference time is not necessarily "now".
 */
export function timeDecay(itemTime: Date, referenceTime: Date, weight: number): number {
  if (weight === 0) return 1;
  const days = Math.abs(referenceTime.getTime() - itemTime.getTime()) / MS_PER_DAY;
  return Math.exp(-days * weight);
}

export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value?.trim()) return null;
  const parsed = new Date(value.trim());
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
