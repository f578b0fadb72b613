import type { MemoryRecord } from "@/memory/types";
import { parseTimestamp } from "@/retrieval/decay";

export type ProfileSlot = "birthday" | "occupation" | "interests" | "name";

/** Query used to pull profile-like facts out of the semantic collection. */
export const PROFILE_QUERY = "생일 나이 직업 취미 이름";

// Checked in order; a text fills the first slot whose keywords it contains.
const SLOT_KEYWORDS: ReadonlyArray<[ProfileSlot, readonly string[]]> = [
  ["birthday", ["생일", "태어났", "출생", "birthday", "born"]],
  ["occupation", ["직업", "일하", "근무", "occupation", "work as", "works as"]],
  ["interests", ["취미", "좋아하", "관심", "hobby", "hobbies", "interested in"]],
  ["name", ["이름", "불러", "부르", "my name", "call me"]],
];

export type UserProfile = {
  userId: string;
  profile: Record<ProfileSlot, string | null>;
  /** Share of the four slots that were filled. */
  completeness: number;
  lastUpdated: string | null;
};

export function slotFor(text: string): ProfileSlot | null {
  const lowered = text.toLowerCase();
  for (const [slot, keywords] of SLOT_KEYWORDS) {
    if (keywords.some((keyword) => lowered.includes(keyword))) return slot;
  }
  return null;
}

/** Fills each slot from the first record (in rank order) that mentions it. */
export function buildProfile(userId: string, records: MemoryRecord[]): UserProfile {
  const profile: Record<ProfileSlot, string | null> = { birthday: null, occupation: null, interests: null, name: null };
  let latest: Date | null = null;

  for (const record of records) {
    const slot = slotFor(record.text);
    if (!slot || profile[slot] !== null) continue;
    profile[slot] = record.text;
    const at = parseTimestamp(record.timestamp);
    if (at && (!latest || at > latest)) latest = at;
  }

  const filled = Object.values(profile).filter((value) => value !== null).length;
  return {
    userId,
    profile,
    completeness: filled / SLOT_KEYWORDS.length,
    lastUpdated: latest ? latest.toISOString() : null,
  };
}
