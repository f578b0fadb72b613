import type { Embedder } from "@/embedding/types";
import { EncodingFailedError } from "@/memory/errors";
import type { MemoryCategory, MemoryRecord, NewMemoryRecord } from "@/memory/types";
import type { CollectionStats, MemoryStore, StoredHit, StoreQuery } from "@/store/types";

export function near(actual: number, expected: number, epsilon = 1e-9): boolean {
  return Math.abs(actual - expected) < epsilon;
}

export function episodicRecord(id: string, overrides: Partial<Omit<MemoryRecord, "category">> = {}): MemoryRecord {
  return {
    id,
    userId: "alice",
    text: `memory ${id}`,
    embedding: null,
    timestamp: "2024-05-01T12:00:00.000Z",
    importance: 0.5,
    source: "conversation",
    ...overrides,
    category: "episodic",
    episodic: { speaker: null, emotion: null, context: null, links: [] },
  };
}

export function semanticRecord(id: string, overrides: Partial<Omit<MemoryRecord, "category">> = {}): MemoryRecord {
  return {
    id,
    userId: "alice",
    text: `fact ${id}`,
    embedding: null,
    timestamp: "2024-05-01T12:00:00.000Z",
    importance: 0.5,
    source: "conversation",
    ...overrides,
    category: "semantic",
    semantic: { factType: null, confidenceScore: 1 },
  };
}

type CollectionBehaviour = StoredHit[] | Error;

/** In-process store returning canned hits per collection and recording every query. */
export class FakeStore implements MemoryStore {
  readonly queries: StoreQuery[] = [];
  readonly inserted: NewMemoryRecord[] = [];

  constructor(private readonly behaviour: Partial<Record<MemoryCategory, CollectionBehaviour>> = {}) {}

  async insert(record: NewMemoryRecord): Promise<string> {
    this.inserted.push(record);
    return `mem-${this.inserted.length}`;
  }

  async search(query: StoreQuery): Promise<StoredHit[]> {
    this.queries.push(query);
    const behaviour = this.behaviour[query.collection] ?? [];
    if (behaviour instanceof Error) throw behaviour;
    return behaviour.slice(0, query.limit);
  }

  async get(): Promise<MemoryRecord | null> {
    return null;
  }

  async count(): Promise<number> {
    const failure = Object.values(this.behaviour).find((b): b is Error => b instanceof Error);
    if (failure) throw failure;
    return 0;
  }

  async deleteByUser(): Promise<number> {
    return 0;
  }

  async getStats(collection: MemoryCategory): Promise<CollectionStats> {
    return { collection, pointCount: 0, vectorDim: 3, distanceMetric: "cosine", annEnabled: false };
  }

  async reset(): Promise<void> {}

  close(): void {}
}

/** Maps texts to vectors by keyword; anything unmatched gets the fallback vector. */
export class FakeEmbedder implements Embedder {
  readonly name = "fake";
  readonly dimensions = 3;
  readonly calls: string[] = [];

  constructor(
    private readonly keywords: Array<[string, number[]]> = [],
    private readonly fallback: number[] = [0, 0, 1],
    private readonly failure: Error | null = null,
  ) {}

  async encode(text: string, signal?: AbortSignal): Promise<number[]> {
    signal?.throwIfAborted();
    this.calls.push(text);
    if (this.failure) throw this.failure;
    const hit = this.keywords.find(([keyword]) => text.includes(keyword));
    return hit ? hit[1] : this.fallback;
  }

  async encodeBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const out: number[][] = [];
    for (const text of texts) out.push(await this.encode(text, signal));
    return out;
  }
}

export function failingEmbedder(): FakeEmbedder {
  return new FakeEmbedder([], [0, 0, 1], new EncodingFailedError("model offline"));
}
