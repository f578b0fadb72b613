import type { MemoryCategory, MemoryRecord, NewMemoryRecord } from "@/memory/types";

export type TimeRange = {
  from?: string;
  to?: string;
};

export type SearchFilters = {
  source?: string;
  speaker?: string;
  factType?: string;
  timeRange?: TimeRange;
};

export type StoreQuery = {
  vector: number[];
  userId: string;
  collection: MemoryCategory;
  limit: number;
  filters?: SearchFilters;
  signal?: AbortSignal;
};

export type StoredHit = {
  record: MemoryRecord;
  /** Cosine similarity in [-1, 1]. */
  score: number;
};

export type CollectionStats = {
  collection: MemoryCategory;
  pointCount: number;
  vectorDim: number;
  distanceMetric: "cosine";
  annEnabled: boolean;
};

/** Vector storage partitioned into one collection per memory category. */
export interface MemoryStore {
  insert(record: NewMemoryRecord): Promise<string>;
  search(query: StoreQuery): Promise<StoredHit[]>;
  get(id: string): Promise<MemoryRecord | null>;
  count(userId: string, collection: MemoryCategory): Promise<number>;
  deleteByUser(userId: string, collection: MemoryCategory): Promise<number>;
  getStats(collection: MemoryCategory): Promise<CollectionStats>;
  reset(collection: MemoryCategory): Promise<void>;
  close(): void;
}
