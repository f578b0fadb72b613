import Database from "better-sqlite3";
import { randomUUID } from "crypto";
import { log } from "@/logger";
import { InvalidRequestError, MemoryError, StorageUnavailableError, errorMessage } from "@/memory/errors";
import { MEMORY_CATEGORIES, isMemoryCategory } from "@/memory/types";
import type {
  EmotionInfo,
  EpisodicAttributes,
  MemoryCategory,
  MemoryRecord,
  NewMemoryRecord,
  SemanticAttributes,
} from "@/memory/types";
import { parseTimestamp } from "@/retrieval/decay";
import { clearEmbeddings, deleteEmbeddings, initializeAnn, searchNearest, type AnnStatus, upsertEmbedding } from "@/store/ann";
import type { CollectionStats, MemoryStore, SearchFilters, StoredHit, StoreQuery } from "@/store/types";
import { cosine, isFiniteVector } from "@/store/vector";

const SCHEMA_VERSION = 1;

export type SqliteStoreOptions = {
  /** File path, or ":memory:". */
  path: string;
  dimensions: number;
  /** Try to load sqlite-vec; falls back to brute-force cosine when unavailable. */
  ann: boolean;
};

type StoredRow = {
  id: string;
  collection: string;
  user_id: string;
  text: string;
  embedding_json: string | null;
  timestamp: string;
  importance: number;
  source: string;
  attributes_json: string;
  created_at: number;
};

const ROW_COLUMNS = `id, collection, user_id, text, embedding_json, timestamp, importance, source, attributes_json, created_at`;

function ensureSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      version INTEGER NOT NULL
    );
    INSERT OR IGNORE INTO schema_version(id, version) VALUES (1, 0);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS memory_records (
      id TEXT PRIMARY KEY,
      collection TEXT NOT NULL,
      user_id TEXT NOT NULL,
      text TEXT NOT NULL,
      embedding_json TEXT,
      timestamp TEXT NOT NULL,
      importance REAL NOT NULL DEFAULT 0.5,
      source TEXT NOT NULL DEFAULT 'conversation',
      attributes_json TEXT NOT NULL DEFAULT '{}',
      created_at INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_memory_collection_user
    ON memory_records(collection, user_id);
    CREATE INDEX IF NOT EXISTS idx_memory_collection_timestamp
    ON memory_records(collection, timestamp DESC);
  `);

  db.prepare(`UPDATE schema_version SET version = ? WHERE id = 1 AND version < ?`).run(SCHEMA_VERSION, SCHEMA_VERSION);
}

function asObject(value: unknown): Record<string, unknown> | null {
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
}

function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function parseJson(raw: string | null): unknown {
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function parseEmbedding(raw: string | null): number[] | null {
  const parsed = parseJson(raw);
  if (!Array.isArray(parsed)) return null;
  const vector: number[] = [];
  for (const value of parsed) {
    if (typeof value !== "number") return null;
    vector.push(value);
  }
  return vector;
}

function readEpisodic(attrs: Record<string, unknown>): EpisodicAttributes {
  const links = Array.isArray(attrs.links) ? attrs.links.filter((l): l is string => typeof l === "string") : [];
  const emotion: EmotionInfo | null = asObject(attrs.emotion);
  return {
    speaker: asString(attrs.speaker),
    emotion,
    context: asObject(attrs.context),
    links,
  };
}

function readSemantic(attrs: Record<string, unknown>): SemanticAttributes {
  return {
    factType: asString(attrs.factType),
    confidenceScore: typeof attrs.confidenceScore === "number" ? attrs.confidenceScore : 1,
  };
}

function parseRow(row: StoredRow): MemoryRecord {
  const attrs = asObject(parseJson(row.attributes_json)) ?? {};
  const base = {
    id: row.id,
    userId: row.user_id,
    text: row.text,
    embedding: parseEmbedding(row.embedding_json),
    timestamp: row.timestamp,
    importance: Number(row.importance),
    source: row.source,
  };
  if (row.collection === "episodic") {
    return { ...base, category: "episodic", episodic: readEpisodic(attrs) };
  }
  return { ...base, category: "semantic", semantic: readSemantic(attrs) };
}

function attributesOf(record: NewMemoryRecord): EpisodicAttributes | SemanticAttributes {
  return record.category === "episodic" ? record.episodic : record.semantic;
}

function normalizeBound(value: string | undefined, label: string): string | null {
  if (value === undefined) return null;
  const parsed = parseTimestamp(value);
  if (!parsed) throw new InvalidRequestError(`invalid ${label} timestamp: ${value}`);
  return parsed.toISOString();
}

function hasFilters(filters: SearchFilters | undefined): boolean {
  if (!filters) return false;
  return Boolean(filters.source || filters.speaker || filters.factType || filters.timeRange?.from || filters.timeRange?.to);
}

export class SqliteMemoryStore implements MemoryStore {
  private readonly db: Database.Database;
  private readonly dimensions: number;
  private annStatus: AnnStatus = { enabled: false, message: "disabled" };

  constructor(private readonly options: SqliteStoreOptions) {
    this.dimensions = options.dimensions;
    this.db = this.guard("open", () => {
      const db = new Database(options.path);
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = NORMAL");
      db.pragma("temp_store = MEMORY");
      ensureSchema(db);
      return db;
    });
    if (options.ann) {
      this.annStatus = initializeAnn(this.db, MEMORY_CATEGORIES, this.dimensions);
      if (this.annStatus.enabled) this.syncAnnIndex();
      else log.warn({ reason: this.annStatus.message }, "sqlite-vec unavailable, using brute-force search");
    }
  }

  get ann(): AnnStatus {
    return this.annStatus;
  }

  get path(): string {
    return this.options.path;
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof MemoryError) throw error;
      throw new StorageUnavailableError(`storage ${operation} failed: ${errorMessage(error, "unknown error")}`, error);
    }
  }

  private checkVector(vector: number[]): void {
    if (vector.length !== this.dimensions) {
      throw new InvalidRequestError(`expected a ${this.dimensions}-dimensional vector, got ${vector.length}`);
    }
    if (!isFiniteVector(vector)) throw new InvalidRequestError("vector contains non-finite values");
  }

  private syncAnnIndex(): void {
    try {
      const rows = this.db
        .prepare<[], { id: string; collection: string; user_id: string; embedding_json: string }>(`
          SELECT id, collection, user_id, embedding_json
          FROM memory_records
          WHERE embedding_json IS NOT NULL
        `)
        .all();
      for (const row of rows) {
        const embedding = parseEmbedding(row.embedding_json);
        // skip malformed or differently-sized historical embeddings
        if (!embedding || embedding.length !== this.dimensions || !isMemoryCategory(row.collection)) continue;
        upsertEmbedding(this.db, row.collection, row.id, row.user_id, embedding);
      }
    } catch (error) {
      this.annStatus = { enabled: false, message: "ann_sync_failed" };
      log.warn({ error: errorMessage(error, "unknown error") }, "sqlite-vec index sync failed");
    }
  }

  async insert(record: NewMemoryRecord): Promise<string> {
    if (record.embedding) this.checkVector(record.embedding);
    const id = randomUUID();
    const { db } = this;
    this.guard("insert", () => {
      const tx = db.transaction(() => {
        db.prepare(`
          INSERT INTO memory_records (${ROW_COLUMNS})
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
          id,
          record.category,
          record.userId,
          record.text,
          record.embedding ? JSON.stringify(record.embedding) : null,
          record.timestamp,
          record.importance,
          record.source,
          JSON.stringify(attributesOf(record)),
          Date.now(),
        );
        if (this.annStatus.enabled && record.embedding) {
          upsertEmbedding(db, record.category, id, record.userId, record.embedding);
        }
      });
      tx();
    });
    return id;
  }

  async search(query: StoreQuery): Promise<StoredHit[]> {
    query.signal?.throwIfAborted();
    this.checkVector(query.vector);
    if (query.limit <= 0) return [];

    if (this.annStatus.enabled && !hasFilters(query.filters)) {
      try {
        return this.searchAnn(query);
      } catch (error) {
        log.warn({ collection: query.collection, error: errorMessage(error, "unknown error") }, "ann search failed, falling back to brute force");
      }
    }
    return this.searchBruteForce(query);
  }

  private searchAnn(query: StoreQuery): StoredHit[] {
    const matches = searchNearest(this.db, query.collection, query.vector, query.limit, query.userId);
    if (matches.length === 0) return [];
    const records = this.loadByIds(matches.map((m) => m.id));
    const hits: StoredHit[] = [];
    for (const match of matches) {
      const record = records.get(match.id);
      if (!record) continue;
      hits.push({ record, score: 1 - Number(match.distance) });
    }
    return hits;
  }

  private searchBruteForce(query: StoreQuery): StoredHit[] {
    const where = ["collection = ?", "user_id = ?", "embedding_json IS NOT NULL"];
    const params: unknown[] = [query.collection, query.userId];
    const filters = query.filters;

    if (filters?.source) {
      where.push("source = ?");
      params.push(filters.source);
    }
    if (filters?.speaker) {
      where.push("json_extract(attributes_json, '$.speaker') = ?");
      params.push(filters.speaker);
    }
    if (filters?.factType) {
      where.push("json_extract(attributes_json, '$.factType') = ?");
      params.push(filters.factType);
    }
    const from = normalizeBound(filters?.timeRange?.from, "from");
    const to = normalizeBound(filters?.timeRange?.to, "to");
    if (from) {
      where.push("timestamp >= ?");
      params.push(from);
    }
    if (to) {
      where.push("timestamp <= ?");
      params.push(to);
    }

    const rows = this.guard("search", () =>
      this.db
        .prepare<unknown[], StoredRow>(`SELECT ${ROW_COLUMNS} FROM memory_records WHERE ${where.join(" AND ")}`)
        .all(...params),
    );

    const hits: StoredHit[] = [];
    for (const row of rows) {
      const record = parseRow(row);
      if (!record.embedding) continue;
      hits.push({ record, score: cosine(query.vector, record.embedding) });
    }
    return hits.sort((a, b) => b.score - a.score).slice(0, query.limit);
  }

  private loadByIds(ids: string[]): Map<string, MemoryRecord> {
    const placeholders = ids.map(() => "?").join(",");
    const rows = this.guard("load", () =>
      this.db
        .prepare<string[], StoredRow>(`SELECT ${ROW_COLUMNS} FROM memory_records WHERE id IN (${placeholders})`)
        .all(...ids),
    );
    return new Map(rows.map((row) => [row.id, parseRow(row)]));
  }

  async get(id: string): Promise<MemoryRecord | null> {
    const row = this.guard("get", () =>
      this.db.prepare<[string], StoredRow>(`SELECT ${ROW_COLUMNS} FROM memory_records WHERE id = ? LIMIT 1`).get(id),
    );
    return row ? parseRow(row) : null;
  }

  async count(userId: string, collection: MemoryCategory): Promise<number> {
    const row = this.guard("count", () =>
      this.db
        .prepare<[string, string], { c: number }>(`SELECT COUNT(*) AS c FROM memory_records WHERE collection = ? AND user_id = ?`)
        .get(collection, userId),
    );
    return row?.c ?? 0;
  }

  async deleteByUser(userId: string, collection: MemoryCategory): Promise<number> {
    const { db } = this;
    return this.guard("delete", () => {
      const tx = db.transaction(() => {
        if (this.annStatus.enabled) {
          const ids = db
            .prepare<[string, string], { id: string }>(`SELECT id FROM memory_records WHERE collection = ? AND user_id = ?`)
            .all(collection, userId)
            .map((row) => row.id);
          deleteEmbeddings(db, collection, ids);
        }
        return db.prepare(`DELETE FROM memory_records WHERE collection = ? AND user_id = ?`).run(collection, userId).changes;
      });
      return tx();
    });
  }

  async getStats(collection: MemoryCategory): Promise<CollectionStats> {
    const row = this.guard("stats", () =>
      this.db.prepare<[string], { c: number }>(`SELECT COUNT(*) AS c FROM memory_records WHERE collection = ?`).get(collection),
    );
    return {
      collection,
      pointCount: row?.c ?? 0,
      vectorDim: this.dimensions,
      distanceMetric: "cosine",
      annEnabled: this.annStatus.enabled,
    };
  }

  async reset(collection: MemoryCategory): Promise<void> {
    const { db } = this;
    this.guard("reset", () => {
      db.prepare(`DELETE FROM memory_records WHERE collection = ?`).run(collection);
      if (this.annStatus.enabled) clearEmbeddings(db, collection, this.dimensions);
    });
    log.info({ collection }, "collection reset");
  }

  close(): void {
    this.db.close();
  }
}
