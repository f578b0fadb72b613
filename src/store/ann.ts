import type Database from "better-sqlite3";
import * as sqliteVec from "sqlite-vec";
import type { MemoryCategory } from "@/memory/types";

export type AnnStatus = {
  enabled: boolean;
  message: string;
};

export type AnnMatch = {
  id: string;
  distance: number;
};

export function vecTable(collection: MemoryCategory): string {
  return `memory_vec_${collection}`;
}

function createVecTable(db: Database.Database, collection: MemoryCategory, dimensions: number): void {
  db.exec(`
    CREATE VIRTUAL TABLE IF NOT EXISTS ${vecTable(collection)} USING vec0(
      id TEXT PRIMARY KEY,
      embedding FLOAT[${dimensions}] distance_metric=cosine,
      user_id TEXT
    );
  `);
}

export function initializeAnn(
  db: Database.Database,
  collections: readonly MemoryCategory[],
  dimensions: number,
): AnnStatus {
  try {
    sqliteVec.load(db);
    for (const collection of collections) createVecTable(db, collection, dimensions);
    return { enabled: true, message: "sqlite_vec_loaded" };
  } catch (error) {
    return {
      enabled: false,
      message: error instanceof Error ? error.message : "sqlite_vec_unavailable",
    };
  }
}

export function upsertEmbedding(
  db: Database.Database,
  collection: MemoryCategory,
  id: string,
  userId: string,
  embedding: number[],
): void {
  const table = vecTable(collection);
  db.prepare(`DELETE FROM ${table} WHERE id = ?`).run(id);
  db.prepare(`INSERT INTO ${table} (id, embedding, user_id) VALUES (?, ?, ?)`).run(
    id,
    JSON.stringify(embedding),
    userId,
  );
}

export function deleteEmbeddings(db: Database.Database, collection: MemoryCategory, ids: string[]): void {
  const stmt = db.prepare(`DELETE FROM ${vecTable(collection)} WHERE id = ?`);
  for (const id of ids) stmt.run(id);
}

export function clearEmbeddings(db: Database.Database, collection: MemoryCategory, dimensions: number): void {
  db.exec(`DROP TABLE IF EXISTS ${vecTable(collection)}`);
  createVecTable(db, collection, dimensions);
}

export function searchNearest(
  db: Database.Database,
  collection: MemoryCategory,
  queryEmbedding: number[],
  limit: number,
  userId: string,
): AnnMatch[] {
  if (limit <= 0) return [];
  return db
    .prepare<[string, number, string], AnnMatch>(`
      SELECT id, distance
      FROM ${vecTable(collection)}
      WHERE embedding MATCH ? AND k = ? AND user_id = ?
      ORDER BY distance
    `)
    .all(JSON.stringify(queryEmbedding), limit, userId);
}
