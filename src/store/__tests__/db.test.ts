import test from "node:test";
import assert from "node:assert/strict";
import { SqliteMemoryStore } from "@/store/db";
import { InvalidRequestError, StorageUnavailableError } from "@/memory/errors";
import type { NewMemoryRecord } from "@/memory/types";
import { near } from "@/__tests__/helpers";

function openStore(): SqliteMemoryStore {
  return new SqliteMemoryStore({ path: ":memory:", dimensions: 3, ann: false });
}

function episodic(
  text: string,
  embedding: number[],
  overrides: Partial<Pick<NewMemoryRecord, "userId" | "timestamp">> = {},
): NewMemoryRecord {
  return {
    userId: "alice",
    text,
    embedding,
    timestamp: "2024-05-01T12:00:00.000Z",
    importance: 0.5,
    source: "conversation",
    ...overrides,
    category: "episodic",
    episodic: { speaker: "bob", emotion: { valence: "positive", intensity: 0.7 }, context: { place: "cafe" }, links: ["m-1"] },
  };
}

function semantic(text: string, embedding: number[], factType: string | null = "world_fact"): NewMemoryRecord {
  return {
    userId: "alice",
    text,
    embedding,
    timestamp: "2024-04-01T00:00:00.000Z",
    importance: 0.8,
    source: "import",
    category: "semantic",
    semantic: { factType, confidenceScore: 0.95 },
  };
}

test("insert and get keep the tagged attributes", async () => {
  const store = openStore();
  const id = await store.insert(episodic("met bob at the cafe", [1, 0, 0]));
  const record = await store.get(id);
  assert.ok(record);
  assert.equal(record.category, "episodic");
  if (record.category !== "episodic") return;
  assert.equal(record.text, "met bob at the cafe");
  assert.deepEqual(record.embedding, [1, 0, 0]);
  assert.deepEqual(record.episodic, {
    speaker: "bob",
    emotion: { valence: "positive", intensity: 0.7 },
    context: { place: "cafe" },
    links: ["m-1"],
  });
  store.close();
});

test("get returns null for an unknown id", async () => {
  const store = openStore();
  assert.equal(await store.get("missing"), null);
  store.close();
});

test("search ranks by cosine similarity within one user and collection", async () => {
  const store = openStore();
  await store.insert(episodic("exact", [1, 0, 0]));
  await store.insert(episodic("close", [1, 1, 0]));
  await store.insert(episodic("orthogonal", [0, 0, 1]));
  await store.insert(episodic("other user", [1, 0, 0], { userId: "carol" }));
  await store.insert(semantic("other collection", [1, 0, 0]));

  const hits = await store.search({ vector: [1, 0, 0], userId: "alice", collection: "episodic", limit: 10 });
  assert.deepEqual(hits.map((h) => h.record.text), ["exact", "close", "orthogonal"]);
  assert.ok(near(hits[0].score, 1));
  assert.ok(near(hits[1].score, Math.SQRT1_2));
  assert.equal(hits[2].score, 0);
  store.close();
});

test("search honours the limit", async () => {
  const store = openStore();
  await store.insert(semantic("a", [1, 0, 0]));
  await store.insert(semantic("b", [0, 1, 0]));
  const hits = await store.search({ vector: [1, 0, 0], userId: "alice", collection: "semantic", limit: 1 });
  assert.deepEqual(hits.map((h) => h.record.text), ["a"]);
  store.close();
});

test("search filters on speaker, fact type, source and time range", async () => {
  const store = openStore();
  await store.insert(episodic("with bob", [1, 0, 0]));
  await store.insert(episodic("later", [1, 0, 0], { timestamp: "2024-06-01T00:00:00.000Z" }));
  await store.insert(semantic("a world fact", [1, 0, 0]));
  await store.insert(semantic("a profile fact", [1, 0, 0], "profile"));

  const bySpeaker = await store.search({ vector: [1, 0, 0], userId: "alice", collection: "episodic", limit: 10, filters: { speaker: "nobody" } });
  assert.equal(bySpeaker.length, 0);

  const byRange = await store.search({
    vector: [1, 0, 0],
    userId: "alice",
    collection: "episodic",
    limit: 10,
    filters: { timeRange: { from: "2024-05-15T00:00:00Z" } },
  });
  assert.deepEqual(byRange.map((h) => h.record.text), ["later"]);

  const byFactType = await store.search({ vector: [1, 0, 0], userId: "alice", collection: "semantic", limit: 10, filters: { factType: "profile" } });
  assert.deepEqual(byFactType.map((h) => h.record.text), ["a profile fact"]);

  const bySource = await store.search({ vector: [1, 0, 0], userId: "alice", collection: "semantic", limit: 10, filters: { source: "conversation" } });
  assert.equal(bySource.length, 0);
  store.close();
});

test("vectors of the wrong dimension are rejected", async () => {
  const store = openStore();
  await assert.rejects(store.insert(episodic("bad", [1, 0])), InvalidRequestError);
  await assert.rejects(store.search({ vector: [1, 0, 0, 0], userId: "alice", collection: "episodic", limit: 1 }), InvalidRequestError);
  store.close();
});

test("an invalid time range bound is rejected", async () => {
  const store = openStore();
  await assert.rejects(
    store.search({ vector: [1, 0, 0], userId: "alice", collection: "episodic", limit: 1, filters: { timeRange: { to: "someday" } } }),
    InvalidRequestError,
  );
  store.close();
});

test("count, deleteByUser and stats track one collection at a time", async () => {
  const store = openStore();
  await store.insert(episodic("one", [1, 0, 0]));
  await store.insert(episodic("two", [0, 1, 0]));
  await store.insert(semantic("fact", [0, 0, 1]));
  await store.insert(episodic("carol's", [1, 0, 0], { userId: "carol" }));

  assert.equal(await store.count("alice", "episodic"), 2);
  assert.equal(await store.count("alice", "semantic"), 1);
  assert.deepEqual(await store.getStats("episodic"), {
    collection: "episodic",
    pointCount: 3,
    vectorDim: 3,
    distanceMetric: "cosine",
    annEnabled: false,
  });

  assert.equal(await store.deleteByUser("alice", "episodic"), 2);
  assert.equal(await store.count("alice", "episodic"), 0);
  assert.equal(await store.count("alice", "semantic"), 1);
  assert.equal(await store.count("carol", "episodic"), 1);
  store.close();
});

test("reset empties only the named collection", async () => {
  const store = openStore();
  await store.insert(episodic("one", [1, 0, 0]));
  await store.insert(semantic("fact", [0, 0, 1]));
  await store.reset("episodic");
  assert.equal((await store.getStats("episodic")).pointCount, 0);
  assert.equal((await store.getStats("semantic")).pointCount, 1);
  store.close();
});

test("SQLite failures surface as storage errors", async () => {
  const store = openStore();
  store.close();
  await assert.rejects(store.count("alice", "episodic"), StorageUnavailableError);
});

test("an aborted signal stops a search", async () => {
  const store = openStore();
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(
    store.search({ vector: [1, 0, 0], userId: "alice", collection: "episodic", limit: 1, signal: controller.signal }),
    { name: "AbortError" },
  );
  store.close();
});
