import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { IndexUnavailableError } from "../src/errors.js";
import { fileIndexPersistence } from "../src/retrieval/indexStore.js";
import type { IndexPersistence } from "../src/retrieval/indexStore.js";
import type { EmbeddedChunk, StoredIndex } from "../src/retrieval/types.js";
import { LocalVectorIndex } from "../src/retrieval/vectorIndex.js";

function chunk(
  documentId: string,
  ordinal: number,
  text: string,
  embedding: number[],
  embeddingModel = "m1"
): EmbeddedChunk {
  return {
    documentId,
    filename: `${documentId}.txt`,
    format: "text",
    unitLabel: "document",
    ordinal,
    start: ordinal * 10,
    end: ordinal * 10 + text.length,
    text,
    extractionConfidence: 1,
    ingestedAt: "2026-03-01T00:00:00.000Z",
    embedding,
    embeddingModel
  };
}

describe("LocalVectorIndex", () => {
  it("returns every entry when k exceeds the index size, best first", async () => {
    const index = LocalVectorIndex.inMemory();
    await index.replaceDocument("a", [chunk("a", 0, "far", [0, 1])]);
    await index.replaceDocument("b", [chunk("b", 0, "near", [1, 0.1])]);

    const hits = await index.search([1, 0], 5, "m1");
    expect(hits.map((h) => h.text)).toEqual(["near", "far"]);
    expect(hits[0]?.score).toBeGreaterThan(hits[1]?.score ?? 1);
    expect(hits[1]?.score).toBe(0);
  });

  it("only compares vectors from the same model and dimension", async () => {
    const index = LocalVectorIndex.inMemory();
    await index.replaceDocument("a", [
      chunk("a", 0, "same model", [1, 0]),
      chunk("a", 1, "other model", [1, 0], "m2"),
      chunk("a", 2, "other dimension", [1, 0, 0])
    ]);

    const hits = await index.search([1, 0], 5, "m1");
    expect(hits.map((h) => h.text)).toEqual(["same model"]);
    expect(hits[0]?.provenance).toMatchObject({
      kind: "document",
      id: "a",
      title: "a.txt",
      label: "document",
      span: { start: 0, end: 10 }
    });
  });

  it("searches an empty index without error", async () => {
    expect(await LocalVectorIndex.inMemory().search([1, 0], 5, "m1")).toEqual([]);
  });

  it("keeps only the latest ingestion of a document", async () => {
    const index = LocalVectorIndex.inMemory();
    expect(await index.replaceDocument("a", [chunk("a", 0, "old one", [1, 0]), chunk("a", 1, "old two", [1, 0])])).toBe(1);
    expect(await index.replaceDocument("a", [chunk("a", 0, "new one", [1, 0])])).toBe(2);

    const hits = await index.search([1, 0], 10, "m1");
    expect(hits.map((h) => h.text)).toEqual(["new one"]);
    expect(await index.documents()).toEqual([
      {
        documentId: "a",
        filename: "a.txt",
        format: "text",
        version: 2,
        ingestedAt: "2026-03-01T00:00:00.000Z",
        chunkCount: 1,
        embeddingModels: ["m1"]
      }
    ]);
  });

  it("upserts idempotently by document, unit label and ordinal", async () => {
    const index = LocalVectorIndex.inMemory();
    await index.upsert(chunk("a", 0, "first", [1, 0]));
    await index.upsert(chunk("a", 0, "first again", [1, 0]));
    await index.upsert(chunk("a", 1, "second", [1, 0]));

    const hits = await index.search([1, 0], 10, "m1");
    expect(hits.map((h) => h.text).sort()).toEqual(["first again", "second"]);
  });

  it("deletes a document and all of its chunks", async () => {
    const index = LocalVectorIndex.inMemory();
    await index.replaceDocument("a", [chunk("a", 0, "alpha", [1, 0]), chunk("a", 1, "beta", [1, 0])]);
    await index.replaceDocument("b", [chunk("b", 0, "gamma", [1, 0])]);

    expect(await index.delete("a")).toBe(true);
    expect(await index.delete("a")).toBe(false);
    expect((await index.search([1, 0], 10, "m1")).map((h) => h.text)).toEqual(["gamma"]);
  });

  it("serializes concurrent replacements of one document", async () => {
    const index = LocalVectorIndex.inMemory();
    const versions = await Promise.all([
      index.replaceDocument("a", [chunk("a", 0, "one", [1, 0])]),
      index.replaceDocument("a", [chunk("a", 0, "two", [1, 0])])
    ]);
    expect(versions).toEqual([1, 2]);
    expect((await index.search([1, 0], 5, "m1")).map((h) => h.text)).toEqual(["two"]);
  });

  it("keeps the prior version visible when persisting fails", async () => {
    let saves = 0;
    const persistence: IndexPersistence = {
      load: async () => null,
      save: async () => {
        saves += 1;
        if (saves > 1) throw new Error("disk full");
      }
    };
    const index = await LocalVectorIndex.open(persistence);
    await index.replaceDocument("a", [chunk("a", 0, "v1 text", [1, 0])]);

    await expect(index.replaceDocument("a", [chunk("a", 0, "v2 text", [1, 0])])).rejects.toBeInstanceOf(
      IndexUnavailableError
    );
    expect((await index.search([1, 0], 5, "m1")).map((h) => h.text)).toEqual(["v1 text"]);
    expect((await index.documents())[0]?.version).toBe(1);
  });
});

describe("file persistence", () => {
  let dir: string;
  let indexPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "supportbrain-index-"));
    indexPath = path.join(dir, "nested", "index.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reloads what was written", async () => {
    const first = await LocalVectorIndex.open(fileIndexPersistence(indexPath));
    await first.replaceDocument("a", [chunk("a", 0, "persisted", [0.6, 0.8])]);

    const stored: unknown = JSON.parse(await fs.readFile(indexPath, "utf-8"));
    expect(stored).toMatchObject({ version: 2, metric: "cosine" });

    const reopened = await LocalVectorIndex.open(fileIndexPersistence(indexPath));
    expect((await reopened.search([0.6, 0.8], 1, "m1")).map((h) => h.text)).toEqual(["persisted"]);
    expect((await reopened.documents())[0]?.version).toBe(1);
  });

  it("treats a missing file as an empty index", async () => {
    const index = await LocalVectorIndex.open(fileIndexPersistence(indexPath));
    expect(await index.documents()).toEqual([]);
  });

  it("refuses a corrupt file or another metric", async () => {
    await fs.mkdir(path.dirname(indexPath), { recursive: true });
    await fs.writeFile(indexPath, "{ not json", "utf-8");
    await expect(LocalVectorIndex.open(fileIndexPersistence(indexPath))).rejects.toBeInstanceOf(
      IndexUnavailableError
    );

    const otherMetric = { version: 2, metric: "dot", documents: [] };
    await fs.writeFile(indexPath, JSON.stringify(otherMetric), "utf-8");
    await expect(LocalVectorIndex.open(fileIndexPersistence(indexPath))).rejects.toBeInstanceOf(
      IndexUnavailableError
    );

    const empty: StoredIndex = { version: 2, metric: "cosine", documents: [] };
    await fs.writeFile(indexPath, JSON.stringify(empty), "utf-8");
    expect(await (await LocalVectorIndex.open(fileIndexPersistence(indexPath))).documents()).toEqual([]);
  });
});
