import { promises as fs } from "node:fs";

import { Document } from "@langchain/core/documents";
import fc from "fast-check";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CitewiseError, ConfigurationError, EmbeddingServiceError } from "../errors.js";
import { FakeEmbeddings, makeDoc, makeTempDir } from "../test-utils/fakes.js";
import { spyLogger } from "../test-utils/logger.js";
import { FileVectorStore } from "./vectorStore.js";

const VECTORS: Record<string, number[]> = {
  alpha: [1, 0],
  beta: [0, 1],
  gamma: [1, 1],
  "about alpha": [1, 0],
  wide: [1, 0, 0]
};

describe("FileVectorStore", () => {
  let dir: string;
  let embeddings: FakeEmbeddings;

  const open = (embeddingModel = "fake-embedding", model = embeddings) =>
    FileVectorStore.open(model, { persistDirectory: dir, collectionName: "notes", embeddingModel });

  beforeEach(async () => {
    dir = await makeTempDir();
    embeddings = new FakeEmbeddings(VECTORS);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("embeds a batch in one call and assigns sequential ids", async () => {
    const store = await open();

    const ids = await store.add([makeDoc("alpha"), makeDoc("beta"), makeDoc("gamma")]);

    expect(ids).toEqual(["doc_0", "doc_1", "doc_2"]);
    expect(embeddings.documentCalls).toEqual([["alpha", "beta", "gamma"]]);
    expect(store.stats()).toEqual({
      collectionName: "notes",
      totalDocuments: 3,
      persistDirectory: dir,
      embeddingModel: "fake-embedding",
      embeddingDimension: 2
    });
  });

  it("ranks by similarity, highest first", async () => {
    const store = await open();
    await store.add([makeDoc("beta"), makeDoc("gamma"), makeDoc("alpha")]);

    const results = await store.search("about alpha", 2);

    expect(results.map(([doc, score]) => [doc.id, doc.pageContent, Number(score.toFixed(4))])).toEqual([
      ["doc_2", "alpha", 1],
      ["doc_1", "gamma", 0.7071]
    ]);
  });

  it("persists across reopen and continues the id sequence", async () => {
    const first = await open();
    await first.add([makeDoc("alpha"), makeDoc("beta")]);

    const second = await open();
    expect(second.stats().totalDocuments).toBe(2);
    expect((await second.search("about alpha", 1)).map(([doc]) => doc.pageContent)).toEqual(["alpha"]);
    expect(await second.add([makeDoc("gamma")])).toEqual(["doc_2"]);
  });

  it("does not call the embedder when searching an empty collection", async () => {
    const store = await open();

    expect(await store.search("about alpha", 3)).toEqual([]);
    expect(embeddings.queryCalls).toEqual([]);
  });

  it("filters on metadata", async () => {
    const store = await open();
    await store.add([makeDoc("alpha", { sourceType: "pdf" }), makeDoc("gamma", { sourceType: "video" })]);

    const results = await store.search("about alpha", 5, { sourceType: "video" });

    expect(results.map(([doc]) => doc.metadata.sourceType)).toEqual(["video"]);
  });

  it("works through LangChain's similaritySearch", async () => {
    const store = await open();
    await store.addDocuments([
      new Document({ pageContent: "beta", metadata: { source: "b", sourceType: "text", contentLength: 4 } }),
      new Document({ pageContent: "alpha", metadata: { source: "a", sourceType: "text", contentLength: 5 } })
    ]);

    const [top] = await store.similaritySearch("about alpha", 1);

    expect(top?.metadata).toEqual({ source: "a", sourceType: "text", contentLength: 5 });
  });

  it("rejects documents without the required metadata", async () => {
    const store = await open();

    await expect(store.addDocuments([new Document({ pageContent: "alpha", metadata: {} })])).rejects.toBeInstanceOf(
      CitewiseError
    );
    expect(embeddings.documentCalls).toEqual([]);
  });

  it("keeps scores within [0, 1]", async () => {
    const store = await open("bag-of-words", new FakeEmbeddings());
    const words = ["tide", "reef", "kelp", "coral", "shore", "wave"];
    await store.add(words.map((w, i) => makeDoc(`${w} ${words[(i + 1) % words.length]}`)));

    await fc.assert(
      fc.asyncProperty(fc.subarray(words, { minLength: 1 }), async (query) => {
        for (const [, score] of await store.search(query.join(" "), 6)) {
          expect(score).toBeGreaterThanOrEqual(0);
          expect(score).toBeLessThanOrEqual(1);
        }
      })
    );
  });

  it("refuses to mix embedding models in one collection", async () => {
    const store = await open();
    await store.add([makeDoc("alpha")]);

    await expect(open("another-model")).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("rejects embeddings of another dimension", async () => {
    const store = await open();
    await store.add([makeDoc("alpha")]);

    await expect(store.add([makeDoc("wide")])).rejects.toBeInstanceOf(EmbeddingServiceError);
    await expect(store.search("wide", 1)).rejects.toBeInstanceOf(EmbeddingServiceError);
    expect(store.stats().totalDocuments).toBe(1);
  });

  it("wraps embedding service failures", async () => {
    const store = await open();
    embeddings.failWith = new Error("quota exceeded");

    await expect(store.add([makeDoc("alpha")])).rejects.toThrow("Failed to embed 1 chunks: quota exceeded");
  });

  it("clears the collection, warning first", async () => {
    const logger = spyLogger();
    const store = await FileVectorStore.open(embeddings, {
      persistDirectory: dir,
      collectionName: "notes",
      embeddingModel: "fake-embedding",
      logger
    });
    await store.add([makeDoc("alpha"), makeDoc("beta")]);

    await store.clear();

    expect(logger.warn).toHaveBeenCalledWith("Clearing collection notes (2 entries will be deleted)");
    expect(store.stats().totalDocuments).toBe(0);
    expect(await store.add([makeDoc("gamma")])).toEqual(["doc_0"]);

    await store.clear();
    const reopened = await open("another-model");
    expect(reopened.stats()).toMatchObject({ totalDocuments: 0, embeddingModel: "another-model" });
  });
});
