import { promises as fs } from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { htmlPage, makeResult, makeTempDir, stubFetch, type StubRoute } from "../test-utils/fakes.js";
import { ArticleDownloader } from "./downloader.js";
import { urlHash } from "./files.js";

const ARTICLE = `<p>${"Coral reefs build slowly from the skeletons of tiny colonial animals. ".repeat(4)}</p>`;

function pdfBytes(size: number): Uint8Array {
  const bytes = new Uint8Array(size).fill(32);
  bytes.set(Buffer.from("%PDF-1.5", "latin1"));
  return bytes;
}

describe("ArticleDownloader", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("saves articles until the quota is met", async () => {
    const routes: Record<string, StubRoute> = {};
    for (const n of [1, 2, 4, 5, 6]) routes[`https://site.test/${n}`] = () => htmlPage(`Page ${n}`, ARTICLE);
    const fetch = stubFetch(routes);
    const downloader = new ArticleDownloader({ dataDir, http: { fetch } });

    const saved = await downloader.downloadUntilQuota({
      query: "Coral Reefs",
      candidates: [1, 2, 3, 4, 5, 6].map((n) => makeResult({ url: `https://site.test/${n}`, title: `Reef ${n}` })),
      minSuccesses: 3,
      maxWorkers: 1
    });

    expect(saved.map((s) => [s.source.url, s.kind])).toEqual([
      ["https://site.test/1", "text"],
      ["https://site.test/2", "text"],
      ["https://site.test/4", "text"]
    ]);
    expect(fetch.calls).toEqual([
      "https://site.test/1",
      "https://site.test/2",
      "https://site.test/3",
      "https://site.test/4"
    ]);

    const first = saved[0];
    if (!first) throw new Error("expected a saved source");
    expect(first.filePath).toBe(
      path.join(dataDir, "downloads", "coral_reefs", `Reef_1_${urlHash("https://site.test/1")}.txt`)
    );
    const content = await fs.readFile(first.filePath, "utf-8");
    expect(content.split("\n").slice(0, 4)).toEqual([
      "Source: https://site.test/1",
      "Title: Reef 1",
      "=".repeat(80),
      ""
    ]);
    expect(content).toContain("Coral reefs build slowly");
  });

  it("stops at exactly the quota with several workers racing", async () => {
    const urls = Array.from({ length: 20 }, (_, i) => `https://site.test/reef-${i + 1}`);
    const fetchable = urls.filter((_, i) => (i + 1) % 4 !== 0);
    expect(fetchable).toHaveLength(15);
    const routes: Record<string, StubRoute> = {};
    for (const url of fetchable) routes[url] = () => htmlPage("Reef", ARTICLE);
    const fetch = stubFetch(routes);
    const downloader = new ArticleDownloader({ dataDir, http: { fetch } });

    const saved = await downloader.downloadUntilQuota({
      query: "reef quota",
      candidates: urls.map((url, i) => makeResult({ url, title: `Reef ${i + 1}` })),
      minSuccesses: 10,
      maxWorkers: 5
    });

    expect(saved).toHaveLength(10);
    expect(new Set(saved.map((s) => s.source.url)).size).toBe(10);
    for (const s of saved) {
      expect(fetchable).toContain(s.source.url);
      expect(s.kind).toBe("text");
      await expect(fs.stat(s.filePath)).resolves.toBeDefined();
    }
    expect(fetch.calls.length).toBeLessThanOrEqual(20);
    expect(new Set(fetch.calls).size).toBe(fetch.calls.length);
  });

  it("reports the pool size for a quota", () => {
    expect(new ArticleDownloader({ dataDir }).poolSize(4)).toBe(12);
    expect(new ArticleDownloader({ dataDir, poolFactor: 2 }).poolSize(4)).toBe(8);
  });

  it("stores a direct PDF download as-is", async () => {
    const bytes = pdfBytes(2048);
    const fetch = stubFetch({ "https://site.test/paper.pdf": () => new Response(bytes) });
    const downloader = new ArticleDownloader({ dataDir, http: { fetch } });

    const [saved] = await downloader.downloadUntilQuota({
      query: "reefs",
      candidates: [makeResult({ url: "https://site.test/paper.pdf", title: "Reef Paper", sourceType: "pdf" })],
      minSuccesses: 1,
      maxWorkers: 2
    });

    expect(saved?.kind).toBe("pdf");
    expect(saved?.filePath.endsWith(".pdf")).toBe(true);
    expect(new Uint8Array(await fs.readFile(saved?.filePath ?? ""))).toEqual(bytes);
  });

  it("falls back to article parsing when a paper link serves HTML", async () => {
    const url = "https://arxiv.org/abs/2401.00001";
    const fetch = stubFetch({ [url]: () => htmlPage("Abstract page", ARTICLE) });
    const downloader = new ArticleDownloader({ dataDir, http: { fetch } });

    const [saved] = await downloader.downloadUntilQuota({
      query: "reefs",
      candidates: [makeResult({ url, title: "Reef preprint" })],
      minSuccesses: 1,
      maxWorkers: 1
    });

    expect(saved?.kind).toBe("text");
    expect(fetch.calls).toEqual([url, url]);
  });

  it("skips pages with too little text", async () => {
    const fetch = stubFetch({ "https://site.test/thin": () => htmlPage("Thin", "<p>Not much here.</p>") });
    const downloader = new ArticleDownloader({ dataDir, http: { fetch } });

    const saved = await downloader.downloadUntilQuota({
      query: "reefs",
      candidates: [makeResult({ url: "https://site.test/thin" })],
      minSuccesses: 1,
      maxWorkers: 1
    });

    expect(saved).toEqual([]);
  });

  it("considers at most poolFactor times the quota", async () => {
    const fetch = stubFetch({});
    const downloader = new ArticleDownloader({ dataDir, http: { fetch }, poolFactor: 2 });

    const saved = await downloader.downloadUntilQuota({
      query: "reefs",
      candidates: [1, 2, 3, 4, 5].map((n) => makeResult({ url: `https://site.test/${n}` })),
      minSuccesses: 1,
      maxWorkers: 1
    });

    expect(saved).toEqual([]);
    expect(fetch.calls).toEqual(["https://site.test/1", "https://site.test/2"]);
  });

  it("does nothing for a zero quota", async () => {
    const fetch = stubFetch({});
    const downloader = new ArticleDownloader({ dataDir, http: { fetch } });

    expect(
      await downloader.downloadUntilQuota({
        query: "reefs",
        candidates: [makeResult({ url: "https://site.test/1" })],
        minSuccesses: 0,
        maxWorkers: 1
      })
    ).toEqual([]);
    expect(fetch.calls).toEqual([]);
  });
});
