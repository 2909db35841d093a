import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { Document } from "@langchain/core/documents";
import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { Settings } from "../config/settings.js";
import type { Completion, CompletionRequest, GenerationService } from "../integrations/gemini/chat.js";
import type { SearchService } from "../integrations/serpapi/searchClient.js";
import type { FetchLike } from "../loaders/http.js";
import type { TranscriptProvider, TranscriptSegment, TranscriptTrack } from "../loaders/transcriptLoader.js";
import type { ChunkSearcher, ScoredChunk } from "../rag/context.js";
import type { DocumentMetadata, MetadataFilter, RagDocument, SearchResult } from "../types.js";

export const TEST_DIMENSION = 64;

function bucket(word: string): number {
  let hash = 2166136261;
  for (let i = 0; i < word.length; i += 1) {
    hash ^= word.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return (hash >>> 0) % TEST_DIMENSION;
}

/** Hashed bag-of-words vectors: texts sharing words point the same way. */
export function bagOfWords(text: string): number[] {
  const vector = new Array<number>(TEST_DIMENSION).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    vector[bucket(word)] += 1;
  }
  return vector;
}

/** Uses `fixed[text]` when given, bag-of-words otherwise. */
export class FakeEmbeddings implements EmbeddingsInterface {
  documentCalls: string[][] = [];
  queryCalls: string[] = [];
  failWith?: Error;

  constructor(private readonly fixed: Record<string, number[]> = {}) {}

  private vector(text: string): number[] {
    return this.fixed[text] ?? bagOfWords(text);
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    this.documentCalls.push(documents);
    if (this.failWith) throw this.failWith;
    return documents.map((d) => this.vector(d));
  }

  async embedQuery(document: string): Promise<number[]> {
    this.queryCalls.push(document);
    if (this.failWith) throw this.failWith;
    return this.vector(document);
  }
}

export class FakeGenerationService implements GenerationService {
  requests: CompletionRequest[] = [];

  constructor(private readonly reply: (request: CompletionRequest) => string | Error = () => "A test answer [1].") {}

  async complete(request: CompletionRequest): Promise<Completion> {
    this.requests.push(request);
    const text = this.reply(request);
    if (text instanceof Error) throw text;
    return { text, usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 }, model: "fake-model" };
  }
}

export class FakeSearchService implements SearchService {
  calls: Array<{ query: string; maxResults: number }> = [];

  constructor(private readonly results: SearchResult[]) {}

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    this.calls.push({ query, maxResults });
    return this.results.slice(0, maxResults).map((r) => ({ ...r }));
  }
}

export class FakeTranscriptProvider implements TranscriptProvider {
  constructor(
    private readonly tracks: TranscriptTrack[],
    private readonly segments: Record<string, TranscriptSegment[]> = {}
  ) {}

  async listTracks(): Promise<TranscriptTrack[]> {
    return this.tracks;
  }

  async fetchSegments(track: TranscriptTrack): Promise<TranscriptSegment[]> {
    return this.segments[track.baseUrl] ?? [];
  }
}

export type StubRoute = (url: string) => Response | Promise<Response>;

/** Routes by exact URL; unknown URLs answer 404. Records every requested URL. */
export function stubFetch(routes: Record<string, StubRoute>): FetchLike & { calls: string[] } {
  const calls: string[] = [];
  const fetchImpl = async (input: string, init?: RequestInit): Promise<Response> => {
    calls.push(input);
    init?.signal?.throwIfAborted();
    const route = routes[input];
    return route ? route(input) : new Response("not found", { status: 404 });
  };
  return Object.assign(fetchImpl, { calls });
}

export function htmlPage(title: string, body: string): Response {
  return new Response(`<html><head><title>${title}</title></head><body><article>${body}</article></body></html>`, {
    status: 200,
    headers: { "content-type": "text/html" }
  });
}

export function makeDoc(text: string, metadata: Partial<DocumentMetadata> = {}): RagDocument {
  return new Document({
    pageContent: text,
    metadata: { source: "test://doc", sourceType: "text", contentLength: text.length, ...metadata }
  });
}

export function makeResult(overrides: Partial<SearchResult> & { url: string }): SearchResult {
  return {
    title: "Untitled",
    contentSnippet: "",
    sourceType: "article",
    score: 0.5,
    ...overrides
  };
}

export async function makeTempDir(prefix = "citewise-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    googleApiKey: "test-secret",
    serpApiKey: "test-secret",
    chatModel: "fake-model",
    embeddingModel: "fake-embedding",
    dataDir: "./data",
    persistDirectory: "./data/vectorstore",
    collectionName: "test_collection",
    chunkSize: 200,
    chunkOverlap: 20,
    chunkWorkers: 2,
    maxSearchResults: 10,
    searchDepth: "basic",
    relevanceThreshold: 0.1,
    minSources: 2,
    downloadWorkers: 2,
    requestTimeoutMs: 5000,
    transcriptLanguage: "en",
    retrievalK: 3,
    maxContextChars: 4000,
    queryExpansion: false,
    expandedQueries: 2,
    temperature: 0.2,
    maxTokens: 500,
    logLevel: "silent",
    ...overrides
  };
}

/** Answers each query from a fixed table; unknown queries find nothing. */
export class StaticSearcher implements ChunkSearcher {
  calls: Array<{ query: string; k: number; filter?: MetadataFilter }> = [];

  constructor(private readonly results: Record<string, ScoredChunk[]>) {}

  async search(query: string, k: number, filter?: MetadataFilter): Promise<ScoredChunk[]> {
    this.calls.push({ query, k, filter });
    return (this.results[query] ?? []).slice(0, k);
  }
}
