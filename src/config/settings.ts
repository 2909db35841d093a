import path from "node:path";

import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import type { LogLevel } from "../logger.js";

const booleanFlag = z
  .string()
  .transform((raw) => !(raw === "0" || raw.toLowerCase() === "false"));

const envSchema = z.object({
  GOOGLE_API_KEY: z.string().min(1).optional(),
  GEMINI_API_KEY: z.string().min(1).optional(),
  SERP_API_KEY: z.string().min(1).optional(),
  CITEWISE_CHAT_MODEL: z.string().default("gemini-2.5-flash"),
  CITEWISE_EMBEDDING_MODEL: z.string().default("gemini-embedding-001"),
  CITEWISE_DATA_DIR: z.string().default("./data"),
  CITEWISE_PERSIST_DIR: z.string().optional(),
  CITEWISE_COLLECTION: z
    .string()
    .regex(/^[a-zA-Z0-9_-]+$/, "collection name may only contain letters, digits, '_' and '-'")
    .default("citewise_v1"),
  CITEWISE_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CITEWISE_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  CITEWISE_CHUNK_WORKERS: z.coerce.number().int().positive().default(4),
  CITEWISE_MAX_SEARCH_RESULTS: z.coerce.number().int().positive().max(100).default(30),
  CITEWISE_SEARCH_DEPTH: z.enum(["basic", "advanced"]).default("advanced"),
  CITEWISE_RELEVANCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  CITEWISE_MIN_SOURCES: z.coerce.number().int().positive().default(10),
  CITEWISE_DOWNLOAD_WORKERS: z.coerce.number().int().positive().default(5),
  CITEWISE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CITEWISE_TRANSCRIPT_LANGUAGE: z.string().min(2).default("en"),
  CITEWISE_RETRIEVAL_K: z.coerce.number().int().positive().default(5),
  CITEWISE_MAX_CONTEXT_CHARS: z.coerce.number().int().positive().default(8000),
  CITEWISE_QUERY_EXPANSION: booleanFlag.default("true"),
  CITEWISE_EXPANDED_QUERIES: z.coerce.number().int().nonnegative().max(10).default(3),
  CITEWISE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  CITEWISE_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  CITEWISE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

export type SearchDepth = "basic" | "advanced";

export type Settings = {
  googleApiKey?: string;
  serpApiKey?: string;
  chatModel: string;
  embeddingModel: string;
  dataDir: string;
  persistDirectory: string;
  collectionName: string;
  chunkSize: number;
  chunkOverlap: number;
  chunkWorkers: number;
  maxSearchResults: number;
  searchDepth: SearchDepth;
  relevanceThreshold: number;
  minSources: number;
  downloadWorkers: number;
  requestTimeoutMs: number;
  transcriptLanguage: string;
  retrievalK: number;
  maxContextChars: number;
  queryExpansion: boolean;
  expandedQueries: number;
  temperature: number;
  maxTokens: number;
  logLevel: LogLevel;
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([name, messages]) => `${name}: ${(messages ?? []).join(", ")}`)
      .join("\n");
    throw new ConfigurationError(`Invalid environment variables:\n${problems}`);
  }
  const e = parsed.data;

  const settings: Settings = {
    googleApiKey: e.GOOGLE_API_KEY ?? e.GEMINI_API_KEY,
    serpApiKey: e.SERP_API_KEY,
    chatModel: e.CITEWISE_CHAT_MODEL,
    embeddingModel: e.CITEWISE_EMBEDDING_MODEL,
    dataDir: e.CITEWISE_DATA_DIR,
    persistDirectory: e.CITEWISE_PERSIST_DIR ?? path.join(e.CITEWISE_DATA_DIR, "vectorstore"),
    collectionName: e.CITEWISE_COLLECTION,
    chunkSize: e.CITEWISE_CHUNK_SIZE,
    chunkOverlap: e.CITEWISE_CHUNK_OVERLAP,
    chunkWorkers: e.CITEWISE_CHUNK_WORKERS,
    maxSearchResults: e.CITEWISE_MAX_SEARCH_RESULTS,
    searchDepth: e.CITEWISE_SEARCH_DEPTH,
    relevanceThreshold: e.CITEWISE_RELEVANCE_THRESHOLD,
    minSources: e.CITEWISE_MIN_SOURCES,
    downloadWorkers: e.CITEWISE_DOWNLOAD_WORKERS,
    requestTimeoutMs: e.CITEWISE_REQUEST_TIMEOUT_MS,
    transcriptLanguage: e.CITEWISE_TRANSCRIPT_LANGUAGE,
    retrievalK: e.CITEWISE_RETRIEVAL_K,
    maxContextChars: e.CITEWISE_MAX_CONTEXT_CHARS,
    queryExpansion: e.CITEWISE_QUERY_EXPANSION,
    expandedQueries: e.CITEWISE_EXPANDED_QUERIES,
    temperature: e.CITEWISE_TEMPERATURE,
    maxTokens: e.CITEWISE_MAX_TOKENS,
    logLevel: e.CITEWISE_LOG_LEVEL
  };

  assertChunking(settings);
  return Object.freeze(settings);
}

export function assertChunking(settings: Pick<Settings, "chunkSize" | "chunkOverlap">): void {
  if (settings.chunkOverlap >= settings.chunkSize) {
    throw new ConfigurationError(
      `chunk overlap (${settings.chunkOverlap}) must be smaller than chunk size (${settings.chunkSize})`
    );
  }
}

function requireConfig(name: string, value: string | undefined): string {
  if (!value) {
    throw new ConfigurationError(`${name} is required for this operation`);
  }
  return value;
}

export function requireGoogleApiKey(settings: Settings): string {
  return requireConfig("GOOGLE_API_KEY", settings.googleApiKey);
}

export function requireSerpApiKey(settings: Settings): string {
  return requireConfig("SERP_API_KEY", settings.serpApiKey);
}
