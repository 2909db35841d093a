import type { Document } from "@langchain/core/documents";

/** Kind of a discovered candidate source. */
export type SourceType = "article" | "pdf" | "video";

/** Kind of an ingested document; `text` covers local plain-text and markdown files. */
export type DocumentSourceType = SourceType | "text";

export type MetadataValue = string | number | boolean;

export type SearchResult = {
  title: string;
  /** Unique key for deduplication. */
  url: string;
  contentSnippet: string;
  sourceType: SourceType;
  /** Relevance in 0..1. Overwritten by relevance filtering. */
  score: number;
  publishedDate?: string;
};

export type DocumentMetadata = {
  source: string;
  sourceType: DocumentSourceType;
  contentLength: number;
  title?: string;
  author?: string;
  numPages?: number;
  numSegments?: number;
  videoId?: string;
  filePath?: string;
  extras?: Record<string, MetadataValue>;
};

export type RagDocument = Document<DocumentMetadata>;

/** Exact-match filter over top-level metadata fields. */
export type MetadataFilter = Partial<Record<keyof Omit<DocumentMetadata, "extras">, MetadataValue>>;
