import type { DocumentMetadata, MetadataFilter } from "../types.js";
import { similarityScore } from "./similarity.js";
import type { StoredEntry } from "./types.js";

export function matchesFilter(metadata: DocumentMetadata, filter: MetadataFilter | undefined): boolean {
  if (!filter) return true;
  const fields: Record<string, unknown> = metadata;
  return Object.entries(filter).every(([key, value]) => value === undefined || fields[key] === value);
}

/**
 * Scores every entry matching `filter` against the query and returns the best `k`, highest
 * first. Ties keep insertion order. Entries of another dimension are skipped.
 */
export function topKSimilarEntries(params: {
  queryEmbedding: number[];
  entries: StoredEntry[];
  k: number;
  filter?: MetadataFilter;
}): Array<{ entry: StoredEntry; score: number }> {
  const expectedDim = params.queryEmbedding.length;
  if (expectedDim === 0 || params.k <= 0) return [];

  return params.entries
    .filter((e) => e.embedding.length === expectedDim && matchesFilter(e.metadata, params.filter))
    .map((entry) => ({ entry, score: similarityScore(params.queryEmbedding, entry.embedding) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, params.k);
}
