import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { errorMessage } from "../errors.js";
import { NullLogger, type ILogger } from "../logger.js";
import { cosineSimilarity } from "../retrieval/similarity.js";
import type { SearchResult, SourceType } from "../types.js";

export type RelevanceFilterOptions = {
  /** Without embeddings the keyword-overlap score is used instead. */
  embeddings?: EmbeddingsInterface;
  threshold: number;
  logger?: ILogger;
};

/**
 * Keeps sources whose snippet is at least `threshold` similar to the query, writes the
 * similarity into `score` and sorts by it, descending. If the embedding call fails the
 * sources are returned unfiltered.
 */
export async function filterByRelevance(
  query: string,
  sources: SearchResult[],
  options: RelevanceFilterOptions
): Promise<SearchResult[]> {
  const logger = options.logger ?? new NullLogger();
  if (sources.length === 0) {
    logger.warn("No sources to filter");
    return [];
  }

  if (!options.embeddings) {
    logger.warn("No embedding model available, using keyword-based filtering");
    return filterByKeywords(query, sources, options.threshold, logger);
  }

  let vectors: number[][];
  try {
    vectors = await options.embeddings.embedDocuments([
      query,
      ...sources.map((s) => s.contentSnippet)
    ]);
  } catch (err: unknown) {
    logger.error(`Relevance filtering skipped, embedding call failed: ${errorMessage(err)}`);
    return sources;
  }

  const [queryVector, ...snippetVectors] = vectors;
  if (!queryVector || snippetVectors.length !== sources.length) {
    logger.error(
      `Relevance filtering skipped, expected ${sources.length + 1} embeddings but got ${vectors.length}`
    );
    return sources;
  }

  const kept: SearchResult[] = [];
  sources.forEach((source, i) => {
    const similarity = cosineSimilarity(queryVector, snippetVectors[i] ?? []);
    if (similarity >= options.threshold) {
      source.score = similarity;
      kept.push(source);
    } else {
      logger.debug(`Filtered out: ${source.title.slice(0, 50)} (similarity ${similarity.toFixed(3)})`);
    }
  });
  kept.sort((a, b) => b.score - a.score);

  logger.info(`Filtered to ${kept.length} sources (removed ${sources.length - kept.length})`);
  return kept;
}

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

/** `|query words ∩ snippet words| / |query words|`, case-insensitive. */
export function keywordOverlapScore(query: string, snippet: string): number {
  const queryWords = words(query);
  if (queryWords.size === 0) return 0;
  const snippetWords = words(snippet);
  let hits = 0;
  for (const word of queryWords) {
    if (snippetWords.has(word)) hits += 1;
  }
  return hits / queryWords.size;
}

export function filterByKeywords(
  query: string,
  sources: SearchResult[],
  threshold: number,
  logger: ILogger = new NullLogger()
): SearchResult[] {
  const kept: SearchResult[] = [];
  for (const source of sources) {
    const overlap = keywordOverlapScore(query, source.contentSnippet);
    if (overlap >= threshold) {
      source.score = overlap;
      kept.push(source);
    }
  }
  kept.sort((a, b) => b.score - a.score);
  logger.info(`Keyword filtering kept ${kept.length} of ${sources.length} sources`);
  return kept;
}

/** Drops the fragment, the query string and trailing slashes. */
export function normalizeUrl(url: string): string {
  return url.replace(/#.*$/s, "").replace(/\?.*$/s, "").replace(/\/+$/, "");
}

/** First occurrence per normalized URL wins; input order is preserved. */
export function deduplicate(sources: SearchResult[], logger: ILogger = new NullLogger()): SearchResult[] {
  const seen = new Set<string>();
  const unique: SearchResult[] = [];
  for (const source of sources) {
    const key = normalizeUrl(source.url);
    if (seen.has(key)) {
      logger.debug(`Duplicate URL filtered: ${source.url}`);
      continue;
    }
    seen.add(key);
    unique.push(source);
  }

  const removed = sources.length - unique.length;
  if (removed > 0) logger.info(`Removed ${removed} duplicate sources`);
  return unique;
}

/** Orders by position in `preferred` (unknown types last), then by score, descending. */
export function rankByType(
  sources: SearchResult[],
  preferred: readonly SourceType[] = ["pdf", "article", "video"]
): SearchResult[] {
  const priority = (type: SourceType) => {
    const i = preferred.indexOf(type);
    return i < 0 ? preferred.length : i;
  };
  return [...sources].sort(
    (a, b) => priority(a.sourceType) - priority(b.sourceType) || b.score - a.score
  );
}
