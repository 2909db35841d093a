import { NullLogger, type ILogger } from "../logger.js";
import type { MetadataFilter, RagDocument } from "../types.js";

export const NO_CONTEXT = "No context available.";

export type ScoredChunk = [RagDocument, number];

/** Anything that ranks chunks for a query; the vector store is the usual one. */
export interface ChunkSearcher {
  search(query: string, k: number, filter?: MetadataFilter): Promise<ScoredChunk[]>;
}

export type Citation = {
  /** 1-based; `[index]` in generated text refers to this entry. */
  index: number;
  source: string;
  title?: string;
  score: number;
  chunk: RagDocument;
};

export type AssembledContext = {
  context: string;
  /** `citations[i - 1]` is the source of `[i]`. */
  citations: Citation[];
};

/**
 * Numbers ranked chunks as `\n[i] text\n` and keeps whole entries while the total stays
 * within `charBudget`; the first entry that would overflow ends the context.
 */
export function formatContext(
  results: ScoredChunk[],
  charBudget: number,
  logger: ILogger = new NullLogger()
): AssembledContext {
  let context = "";
  const citations: Citation[] = [];

  for (const [chunk, score] of results) {
    const index = citations.length + 1;
    const entry = `\n[${index}] ${chunk.pageContent}\n`;
    if (context.length + entry.length > charBudget) {
      logger.warn(`Context truncated at ${context.length} chars (max: ${charBudget})`, {
        included: citations.length,
        dropped: results.length - citations.length
      });
      break;
    }
    context += entry;
    citations.push({ index, source: chunk.metadata.source, title: chunk.metadata.title, score, chunk });
  }

  if (citations.length === 0) {
    return { context: NO_CONTEXT, citations: [] };
  }
  logger.debug(`Formatted context: ${context.length} chars from ${citations.length} sources`);
  return { context, citations };
}

export async function assembleContext(params: {
  searcher: ChunkSearcher;
  query: string;
  k: number;
  charBudget: number;
  filter?: MetadataFilter;
  logger?: ILogger;
}): Promise<AssembledContext> {
  const results = await params.searcher.search(params.query, params.k, params.filter);
  return formatContext(results, params.charBudget, params.logger);
}
