import { errorMessage } from "../errors.js";
import type { GenerationService } from "../integrations/gemini/chat.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { ChunkSearcher, ScoredChunk } from "./context.js";

export const MULTI_QUERY_PROMPT = `You are a knowledgeable research assistant.
For the given question, propose up to {count} related questions to assist in finding comprehensive information.
Provide concise, single-topic questions that cover various aspects of the topic.
Ensure each question is complete and directly related to the original inquiry.
List each question on a separate line without numbering.`;

/** Lines this short are noise rather than questions. */
const MIN_QUERY_CHARS = 11;

/** One query per non-empty line, list markers stripped, short and repeated lines dropped. */
export function parseQueryLines(text: string, original: string, max: number): string[] {
  const seen = new Set([original.trim().toLowerCase()]);
  const queries: string[] = [];
  for (const line of text.split("\n")) {
    const query = line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, "").trim();
    if (query.length < MIN_QUERY_CHARS || seen.has(query.toLowerCase())) continue;
    seen.add(query.toLowerCase());
    queries.push(query);
    if (queries.length >= max) break;
  }
  return queries;
}

/**
 * The original query followed by up to `count` related ones from the generation service.
 * Any generation failure yields just the original query.
 */
export async function expandQuery(
  query: string,
  generation: GenerationService,
  options: { count: number; logger?: ILogger }
): Promise<string[]> {
  const logger = options.logger ?? new NullLogger();
  if (options.count <= 0) return [query];

  try {
    const completion = await generation.complete({
      systemPrompt: MULTI_QUERY_PROMPT.replace("{count}", String(options.count)),
      userPrompt: query,
      temperature: 0.3,
      maxTokens: 500
    });
    const queries = [query, ...parseQueryLines(completion.text, query, options.count)];
    logger.info(`Generated ${queries.length} queries (including original)`);
    logger.debug("Expanded queries", { queries });
    return queries;
  } catch (err: unknown) {
    logger.error(`Query expansion failed, using the original query only: ${errorMessage(err)}`);
    return [query];
  }
}

function chunkKey([chunk]: ScoredChunk): string {
  return chunk.id ?? `${chunk.metadata.source}\n${chunk.pageContent}`;
}

/** Searches every query, keeps each chunk's best score and returns the overall top `k`. */
export async function retrieveMultiQuery(
  searcher: ChunkSearcher,
  queries: string[],
  k: number
): Promise<ScoredChunk[]> {
  const best = new Map<string, ScoredChunk>();
  for (const query of queries) {
    for (const result of await searcher.search(query, k)) {
      const key = chunkKey(result);
      const current = best.get(key);
      if (!current || result[1] > current[1]) best.set(key, result);
    }
  }
  return [...best.values()].sort((a, b) => b[1] - a[1]).slice(0, k);
}
