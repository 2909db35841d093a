import type { Settings } from "../config/settings.js";
import type { CompletionRequest, GenerationService, TokenUsage } from "../integrations/gemini/chat.js";
import { NullLogger, type ILogger } from "../logger.js";
import { formatContext, type ChunkSearcher, type Citation } from "./context.js";
import { expandQuery, retrieveMultiQuery } from "./queryExpansion.js";

export const RAG_SYSTEM_PROMPT = `You are a knowledgeable research assistant. Answer the user's question using ONLY the provided context from retrieved sources.

Guidelines:
1. Base your answer strictly on the provided context
2. Cite sources using NUMERIC references like [1], [2], [1,3], or [2-5]
3. Use [1] for a single source, [1,3] for multiple non-consecutive sources, and [2-5] for consecutive ranges
4. If the context doesn't contain enough information, say so
5. Be concise but comprehensive
6. Do not make up information not present in the context
7. DO NOT include a "Sources:" or "References:" section at the end; it is added automatically

Context with source numbers:
{context}`;

export const NO_ANSWER =
  "I could not find any relevant information in the indexed documents to answer this question.";

export type AnswerOptions = {
  k: number;
  maxContextChars: number;
  temperature: number;
  maxTokens: number;
  queryExpansion: boolean;
  expandedQueries: number;
};

export type AnswerResult = {
  /** The generated text followed by the `## Sources` list. */
  answer: string;
  citations: Citation[];
  queries: string[];
  usage: TokenUsage;
  model?: string;
};

export function answerOptionsFrom(
  settings: Pick<
    Settings,
    "retrievalK" | "maxContextChars" | "temperature" | "maxTokens" | "queryExpansion" | "expandedQueries"
  >
): AnswerOptions {
  return {
    k: settings.retrievalK,
    maxContextChars: settings.maxContextChars,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
    queryExpansion: settings.queryExpansion,
    expandedQueries: settings.expandedQueries
  };
}

export function buildSystemPrompt(context: string): string {
  return RAG_SYSTEM_PROMPT.replace("{context}", context);
}

export function appendSources(answer: string, citations: Citation[]): string {
  if (citations.length === 0) return answer;
  const lines = citations.map((c) => `[${c.index}] ${c.source}`);
  return `${answer.trimEnd()}\n\n## Sources\n${lines.join("\n")}\n`;
}

export async function answerQuestion(params: {
  question: string;
  searcher: ChunkSearcher;
  generation: GenerationService;
  options: AnswerOptions;
  logger?: ILogger;
}): Promise<AnswerResult> {
  const logger = params.logger ?? new NullLogger();
  const { options } = params;

  const queries = options.queryExpansion
    ? await expandQuery(params.question, params.generation, { count: options.expandedQueries, logger })
    : [params.question];

  const results = await retrieveMultiQuery(params.searcher, queries, options.k);
  const { context, citations } = formatContext(results, options.maxContextChars, logger);

  if (citations.length === 0) {
    logger.warn("No relevant chunks retrieved; skipping generation");
    return {
      answer: NO_ANSWER,
      citations,
      queries,
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 }
    };
  }

  const request: CompletionRequest = {
    systemPrompt: buildSystemPrompt(context),
    userPrompt: params.question,
    temperature: options.temperature,
    maxTokens: options.maxTokens
  };
  const completion = await params.generation.complete(request);
  logger.info(`Generated answer with ${citations.length} sources`, { ...completion.usage });

  return {
    answer: appendSources(completion.text, citations),
    citations,
    queries,
    usage: completion.usage,
    model: completion.model
  };
}
