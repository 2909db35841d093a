import type { ResearchMode, ResearchOutcome } from "../../rag/pipeline.js";
import { createResearchPipeline, type Services } from "../../rag/services.js";

export function formatSummary(outcome: ResearchOutcome): string {
  const { usage } = outcome.result;
  return [
    "Session summary",
    `  Mode: ${outcome.mode}`,
    `  Sources found: ${outcome.sourcesFound}`,
    `  Sources approved: ${outcome.sourcesApproved}`,
    `  Sources saved: ${outcome.sourcesSaved}`,
    `  Documents loaded: ${outcome.documentsLoaded} (${outcome.documentsSkipped} skipped)`,
    `  Chunks created: ${outcome.chunksCreated}`,
    `  Collection total: ${outcome.collectionTotal}`,
    `  Queries: ${outcome.result.queries.length}`,
    `  Tokens: ${usage.inputTokens} in / ${usage.outputTokens} out`
  ].join("\n");
}

export async function runResearchCommand(
  args: { query: string; mode: ResearchMode; localDir?: string; minSources?: number },
  services: Services
): Promise<void> {
  if (!args.query.trim()) {
    throw new Error("Usage: citewise research <query>");
  }

  const pipeline = await createResearchPipeline(services);
  const outcome = await pipeline.run(args);
  process.stdout.write(`${outcome.result.answer}\n\n${formatSummary(outcome)}\n`);
}
