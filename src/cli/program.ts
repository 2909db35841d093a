import { Command, InvalidArgumentError, Option } from "commander";

import type { ResearchMode } from "../rag/pipeline.js";
import type { Services } from "../rag/services.js";
import type { DocumentSourceType } from "../types.js";
import { runAskCommand } from "./commands/ask.js";
import { runClearCommand, runStatsCommand } from "./commands/collection.js";
import { runIngestCommand } from "./commands/ingest.js";
import { runResearchCommand } from "./commands/research.js";
import { runSearchCommand } from "./commands/search.js";

const RESEARCH_MODES: readonly ResearchMode[] = ["online", "local", "both"];
const SOURCE_TYPES: readonly DocumentSourceType[] = ["article", "pdf", "video", "text"];

interface ResearchOptions {
  mode: string;
  local?: string;
  minSources?: number;
}

interface SearchOptions {
  k: number;
  type?: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function oneOf<T extends string>(values: readonly T[], value: string | undefined): T | undefined {
  return values.find((v) => v === value);
}

/** Services are built on first use, so `--help` needs no API keys. */
export function createProgram(getServices: () => Services): Command {
  const program = new Command();
  program
    .name("citewise")
    .description("Research assistant: gather sources, index them, answer with numbered citations")
    .showHelpAfterError();

  program
    .command("ingest")
    .description("Index the .pdf, .txt and .md files of a directory")
    .argument("<dir>", "Directory to scan")
    .option("--no-recursive", "Do not descend into subdirectories")
    .action(async (dir: string, options: { recursive: boolean }) => {
      await runIngestCommand({ sourceDir: dir, recursive: options.recursive }, getServices());
    });

  program
    .command("research")
    .description("Search, download, index and answer in one run")
    .argument("<query...>", "Research question")
    .addOption(new Option("--mode <mode>", "Where documents come from").choices(RESEARCH_MODES).default("online"))
    .option("--local <dir>", "Directory of local documents (local and both modes)")
    .option("--min-sources <n>", "Sources to save before stopping", parsePositiveInt)
    .action(async (words: string[], options: ResearchOptions) => {
      await runResearchCommand(
        {
          query: words.join(" "),
          mode: oneOf(RESEARCH_MODES, options.mode) ?? "online",
          localDir: options.local,
          minSources: options.minSources
        },
        getServices()
      );
    });

  program
    .command("ask")
    .description("Answer from the existing collection")
    .argument("<question...>", "Question")
    .action(async (words: string[]) => {
      await runAskCommand(words.join(" "), getServices());
    });

  program
    .command("search")
    .description("Show the chunks nearest to a query")
    .argument("<query...>", "Query")
    .option("-k <n>", "Number of results", parsePositiveInt, 5)
    .addOption(new Option("--type <sourceType>", "Only chunks of this source type").choices(SOURCE_TYPES))
    .action(async (words: string[], options: SearchOptions) => {
      await runSearchCommand(
        { query: words.join(" "), k: options.k, sourceType: oneOf(SOURCE_TYPES, options.type) },
        getServices()
      );
    });

  program
    .command("stats")
    .description("Show collection statistics")
    .action(async () => {
      await runStatsCommand(getServices());
    });

  program
    .command("clear")
    .description("Delete every entry in the collection")
    .option("--yes", "Confirm the deletion", false)
    .action(async (options: { yes: boolean }) => {
      await runClearCommand({ yes: options.yes }, getServices());
    });

  return program;
}
