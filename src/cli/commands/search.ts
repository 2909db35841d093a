import { openStore, type Services } from "../../rag/services.js";
import type { DocumentSourceType } from "../../types.js";

export async function runSearchCommand(
  args: { query: string; k: number; sourceType?: DocumentSourceType },
  services: Services
): Promise<void> {
  const store = await openStore(services);
  const results = await store.search(args.query, args.k, args.sourceType ? { sourceType: args.sourceType } : undefined);
  if (results.length === 0) {
    process.stdout.write("No matching chunks.\n");
    return;
  }

  const blocks = results.map(([chunk, score], i) => {
    const preview = chunk.pageContent.replace(/\s+/g, " ").slice(0, 200);
    return `[${i + 1}] ${score.toFixed(3)} ${chunk.metadata.source}\n    ${preview}`;
  });
  process.stdout.write(`${blocks.join("\n")}\n`);
}
