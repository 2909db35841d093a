import { ingestDirectory } from "../../rag/ingest.js";
import { openStore, type Services } from "../../rag/services.js";

export async function runIngestCommand(
  args: { sourceDir: string; recursive: boolean },
  services: Services
): Promise<void> {
  const { settings } = services;
  const store = await openStore(services);
  const result = await ingestDirectory({
    sourceDir: args.sourceDir,
    recursive: args.recursive,
    store,
    chunking: {
      chunkSize: settings.chunkSize,
      chunkOverlap: settings.chunkOverlap,
      workers: settings.chunkWorkers
    },
    logger: services.logger
  });

  const lines = [
    `Loaded: ${result.report.documents.length}`,
    `Skipped: ${result.report.failures.length}`,
    ...result.report.failures.map((f) => `  - ${f.locator}: ${f.reason}`),
    `Chunks created: ${result.chunksCreated}`,
    `Collection total: ${result.collectionTotal}`
  ];
  process.stdout.write(`${lines.join("\n")}\n`);
}
