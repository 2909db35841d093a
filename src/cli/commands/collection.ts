import { openStore, type Services } from "../../rag/services.js";

export async function runStatsCommand(services: Services): Promise<void> {
  const store = await openStore(services);
  const stats = store.stats();
  process.stdout.write(
    [
      `Collection: ${stats.collectionName}`,
      `Total documents: ${stats.totalDocuments}`,
      `Persist directory: ${stats.persistDirectory}`,
      `Embedding model: ${stats.embeddingModel}`
    ].join("\n") + "\n"
  );
}

export async function runClearCommand(args: { yes: boolean }, services: Services): Promise<void> {
  if (!args.yes) {
    throw new Error("Refusing to clear the collection without --yes");
  }
  const store = await openStore(services);
  const before = store.stats().totalDocuments;
  await store.clear();
  process.stdout.write(`Cleared ${before} entries from ${store.stats().collectionName}\n`);
}
