import { NullLogger, type ILogger } from "../logger.js";
import type { RagDocument } from "../types.js";
import { chunkDocuments } from "./chunker.js";

export type ParallelChunkOptions = {
  chunkSize: number;
  chunkOverlap: number;
  workers: number;
  logger?: ILogger;
};

/**
 * Partitions `items` into at most `workers` contiguous batches. All batches but the last
 * hold `floor(n / workers)` items (at least one); the last absorbs the remainder.
 */
export function partition<T>(items: readonly T[], workers: number): T[][] {
  if (items.length === 0) return [];
  const count = Math.max(1, Math.min(Math.floor(workers), items.length));
  const size = Math.max(1, Math.floor(items.length / count));
  const batches: T[][] = [];
  for (let b = 0; b < count; b += 1) {
    const start = b * size;
    const end = b === count - 1 ? items.length : start + size;
    batches.push(items.slice(start, end));
  }
  return batches;
}

/**
 * Chunks each batch as its own async task and concatenates the results in batch order.
 * The tasks share the calling thread and take turns between documents. Waits for every
 * batch (full barrier); a failing batch fails the whole call.
 */
export async function chunkParallel(
  documents: RagDocument[],
  options: ParallelChunkOptions
): Promise<RagDocument[]> {
  const logger = options.logger ?? new NullLogger();
  const batches = partition(documents, options.workers);
  logger.info(`Chunking ${documents.length} documents in ${batches.length} batches`);

  const results = await Promise.all(
    batches.map((batch) =>
      chunkDocuments(batch, {
        chunkSize: options.chunkSize,
        chunkOverlap: options.chunkOverlap,
        logger
      })
    )
  );

  return results.flat();
}
