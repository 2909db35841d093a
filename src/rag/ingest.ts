import { EmptyCorpusError } from "../errors.js";
import { chunkParallel } from "../ingestion/parallelChunker.js";
import type { LoadReport } from "../loaders/document.js";
import type { PdfExtractionStrategy } from "../loaders/pdfLoader.js";
import { loadSourceDirectory } from "../loaders/sourceDirectory.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { FileVectorStore } from "../retrieval/vectorStore.js";
import type { RagDocument } from "../types.js";

export type ChunkingOptions = {
  chunkSize: number;
  chunkOverlap: number;
  workers: number;
};

export type IndexTarget = Pick<FileVectorStore, "add" | "stats">;

export type IndexResult = {
  chunksCreated: number;
  collectionTotal: number;
};

/** Chunks in parallel and adds every chunk to the store in one batch. */
export async function indexDocuments(params: {
  documents: RagDocument[];
  store: IndexTarget;
  chunking: ChunkingOptions;
  logger?: ILogger;
}): Promise<IndexResult> {
  const chunks = await chunkParallel(params.documents, { ...params.chunking, logger: params.logger });
  await params.store.add(chunks);
  return { chunksCreated: chunks.length, collectionTotal: params.store.stats().totalDocuments };
}

export type IngestResult = IndexResult & {
  report: LoadReport;
};

export async function ingestDirectory(params: {
  sourceDir: string;
  recursive?: boolean;
  store: IndexTarget;
  chunking: ChunkingOptions;
  pdfStrategies?: readonly PdfExtractionStrategy[];
  logger?: ILogger;
}): Promise<IngestResult> {
  const logger = params.logger ?? new NullLogger();
  const report = await loadSourceDirectory(params.sourceDir, {
    recursive: params.recursive,
    pdfStrategies: params.pdfStrategies,
    logger
  });
  if (report.documents.length === 0) {
    throw new EmptyCorpusError(
      `No documents could be loaded from ${params.sourceDir} (${report.failures.length} skipped)`
    );
  }

  const indexed = await indexDocuments({
    documents: report.documents,
    store: params.store,
    chunking: params.chunking,
    logger
  });
  return { ...indexed, report };
}
