import { errorMessage } from "../errors.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { SearchResult } from "../types.js";
import { ArticleLoader } from "./articleLoader.js";
import type { LoadReport, SingleDocumentLoader } from "./document.js";
import type { HttpOptions } from "./http.js";
import { PdfFileLoader, PdfUrlLoader, type PdfExtractionStrategy } from "./pdfLoader.js";
import { TextFileLoader } from "./textLoader.js";
import { TranscriptLoader, type TranscriptProvider } from "./transcriptLoader.js";

export type SavedSource = {
  source: SearchResult;
  filePath: string;
  kind: "pdf" | "text";
};

export type SourceLoaderDeps = {
  http?: HttpOptions;
  transcripts: TranscriptProvider;
  transcriptLanguage?: string;
  pdfStrategies?: readonly PdfExtractionStrategy[];
  logger?: ILogger;
};

/** Loader for a source that has not been saved locally. */
export function loaderForSource(source: SearchResult, deps: SourceLoaderDeps): SingleDocumentLoader {
  switch (source.sourceType) {
    case "video":
      return new TranscriptLoader(source.url, {
        provider: deps.transcripts,
        language: deps.transcriptLanguage,
        logger: deps.logger
      });
    case "pdf":
      return new PdfUrlLoader(source.url, { ...deps.http, strategies: deps.pdfStrategies, logger: deps.logger });
    case "article":
      return new ArticleLoader(source.url, deps.http);
  }
}

export function loaderForSavedFile(saved: SavedSource, deps: Pick<SourceLoaderDeps, "pdfStrategies" | "logger">): SingleDocumentLoader {
  return saved.kind === "pdf"
    ? new PdfFileLoader(saved.filePath, { sourceUrl: saved.source.url, strategies: deps.pdfStrategies, logger: deps.logger })
    : new TextFileLoader(saved.filePath, { sourceUrl: saved.source.url, sourceType: "article" });
}

/**
 * Loads every item, one at a time. A failing item is recorded and skipped; it never stops
 * the others.
 */
export async function loadAll<T>(
  items: readonly T[],
  params: { locate: (item: T) => string; loaderFor: (item: T) => SingleDocumentLoader; logger?: ILogger }
): Promise<LoadReport> {
  const logger = params.logger ?? new NullLogger();
  const report: LoadReport = { documents: [], failures: [] };

  for (const item of items) {
    const locator = params.locate(item);
    try {
      report.documents.push(await params.loaderFor(item).loadOne());
    } catch (err: unknown) {
      logger.warn(`Skipped ${locator}: ${errorMessage(err)}`);
      report.failures.push({ locator, reason: errorMessage(err) });
    }
  }

  logger.info(`Loaded ${report.documents.length} of ${items.length} sources (${report.failures.length} skipped)`);
  return report;
}
