import { promises as fs } from "node:fs";

import { DirectoryLoader } from "@langchain/classic/document_loaders/fs/directory";
import { BaseDocumentLoader } from "@langchain/core/document_loaders/base";

import { ConfigurationError, errorMessage } from "../errors.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { RagDocument } from "../types.js";
import type { LoadReport, SingleDocumentLoader } from "./document.js";
import { PdfFileLoader, type PdfExtractionStrategy } from "./pdfLoader.js";
import { TextFileLoader } from "./textLoader.js";

export const SUPPORTED_EXTENSIONS = [".pdf", ".txt", ".md"] as const;

/** Records a per-file failure in the report instead of aborting the directory walk. */
class ReportingLoader extends BaseDocumentLoader {
  constructor(
    private readonly filePath: string,
    private readonly inner: SingleDocumentLoader,
    private readonly report: LoadReport,
    private readonly logger: ILogger
  ) {
    super();
  }

  async load(): Promise<RagDocument[]> {
    try {
      const doc = await this.inner.loadOne();
      this.report.documents.push(doc);
      return [doc];
    } catch (err: unknown) {
      this.logger.warn(`Skipped ${this.filePath}: ${errorMessage(err)}`);
      this.report.failures.push({ locator: this.filePath, reason: errorMessage(err) });
      return [];
    }
  }
}

export async function loadSourceDirectory(
  sourceDir: string,
  options: { recursive?: boolean; logger?: ILogger; pdfStrategies?: readonly PdfExtractionStrategy[] } = {}
): Promise<LoadReport> {
  const logger = options.logger ?? new NullLogger();
  const stat = await fs.stat(sourceDir).catch(() => undefined);
  if (!stat?.isDirectory()) {
    throw new ConfigurationError(`Not a directory: ${sourceDir}`);
  }

  const report: LoadReport = { documents: [], failures: [] };
  const wrap = (filePath: string, inner: SingleDocumentLoader) =>
    new ReportingLoader(filePath, inner, report, logger);

  const loader = new DirectoryLoader(
    sourceDir,
    {
      ".pdf": (p: string) => wrap(p, new PdfFileLoader(p, { strategies: options.pdfStrategies, logger })),
      ".txt": (p: string) => wrap(p, new TextFileLoader(p)),
      ".md": (p: string) => wrap(p, new TextFileLoader(p))
    },
    options.recursive ?? true,
    "ignore"
  );
  await loader.load();

  const byPath = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);
  report.documents.sort((a, b) => byPath(a.metadata.filePath ?? a.metadata.source, b.metadata.filePath ?? b.metadata.source));
  report.failures.sort((a, b) => byPath(a.locator, b.locator));

  logger.info(
    `Loaded ${report.documents.length} documents from ${sourceDir} (${report.failures.length} skipped)`
  );
  return report;
}
