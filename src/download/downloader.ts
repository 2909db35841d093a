import { promises as fs } from "node:fs";
import path from "node:path";

import { errorMessage } from "../errors.js";
import { extractArticle } from "../loaders/articleLoader.js";
import { fetchBytes, fetchText, type HttpOptions } from "../loaders/http.js";
import type { SavedSource } from "../loaders/sourceLoader.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { SearchResult } from "../types.js";
import { createQueryDirectory, fileNameFor, formatSavedArticle, isPdfBytes, isPdfLike } from "./files.js";
import { runUntilQuota } from "./quotaPool.js";

/** Saved article text shorter than this counts as a failed save. */
export const MIN_SAVED_TEXT_CHARS = 200;
/** Direct downloads smaller than this are treated as error pages. */
export const MIN_PDF_BYTES = 1024;

export type ArticleDownloaderOptions = {
  dataDir: string;
  http?: HttpOptions;
  /** Candidates considered: at most `poolFactor * minSuccesses`. */
  poolFactor?: number;
  logger?: ILogger;
};

export class ArticleDownloader {
  private readonly logger: ILogger;

  constructor(private readonly options: ArticleDownloaderOptions) {
    this.logger = options.logger ?? new NullLogger();
  }

  /** How many leading candidates `downloadUntilQuota` considers for a quota. */
  poolSize(minSuccesses: number): number {
    return Math.max(0, minSuccesses) * (this.options.poolFactor ?? 3);
  }

  /**
   * Saves candidates under `<dataDir>/downloads/<query>` until `minSuccesses` are saved or the
   * capped pool is exhausted. Falling short is not an error: the returned list is just shorter.
   */
  async downloadUntilQuota(params: {
    query: string;
    candidates: SearchResult[];
    minSuccesses: number;
    maxWorkers: number;
  }): Promise<SavedSource[]> {
    if (params.minSuccesses <= 0 || params.candidates.length === 0) return [];

    const queryDir = await createQueryDirectory(this.options.dataDir, params.query);
    const pool = params.candidates.slice(0, this.poolSize(params.minSuccesses));
    this.logger.info(
      `Target: ${params.minSuccesses} saves from ${pool.length} candidates (${params.maxWorkers} workers)`,
      { queryDir }
    );

    const outcome = await runUntilQuota(pool, {
      quota: params.minSuccesses,
      workers: params.maxWorkers,
      task: (source, signal) => this.saveOne(source, queryDir, signal),
      onSuccess: (saved, count) =>
        this.logger.info(
          `Saved ${saved.kind.toUpperCase()} (${count}/${params.minSuccesses}): ${saved.source.title.slice(0, 60)}`
        ),
      onFailure: (source, err) =>
        this.logger.debug(`Failed: ${source.url}${err === undefined ? "" : ` (${errorMessage(err)})`}`)
    });

    const saved = outcome.successes;
    const counts = {
      pdf: saved.filter((s) => s.kind === "pdf").length,
      text: saved.filter((s) => s.kind === "text").length,
      attempted: outcome.attempted,
      abandoned: outcome.abandoned
    };
    if (saved.length < params.minSuccesses) {
      this.logger.warn(
        `Only saved ${saved.length} sources (target: ${params.minSuccesses}); tried ${outcome.attempted} of ${params.candidates.length}`,
        counts
      );
    } else {
      this.logger.info(`Saved ${saved.length} sources (target: ${params.minSuccesses})`, counts);
    }
    return saved;
  }

  /** PDF-like candidates try a direct download first, then every candidate tries HTML parsing. */
  private async saveOne(source: SearchResult, queryDir: string, signal: AbortSignal): Promise<SavedSource | null> {
    if (isPdfLike(source.url)) {
      const pdf = await this.downloadPdf(source, queryDir, signal);
      if (pdf) return pdf;
      this.logger.info(`Download failed, trying to parse as article: ${source.url}`);
    }
    return this.parseAndSave(source, queryDir, signal);
  }

  private async downloadPdf(source: SearchResult, queryDir: string, signal: AbortSignal): Promise<SavedSource | null> {
    let bytes: Uint8Array;
    try {
      bytes = await fetchBytes(source.url, { ...this.options.http, signal });
    } catch (err: unknown) {
      this.logger.debug(`PDF download failed for ${source.url}: ${errorMessage(err)}`);
      return null;
    }
    if (!isPdfBytes(bytes, MIN_PDF_BYTES)) {
      this.logger.debug(`Not a PDF (${bytes.length} bytes): ${source.url}`);
      return null;
    }
    if (signal.aborted) return null;

    const filePath = path.join(queryDir, fileNameFor(source.title, source.url, "pdf"));
    await fs.writeFile(filePath, bytes);
    return { source, filePath, kind: "pdf" };
  }

  private async parseAndSave(source: SearchResult, queryDir: string, signal: AbortSignal): Promise<SavedSource | null> {
    let html: string;
    try {
      html = await fetchText(source.url, { ...this.options.http, signal });
    } catch (err: unknown) {
      this.logger.debug(`Fetch failed for ${source.url}: ${errorMessage(err)}`);
      return null;
    }

    const article = extractArticle(html, source.url);
    if (article.text.length < MIN_SAVED_TEXT_CHARS) {
      this.logger.warn(`Very little text extracted (${article.text.length} chars) from ${source.url}`);
      return null;
    }
    if (signal.aborted) return null;

    const title = source.title || article.title;
    const filePath = path.join(queryDir, fileNameFor(title, source.url, "txt"));
    await fs.writeFile(filePath, formatSavedArticle({ url: source.url, title, text: article.text }), "utf-8");
    return { source, filePath, kind: "text" };
  }
}
