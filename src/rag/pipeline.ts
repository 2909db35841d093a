import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { assertChunking, type Settings } from "../config/settings.js";
import { ArticleDownloader } from "../download/downloader.js";
import { ConfigurationError, EmptyCorpusError } from "../errors.js";
import { deduplicate, filterByRelevance, rankByType } from "../ingestion/sourceFilter.js";
import type { GenerationService } from "../integrations/gemini/chat.js";
import type { SearchService } from "../integrations/serpapi/searchClient.js";
import type { LoadFailure, LoadReport } from "../loaders/document.js";
import type { HttpOptions } from "../loaders/http.js";
import type { PdfExtractionStrategy } from "../loaders/pdfLoader.js";
import { loadSourceDirectory } from "../loaders/sourceDirectory.js";
import { loadAll, loaderForSavedFile, loaderForSource } from "../loaders/sourceLoader.js";
import type { TranscriptProvider } from "../loaders/transcriptLoader.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { FileVectorStore } from "../retrieval/vectorStore.js";
import type { RagDocument } from "../types.js";
import { answerOptionsFrom, answerQuestion, type AnswerResult } from "./answer.js";
import { indexDocuments } from "./ingest.js";

export type ResearchMode = "online" | "local" | "both";

export type ResearchPipelineDeps = {
  settings: Settings;
  store: Pick<FileVectorStore, "add" | "search" | "stats">;
  generation: GenerationService;
  transcripts: TranscriptProvider;
  /** Used for relevance filtering; without it the keyword fallback applies. */
  embeddings?: EmbeddingsInterface;
  search?: SearchService;
  downloader?: ArticleDownloader;
  http?: HttpOptions;
  pdfStrategies?: readonly PdfExtractionStrategy[];
  logger?: ILogger;
};

export type ResearchRequest = {
  query: string;
  mode: ResearchMode;
  localDir?: string;
  minSources?: number;
};

export type ResearchOutcome = {
  query: string;
  mode: ResearchMode;
  sourcesFound: number;
  sourcesApproved: number;
  sourcesSaved: number;
  documentsLoaded: number;
  documentsSkipped: number;
  failures: LoadFailure[];
  chunksCreated: number;
  collectionTotal: number;
  result: AnswerResult;
};

type OnlineStage = {
  found: number;
  approved: number;
  saved: number;
  reports: LoadReport[];
};

/**
 * query → search → relevance filter → dedup → type ranking → download until quota → load,
 * plus local files, then chunk, index, retrieve and answer.
 */
export class ResearchPipeline {
  private readonly logger: ILogger;
  private readonly downloader: ArticleDownloader;

  constructor(private readonly deps: ResearchPipelineDeps) {
    assertChunking(deps.settings);
    this.logger = deps.logger ?? new NullLogger();
    this.downloader =
      deps.downloader ??
      new ArticleDownloader({
        dataDir: deps.settings.dataDir,
        http: { timeoutMs: deps.settings.requestTimeoutMs, ...deps.http },
        logger: this.logger
      });
  }

  async run(request: ResearchRequest): Promise<ResearchOutcome> {
    const { settings } = this.deps;
    if (request.mode === "local" && !request.localDir) {
      throw new ConfigurationError("Local mode needs a directory of documents");
    }

    const online: OnlineStage =
      request.mode === "local"
        ? { found: 0, approved: 0, saved: 0, reports: [] }
        : await this.gatherOnline(request.query, request.minSources ?? settings.minSources);

    const reports = [...online.reports];
    if (request.localDir && request.mode !== "online") {
      reports.push(
        await loadSourceDirectory(request.localDir, { pdfStrategies: this.deps.pdfStrategies, logger: this.logger })
      );
    }

    const documents: RagDocument[] = reports.flatMap((r) => r.documents);
    const failures = reports.flatMap((r) => r.failures);
    this.logger.info(`Loaded ${documents.length} documents (${failures.length} skipped)`);
    if (documents.length === 0) {
      throw new EmptyCorpusError();
    }

    const indexed = await indexDocuments({
      documents,
      store: this.deps.store,
      chunking: {
        chunkSize: settings.chunkSize,
        chunkOverlap: settings.chunkOverlap,
        workers: settings.chunkWorkers
      },
      logger: this.logger
    });

    const result = await answerQuestion({
      question: request.query,
      searcher: this.deps.store,
      generation: this.deps.generation,
      options: answerOptionsFrom(settings),
      logger: this.logger
    });

    return {
      query: request.query,
      mode: request.mode,
      sourcesFound: online.found,
      sourcesApproved: online.approved,
      sourcesSaved: online.saved,
      documentsLoaded: documents.length,
      documentsSkipped: failures.length,
      failures,
      chunksCreated: indexed.chunksCreated,
      collectionTotal: indexed.collectionTotal,
      result
    };
  }

  private async gatherOnline(query: string, minSources: number): Promise<OnlineStage> {
    const { settings, search } = this.deps;
    if (!search) {
      throw new ConfigurationError("Online research needs a search service (set SERP_API_KEY)");
    }

    const found = await search.search(query, settings.maxSearchResults, settings.searchDepth);
    const relevant = await filterByRelevance(query, found, {
      embeddings: this.deps.embeddings,
      threshold: settings.relevanceThreshold,
      logger: this.logger
    });
    const approved = rankByType(deduplicate(relevant, this.logger));

    const videos = approved.filter((s) => s.sourceType === "video");
    const downloadable = approved.filter((s) => s.sourceType !== "video");

    const saved = await this.downloader.downloadUntilQuota({
      query,
      candidates: downloadable,
      minSuccesses: minSources,
      maxWorkers: settings.downloadWorkers
    });

    // Short of the quota, candidates past the download pool are loaded straight from their URL.
    const shortfall = minSources - saved.length;
    const unreached =
      shortfall > 0 ? downloadable.slice(this.downloader.poolSize(minSources)).slice(0, shortfall) : [];
    if (unreached.length > 0) {
      this.logger.info(`Loading ${unreached.length} sources beyond the download pool directly`);
    }

    const savedReport = await loadAll(saved, {
      locate: (s) => s.filePath,
      loaderFor: (s) => loaderForSavedFile(s, { pdfStrategies: this.deps.pdfStrategies, logger: this.logger }),
      logger: this.logger
    });
    const remoteReport = await loadAll([...videos, ...unreached], {
      locate: (s) => s.url,
      loaderFor: (s) =>
        loaderForSource(s, {
          http: { timeoutMs: settings.requestTimeoutMs, ...this.deps.http },
          transcripts: this.deps.transcripts,
          transcriptLanguage: settings.transcriptLanguage,
          pdfStrategies: this.deps.pdfStrategies,
          logger: this.logger
        }),
      logger: this.logger
    });

    return {
      found: found.length,
      approved: approved.length,
      saved: saved.length,
      reports: [savedReport, remoteReport]
    };
  }
}
