import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { Settings } from "../config/settings.js";
import { GeminiGenerationService, type GenerationService } from "../integrations/gemini/chat.js";
import { createEmbeddings } from "../integrations/gemini/embeddings.js";
import { SerpApiSearchClient, type SearchService } from "../integrations/serpapi/searchClient.js";
import { YouTubeTranscriptProvider, type TranscriptProvider } from "../loaders/transcriptLoader.js";
import type { ILogger } from "../logger.js";
import { FileVectorStore } from "../retrieval/vectorStore.js";
import { ResearchPipeline } from "./pipeline.js";

export type Services = {
  settings: Settings;
  logger: ILogger;
  embeddings: EmbeddingsInterface;
  generation: GenerationService;
  transcripts: TranscriptProvider;
  /** Present only when SERP_API_KEY is configured. */
  search?: SearchService;
};

export function createServices(settings: Settings, logger: ILogger): Services {
  return {
    settings,
    logger,
    embeddings: createEmbeddings(settings),
    generation: new GeminiGenerationService(settings),
    transcripts: new YouTubeTranscriptProvider({ timeoutMs: settings.requestTimeoutMs }),
    search: settings.serpApiKey ? new SerpApiSearchClient({ apiKey: settings.serpApiKey, logger }) : undefined
  };
}

/** The collection is pinned to the configured embedding model. */
export function openStore(services: Pick<Services, "settings" | "logger" | "embeddings">): Promise<FileVectorStore> {
  return FileVectorStore.open(services.embeddings, {
    persistDirectory: services.settings.persistDirectory,
    collectionName: services.settings.collectionName,
    embeddingModel: services.settings.embeddingModel,
    logger: services.logger
  });
}

export async function createResearchPipeline(services: Services): Promise<ResearchPipeline> {
  return new ResearchPipeline({
    settings: services.settings,
    store: await openStore(services),
    generation: services.generation,
    transcripts: services.transcripts,
    embeddings: services.embeddings,
    search: services.search,
    logger: services.logger
  });
}
