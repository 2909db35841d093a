import { Document, type DocumentInterface } from "@langchain/core/documents";
import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import { VectorStore } from "@langchain/core/vectorstores";

import { CitewiseError, ConfigurationError, EmbeddingServiceError, errorMessage } from "../errors.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { ChunkSearcher, ScoredChunk } from "../rag/context.js";
import type { MetadataFilter, RagDocument } from "../types.js";
import { collectionPath, loadIndex, saveIndex } from "./indexStore.js";
import { topKSimilarEntries } from "./search.js";
import { documentMetadataSchema, type StoredCollection, type StoredEntry } from "./types.js";

export type FileVectorStoreConfig = {
  persistDirectory: string;
  collectionName: string;
  /** Recorded in the collection; a non-empty collection refuses any other model. */
  embeddingModel: string;
  logger?: ILogger;
};

export type CollectionStats = {
  collectionName: string;
  totalDocuments: number;
  persistDirectory: string;
  embeddingModel: string;
  embeddingDimension?: number;
};

/**
 * A named collection of embedded chunks kept in one JSON file under `persistDirectory`.
 * Entries get sequential ids (`doc_0`, `doc_1`, ...) continuing from the collection size and
 * are never deduplicated. One writer per process.
 */
export class FileVectorStore extends VectorStore implements ChunkSearcher {
  declare FilterType: MetadataFilter;

  private readonly config: FileVectorStoreConfig;
  private readonly logger: ILogger;
  private collection: StoredCollection;

  _vectorstoreType(): string {
    return "citewise-file";
  }

  private constructor(embeddings: EmbeddingsInterface, config: FileVectorStoreConfig, collection: StoredCollection) {
    super(embeddings, config);
    this.config = config;
    this.logger = config.logger ?? new NullLogger();
    this.collection = collection;
  }

  static async open(embeddings: EmbeddingsInterface, config: FileVectorStoreConfig): Promise<FileVectorStore> {
    const filePath = collectionPath(config.persistDirectory, config.collectionName);
    const stored = await loadIndex(filePath);

    if (stored && stored.entries.length > 0 && stored.embeddingModel !== config.embeddingModel) {
      throw new ConfigurationError(
        `Embedding model mismatch for collection "${config.collectionName}".\nCollection: ${stored.embeddingModel}\nCurrent: ${config.embeddingModel}\nClear the collection or use the original model.`
      );
    }

    const collection: StoredCollection =
      stored && stored.entries.length > 0
        ? stored
        : { version: 1, name: config.collectionName, embeddingModel: config.embeddingModel, entries: [] };

    const store = new FileVectorStore(embeddings, config, collection);
    store.logger.info(`Opened collection ${config.collectionName}`, {
      totalDocuments: collection.entries.length
    });
    return store;
  }

  get filePath(): string {
    return collectionPath(this.config.persistDirectory, this.config.collectionName);
  }

  /** Embeds all chunk texts in one batch call and persists them as one write. Returns the new ids. */
  async add(chunks: RagDocument[]): Promise<string[]> {
    if (chunks.length === 0) return [];

    let vectors: number[][];
    try {
      vectors = await this.embeddings.embedDocuments(chunks.map((c) => c.pageContent));
    } catch (err: unknown) {
      throw new EmbeddingServiceError(`Failed to embed ${chunks.length} chunks: ${errorMessage(err)}`, {
        cause: err
      });
    }
    return this.addVectors(vectors, chunks);
  }

  async addDocuments(documents: DocumentInterface[]): Promise<string[]> {
    return this.add(documents.map(toRagDocument));
  }

  async addVectors(vectors: number[][], documents: DocumentInterface[]): Promise<string[]> {
    if (vectors.length !== documents.length) {
      throw new EmbeddingServiceError(
        `Embedding count mismatch: documents=${documents.length} embeddings=${vectors.length}`
      );
    }
    if (documents.length === 0) return [];

    const dimension = this.collection.embeddingDimension ?? vectors[0]?.length ?? 0;
    if (dimension <= 0) {
      throw new EmbeddingServiceError(`Embedding dimension invalid (${dimension}). Check embedding model: ${this.config.embeddingModel}`);
    }
    vectors.forEach((v, i) => {
      if (v.length !== dimension) {
        throw new EmbeddingServiceError(
          `Embedding dimension mismatch at chunk ${i}: expected=${dimension} actual=${v.length}`
        );
      }
    });

    const start = this.collection.entries.length;
    const added: StoredEntry[] = documents.map((doc, i) => ({
      id: `doc_${start + i}`,
      text: doc.pageContent,
      metadata: toRagDocument(doc).metadata,
      embedding: vectors[i] ?? []
    }));

    const next: StoredCollection = {
      ...this.collection,
      embeddingDimension: dimension,
      entries: [...this.collection.entries, ...added]
    };
    await saveIndex(this.filePath, next);
    this.collection = next;

    this.logger.info(`Added ${added.length} chunks to ${this.config.collectionName}`, {
      totalDocuments: next.entries.length
    });
    return added.map((e) => e.id);
  }

  /**
   * The `k` nearest chunks with `score = 1 - cosineDistance` in [0, 1]. An empty collection
   * returns `[]` without calling the embedding service.
   */
  async search(query: string, k: number, filter?: MetadataFilter): Promise<ScoredChunk[]> {
    if (this.collection.entries.length === 0) return [];

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embeddings.embedQuery(query);
    } catch (err: unknown) {
      throw new EmbeddingServiceError(`Failed to embed query: ${errorMessage(err)}`, { cause: err });
    }
    return this.rank(queryEmbedding, k, filter);
  }

  async similaritySearchVectorWithScore(
    query: number[],
    k: number,
    filter?: this["FilterType"]
  ): Promise<ScoredChunk[]> {
    return this.rank(query, k, filter);
  }

  private rank(query: number[], k: number, filter: MetadataFilter | undefined): ScoredChunk[] {
    const dimension = this.collection.embeddingDimension;
    if (dimension !== undefined && query.length !== dimension) {
      throw new EmbeddingServiceError(
        `Embedding dimension mismatch.\nCollection: ${dimension}\nQuery: ${query.length}`
      );
    }
    return topKSimilarEntries({ queryEmbedding: query, entries: this.collection.entries, k, filter }).map(
      ({ entry, score }): ScoredChunk => [
        new Document({ id: entry.id, pageContent: entry.text, metadata: { ...entry.metadata } }),
        score
      ]
    );
  }

  stats(): CollectionStats {
    return {
      collectionName: this.config.collectionName,
      totalDocuments: this.collection.entries.length,
      persistDirectory: this.config.persistDirectory,
      embeddingModel: this.collection.embeddingModel,
      embeddingDimension: this.collection.embeddingDimension
    };
  }

  /** Irreversibly removes every entry; ids restart at `doc_0`. */
  async clear(): Promise<void> {
    this.logger.warn(
      `Clearing collection ${this.config.collectionName} (${this.collection.entries.length} entries will be deleted)`
    );
    const empty: StoredCollection = {
      version: 1,
      name: this.config.collectionName,
      embeddingModel: this.config.embeddingModel,
      entries: []
    };
    await saveIndex(this.filePath, empty);
    this.collection = empty;
  }
}

function toRagDocument(doc: DocumentInterface): RagDocument {
  const parsed = documentMetadataSchema.safeParse(doc.metadata);
  if (!parsed.success) {
    throw new CitewiseError(
      `Chunk metadata is missing required fields: ${parsed.error.issues.map((i) => i.path.join(".")).join(", ")}`
    );
  }
  return new Document({ id: doc.id, pageContent: doc.pageContent, metadata: parsed.data });
}
