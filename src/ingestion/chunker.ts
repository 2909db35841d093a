import { Document } from "@langchain/core/documents";
import { TextSplitter, type TextSplitterParams } from "@langchain/textsplitters";

import { ConfigurationError } from "../errors.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { RagDocument } from "../types.js";

/** Paragraph, line, sentence, word, then a hard character split. */
export const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", " ", ""] as const;

/** Longest chunk, overlap prefix included: 120% of the chunk size. */
export function maxChunkLength(chunkSize: number): number {
  return Math.floor((chunkSize * 6) / 5);
}

export type OverlapWindowSplitterParams = {
  chunkSize: number;
  chunkOverlap: number;
  separators?: readonly string[];
  logger?: ILogger;
};

/**
 * Recursive separator splitter with raw-piece overlap.
 *
 * Text is first cut into raw pieces of at most `pieceSize` characters, trying the
 * separators in order and recursing into oversized pieces with the next one. The raw
 * pieces concatenate back to the input exactly. Chunk `i` is then the trailing
 * `chunkOverlap` characters of raw piece `i - 1` followed by raw piece `i`.
 *
 * `pieceSize` is `chunkSize`, shrunk when the overlap would otherwise push a chunk past
 * `maxChunkLength(chunkSize)`.
 */
export class OverlapWindowSplitter extends TextSplitter {
  static lc_name() {
    return "OverlapWindowSplitter";
  }

  readonly separators: readonly string[];
  /** Upper bound for a raw piece. */
  readonly pieceSize: number;

  constructor(params: OverlapWindowSplitterParams) {
    super(OverlapWindowSplitter.resolveParams(params));
    this.separators = params.separators ?? DEFAULT_SEPARATORS;
    this.pieceSize = Math.max(
      1,
      Math.min(this.chunkSize, maxChunkLength(this.chunkSize) - this.chunkOverlap)
    );
  }

  private static resolveParams(params: OverlapWindowSplitterParams): Partial<TextSplitterParams> {
    if (!Number.isInteger(params.chunkSize) || params.chunkSize < 1) {
      throw new ConfigurationError(`chunk size must be a positive integer, got ${params.chunkSize}`);
    }
    let chunkOverlap = Math.max(0, Math.floor(params.chunkOverlap));
    if (chunkOverlap >= params.chunkSize) {
      const clamped = params.chunkSize - 1;
      (params.logger ?? new NullLogger()).warn(
        `Chunk overlap ${chunkOverlap} is not smaller than chunk size ${params.chunkSize}; using ${clamped}`
      );
      chunkOverlap = clamped;
    }
    return { chunkSize: params.chunkSize, chunkOverlap, keepSeparator: true };
  }

  async splitText(text: string): Promise<string[]> {
    const pieces = this.splitPieces(text);
    return pieces.map((piece, i) =>
      i === 0 ? piece : overlapTail(pieces[i - 1] ?? "", this.chunkOverlap) + piece
    );
  }

  /** Raw, non-overlapping pieces; `splitPieces(t).join("") === t`. */
  splitPieces(text: string): string[] {
    if (text.length === 0) return [];
    return this.splitRecursive(text, this.separators);
  }

  private splitRecursive(text: string, separators: readonly string[]): string[] {
    if (text.length <= this.pieceSize) return [text];

    let index = separators.findIndex((s) => s === "" || text.includes(s));
    if (index < 0) index = separators.length;
    const separator = separators[index] ?? "";
    const remaining = separators.slice(index + 1);

    const pieces: string[] = [];
    let buffer = "";
    for (const split of splitKeepingSeparator(text, separator)) {
      if (split.length > this.pieceSize) {
        if (buffer) {
          pieces.push(buffer);
          buffer = "";
        }
        // No finer separator left: keep the oversized piece whole.
        if (remaining.length === 0) pieces.push(split);
        else pieces.push(...this.splitRecursive(split, remaining));
        continue;
      }
      if (buffer && buffer.length + split.length > this.pieceSize) {
        pieces.push(buffer);
        buffer = "";
      }
      buffer += split;
    }
    if (buffer) pieces.push(buffer);
    return pieces;
  }
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") return Array.from(text);
  const parts = text.split(separator);
  return parts
    .map((part, i) => (i < parts.length - 1 ? part + separator : part))
    .filter((part) => part.length > 0);
}

function overlapTail(piece: string, overlap: number): string {
  return overlap > 0 ? piece.slice(-overlap) : "";
}

/**
 * Splits each document into overlapping chunks. Chunks carry a copy of the parent's
 * metadata, unchanged.
 */
export async function chunkDocuments(
  documents: RagDocument[],
  options: OverlapWindowSplitterParams
): Promise<RagDocument[]> {
  const logger = options.logger ?? new NullLogger();
  if (documents.length === 0) {
    logger.warn("No documents to chunk");
    return [];
  }

  const splitter = new OverlapWindowSplitter(options);
  const chunks: RagDocument[] = [];
  for (const doc of documents) {
    for (const text of await splitter.splitText(doc.pageContent)) {
      chunks.push(new Document({ pageContent: text, metadata: { ...doc.metadata } }));
    }
  }

  if (chunks.length > 0) {
    const lengths = chunks.map((c) => c.pageContent.length);
    logger.debug("Chunk stats", {
      min: lengths.reduce((a, b) => Math.min(a, b)),
      max: lengths.reduce((a, b) => Math.max(a, b)),
      avg: Math.round(lengths.reduce((a, b) => a + b, 0) / lengths.length)
    });
  }
  logger.info(`Created ${chunks.length} chunks from ${documents.length} documents`, {
    chunkSize: splitter.chunkSize,
    chunkOverlap: splitter.chunkOverlap
  });
  return chunks;
}
