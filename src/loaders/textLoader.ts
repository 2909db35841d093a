import path from "node:path";

import { TextLoader } from "@langchain/classic/document_loaders/fs/text";

import type { DocumentSourceType, RagDocument } from "../types.js";
import { MIN_DOCUMENT_CHARS, SingleDocumentLoader, makeDocument } from "./document.js";

const HEADER_LINES = 5;

export type TextFileHeader = {
  title?: string;
  source?: string;
};

/** Reads `Title: ` and `Source: ` lines from the top of a file written by the downloader. */
export function parseTextHeader(content: string): TextFileHeader {
  const header: TextFileHeader = {};
  for (const line of content.split("\n").slice(0, HEADER_LINES)) {
    if (!header.title && line.startsWith("Title: ")) header.title = line.slice("Title: ".length).trim() || undefined;
    if (!header.source && line.startsWith("Source: ")) header.source = line.slice("Source: ".length).trim() || undefined;
  }
  return header;
}

export type TextFileLoaderOptions = {
  sourceUrl?: string;
  /** Defaults to `article` for files carrying a `Source:` header, `text` otherwise. */
  sourceType?: DocumentSourceType;
  minChars?: number;
};

export class TextFileLoader extends SingleDocumentLoader {
  constructor(
    private readonly filePath: string,
    private readonly options: TextFileLoaderOptions = {}
  ) {
    super();
  }

  async loadOne(): Promise<RagDocument> {
    const [raw] = await new TextLoader(this.filePath).load();
    const content = raw?.pageContent ?? "";
    const header = parseTextHeader(content);

    return makeDocument(
      content,
      {
        source: this.options.sourceUrl ?? header.source ?? this.filePath,
        sourceType: this.options.sourceType ?? (header.source ? "article" : "text"),
        filePath: this.filePath,
        title: header.title ?? path.basename(this.filePath, path.extname(this.filePath))
      },
      this.options.minChars ?? MIN_DOCUMENT_CHARS
    );
  }
}
