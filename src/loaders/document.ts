import { BaseDocumentLoader } from "@langchain/core/document_loaders/base";
import { Document } from "@langchain/core/documents";

import { ExtractionError } from "../errors.js";
import type { DocumentMetadata, RagDocument } from "../types.js";

/** Loaders refuse to produce documents shorter than this. */
export const MIN_DOCUMENT_CHARS = 100;

export function makeDocument(
  text: string,
  metadata: Omit<DocumentMetadata, "contentLength">,
  minChars = MIN_DOCUMENT_CHARS
): RagDocument {
  const pageContent = text.trim();
  if (pageContent.length < minChars) {
    throw new ExtractionError(
      `Extracted only ${pageContent.length} characters from ${metadata.source} (minimum ${minChars})`,
      { locator: metadata.source }
    );
  }
  return new Document({
    pageContent,
    metadata: { ...metadata, contentLength: pageContent.length }
  });
}

/** A LangChain loader that always yields exactly one document or throws. */
export abstract class SingleDocumentLoader extends BaseDocumentLoader {
  abstract loadOne(): Promise<RagDocument>;

  async load(): Promise<RagDocument[]> {
    return [await this.loadOne()];
  }
}

export type LoadFailure = { locator: string; reason: string };

/** Outcome of a batch load: what loaded, and what was skipped and why. */
export type LoadReport = {
  documents: RagDocument[];
  failures: LoadFailure[];
};
