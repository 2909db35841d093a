import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { PDFLoader } from "@langchain/community/document_loaders/fs/pdf";
import { Document } from "@langchain/core/documents";
import { extractText, getDocumentProxy, getMeta } from "unpdf";
import { z } from "zod";

import { ExtractionError, errorMessage } from "../errors.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { RagDocument } from "../types.js";
import { MIN_DOCUMENT_CHARS, SingleDocumentLoader, makeDocument } from "./document.js";
import { fetchBytes, type HttpOptions } from "./http.js";

export type PdfPage = { pageNumber: number; text: string };

export type PdfExtraction = {
  pages: PdfPage[];
  numPages: number;
  title?: string;
  author?: string;
};

export type PdfExtractionResult =
  | { ok: true; extraction: PdfExtraction }
  | { ok: false; reason: string };

/** One PDF backend. Never throws: failure is a value. */
export type PdfExtractionStrategy = {
  name: string;
  extract(filePath: string): Promise<PdfExtractionResult>;
};

const langChainPageMetadataSchema = z.object({
  pdf: z
    .object({
      totalPages: z.number().optional(),
      info: z.object({ Title: z.unknown().optional(), Author: z.unknown().optional() }).passthrough().optional()
    })
    .passthrough()
    .optional(),
  loc: z.object({ pageNumber: z.number() }).passthrough().optional()
});

const pdfInfoSchema = z
  .object({ Title: z.unknown().optional(), Author: z.unknown().optional() })
  .passthrough();

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** Primary backend: LangChain's PDFLoader over pdf-parse, one document per page. */
export const pdfParseStrategy: PdfExtractionStrategy = {
  name: "pdf-parse",
  async extract(filePath) {
    try {
      const docs = await new PDFLoader(filePath, { splitPages: true }).load();
      let numPages = docs.length;
      let title: string | undefined;
      let author: string | undefined;
      const pages = docs.map((doc, i) => {
        const meta = langChainPageMetadataSchema.safeParse(doc.metadata);
        if (meta.success) {
          numPages = meta.data.pdf?.totalPages ?? numPages;
          title ??= nonEmptyString(meta.data.pdf?.info?.Title);
          author ??= nonEmptyString(meta.data.pdf?.info?.Author);
        }
        const pageNumber = meta.success ? (meta.data.loc?.pageNumber ?? i + 1) : i + 1;
        return { pageNumber, text: doc.pageContent };
      });
      return { ok: true, extraction: { pages, numPages, title, author } };
    } catch (err: unknown) {
      return { ok: false, reason: errorMessage(err) };
    }
  }
};

/** Secondary backend: unpdf (PDF.js), text per page. */
export const unpdfStrategy: PdfExtractionStrategy = {
  name: "unpdf",
  async extract(filePath) {
    try {
      const pdf = await getDocumentProxy(new Uint8Array(await fs.readFile(filePath)));
      const { totalPages, text } = await extractText(pdf, { mergePages: false });
      const { info } = await getMeta(pdf);
      const parsedInfo = pdfInfoSchema.safeParse(info);
      return {
        ok: true,
        extraction: {
          pages: text.map((pageText, i) => ({ pageNumber: i + 1, text: pageText })),
          numPages: totalPages,
          title: parsedInfo.success ? nonEmptyString(parsedInfo.data.Title) : undefined,
          author: parsedInfo.success ? nonEmptyString(parsedInfo.data.Author) : undefined
        }
      };
    } catch (err: unknown) {
      return { ok: false, reason: errorMessage(err) };
    }
  }
};

export const DEFAULT_PDF_STRATEGIES: readonly PdfExtractionStrategy[] = [pdfParseStrategy, unpdfStrategy];

export function cleanPdfText(text: string): string {
  return text
    .replace(/ +/g, " ")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** Blank pages are skipped; the rest are prefixed with a `--- Page n ---` marker. */
export function joinPdfPages(pages: PdfPage[]): string {
  return cleanPdfText(
    pages
      .filter((p) => p.text.trim().length > 0)
      .map((p) => `\n--- Page ${p.pageNumber} ---\n${p.text}`)
      .join("")
  );
}

/**
 * Tries each strategy in order; the first one producing text wins. Throws `ExtractionError`
 * naming every backend's failure when none does.
 */
export async function extractPdf(
  filePath: string,
  strategies: readonly PdfExtractionStrategy[] = DEFAULT_PDF_STRATEGIES,
  logger: ILogger = new NullLogger()
): Promise<{ text: string; extraction: PdfExtraction; backend: string }> {
  const failures: string[] = [];
  for (const strategy of strategies) {
    const result = await strategy.extract(filePath);
    if (!result.ok) {
      logger.warn(`PDF backend ${strategy.name} failed for ${filePath}: ${result.reason}`);
      failures.push(`${strategy.name}: ${result.reason}`);
      continue;
    }
    const text = joinPdfPages(result.extraction.pages);
    if (!text) {
      logger.warn(`PDF backend ${strategy.name} found no text in ${filePath}`);
      failures.push(`${strategy.name}: no text`);
      continue;
    }
    logger.info(`Extracted ${text.length} characters from ${result.extraction.numPages} pages`, {
      backend: strategy.name
    });
    return { text, extraction: result.extraction, backend: strategy.name };
  }
  throw new ExtractionError(`No text extracted from PDF ${filePath} (${failures.join("; ")})`, {
    locator: filePath
  });
}

export type PdfLoaderOptions = {
  /** Recorded as `source` instead of the file path. */
  sourceUrl?: string;
  strategies?: readonly PdfExtractionStrategy[];
  minChars?: number;
  logger?: ILogger;
};

export class PdfFileLoader extends SingleDocumentLoader {
  constructor(
    private readonly filePath: string,
    private readonly options: PdfLoaderOptions = {}
  ) {
    super();
  }

  async loadOne(): Promise<RagDocument> {
    const { text, extraction } = await extractPdf(this.filePath, this.options.strategies, this.options.logger);
    return makeDocument(
      text,
      {
        source: this.options.sourceUrl ?? this.filePath,
        sourceType: "pdf",
        filePath: this.filePath,
        numPages: extraction.numPages,
        title: extraction.title ?? path.basename(this.filePath, path.extname(this.filePath)),
        author: extraction.author
      },
      this.options.minChars ?? MIN_DOCUMENT_CHARS
    );
  }
}

/** Downloads to a temporary directory, loads, and removes the directory again. */
export async function loadPdfFromUrl(
  url: string,
  options: HttpOptions & Omit<PdfLoaderOptions, "sourceUrl"> = {}
): Promise<RagDocument> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "citewise-pdf-"));
  try {
    const filePath = path.join(dir, "download.pdf");
    await fs.writeFile(filePath, await fetchBytes(url, options));
    const doc = await new PdfFileLoader(filePath, { ...options, sourceUrl: url }).loadOne();
    // The temporary file is gone after this call.
    const { filePath: _removed, ...metadata } = doc.metadata;
    return new Document({ pageContent: doc.pageContent, metadata });
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export class PdfUrlLoader extends SingleDocumentLoader {
  constructor(
    private readonly url: string,
    private readonly options: HttpOptions & Omit<PdfLoaderOptions, "sourceUrl"> = {}
  ) {
    super();
  }

  async loadOne(): Promise<RagDocument> {
    return loadPdfFromUrl(this.url, this.options);
  }
}
