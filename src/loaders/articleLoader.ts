import { load, type CheerioAPI } from "cheerio";

import type { RagDocument } from "../types.js";
import { MIN_DOCUMENT_CHARS, SingleDocumentLoader, makeDocument } from "./document.js";
import { fetchText, type HttpOptions } from "./http.js";

const STRIPPED_ELEMENTS = "script, style, noscript, nav, footer, aside, iframe";

/** Tried in order; the first container with text wins, else `<body>`. */
export const CONTENT_SELECTORS = [
  "article",
  "[role='main']",
  "main",
  ".post-content",
  ".article-content",
  ".entry-content",
  ".content",
  "#content"
];

const BLOCK_ELEMENTS = "p, div, section, li, tr, pre, blockquote, h1, h2, h3, h4, h5, h6";

export type ExtractedArticle = {
  title: string;
  text: string;
  author?: string;
};

/** Trims each line, squeezes inner whitespace and collapses runs of blank lines into one. */
export function collapseBlankLines(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/[ \t\u00a0]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function extractArticle(html: string, url: string): ExtractedArticle {
  const $ = load(html);
  $(STRIPPED_ELEMENTS).remove();

  const title =
    $("title").first().text().trim() || $("h1").first().text().trim() || url;
  const author = $("meta[name='author']").attr("content")?.trim() || undefined;

  let container: ReturnType<CheerioAPI> = $("body");
  for (const selector of CONTENT_SELECTORS) {
    const candidate = $(selector).first();
    if (candidate.length > 0 && candidate.text().trim().length > 0) {
      container = candidate;
      break;
    }
  }

  container.find("br").replaceWith("\n");
  container.find(BLOCK_ELEMENTS).each((_, el) => {
    $(el).append("\n");
  });

  return { title, text: collapseBlankLines(container.text()), author };
}

export class ArticleLoader extends SingleDocumentLoader {
  constructor(
    private readonly url: string,
    private readonly options: HttpOptions & { minChars?: number } = {}
  ) {
    super();
  }

  async loadOne(): Promise<RagDocument> {
    const html = await fetchText(this.url, this.options);
    const article = extractArticle(html, this.url);
    return makeDocument(
      article.text,
      { source: this.url, sourceType: "article", title: article.title, author: article.author },
      this.options.minChars ?? MIN_DOCUMENT_CHARS
    );
  }
}
