import { getJson } from "serpapi";
import { z } from "zod";

import type { SearchDepth } from "../../config/settings.js";
import { FetchError, errorMessage } from "../../errors.js";
import { NullLogger, type ILogger } from "../../logger.js";
import type { SearchResult, SourceType } from "../../types.js";

export interface SearchService {
  search(query: string, maxResults: number, depth: SearchDepth): Promise<SearchResult[]>;
}

export type SerpApiRequest = {
  engine: "google";
  q: string;
  num: number;
  api_key: string;
};

const organicResultSchema = z.object({
  title: z.string(),
  link: z.string(),
  snippet: z.string().optional(),
  date: z.string().optional()
});

const responseSchema = z.object({
  organic_results: z.array(z.unknown()).optional()
});

const VIDEO_HOSTS = ["youtube.com", "youtu.be", "vimeo.com"];

export function detectSourceType(url: string): SourceType {
  const parsed = URL.canParse(url) ? new URL(url) : undefined;
  const host = parsed?.hostname.toLowerCase() ?? "";
  const pathname = (parsed?.pathname ?? url).toLowerCase();

  if (VIDEO_HOSTS.some((h) => host === h || host.endsWith(`.${h}`))) return "video";
  if (pathname.endsWith(".pdf") || pathname.includes("/pdf/")) return "pdf";
  return "article";
}

/**
 * Google search through SerpApi. `basic` runs the query as given; `advanced` also asks for
 * PDFs and videos and merges the three result lists, first URL occurrence winning.
 */
export class SerpApiSearchClient implements SearchService {
  private readonly apiKey: string;
  private readonly logger: ILogger;
  private readonly request: (params: SerpApiRequest) => Promise<unknown>;

  constructor(params: {
    apiKey: string;
    logger?: ILogger;
    request?: (params: SerpApiRequest) => Promise<unknown>;
  }) {
    this.apiKey = params.apiKey;
    this.logger = params.logger ?? new NullLogger();
    this.request = params.request ?? ((p) => getJson(p));
  }

  async search(query: string, maxResults: number, depth: SearchDepth): Promise<SearchResult[]> {
    const queries =
      depth === "advanced" ? [query, `${query} filetype:pdf`, `${query} site:youtube.com`] : [query];
    const perQuery = Math.max(1, Math.ceil(maxResults / queries.length));

    const settled = await Promise.allSettled(queries.map((q) => this.searchOnce(q, perQuery)));

    const merged: SearchResult[] = [];
    const seen = new Set<string>();
    const failures: unknown[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === "rejected") {
        this.logger.warn(`Search failed for "${queries[i]}": ${errorMessage(outcome.reason)}`);
        failures.push(outcome.reason);
        return;
      }
      for (const result of outcome.value) {
        if (seen.has(result.url)) continue;
        seen.add(result.url);
        merged.push(result);
      }
    });

    if (failures.length === queries.length) {
      throw new FetchError(`Search failed: ${errorMessage(failures[0])}`, {
        url: "https://serpapi.com/search",
        cause: failures[0]
      });
    }

    const results = merged.slice(0, maxResults);
    this.logger.info(`Found ${results.length} sources for "${query}"`, {
      pdf: results.filter((r) => r.sourceType === "pdf").length,
      article: results.filter((r) => r.sourceType === "article").length,
      video: results.filter((r) => r.sourceType === "video").length
    });
    return results;
  }

  private async searchOnce(q: string, num: number): Promise<SearchResult[]> {
    const raw = await this.request({ engine: "google", q, num, api_key: this.apiKey });
    const parsed = responseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error("Unexpected SerpApi response shape");
    }

    const organic = (parsed.data.organic_results ?? []).flatMap((item) => {
      const r = organicResultSchema.safeParse(item);
      return r.success ? [r.data] : [];
    });

    return organic.map((r, rank) => ({
      title: r.title,
      url: r.link,
      contentSnippet: r.snippet ?? "",
      sourceType: detectSourceType(r.link),
      score: 1 - rank / organic.length,
      publishedDate: r.date
    }));
  }
}
