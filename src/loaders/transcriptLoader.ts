import { z } from "zod";

import { ExtractionError } from "../errors.js";
import { NullLogger, type ILogger } from "../logger.js";
import type { RagDocument } from "../types.js";
import { MIN_DOCUMENT_CHARS, SingleDocumentLoader, makeDocument } from "./document.js";
import { fetchText, type HttpOptions } from "./http.js";

export type TranscriptTrack = {
  languageCode: string;
  /** Auto-generated (speech recognition) rather than authored. */
  isGenerated: boolean;
  baseUrl: string;
  name?: string;
};

export type TranscriptSegment = {
  text: string;
  /** Seconds from the start of the video. */
  start: number;
  duration: number;
};

export interface TranscriptProvider {
  listTracks(videoId: string): Promise<TranscriptTrack[]>;
  fetchSegments(track: TranscriptTrack): Promise<TranscriptSegment[]>;
}

const VIDEO_ID_PATTERNS = [
  /youtube\.com\/watch\?(?:.*&)?v=([a-zA-Z0-9_-]{11})/,
  /youtu\.be\/([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/embed\/([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/shorts\/([a-zA-Z0-9_-]{11})/
];

export function getVideoId(url: string): string | undefined {
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

function matchesLanguage(track: TranscriptTrack, language: string): boolean {
  const code = track.languageCode.toLowerCase();
  const wanted = language.toLowerCase();
  return code === wanted || code.startsWith(`${wanted}-`);
}

/** An authored track in `language` if there is one, else a generated one. */
export function selectTrack(tracks: TranscriptTrack[], language: string): TranscriptTrack | undefined {
  const inLanguage = tracks.filter((t) => matchesLanguage(t, language));
  return inLanguage.find((t) => !t.isGenerated) ?? inLanguage.find((t) => t.isGenerated);
}

export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const mm = String(Math.floor(total / 60)).padStart(2, "0");
  const ss = String(total % 60).padStart(2, "0");
  return `${mm}:${ss}`;
}

export function formatTranscript(segments: TranscriptSegment[]): string {
  return segments
    .map((s) => ({ ...s, text: s.text.replace(/\s+/g, " ").trim() }))
    .filter((s) => s.text.length > 0)
    .map((s) => `[${formatTimestamp(s.start)}] ${s.text}`)
    .join("\n");
}

const captionTrackSchema = z.object({
  baseUrl: z.string(),
  languageCode: z.string(),
  kind: z.string().optional(),
  name: z.object({ simpleText: z.string().optional() }).passthrough().optional()
});

const json3Schema = z.object({
  events: z
    .array(
      z.object({
        tStartMs: z.number().optional(),
        dDurationMs: z.number().optional(),
        segs: z.array(z.object({ utf8: z.string().optional() }).passthrough()).optional()
      })
    )
    .optional()
});

/** Returns the JSON array starting at `start` (which must be `[`), honouring string escapes. */
export function sliceJsonArray(source: string, start: number): string | undefined {
  if (source[start] !== "[") return undefined;
  let depth = 0;
  let inString = false;
  for (let i = start; i < source.length; i += 1) {
    const ch = source[i];
    if (inString) {
      if (ch === "\\") i += 1;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "[") depth += 1;
    else if (ch === "]") {
      depth -= 1;
      if (depth === 0) return source.slice(start, i + 1);
    }
  }
  return undefined;
}

/** Reads the caption track list embedded in the watch page and fetches tracks as `json3`. */
export class YouTubeTranscriptProvider implements TranscriptProvider {
  constructor(private readonly http: HttpOptions = {}) {}

  async listTracks(videoId: string): Promise<TranscriptTrack[]> {
    const html = await fetchText(`https://www.youtube.com/watch?v=${videoId}`, this.http);
    const marker = html.indexOf('"captionTracks":');
    if (marker < 0) return [];

    const json = sliceJsonArray(html, html.indexOf("[", marker));
    if (!json) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (err: unknown) {
      throw new ExtractionError(`Unreadable caption track list for video ${videoId}`, {
        locator: videoId,
        cause: err
      });
    }
    const parsed = z.array(captionTrackSchema).safeParse(raw);
    if (!parsed.success) return [];

    return parsed.data.map((t) => ({
      languageCode: t.languageCode,
      isGenerated: t.kind === "asr",
      baseUrl: t.baseUrl,
      name: t.name?.simpleText
    }));
  }

  async fetchSegments(track: TranscriptTrack): Promise<TranscriptSegment[]> {
    const body = await fetchText(`${track.baseUrl}&fmt=json3`, this.http);
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (err: unknown) {
      throw new ExtractionError("Transcript track is not valid JSON", { locator: track.baseUrl, cause: err });
    }
    const parsed = json3Schema.safeParse(raw);
    if (!parsed.success) {
      throw new ExtractionError("Unexpected transcript track format", { locator: track.baseUrl });
    }

    return (parsed.data.events ?? []).flatMap((event) => {
      const text = (event.segs ?? []).map((s) => s.utf8 ?? "").join("");
      if (!text.trim()) return [];
      return [{ text, start: (event.tStartMs ?? 0) / 1000, duration: (event.dDurationMs ?? 0) / 1000 }];
    });
  }
}

export type TranscriptLoaderOptions = {
  provider: TranscriptProvider;
  language?: string;
  minChars?: number;
  logger?: ILogger;
};

export class TranscriptLoader extends SingleDocumentLoader {
  constructor(
    private readonly url: string,
    private readonly options: TranscriptLoaderOptions
  ) {
    super();
  }

  async loadOne(): Promise<RagDocument> {
    const logger = this.options.logger ?? new NullLogger();
    const language = this.options.language ?? "en";

    const videoId = getVideoId(this.url);
    if (!videoId) {
      throw new ExtractionError(`Invalid YouTube URL: ${this.url}`, { locator: this.url });
    }

    const track = selectTrack(await this.options.provider.listTracks(videoId), language);
    if (!track) {
      throw new ExtractionError(`No ${language} transcript available for video ${videoId}`, { locator: this.url });
    }
    logger.info(
      `Found ${track.isGenerated ? "auto-generated" : "manually created"} ${language} transcript for ${videoId}`
    );

    const segments = await this.options.provider.fetchSegments(track);
    const doc = makeDocument(
      formatTranscript(segments),
      { source: this.url, sourceType: "video", videoId, numSegments: segments.length, title: `YouTube video ${videoId}` },
      this.options.minChars ?? MIN_DOCUMENT_CHARS
    );
    logger.info(`Loaded video ${videoId}: ${doc.pageContent.length} characters, ${segments.length} segments`);
    return doc;
  }
}
