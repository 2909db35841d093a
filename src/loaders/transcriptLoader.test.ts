import { describe, expect, it } from "vitest";

import { ExtractionError } from "../errors.js";
import { FakeTranscriptProvider, stubFetch } from "../test-utils/fakes.js";
import {
  TranscriptLoader,
  YouTubeTranscriptProvider,
  formatTimestamp,
  formatTranscript,
  getVideoId,
  selectTrack,
  sliceJsonArray,
  type TranscriptTrack
} from "./transcriptLoader.js";

describe("getVideoId", () => {
  it.each([
    ["https://www.youtube.com/watch?v=abcDEF12345", "abcDEF12345"],
    ["https://www.youtube.com/watch?feature=share&v=abcDEF12345", "abcDEF12345"],
    ["https://youtu.be/abcDEF12345?t=4", "abcDEF12345"],
    ["https://www.youtube.com/embed/abc_EF-2345", "abc_EF-2345"],
    ["https://youtube.com/shorts/abcDEF12345", "abcDEF12345"]
  ])("reads %s", (url, id) => {
    expect(getVideoId(url)).toBe(id);
  });

  it("returns undefined for other URLs", () => {
    expect(getVideoId("https://vimeo.com/123")).toBeUndefined();
  });
});

describe("selectTrack", () => {
  const generated: TranscriptTrack = { languageCode: "en", isGenerated: true, baseUrl: "gen" };
  const manual: TranscriptTrack = { languageCode: "en-GB", isGenerated: false, baseUrl: "manual" };
  const german: TranscriptTrack = { languageCode: "de", isGenerated: false, baseUrl: "de" };

  it("prefers an authored track in the language", () => {
    expect(selectTrack([german, generated, manual], "en")).toBe(manual);
  });

  it("falls back to a generated track", () => {
    expect(selectTrack([german, generated], "EN")).toBe(generated);
  });

  it("finds nothing in another language", () => {
    expect(selectTrack([german], "fr")).toBeUndefined();
  });
});

describe("formatTranscript", () => {
  it("prefixes timestamps and skips empty segments", () => {
    expect(
      formatTranscript([
        { text: "Welcome  back", start: 0, duration: 2 },
        { text: "  ", start: 2, duration: 1 },
        { text: "to the\nchannel", start: 125.7, duration: 3 }
      ])
    ).toBe("[00:00] Welcome back\n[02:05] to the channel");
  });

  it("pads minutes past an hour", () => {
    expect(formatTimestamp(3723)).toBe("62:03");
  });
});

describe("sliceJsonArray", () => {
  it("stops at the matching bracket, ignoring brackets in strings", () => {
    const source = 'x = [1, "a]b\\"]", [2]] tail';
    expect(sliceJsonArray(source, 4)).toBe('[1, "a]b\\"]", [2]]');
  });

  it("returns undefined when not at an array", () => {
    expect(sliceJsonArray("abc", 0)).toBeUndefined();
  });
});

const SEGMENTS = [
  { text: "Today we look at how glaciers carve valleys over thousands of years.", start: 0, duration: 4 },
  { text: "Moving ice plucks rock from the valley floor and grinds it smooth.", start: 4, duration: 4 }
];

describe("TranscriptLoader", () => {
  const url = "https://www.youtube.com/watch?v=glacier0001";

  it("loads the selected track as a video document", async () => {
    const provider = new FakeTranscriptProvider(
      [
        { languageCode: "en", isGenerated: true, baseUrl: "gen" },
        { languageCode: "en", isGenerated: false, baseUrl: "manual" }
      ],
      { manual: SEGMENTS }
    );

    const doc = await new TranscriptLoader(url, { provider }).loadOne();

    expect(doc.pageContent).toBe(
      "[00:00] Today we look at how glaciers carve valleys over thousands of years.\n" +
        "[00:04] Moving ice plucks rock from the valley floor and grinds it smooth."
    );
    expect(doc.metadata).toMatchObject({
      source: url,
      sourceType: "video",
      videoId: "glacier0001",
      numSegments: 2,
      title: "YouTube video glacier0001"
    });
  });

  it("rejects a URL without a video id", async () => {
    const provider = new FakeTranscriptProvider([]);
    await expect(new TranscriptLoader("https://example.test/v", { provider }).loadOne()).rejects.toThrow(
      "Invalid YouTube URL: https://example.test/v"
    );
  });

  it("rejects a video without a transcript in the language", async () => {
    const provider = new FakeTranscriptProvider([{ languageCode: "de", isGenerated: false, baseUrl: "de" }]);
    await expect(new TranscriptLoader(url, { provider }).loadOne()).rejects.toBeInstanceOf(ExtractionError);
  });
});

describe("YouTubeTranscriptProvider", () => {
  it("reads caption tracks from the watch page and fetches json3 segments", async () => {
    const tracks = [
      { baseUrl: "https://captions.test/t?id=1", languageCode: "en", kind: "asr", name: { simpleText: "English" } }
    ];
    const fetch = stubFetch({
      "https://www.youtube.com/watch?v=glacier0001": () =>
        new Response(`<script>var cfg = {"captionTracks":${JSON.stringify(tracks)},"other":[]};</script>`),
      "https://captions.test/t?id=1&fmt=json3": () =>
        new Response(
          JSON.stringify({
            events: [
              { tStartMs: 1500, dDurationMs: 2000, segs: [{ utf8: "Ice " }, { utf8: "moves" }] },
              { tStartMs: 3500, segs: [{ utf8: "\n" }] }
            ]
          })
        )
    });
    const provider = new YouTubeTranscriptProvider({ fetch });

    const listed = await provider.listTracks("glacier0001");
    expect(listed).toEqual([
      { languageCode: "en", isGenerated: true, baseUrl: "https://captions.test/t?id=1", name: "English" }
    ]);

    const [track] = listed;
    if (!track) throw new Error("expected a track");
    expect(await provider.fetchSegments(track)).toEqual([{ text: "Ice moves", start: 1.5, duration: 2 }]);
  });

  it("returns no tracks when the page has no captions", async () => {
    const fetch = stubFetch({ "https://www.youtube.com/watch?v=glacier0001": () => new Response("<html></html>") });
    expect(await new YouTubeTranscriptProvider({ fetch }).listTracks("glacier0001")).toEqual([]);
  });
});
