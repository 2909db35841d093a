import { describe, expect, it } from "vitest";

import { ExtractionError, FetchError } from "../errors.js";
import { htmlPage, stubFetch } from "../test-utils/fakes.js";
import { ArticleLoader, collapseBlankLines, extractArticle } from "./articleLoader.js";

const PAGE = `<html><head><title>Tide pools</title><meta name="author" content="R. Marsh">
<script>var tracking = 1;</script></head>
<body><nav>Home | About</nav>
<article><h1>Tide pools</h1><p>First   paragraph.</p><p>Second<br>line.</p></article>
<footer>Footer text</footer></body></html>`;

describe("extractArticle", () => {
  it("reads the main container and drops boilerplate", () => {
    expect(extractArticle(PAGE, "https://example.test/tide")).toEqual({
      title: "Tide pools",
      author: "R. Marsh",
      text: "Tide pools\nFirst paragraph.\nSecond\nline."
    });
  });

  it("falls back to the body and the URL as title", () => {
    const article = extractArticle("<html><body><div>Plain body text here.</div></body></html>", "https://example.test/x");

    expect(article).toEqual({ title: "https://example.test/x", text: "Plain body text here.", author: undefined });
  });

  it("uses the first heading when there is no title", () => {
    expect(extractArticle("<body><main><h1>Heading</h1><p>Body</p></main></body>", "u").title).toBe("Heading");
  });
});

describe("collapseBlankLines", () => {
  it("squeezes spaces and keeps at most one blank line", () => {
    expect(collapseBlankLines("  a \t b  \n\n\n\n c  d ")).toBe("a b\n\nc d");
  });
});

describe("ArticleLoader", () => {
  const body = `<p>${"Rock pools hold water at low tide and shelter small animals. ".repeat(3)}</p>`;

  it("loads an article document", async () => {
    const fetch = stubFetch({ "https://example.test/a": () => htmlPage("Rock pools", body) });

    const [doc] = await new ArticleLoader("https://example.test/a", { fetch }).load();

    expect(doc?.metadata).toMatchObject({
      source: "https://example.test/a",
      sourceType: "article",
      title: "Rock pools",
      contentLength: doc?.pageContent.length
    });
    expect(doc?.pageContent.startsWith("Rock pools hold water")).toBe(true);
  });

  it("rejects pages with too little text", async () => {
    const fetch = stubFetch({ "https://example.test/a": () => htmlPage("Short", "<p>Too short.</p>") });

    await expect(new ArticleLoader("https://example.test/a", { fetch }).loadOne()).rejects.toBeInstanceOf(
      ExtractionError
    );
  });

  it("propagates HTTP errors", async () => {
    await expect(
      new ArticleLoader("https://example.test/gone", { fetch: stubFetch({}) }).loadOne()
    ).rejects.toBeInstanceOf(FetchError);
  });
});
