import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

/** Hosts whose links are treated as papers worth a direct PDF download. */
export const ACADEMIC_DOMAINS = [
  "arxiv.org",
  "doi.org",
  "ncbi.nlm.nih.gov",
  "springer.com",
  "sciencedirect.com",
  "wiley.com",
  "nature.com",
  "science.org",
  "ieee.org",
  "acm.org",
  "jstor.org",
  "researchgate.net",
  "biorxiv.org",
  "medrxiv.org",
  "ssrn.com"
];

export function isPdfLike(url: string): boolean {
  const parsed = URL.canParse(url) ? new URL(url) : undefined;
  const pathname = (parsed?.pathname ?? url).toLowerCase();
  if (pathname.endsWith(".pdf")) return true;
  const host = parsed?.hostname.toLowerCase() ?? "";
  return ACADEMIC_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

export function sanitizeFilename(name: string, maxLength = 100): string {
  const cleaned = name
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, "_")
    .replace(/\s+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^[._]+|[._]+$/g, "")
    .slice(0, maxLength)
    .replace(/[._]+$/, "");
  return cleaned || "untitled";
}

/** First 8 hex digits of the URL's SHA-256. */
export function urlHash(url: string): string {
  return createHash("sha256").update(url).digest("hex").slice(0, 8);
}

/** `<title>_<hash>.<ext>`: distinct URLs never share a file even when titles collide. */
export function fileNameFor(title: string, url: string, extension: "pdf" | "txt"): string {
  return `${sanitizeFilename(title, 80)}_${urlHash(url)}.${extension}`;
}

export function queryDirectoryName(query: string): string {
  return sanitizeFilename(query.toLowerCase(), 50);
}

export async function createQueryDirectory(dataDir: string, query: string): Promise<string> {
  const dir = path.join(dataDir, "downloads", queryDirectoryName(query));
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export function isPdfBytes(bytes: Uint8Array, minBytes = 1024): boolean {
  if (bytes.length < minBytes) return false;
  return Buffer.from(bytes.subarray(0, 5)).toString("latin1") === "%PDF-";
}

export function formatSavedArticle(params: { url: string; title: string; text: string }): string {
  return `Source: ${params.url}\nTitle: ${params.title}\n${"=".repeat(80)}\n\n${params.text}`;
}
