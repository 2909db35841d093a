import { FetchError, errorMessage } from "../errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

export type HttpOptions = {
  fetch?: FetchLike;
  timeoutMs?: number;
  signal?: AbortSignal;
};

/**
 * GET with a browser-like User-Agent, redirects followed and a per-request timeout combined
 * with the caller's signal. Network failures and non-2xx statuses become `FetchError`.
 */
export async function fetchOk(url: string, options: HttpOptions = {}): Promise<Response> {
  const timeout = AbortSignal.timeout(options.timeoutMs ?? 30_000);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
  const doFetch = options.fetch ?? fetch;

  let response: Response;
  try {
    response = await doFetch(url, {
      headers: { "User-Agent": BROWSER_USER_AGENT },
      redirect: "follow",
      signal
    });
  } catch (err: unknown) {
    throw new FetchError(`Request failed for ${url}: ${errorMessage(err)}`, { url, cause: err });
  }

  if (!response.ok) {
    // Release the connection; the error page is never read.
    await response.body?.cancel();
    throw new FetchError(`HTTP ${response.status} for ${url}`, { url, status: response.status });
  }
  return response;
}

export async function fetchText(url: string, options: HttpOptions = {}): Promise<string> {
  const response = await fetchOk(url, options);
  return response.text();
}

export async function fetchBytes(url: string, options: HttpOptions = {}): Promise<Uint8Array> {
  const response = await fetchOk(url, options);
  return new Uint8Array(await response.arrayBuffer());
}
