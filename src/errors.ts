/**
 * Base class for every error raised by citewise.
 * The optional cause is forwarded to `Error` so stack chains survive.
 */
export class CitewiseError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "CitewiseError";
  }
}

/** Network or HTTP failure while fetching a source. */
export class FetchError extends CitewiseError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, options: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.url = options.url;
    this.status = options.status;
  }
}

/** A source was fetched but yielded no usable text. */
export class ExtractionError extends CitewiseError {
  readonly locator: string;

  constructor(message: string, options: { locator: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "ExtractionError";
    this.locator = options.locator;
  }
}

export class EmbeddingServiceError extends CitewiseError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "EmbeddingServiceError";
  }
}

export class ConfigurationError extends CitewiseError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** The load phase finished without a single document. */
export class EmptyCorpusError extends CitewiseError {
  constructor(message = "No documents available for processing") {
    super(message);
    this.name = "EmptyCorpusError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
