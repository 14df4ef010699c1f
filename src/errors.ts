/**
 * Error types raised by the pipeline.
 * Everything here except ExtractionError and HttpError is fatal for a run.
 */

/** A request completed with a non-2xx status */
export class HttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string,
  ) {
    super(`HTTP ${status} ${statusText} for ${url}`);
    this.name = "HttpError";
  }
}

/** A chapter page could not be fetched or understood; safe to retry */
export class ExtractionError extends Error {
  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

/** The links file produced no chapter links at all */
export class EmptyLinkIndexError extends Error {
  constructor(readonly path: string) {
    super(`No chapter links found in ${path}`);
    this.name = "EmptyLinkIndexError";
  }
}

/** Some chapters in the requested range have no link from a prioritized source */
export class PlanningError extends Error {
  constructor(readonly missing: number[]) {
    super(`No link from the selected sources for chapters: ${missing.join(", ")}`);
    this.name = "PlanningError";
  }
}

/** A chapter still failed after every retry; aborts the run */
export class ChapterFetchError extends Error {
  constructor(
    readonly chapter: number,
    readonly url: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Failed to fetch chapter ${chapter} from ${url} after ${attempts} attempts`, options);
    this.name = "ChapterFetchError";
  }
}
