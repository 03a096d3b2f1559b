/**
 * Error taxonomy for the scrape pipeline. Each class marks how far a failure
 * reaches: a record, a page, a URL, or a whole site.
 */

export interface ErrorContext {
  site?: string;
  url?: string;
  cause?: unknown;
}

abstract class PipelineError extends Error {
  readonly site?: string;
  readonly url?: string;

  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, ctx.cause !== undefined ? { cause: ctx.cause } : undefined);
    this.name = new.target.name;
    this.site = ctx.site;
    this.url = ctx.url;
  }
}

/** Network or HTTP failure after all retries. Abandons the URL. */
export class FetchError extends PipelineError {
  readonly httpStatus?: number;

  constructor(message: string, ctx: ErrorContext & { httpStatus?: number } = {}) {
    super(message, ctx);
    this.httpStatus = ctx.httpStatus;
  }
}

/** The document's top-level structure is not what the extractor expects. */
export class ExtractionError extends PipelineError {}

/** A raw record cannot become a minimally valid listing. */
export class TransformError extends PipelineError {}

/** Missing or malformed site configuration, or an unknown site name. */
export class ConfigError extends PipelineError {}

/** Output cannot be written. Aborts the site's run. */
export class FatalError extends PipelineError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
