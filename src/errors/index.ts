/**
 * Errors Module
 *
 * Error taxonomy of the crawler. Every error carries a stable `code` so
 * callers and logs can classify failures without string matching.
 *
 * Containment rules:
 * - RetrievalError: one page or asset failed; skipped at the smallest unit
 * - SessionError: one listing card could not be inspected; that card is skipped
 * - ConfigurationError: fatal at startup, raised before any network activity
 * - RunStateError: a run was driven through an invalid transition
 *
 * A missing structural marker is not an error: it resolves to null.
 */

export type CrawlerErrorCode =
  | 'RETRIEVAL_ERROR'
  | 'SESSION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'RUN_STATE_ERROR';

/**
 * Base class for all crawler errors
 */
export class CrawlerError extends Error {
  readonly code: CrawlerErrorCode;

  constructor(code: CrawlerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Network or HTTP failure fetching a page or an asset
 */
export class RetrievalError extends CrawlerError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null, cause?: unknown) {
    super('RETRIEVAL_ERROR', `Failed to retrieve ${url}: ${message}`, { cause });
    this.url = url;
    this.status = status;
  }
}

/**
 * Browser-automation failure (stale element, missing link, closed page)
 */
export class SessionError extends CrawlerError {
  constructor(message: string, cause?: unknown) {
    super('SESSION_ERROR', message, { cause });
  }
}

/**
 * Missing or invalid configuration
 */
export class ConfigurationError extends CrawlerError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      'CONFIGURATION_ERROR',
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message
    );
    this.issues = issues;
  }
}

/**
 * Invalid crawl run transition
 */
export class RunStateError extends CrawlerError {
  constructor(message: string) {
    super('RUN_STATE_ERROR', message);
  }
}

/**
 * Safely extract an error message
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
