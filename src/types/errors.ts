/**
 * Error Taxonomy
 *
 * Most navigation failures are not errors at all: the driver reports them as
 * "did not progress". The classes here cover what is left.
 */

/**
 * High-level error categories
 */
export type ErrorCategory =
  | 'policy'         // robots.txt disallows the URL
  | 'navigation'     // selector missing, click target gone
  | 'session_broken' // provider timeout / intent page
  | 'browser'        // page, context or browser closed; launch failure
  | 'config'         // invalid request or environment
  | 'internal';

/**
 * Machine-readable error codes
 */
export type ErrorCode =
  | 'ROBOTS_BLOCKED'
  | 'SESSION_BROKEN'
  | 'BROWSER_TARGET_CLOSED'
  | 'BROWSER_LAUNCH_FAILED'
  | 'CONFIG_INVALID'
  | 'INTERNAL_ERROR';

/**
 * Base class for errors raised by the scout
 */
export class ScrapeError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'ScrapeError';
  }
}

/**
 * Raised inside an attempt when the provider session is still broken after the
 * recovery ladder and the attempt budget allows another try.
 */
export class SessionBrokenError extends ScrapeError {
  constructor(
    public readonly provider: string,
    public readonly attempt: number
  ) {
    super(`Session broken for ${provider} on attempt ${attempt}`, 'session_broken', 'SESSION_BROKEN');
    this.name = 'SessionBrokenError';
  }
}

/**
 * Raised when the browser cannot be started for a batch
 */
export class BrowserLaunchError extends ScrapeError {
  constructor(message: string) {
    super(message, 'browser', 'BROWSER_LAUNCH_FAILED');
    this.name = 'BrowserLaunchError';
  }
}

const TARGET_CLOSED_MESSAGE = 'Target page, context or browser has been closed';

/**
 * Playwright's signal that the page was closed out from under us
 */
export function isTargetClosedError(error: unknown): boolean {
  return error instanceof Error && error.message.includes(TARGET_CLOSED_MESSAGE);
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
