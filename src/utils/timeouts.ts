/**
 * Central Timeout Configuration
 *
 * All timeout and settle values in milliseconds. Import from here rather than
 * scattering literals through the navigation code.
 */

export const TIMEOUTS = {
  /** Default action timeout set on every session page */
  PAGE_ACTION: 15000,

  /** Default navigation timeout set on every page and on the shared context */
  PAGE_NAVIGATION: 25000,

  /** Shared budget for the result markers raced in waitForAnyResult */
  RESULT_WAIT: 8000,

  /** Settle delay when no result selector appeared in time */
  RESULT_SETTLE: 4000,

  /** Click budget for cookie banners and continue-like controls */
  CLICK: 2000,

  /** Click budget for postcode submit controls */
  SUBMIT_CLICK: 3000,

  /** Wait after a consent click */
  COOKIE_SETTLE: 200,

  /** Wait after a postcode submission or continue click */
  POST_CLICK: 400,

  /** Wait after picking an address */
  ADDRESS_SETTLE: 300,

  /** Wait after answering a radio/label question */
  LABEL_SETTLE: 200,

  /** Wait after filling a field */
  FIELD_SETTLE: 100,

  /** Keystroke delay when typing a postcode */
  KEYSTROKE: 20,

  /** Wait at the end of every wizard iteration */
  WIZARD_ITERATION: 500,

  /** Extra wait when a wizard iteration made no progress */
  WIZARD_IDLE: 600,

  /** Wait after a soft reload during session recovery */
  RELOAD_SETTLE: 600,

  /** Wait after navigating to a provider deep link */
  DEEP_LINK_SETTLE: 400,

  /** Wait after the wizard before reading the page */
  FINAL_SETTLE: 1200,

  /** Scroll nudge settle after a pre-wizard click-through */
  SCROLL_SETTLE: 150,

  /** robots.txt fetch budget */
  ROBOTS_FETCH: 6000,

  /** Per-attempt backoff unit: delay = unit * attempt */
  ATTEMPT_BACKOFF: 900,
} as const;

/**
 * Type for timeout keys
 */
export type TimeoutKey = keyof typeof TIMEOUTS;

/**
 * Get a timeout value with optional override
 */
export function getTimeout(key: TimeoutKey, override?: number): number {
  return override ?? TIMEOUTS[key];
}
