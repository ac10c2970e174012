/**
 * Core types for the broadband offer scout
 */

// Re-export error taxonomy
export * from './errors.js';

/**
 * Tri-state answer: `null` means "do not attempt to answer"
 */
export type TriState = boolean | null;

/**
 * Pre-wizard click-through for providers whose landing page hides the
 * postcode checker behind a call to action.
 */
export interface PreCtaHint {
  readonly selectors: readonly string[];
  /** Path fragment identifying the landing page the CTA lives on */
  readonly landingPath: string;
}

/**
 * Signals that a provider session has died (timeout / "intent" pages)
 */
export interface SessionBrokenSignals {
  /** Substrings of the page URL */
  readonly urlTokens: readonly string[];
  /** Phrases searched for in the main page regions */
  readonly phrases: readonly string[];
}

/**
 * Selector hints for one provider domain, or the generic fallback
 */
export interface SiteProfile {
  readonly domain: string;
  readonly name: string;
  readonly cookieSelectors: readonly string[];
  readonly postcodeInputSelectors: readonly string[];
  readonly submitSelectors: readonly string[];
  readonly resultSelectors: readonly string[];
  readonly fallbackPaths: readonly string[];
  readonly preCta?: PreCtaHint;
  /** Absolute deep link to the provider's purchase/availability flow */
  readonly directLink?: string;
  readonly sessionBrokenSignals?: SessionBrokenSignals;
  /** Whole-attempt cap for this provider (default 1) */
  readonly maxAttempts?: number;
}

/**
 * Per-attempt navigation counters
 */
export interface NavigationCounters {
  gotoCount: number;
  wizardSteps: number;
}

/**
 * Append-only audit record
 */
export interface StatusEvent {
  readonly provider: string;
  readonly url: string;
  readonly step: string;
  readonly detail: string;
  /** Robots decision: true/false, or null when unknown */
  readonly allowed: TriState;
  readonly goto: number | null;
  readonly steps: number | null;
}

/**
 * One priced offer parsed from a card on the results page
 */
export interface OfferCandidate {
  readonly planName: string | null;
  /** Always megabits per second */
  readonly speedMbps: number;
  readonly monthlyPriceGbp: number;
  readonly upfrontFeeGbp: number | null;
  readonly contractMonths: number | null;
  readonly cardTextSample: string;
}

/**
 * Offer as persisted in the cache
 */
export interface OfferRow extends OfferCandidate {
  readonly provider: string;
  readonly url: string;
  readonly postcode: string;
  /** ISO-8601 UTC, second precision */
  readonly scrapedAt: string;
  readonly rowId: string;
}

/**
 * Observability switches; none of them changes what gets extracted
 */
export interface DebugOptions {
  headed: boolean;
  slowMoMs: number;
  devtools: boolean;
  recordVideoDir: string | null;
  recordHarPath: string | null;
  tracePath: string | null;
  consoleLogPath: string | null;
  logsDir: string;
  /** Open the Playwright Inspector on every new session page */
  pauseOnStart: boolean;
}

/**
 * Input to one scrape session
 */
export interface ScrapeRequest {
  postcode: string;
  addressHint: string | null;
  /** 1-based fallback choice in the address list */
  addressIndex: number;
  moving: TriState;
  extraFields: Record<string, string>;
  maxSteps: number;
  respectRobots: boolean;
  debug: DebugOptions;
}

/**
 * Result of one session
 */
export interface SessionResult {
  offers: OfferCandidate[];
  statusEvents: StatusEvent[];
}

/**
 * Result of one batch
 */
export interface BatchResult {
  rows: OfferRow[];
  statusEvents: StatusEvent[];
}

/**
 * Permission oracle consulted before every navigation
 */
export interface RobotsChecker {
  isAllowed(url: string): Promise<boolean>;
}
