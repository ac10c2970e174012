/**
 * Scrape Orchestrator
 *
 * Runs one session per provider URL, concurrently, inside one browser and
 * one shared context, then turns the offers into cache rows. A session that
 * rejects only costs its own URL a status event.
 */

import { logger } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';
import { providerOf } from '../utils/url.js';
import {
  errorMessage,
  type BatchResult,
  type OfferRow,
  type RobotsChecker,
  type ScrapeRequest,
  type StatusEvent,
} from '../types/index.js';
import { BrowserManager, browserConfigFor, type BatchBrowser, type BrowserConfig } from './browser-manager.js';
import { RobotsGate } from './robots-gate.js';
import { ScrapeSession } from './scrape-session.js';
import { getSiteProfiles, type SiteProfileRegistry } from './site-profiles.js';
import { rowIdFor } from './offer-cache.js';

const log = logger.orchestrator;

export interface ScrapeOrchestratorOptions {
  /** Builds the batch browser; defaults to a Playwright BrowserManager */
  browserFactory?: (config: BrowserConfig) => BatchBrowser;
  /** Defaults to a fresh RobotsGate per batch */
  robots?: RobotsChecker;
  profiles?: SiteProfileRegistry;
  navigationTimeout?: number;
  /** Delay before the attempt after `attempt` */
  backoff?: (attempt: number) => number;
  now?: () => Date;
}

/**
 * ISO-8601 UTC to the second
 */
export function scrapedAtStamp(now: Date): string {
  return `${now.toISOString().slice(0, 19)}Z`;
}

export class ScrapeOrchestrator {
  private readonly browserFactory: (config: BrowserConfig) => BatchBrowser;
  private readonly profiles: SiteProfileRegistry;
  private readonly now: () => Date;

  constructor(private readonly options: ScrapeOrchestratorOptions = {}) {
    this.browserFactory = options.browserFactory ?? ((config) => new BrowserManager(config));
    this.profiles = options.profiles ?? getSiteProfiles();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Scrape every URL for one request
   *
   * @throws BrowserLaunchError when the browser cannot be started
   */
  async scrapeMany(request: ScrapeRequest, urls: readonly string[]): Promise<BatchResult> {
    const navigationTimeout = getTimeout('PAGE_NAVIGATION', this.options.navigationTimeout);
    const browser = this.browserFactory(browserConfigFor(request.debug, navigationTimeout));
    const robots = this.options.robots ?? new RobotsGate();
    const startTime = Date.now();

    try {
      const context = await browser.createContext();
      log.info('Batch started', { urls: urls.length, postcode: request.postcode });

      const settled = await Promise.allSettled(
        // async so a throw while setting up one session only rejects that URL
        urls.map(async (url) =>
          new ScrapeSession(context, url, request, {
            robots,
            profile: this.profiles.profileFor(url),
            backoff: this.options.backoff,
            navigationTimeout,
          }).run()
        )
      );

      const scrapedAt = scrapedAtStamp(this.now());
      const rows: OfferRow[] = [];
      const statusEvents: StatusEvent[] = [];

      settled.forEach((outcome, i) => {
        const url = urls[i];
        const provider = providerOf(url);
        if (outcome.status === 'rejected') {
          log.error('Session rejected', { provider, url, error: outcome.reason });
          statusEvents.push(
            Object.freeze({
              provider,
              url,
              step: 'exception',
              detail: errorMessage(outcome.reason),
              allowed: null,
              goto: null,
              steps: null,
            })
          );
          return;
        }

        statusEvents.push(...outcome.value.statusEvents);
        for (const offer of outcome.value.offers) {
          const row = { ...offer, provider, url, postcode: request.postcode, scrapedAt };
          rows.push(Object.freeze({ ...row, rowId: rowIdFor(row) }));
        }
      });

      log.timed('Batch finished', startTime, { rows: rows.length, events: statusEvents.length });
      return { rows, statusEvents };
    } finally {
      await browser.cleanup();
    }
  }
}

/**
 * Scrape URLs with default collaborators
 */
export function scrapeMany(
  request: ScrapeRequest,
  urls: readonly string[],
  options: ScrapeOrchestratorOptions = {}
): Promise<BatchResult> {
  return new ScrapeOrchestrator(options).scrapeMany(request, urls);
}
