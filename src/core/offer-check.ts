/**
 * Offer check: the cache-then-scrape flow behind the CLI
 *
 * Reads the CSV cache, decides which providers still need a live scrape,
 * scrapes only those, appends the new rows and returns everything the
 * operator should see.
 */

import { logger } from '../utils/logger.js';
import { providerOf } from '../utils/url.js';
import type { BatchResult, OfferRow, ScrapeRequest, StatusEvent } from '../types/index.js';
import { appendRows, loadExisting, splitCachedAndMissing } from './offer-cache.js';

const log = logger.create('OfferCheck');

/**
 * `auto` reuses fresh rows, `cache-only` ignores age and only scrapes when
 * the cache has nothing, `refresh` ignores the cache
 */
export type CacheMode = 'auto' | 'cache-only' | 'refresh';

export interface OfferCheckInput {
  request: ScrapeRequest;
  urls: readonly string[];
  cachePath: string;
  mode: CacheMode;
  dedupe: boolean;
  maxAgeHours: number;
}

export interface OfferCheckResult {
  rows: OfferRow[];
  statusEvents: StatusEvent[];
  /** URLs that were scraped live */
  scrapedUrls: string[];
}

export type BatchScraper = (request: ScrapeRequest, urls: readonly string[]) => Promise<BatchResult>;

function checkEvent(step: string): StatusEvent {
  return Object.freeze({ provider: 'all', url: '', step, detail: '', allowed: null, goto: null, steps: null });
}

export async function runOfferCheck(
  input: OfferCheckInput,
  scrape: BatchScraper,
  now: Date = new Date()
): Promise<OfferCheckResult> {
  const { request, urls, cachePath, mode } = input;
  const statusEvents: StatusEvent[] = [];
  let cachedRows: OfferRow[] = [];
  let toScrape: string[] = [...urls];

  if (mode === 'refresh') {
    statusEvents.push(checkEvent('cache_ignored_refresh'));
  } else {
    const split = splitCachedAndMissing(
      loadExisting(cachePath),
      request.postcode,
      urls.map(providerOf),
      input.maxAgeHours,
      mode === 'cache-only',
      now
    );
    statusEvents.push(...split.statusEvents);
    cachedRows = split.cachedRows;

    if (mode === 'cache-only') {
      toScrape = [];
      if (cachedRows.length === 0) {
        statusEvents.push(checkEvent('cache_empty_fallback_scrape'));
        toScrape = [...urls];
      }
    } else {
      const missing = new Set(split.missingProviders);
      toScrape = urls.filter((url) => missing.has(providerOf(url)));
    }
  }

  let scrapedRows: OfferRow[] = [];
  if (toScrape.length > 0) {
    const startTime = Date.now();
    const batch = await scrape(request, toScrape);
    statusEvents.push(...batch.statusEvents);
    scrapedRows = batch.rows;
    log.timed('Scraped providers', startTime, { urls: toScrape.length, rows: scrapedRows.length });
    appendRows(cachePath, scrapedRows, input.dedupe);
  } else {
    log.info('No scraping needed, using cached rows', { rows: cachedRows.length });
  }

  return { rows: [...cachedRows, ...scrapedRows], statusEvents, scrapedUrls: toScrape };
}
