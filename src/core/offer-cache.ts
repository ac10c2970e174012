/**
 * Offer Cache
 *
 * CSV store of scraped offers, keyed by postcode and provider. Lets a run
 * reuse fresh rows and only drive a browser for providers whose rows are
 * missing or stale.
 */

import * as fs from 'fs';
import { createHash } from 'crypto';
import { parse as parseCSV } from 'csv-parse/sync';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { OfferRow, StatusEvent } from '../types/index.js';

const log = logger.cache;

export const CSV_FIELDS = [
  'provider',
  'url',
  'postcode',
  'plan_name',
  'speed_mbps',
  'monthly_price_gbp',
  'upfront_fee_gbp',
  'contract_months',
  'scraped_at',
  'card_text_sample',
  'row_id',
] as const;

type CsvField = (typeof CSV_FIELDS)[number];

const csvRecordsSchema = z.array(z.record(z.string()));

export interface CacheSplit {
  cachedRows: OfferRow[];
  /** Providers that still need a live scrape */
  missingProviders: string[];
  statusEvents: StatusEvent[];
}

/**
 * Format a price the way the cache has always stored it ("35.0", "9.99")
 */
function priceText(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Stable 12-hex-char id over provider, plan, speed, price and URL
 *
 * A missing plan renders as "None", the form existing cache files use.
 */
export function rowIdFor(
  row: Pick<OfferRow, 'provider' | 'planName' | 'speedMbps' | 'monthlyPriceGbp' | 'url'>
): string {
  const raw = `${row.provider}|${row.planName ?? 'None'}|${row.speedMbps}|${priceText(row.monthlyPriceGbp)}|${row.url}`;
  return createHash('sha1').update(raw, 'utf-8').digest('hex').slice(0, 12);
}

/**
 * Milliseconds since epoch, or NaN for a missing or unreadable timestamp
 */
export function scrapedAtMs(value: string): number {
  if (!value) return NaN;
  return Date.parse(value.includes('T') ? value : value.replace(' ', 'T'));
}

function optionalNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function csvEscape(value: string | number | null): string {
  if (value === null) return '';
  const s = String(value);
  if (/[",\r\n]/.test(s)) return `"${s.replace(/"/g, '""')}"`;
  return s;
}

function toCsvLine(row: OfferRow): string {
  const values: Record<CsvField, string | number | null> = {
    provider: row.provider,
    url: row.url,
    postcode: row.postcode,
    plan_name: row.planName,
    speed_mbps: row.speedMbps,
    monthly_price_gbp: row.monthlyPriceGbp,
    upfront_fee_gbp: row.upfrontFeeGbp,
    contract_months: row.contractMonths,
    scraped_at: row.scrapedAt,
    card_text_sample: row.cardTextSample,
    row_id: row.rowId,
  };
  return CSV_FIELDS.map((field) => csvEscape(values[field])).join(',');
}

function fromRecord(record: Record<string, string>): OfferRow | null {
  const speed = optionalNumber(record.speed_mbps);
  const price = optionalNumber(record.monthly_price_gbp);
  if (speed === null || price === null) return null;

  const months = optionalNumber(record.contract_months);
  const base = {
    provider: record.provider ?? '',
    url: record.url ?? '',
    postcode: record.postcode ?? '',
    planName: record.plan_name ? record.plan_name : null,
    speedMbps: Math.round(speed),
    monthlyPriceGbp: price,
    upfrontFeeGbp: optionalNumber(record.upfront_fee_gbp),
    contractMonths: months === null ? null : Math.round(months),
    scrapedAt: record.scraped_at ?? '',
    cardTextSample: record.card_text_sample ?? '',
  };
  return { ...base, rowId: record.row_id ? record.row_id : rowIdFor(base) };
}

/**
 * Parse cache CSV content; rows without a speed or price are skipped
 */
export function parseOfferCsv(content: string): OfferRow[] {
  const records = csvRecordsSchema.parse(
    parseCSV(content, {
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  );

  const rows: OfferRow[] = [];
  for (const record of records) {
    const row = fromRecord(record);
    if (row) {
      rows.push(row);
    } else {
      log.warn('Skipping cache row without speed or price', { provider: record.provider, url: record.url });
    }
  }
  return rows;
}

/**
 * Serialize rows with the cache header
 */
export function formatOfferCsv(rows: readonly OfferRow[]): string {
  return [CSV_FIELDS.join(','), ...rows.map(toCsvLine)].join('\n') + '\n';
}

/**
 * Rows in the cache file; a missing file is an empty cache
 */
export function loadExisting(filePath: string): OfferRow[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  return parseOfferCsv(fs.readFileSync(filePath, 'utf-8'));
}

function identityKey(row: OfferRow): string {
  return JSON.stringify([row.provider, row.url, row.postcode, row.planName, row.speedMbps, row.monthlyPriceGbp]);
}

/**
 * Newest row per (provider, url, postcode, plan, speed, price)
 *
 * Rows without a readable timestamp sort last.
 */
export function dedupeRows(rows: readonly OfferRow[]): OfferRow[] {
  const byAge = [...rows].sort((a, b) => {
    const ta = scrapedAtMs(a.scrapedAt);
    const tb = scrapedAtMs(b.scrapedAt);
    if (Number.isNaN(ta)) return Number.isNaN(tb) ? 0 : 1;
    if (Number.isNaN(tb)) return -1;
    return tb - ta;
  });

  const seen = new Set<string>();
  return byAge.filter((row) => {
    const key = identityKey(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Merge new rows into the cache file and rewrite it
 */
export function appendRows(filePath: string, rows: readonly OfferRow[], dedupe: boolean = true): void {
  if (rows.length === 0) return;

  const merged = [...loadExisting(filePath), ...rows];
  const output = dedupe ? dedupeRows(merged) : merged;
  fs.writeFileSync(filePath, formatOfferCsv(output), 'utf-8');
  log.info('Cache updated', { filePath, added: rows.length, total: output.length });
}

function cacheEvent(provider: string, step: string, detail: string): StatusEvent {
  return Object.freeze({ provider, url: '', step, detail, allowed: null, goto: null, steps: null });
}

/**
 * Decide per provider whether cached rows are fresh enough to reuse
 */
export function splitCachedAndMissing(
  existing: readonly OfferRow[],
  postcode: string,
  providers: readonly string[],
  maxAgeHours: number,
  forceCacheOnly: boolean,
  now: Date = new Date()
): CacheSplit {
  const wanted = new Set(providers);
  const code = postcode.toUpperCase();
  const subset = existing.filter((row) => row.postcode.toUpperCase() === code && wanted.has(row.provider));

  if (subset.length === 0) {
    return {
      cachedRows: [],
      missingProviders: [...providers],
      statusEvents: [cacheEvent('all', 'cache_miss', 'no matching rows in CSV')],
    };
  }

  if (forceCacheOnly) {
    return {
      cachedRows: subset,
      missingProviders: [],
      statusEvents: providers.map((provider) => {
        const count = subset.filter((row) => row.provider === provider).length;
        return cacheEvent(provider, 'cache_used_forced', `rows=${count} (age ignored)`);
      }),
    };
  }

  const cutoff = now.getTime() - maxAgeHours * 3600 * 1000;
  const cachedRows: OfferRow[] = [];
  const missingProviders: string[] = [];
  const statusEvents: StatusEvent[] = [];

  for (const provider of providers) {
    const rows = subset.filter((row) => row.provider === provider);
    if (rows.length === 0) {
      missingProviders.push(provider);
      statusEvents.push(cacheEvent(provider, 'cache_miss_provider', 'no rows for provider'));
      continue;
    }

    const stamps = rows.map((row) => scrapedAtMs(row.scrapedAt)).filter((t) => !Number.isNaN(t));
    if (stamps.length === 0) {
      missingProviders.push(provider);
      statusEvents.push(cacheEvent(provider, 'cache_no_timestamp', ''));
      continue;
    }

    const latest = Math.max(...stamps);
    if (latest >= cutoff) {
      const fresh = rows.filter((row) => scrapedAtMs(row.scrapedAt) >= cutoff);
      cachedRows.push(...fresh);
      statusEvents.push(cacheEvent(provider, 'cache_used', `fresh rows=${fresh.length}`));
    } else {
      missingProviders.push(provider);
      statusEvents.push(cacheEvent(provider, 'cache_stale', `latest=${new Date(latest).toISOString()}`));
    }
  }

  return { cachedRows, missingProviders, statusEvents };
}
