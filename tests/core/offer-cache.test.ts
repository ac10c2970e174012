/**
 * Tests for the CSV offer cache
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createHash } from 'crypto';
import {
  CSV_FIELDS,
  appendRows,
  dedupeRows,
  formatOfferCsv,
  loadExisting,
  parseOfferCsv,
  rowIdFor,
  scrapedAtMs,
  splitCachedAndMissing,
} from '../../src/core/offer-cache.js';
import type { OfferRow } from '../../src/types/index.js';

const NOW = new Date('2026-03-01T12:00:00Z');

function row(partial: Partial<OfferRow> = {}): OfferRow {
  return {
    provider: 'example.com',
    url: 'https://www.example.com/broadband',
    postcode: 'TW8 0FD',
    planName: null,
    speedMbps: 500,
    monthlyPriceGbp: 35,
    upfrontFeeGbp: null,
    contractMonths: 24,
    scrapedAt: '2026-03-01T06:00:00Z',
    cardTextSample: 'Full Fibre 500Mb £35/month',
    rowId: 'aaaaaaaaaaaa',
    ...partial,
  };
}

describe('rowIdFor', () => {
  it('should hash provider, plan, speed, price and URL with None for a missing plan', () => {
    const expected = createHash('sha1')
      .update('example.com|None|500|35.0|https://www.example.com/broadband')
      .digest('hex')
      .slice(0, 12);
    expect(rowIdFor(row())).toBe(expected);
  });

  it('should keep decimals as they are', () => {
    const expected = createHash('sha1')
      .update('example.com|Fibre 74|74|27.99|https://www.example.com/broadband')
      .digest('hex')
      .slice(0, 12);
    expect(rowIdFor(row({ planName: 'Fibre 74', speedMbps: 74, monthlyPriceGbp: 27.99 }))).toBe(expected);
  });

  it('should ignore fields outside the identity', () => {
    expect(rowIdFor(row({ postcode: 'SW1A 1AA', upfrontFeeGbp: 10 }))).toBe(rowIdFor(row()));
  });
});

describe('scrapedAtMs', () => {
  it('should parse ISO timestamps', () => {
    expect(scrapedAtMs('2026-03-01T06:00:00Z')).toBe(Date.UTC(2026, 2, 1, 6));
  });

  it('should return NaN for missing or unreadable values', () => {
    expect(scrapedAtMs('')).toBeNaN();
    expect(scrapedAtMs('yesterday')).toBeNaN();
  });
});

describe('CSV format', () => {
  it('should write the header and quote awkward values', () => {
    const csv = formatOfferCsv([
      row({ planName: 'Fibre, 500', cardTextSample: 'He said "hi"', rowId: 'abc123def456', scrapedAt: '2026-03-01T12:00:00Z' }),
    ]);
    expect(csv).toBe(
      `${CSV_FIELDS.join(',')}\n` +
        'example.com,https://www.example.com/broadband,TW8 0FD,"Fibre, 500",500,35,,24,2026-03-01T12:00:00Z,"He said ""hi""",abc123def456\n'
    );
  });

  it('should read back what it writes', () => {
    const original = row({ planName: 'Fibre, 500', upfrontFeeGbp: 9.99 });
    expect(parseOfferCsv(formatOfferCsv([original]))).toEqual([original]);
  });

  it('should skip rows without a speed or price', () => {
    const csv = `${CSV_FIELDS.join(',')}\nexample.com,https://x.test/,TW8 0FD,,,35,,,2026-03-01T12:00:00Z,,id1\n`;
    expect(parseOfferCsv(csv)).toEqual([]);
  });

  it('should compute a missing row id', () => {
    const csv = `${CSV_FIELDS.join(',')}\nexample.com,https://www.example.com/broadband,TW8 0FD,,500,35.0,,,2026-03-01T12:00:00Z,,\n`;
    const [parsed] = parseOfferCsv(csv);
    expect(parsed.rowId).toBe(rowIdFor(row()));
    expect(parsed.contractMonths).toBeNull();
  });
});

describe('dedupeRows', () => {
  it('should keep the newest row per identity', () => {
    const older = row({ scrapedAt: '2026-02-01T00:00:00Z', rowId: 'old' });
    const newer = row({ scrapedAt: '2026-03-01T00:00:00Z', rowId: 'new' });
    expect(dedupeRows([older, newer])).toEqual([newer]);
  });

  it('should sort rows without a timestamp last', () => {
    const undated = row({ scrapedAt: '', rowId: 'undated' });
    const dated = row({ scrapedAt: '2026-02-01T00:00:00Z', rowId: 'dated' });
    expect(dedupeRows([undated, dated]).map((r) => r.rowId)).toEqual(['dated']);
  });

  it('should keep rows that differ in price', () => {
    expect(dedupeRows([row(), row({ monthlyPriceGbp: 40 })])).toHaveLength(2);
  });
});

describe('cache file', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'offer-cache-'));
    file = path.join(dir, 'offers.csv');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should treat a missing file as empty', () => {
    expect(loadExisting(file)).toEqual([]);
  });

  it('should not create a file for no rows', () => {
    appendRows(file, []);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('should merge and dedupe on append', () => {
    appendRows(file, [row({ scrapedAt: '2026-02-01T00:00:00Z', rowId: 'old' })]);
    appendRows(file, [row({ scrapedAt: '2026-03-01T00:00:00Z', rowId: 'new' })]);
    expect(loadExisting(file).map((r) => r.rowId)).toEqual(['new']);
  });

  it('should keep duplicates when dedupe is off', () => {
    appendRows(file, [row({ rowId: 'one' })], false);
    appendRows(file, [row({ rowId: 'two' })], false);
    expect(loadExisting(file).map((r) => r.rowId)).toEqual(['one', 'two']);
  });
});

describe('splitCachedAndMissing', () => {
  const providers = ['fresh.example', 'stale.example', 'absent.example', 'undated.example'];

  it('should report a miss for every provider when nothing matches', () => {
    const split = splitCachedAndMissing([row({ postcode: 'SW1A 1AA' })], 'TW8 0FD', ['example.com'], 24, false, NOW);
    expect(split.cachedRows).toEqual([]);
    expect(split.missingProviders).toEqual(['example.com']);
    expect(split.statusEvents).toEqual([
      { provider: 'all', url: '', step: 'cache_miss', detail: 'no matching rows in CSV', allowed: null, goto: null, steps: null },
    ]);
  });

  it('should match postcodes case-insensitively', () => {
    const split = splitCachedAndMissing([row({ postcode: 'tw8 0fd' })], 'TW8 0FD', ['example.com'], 24, false, NOW);
    expect(split.cachedRows).toHaveLength(1);
    expect(split.missingProviders).toEqual([]);
  });

  it('should decide freshness per provider', () => {
    const existing = [
      row({ provider: 'fresh.example', scrapedAt: '2026-03-01T06:00:00Z' }),
      row({ provider: 'fresh.example', scrapedAt: '2026-02-20T06:00:00Z', monthlyPriceGbp: 30 }),
      row({ provider: 'stale.example', scrapedAt: '2026-02-27T12:00:00Z' }),
      row({ provider: 'undated.example', scrapedAt: '' }),
    ];
    const split = splitCachedAndMissing(existing, 'TW8 0FD', providers, 24, false, NOW);

    expect(split.cachedRows).toEqual([existing[0]]);
    expect(split.missingProviders).toEqual(['stale.example', 'absent.example', 'undated.example']);
    expect(split.statusEvents.map((e) => [e.provider, e.step, e.detail])).toEqual([
      ['fresh.example', 'cache_used', 'fresh rows=1'],
      ['stale.example', 'cache_stale', 'latest=2026-02-27T12:00:00.000Z'],
      ['absent.example', 'cache_miss_provider', 'no rows for provider'],
      ['undated.example', 'cache_no_timestamp', ''],
    ]);
  });

  it('should use every matching row regardless of age when forced', () => {
    const existing = [row({ provider: 'stale.example', scrapedAt: '2020-01-01T00:00:00Z' })];
    const split = splitCachedAndMissing(existing, 'TW8 0FD', ['stale.example', 'absent.example'], 24, true, NOW);

    expect(split.cachedRows).toEqual(existing);
    expect(split.missingProviders).toEqual([]);
    expect(split.statusEvents.map((e) => [e.provider, e.step, e.detail])).toEqual([
      ['stale.example', 'cache_used_forced', 'rows=1 (age ignored)'],
      ['absent.example', 'cache_used_forced', 'rows=0 (age ignored)'],
    ]);
  });
});
