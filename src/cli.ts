/**
 * broadband-scout command line
 *
 * Usage:
 *   broadband-scout --postcode "TW8 0FD" [--provider Sky ...] [--url URL ...] [options]
 *
 * Prints the offers sorted by monthly price, then the status trail.
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { configureLogger, logger } from './utils/logger.js';
import { parseBrowserConfig, parseLogConfig } from './utils/env-parser.js';
import {
  ConfigValidationError,
  integerStringSchema,
  parseScrapeRequest,
} from './utils/config-schemas.js';
import { withScheme } from './utils/url.js';
import { ScrapeError, errorMessage, type OfferRow, type ScrapeRequest, type StatusEvent } from './types/index.js';
import { getSiteProfiles } from './core/site-profiles.js';
import { ScrapeOrchestrator } from './core/scrape-orchestrator.js';
import { runOfferCheck, type CacheMode } from './core/offer-check.js';

const log = logger.cli;

export const USAGE = `Usage: broadband-scout --postcode <postcode> [options]

Targets (default: every known provider)
  --provider <name>        Known provider by name, repeatable
  --url <url>              Extra provider URL, repeatable

Wizard
  --address-hint <text>    Pick the first address containing this text
  --address-index <n>      1-based address to pick otherwise (default 1)
  --moving yes|no|auto     Answer to "are you moving?" (default auto)
  --extra-fields <json>    Object of label text -> value for extra fields
  --max-steps <n>          Wizard step budget, 3 to 12 (default 6)
  --no-robots              Do not consult robots.txt

Cache
  --cache <csv>            Cache file (default offers.csv)
  --mode auto|cache-only|refresh
  --no-dedupe              Keep duplicate rows when appending
  --max-age-hours <n>      Freshness window for cached rows (default 24)

Debug
  --headed  --slow-mo <ms>  --devtools  --video-dir <dir>  --har <file>
  --trace <file>  --console-log <file>  --logs-dir <dir>
  --pause                  Open the Playwright Inspector on each page (implies --headed)
`;

const cliSchema = z.object({
  postcode: z.string({ required_error: '--postcode is required' }).trim().min(1, { message: '--postcode is required' }),
  providers: z.array(z.string()).default([]),
  urls: z.array(z.string().min(1)).default([]),
  addressHint: z.string().optional(),
  addressIndex: integerStringSchema({ min: 1, default: 1 }),
  moving: z.enum(['yes', 'no', 'auto']).default('auto'),
  extraFields: z.string().optional(),
  maxSteps: integerStringSchema({ min: 3, max: 12, default: 6 }),
  noRobots: z.boolean().default(false),
  cache: z.string().min(1).default('offers.csv'),
  mode: z.enum(['auto', 'cache-only', 'refresh']).default('auto'),
  noDedupe: z.boolean().default(false),
  maxAgeHours: integerStringSchema({ min: 0, default: 24 }),
  headed: z.boolean().default(false),
  slowMo: integerStringSchema({ min: 0, max: 5000, default: 0 }),
  devtools: z.boolean().default(false),
  videoDir: z.string().optional(),
  har: z.string().optional(),
  trace: z.string().optional(),
  consoleLog: z.string().optional(),
  logsDir: z.string().optional(),
  pause: z.boolean().default(false),
});

const extraFieldsSchema = z.record(z.string());

export interface CliOptions {
  request: ScrapeRequest;
  providers: string[];
  urls: string[];
  cachePath: string;
  mode: CacheMode;
  dedupe: boolean;
  maxAgeHours: number;
}

/**
 * Raised for arguments that are not a validation failure of a known flag
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function parseExtraFields(raw: string | undefined): Record<string, string> {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CliUsageError(`--extra-fields is not valid JSON: ${errorMessage(error)}`);
  }
  const result = extraFieldsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigValidationError('extraFields', result.error);
  }
  return result.data;
}

const MOVING: Record<'yes' | 'no' | 'auto', boolean | null> = { yes: true, no: false, auto: null };

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        postcode: { type: 'string' },
        provider: { type: 'string', multiple: true },
        url: { type: 'string', multiple: true },
        'address-hint': { type: 'string' },
        'address-index': { type: 'string' },
        moving: { type: 'string' },
        'extra-fields': { type: 'string' },
        'max-steps': { type: 'string' },
        'no-robots': { type: 'boolean' },
        cache: { type: 'string' },
        mode: { type: 'string' },
        'no-dedupe': { type: 'boolean' },
        'max-age-hours': { type: 'string' },
        headed: { type: 'boolean' },
        'slow-mo': { type: 'string' },
        devtools: { type: 'boolean' },
        'video-dir': { type: 'string' },
        har: { type: 'string' },
        trace: { type: 'string' },
        'console-log': { type: 'string' },
        'logs-dir': { type: 'string' },
        pause: { type: 'boolean' },
      },
    });
  } catch (error) {
    throw new CliUsageError(errorMessage(error));
  }
}

/**
 * Parse argv (without node and script) into a validated run
 *
 * @throws CliUsageError | ConfigValidationError
 */
export function parseCliArgs(argv: readonly string[], env: Record<string, string | undefined> = process.env): CliOptions {
  const { values } = readFlags(argv);

  const result = cliSchema.safeParse({
    postcode: values.postcode,
    providers: values.provider,
    urls: values.url,
    addressHint: values['address-hint'],
    addressIndex: values['address-index'],
    moving: values.moving,
    extraFields: values['extra-fields'],
    maxSteps: values['max-steps'],
    noRobots: values['no-robots'],
    cache: values.cache,
    mode: values.mode,
    noDedupe: values['no-dedupe'],
    maxAgeHours: values['max-age-hours'],
    headed: values.headed,
    slowMo: values['slow-mo'],
    devtools: values.devtools,
    videoDir: values['video-dir'],
    har: values.har,
    trace: values.trace,
    consoleLog: values['console-log'],
    logsDir: values['logs-dir'],
    pause: values.pause,
  });
  if (!result.success) {
    throw new ConfigValidationError('cli', result.error);
  }
  const cli = result.data;
  const browserEnv = parseBrowserConfig(env);

  const request = parseScrapeRequest({
    postcode: cli.postcode,
    addressHint: cli.addressHint ?? null,
    addressIndex: cli.addressIndex,
    moving: MOVING[cli.moving],
    extraFields: parseExtraFields(cli.extraFields),
    maxSteps: cli.maxSteps,
    respectRobots: !cli.noRobots,
    debug: {
      headed: cli.headed || browserEnv.headed,
      slowMoMs: cli.slowMo,
      devtools: cli.devtools,
      recordVideoDir: cli.videoDir ?? null,
      recordHarPath: cli.har ?? null,
      tracePath: cli.trace ?? null,
      consoleLogPath: cli.consoleLog ?? null,
      logsDir: cli.logsDir ?? browserEnv.logsDir,
      pauseOnStart: cli.pause,
    },
  });

  return {
    request,
    providers: cli.providers,
    urls: cli.urls.map(withScheme),
    cachePath: cli.cache,
    mode: cli.mode,
    dedupe: !cli.noDedupe,
    maxAgeHours: cli.maxAgeHours,
  };
}

/**
 * URLs to check: named providers plus extra URLs, or every known provider
 *
 * @throws CliUsageError for an unknown provider name
 */
export function resolveTargetUrls(
  providers: readonly string[],
  extraUrls: readonly string[],
  known: Readonly<Record<string, string>>
): string[] {
  const byName = new Map(Object.entries(known).map(([name, url]) => [name.toLowerCase(), url]));
  const urls: string[] = [];

  for (const name of providers) {
    const url = byName.get(name.trim().toLowerCase());
    if (!url) {
      throw new CliUsageError(`Unknown provider "${name}". Known: ${Object.keys(known).join(', ')}`);
    }
    urls.push(url);
  }
  urls.push(...extraUrls);

  const chosen = urls.length > 0 ? urls : Object.values(known);
  return [...new Set(chosen)];
}

function money(value: number | null): string {
  return value === null ? '-' : `£${value.toFixed(2)}`;
}

function renderTable(header: string[], rows: string[][]): string {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
  return [line(header), line(widths.map((w) => '-'.repeat(w))), ...rows.map(line)].join('\n');
}

/**
 * Offers sorted by monthly price, fastest first at equal price
 */
export function formatOfferTable(rows: readonly OfferRow[]): string {
  if (rows.length === 0) return 'No offers found.';
  const sorted = [...rows].sort(
    (a, b) => a.monthlyPriceGbp - b.monthlyPriceGbp || b.speedMbps - a.speedMbps
  );
  return renderTable(
    ['Provider', 'Plan', 'Mb/s', 'Monthly', 'Upfront', 'Months'],
    sorted.map((row) => [
      row.provider,
      row.planName ?? '-',
      String(row.speedMbps),
      money(row.monthlyPriceGbp),
      money(row.upfrontFeeGbp),
      row.contractMonths === null ? '-' : String(row.contractMonths),
    ])
  );
}

export function formatStatusTrail(events: readonly StatusEvent[]): string {
  if (events.length === 0) return 'No status events.';
  return renderTable(
    ['Provider', 'Step', 'Detail', 'Allowed', 'Goto', 'Steps', 'URL'],
    events.map((e) => [
      e.provider,
      e.step,
      e.detail,
      e.allowed === null ? '-' : String(e.allowed),
      e.goto === null ? '-' : String(e.goto),
      e.steps === null ? '-' : String(e.steps),
      e.url,
    ])
  );
}

/**
 * Run the CLI; resolves to the process exit code
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  out: NodeJS.WritableStream = process.stdout
): Promise<number> {
  if (argv.includes('--help') || argv.includes('-h')) {
    out.write(USAGE);
    return 0;
  }

  configureLogger(parseLogConfig());

  let options: CliOptions;
  let urls: string[];
  try {
    options = parseCliArgs(argv);
    urls = resolveTargetUrls(options.providers, options.urls, getSiteProfiles().defaultProviderUrls);
  } catch (error) {
    if (error instanceof CliUsageError || error instanceof ConfigValidationError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  const browserEnv = parseBrowserConfig();
  const orchestrator = new ScrapeOrchestrator({ navigationTimeout: browserEnv.navigationTimeout });

  try {
    const result = await runOfferCheck(
      {
        request: options.request,
        urls,
        cachePath: options.cachePath,
        mode: options.mode,
        dedupe: options.dedupe,
        maxAgeHours: options.maxAgeHours,
      },
      (request, targets) => orchestrator.scrapeMany(request, targets)
    );

    out.write(`${formatOfferTable(result.rows)}\n\n${formatStatusTrail(result.statusEvents)}\n`);
    return 0;
  } catch (error) {
    if (error instanceof ScrapeError) {
      log.error('Run failed', { code: error.code, error });
      process.stderr.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }
}
