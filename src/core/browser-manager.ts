/**
 * Browser Manager - Handles Playwright browser lifecycle for one batch
 *
 * One Chromium instance and one shared context per run. The context carries
 * the UK desktop fingerprint every provider expects and, when asked, the
 * run's observational artifacts: console log, video, HAR and trace.
 */

import type { Browser, BrowserContext, BrowserContextOptions } from 'playwright';
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { BrowserLaunchError, errorMessage, type DebugOptions } from '../types/index.js';
import type { PageSource } from './scrape-session.js';

const log = logger.browser;

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const VIEWPORT = { width: 1366, height: 900 } as const;

const INIT_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', {get: () => undefined});
Object.defineProperty(navigator, 'languages', {get: () => ['en-GB','en']});
`;

/**
 * Resolved artifact locations for one run; null disables an artifact
 */
export interface RunArtifacts {
  consoleLogPath: string | null;
  recordVideoDir: string | null;
  recordHarPath: string | null;
  tracePath: string | null;
}

export interface BrowserConfig {
  headless: boolean;
  slowMo: number;
  devtools: boolean;
  navigationTimeout: number;
  artifacts: RunArtifacts;
}

/**
 * What the orchestrator needs from a browser: a shared context to open
 * pages in, and teardown
 */
export interface BatchBrowser {
  initialize(): Promise<void>;
  createContext(): Promise<PageSource>;
  cleanup(): Promise<void>;
}

/**
 * UTC run stamp, `YYYYMMDD-HHMMSS`
 */
export function runTimestamp(now: Date = new Date()): string {
  const iso = now.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`;
}

/**
 * Fill unset artifact paths with defaults under the logs directory
 */
export function resolveArtifacts(debug: DebugOptions, now: Date = new Date()): RunArtifacts {
  const ts = runTimestamp(now);
  const dir = debug.logsDir;
  return {
    consoleLogPath: debug.consoleLogPath ?? path.join(dir, `console-${ts}.log`),
    recordVideoDir: debug.recordVideoDir ?? path.join(dir, 'videos', ts),
    recordHarPath: debug.recordHarPath ?? path.join(dir, `network-${ts}.har`),
    tracePath: debug.tracePath ?? path.join(dir, `trace-${ts}.zip`),
  };
}

/**
 * One line of the console log file
 */
export function formatConsoleLine(type: string, text: string, now: Date = new Date()): string {
  return `${now.toISOString().slice(0, 19)}Z [chromium:${type}] ${text}`;
}

/**
 * Append-only console log file; turns itself off when the file cannot be written
 */
export class ConsoleSink {
  private readonly stream: fs.WriteStream;
  private failed = false;

  constructor(readonly filePath: string) {
    this.stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    this.stream.on('error', (error) => {
      this.failed = true;
      log.warn('Console log disabled', { path: filePath, error: errorMessage(error) });
    });
  }

  get active(): boolean {
    return !this.failed;
  }

  write(line: string): void {
    if (this.failed) return;
    this.stream.write(`${line}\n`);
  }

  async close(): Promise<void> {
    if (this.failed || this.stream.destroyed) return;
    await new Promise<void>((resolve) => this.stream.end(() => resolve()));
  }
}

export class BrowserManager implements BatchBrowser {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private consoleSink: ConsoleSink | null = null;
  private tracing = false;

  constructor(private readonly config: BrowserConfig) {}

  async initialize(): Promise<void> {
    if (this.browser) return;

    let pw: typeof import('playwright');
    try {
      pw = await import('playwright');
    } catch (error) {
      throw new BrowserLaunchError(`Playwright is not installed: ${errorMessage(error)}`);
    }

    try {
      this.browser = await pw.chromium.launch({
        headless: this.config.headless,
        slowMo: this.config.slowMo,
        devtools: this.config.devtools,
      });
    } catch (error) {
      throw new BrowserLaunchError(
        `Chromium failed to launch (run "npx playwright install chromium"): ${errorMessage(error)}`
      );
    }
    log.info('Browser launched', { headless: this.config.headless, slowMo: this.config.slowMo });
  }

  async createContext(): Promise<BrowserContext> {
    await this.initialize();
    if (this.context) return this.context;
    if (!this.browser) {
      throw new BrowserLaunchError('Browser is not running');
    }

    const { artifacts } = this.config;
    const options: BrowserContextOptions = {
      viewport: VIEWPORT,
      userAgent: USER_AGENT,
      locale: 'en-GB',
    };
    if (artifacts.recordVideoDir) {
      fs.mkdirSync(artifacts.recordVideoDir, { recursive: true });
      options.recordVideo = { dir: artifacts.recordVideoDir };
    }
    if (artifacts.recordHarPath) {
      fs.mkdirSync(path.dirname(artifacts.recordHarPath), { recursive: true });
      options.recordHar = { path: artifacts.recordHarPath };
    }

    const context = await this.browser.newContext(options);
    await context.addInitScript(INIT_SCRIPT);
    context.setDefaultNavigationTimeout(this.config.navigationTimeout);

    if (artifacts.consoleLogPath) {
      fs.mkdirSync(path.dirname(artifacts.consoleLogPath), { recursive: true });
      const sink = new ConsoleSink(artifacts.consoleLogPath);
      this.consoleSink = sink;
      context.on('page', (page) => {
        page.on('console', (msg) => sink.write(formatConsoleLine(msg.type(), msg.text())));
      });
    }

    if (artifacts.tracePath) {
      await context.tracing.start({ screenshots: true, snapshots: true, sources: true });
      this.tracing = true;
    }

    this.context = context;
    log.debug('Context created', { artifacts });
    return context;
  }

  async cleanup(): Promise<void> {
    const context = this.context;
    this.context = null;

    if (context) {
      if (this.tracing && this.config.artifacts.tracePath) {
        try {
          await context.tracing.stop({ path: this.config.artifacts.tracePath });
        } catch (error) {
          log.warn('Trace could not be saved', { error: errorMessage(error) });
        }
        this.tracing = false;
      }
      try {
        await context.close();
      } catch (error) {
        log.warn('Context close failed', { error: errorMessage(error) });
      }
    }

    if (this.browser) {
      try {
        await this.browser.close();
      } catch (error) {
        log.warn('Browser close failed', { error: errorMessage(error) });
      }
      this.browser = null;
    }

    const sink = this.consoleSink;
    this.consoleSink = null;
    await sink?.close();
    log.info('Browser closed');
  }
}

/**
 * Browser config for a batch from the request's debug options
 */
export function browserConfigFor(debug: DebugOptions, navigationTimeout: number = TIMEOUTS.PAGE_NAVIGATION): BrowserConfig {
  return {
    // the Inspector only opens in a headed browser
    headless: !debug.headed && !debug.pauseOnStart,
    slowMo: debug.slowMoMs,
    devtools: debug.devtools,
    navigationTimeout,
    artifacts: resolveArtifacts(debug),
  };
}
