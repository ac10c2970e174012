/**
 * Scrape Session
 *
 * Runs one provider URL from first navigation to extracted offers:
 *
 *   navigate -> consent -> postcode -> (recovery) -> wizard -> extract
 *
 * The robots gate is consulted before every navigation. A whole attempt
 * (fresh page, fresh counters) is retried when the provider's session breaks
 * beyond repair or an unexpected error escapes, up to the profile's attempt
 * cap. Every step is recorded as a StatusEvent.
 */

import { logger, type Logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { withRetry } from '../utils/retry.js';
import { hostOrigin, providerOf } from '../utils/url.js';
import {
  SessionBrokenError,
  errorMessage,
  isTargetClosedError,
  type NavigationCounters,
  type OfferCandidate,
  type RobotsChecker,
  type ScrapeRequest,
  type SessionResult,
  type SiteProfile,
  type StatusEvent,
  type TriState,
} from '../types/index.js';
import { NavigationDriver } from './navigation-driver.js';
import { WizardStateMachine } from './wizard-state-machine.js';
import { recoveryPolicyFor, type RecoverablePage, type SessionRecoveryPolicy } from './session-recovery.js';
import { extractOffers } from './offer-extractor.js';
import { profileFor } from './site-profiles.js';

const EMPTY_DOCUMENT = '<html></html>';

type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

/**
 * The slice of a Playwright Page a session uses
 */
export interface ScrapePage extends RecoverablePage {
  goto(url: string, options?: { waitUntil?: LoadState }): Promise<unknown>;
  pause(): Promise<void>;
  content(): Promise<string>;
  close(): Promise<void>;
  isClosed(): boolean;
  setDefaultTimeout(timeout: number): void;
  setDefaultNavigationTimeout(timeout: number): void;
}

/**
 * Where sessions get their pages; a Playwright BrowserContext fits
 */
export interface PageSource {
  newPage(): Promise<ScrapePage>;
}

export interface ScrapeSessionOptions {
  /** Consulted before every navigation when the request respects robots.txt */
  robots: RobotsChecker;
  /** Defaults to the registry profile for the URL */
  profile?: SiteProfile;
  /** Delay before the attempt after `attempt` */
  backoff?: (attempt: number) => number;
  navigationTimeout?: number;
}

/** Ends an attempt without retrying it */
class AttemptStopped extends Error {
  constructor(readonly reason: string) {
    super(`Attempt stopped: ${reason}`);
    this.name = 'AttemptStopped';
  }
}

export class ScrapeSession {
  private readonly provider: string;
  private readonly profile: SiteProfile;
  private readonly policy: SessionRecoveryPolicy | null;
  private readonly events: StatusEvent[] = [];
  private readonly log: Logger;

  constructor(
    private readonly source: PageSource,
    private readonly url: string,
    private readonly request: ScrapeRequest,
    private readonly options: ScrapeSessionOptions
  ) {
    this.provider = providerOf(url);
    this.profile = options.profile ?? profileFor(url);
    this.policy = recoveryPolicyFor(this.profile);
    this.log = logger.session.child({ provider: this.provider, url });
  }

  /**
   * Run the attempt loop; never rejects for navigation or page failures
   */
  async run(): Promise<SessionResult> {
    const maxAttempts = this.profile.maxAttempts ?? 1;
    let offers: OfferCandidate[] = [];

    try {
      offers = await withRetry((attempt) => this.runAttempt(attempt, maxAttempts), {
        maxAttempts,
        delayForAttempt: this.options.backoff ?? ((attempt) => TIMEOUTS.ATTEMPT_BACKOFF * attempt),
        onRetry: (attempt, error, delayMs) => {
          this.log.warn('Retrying with a fresh page', { attempt, maxAttempts, error: error.message, retryDelayMs: delayMs });
        },
      });
    } catch (error) {
      this.log.warn('Attempts exhausted', { maxAttempts, error: errorMessage(error) });
    }

    this.log.info('Session finished', { offers: offers.length, events: this.events.length });
    return { offers, statusEvents: [...this.events] };
  }

  private async runAttempt(attempt: number, maxAttempts: number): Promise<OfferCandidate[]> {
    const counters: NavigationCounters = { gotoCount: 0, wizardSteps: 0 };
    const record = (step: string, url: string, detail = '', allowed: TriState = true): void => {
      this.events.push(
        Object.freeze({
          provider: this.provider,
          url,
          step: `${step}_a${attempt}`,
          detail,
          allowed,
          goto: counters.gotoCount,
          steps: counters.wizardSteps,
        })
      );
    };

    let page: ScrapePage | null = null;
    try {
      page = await this.source.newPage();
      page.setDefaultTimeout(TIMEOUTS.PAGE_ACTION);
      page.setDefaultNavigationTimeout(this.options.navigationTimeout ?? TIMEOUTS.PAGE_NAVIGATION);
      await this.nudge(page);
      if (this.request.debug.pauseOnStart) {
        await this.pauseForInspector(page);
      }

      return await this.drive(page, attempt, maxAttempts, counters, record);
    } catch (error) {
      if (error instanceof AttemptStopped) {
        this.log.info('Attempt stopped', { attempt, reason: error.reason });
        return [];
      }
      if (error instanceof SessionBrokenError) {
        throw error;
      }
      this.log.error('Attempt failed', { attempt, error });
      record('exception', this.url, errorMessage(error), null);
      throw error;
    } finally {
      if (page) {
        await this.safeClose(page);
      }
    }
  }

  private async drive(
    page: ScrapePage,
    attempt: number,
    maxAttempts: number,
    counters: NavigationCounters,
    record: (step: string, url: string, detail?: string, allowed?: TriState) => void
  ): Promise<OfferCandidate[]> {
    const profile = this.profile;
    const driver = new NavigationDriver(page);
    const postcode = this.request.postcode;
    const submit = () => driver.submitPostcode(postcode, profile.postcodeInputSelectors, profile.submitSelectors);

    // Navigated
    if (!(await this.allowed(this.url))) {
      record('robots_blocked_initial', this.url, '', false);
      throw new AttemptStopped('robots');
    }
    try {
      await page.goto(this.url, { waitUntil: 'domcontentloaded' });
      counters.gotoCount++;
      record('navigated', this.url);
    } catch (error) {
      const base = `${hostOrigin(this.url)}/`;
      this.log.warn('Initial navigation failed, trying host root', { base, error: errorMessage(error) });
      if (!(await this.allowed(base))) {
        record('robots_blocked_base', base, '', false);
        throw new AttemptStopped('robots');
      }
      await page.goto(base, { waitUntil: 'domcontentloaded' });
      counters.gotoCount++;
      record('navigated_base', base);
    }

    // ConsentHandled
    await driver.acceptCookies(profile.cookieSelectors);
    await driver.runPreActions(profile, counters);

    const goDirect = async (): Promise<boolean> => {
      const target = profile.directLink;
      if (!target) return false;
      if (!(await this.allowed(target))) {
        record('robots_blocked_direct', target, '', false);
        return false;
      }
      try {
        await page.goto(target, { waitUntil: 'domcontentloaded' });
        await page.waitForTimeout(TIMEOUTS.DEEP_LINK_SETTLE);
      } catch (error) {
        this.log.debug('Deep link navigation failed', { target, error: errorMessage(error) });
        return false;
      }
      counters.gotoCount++;
      record('navigated_direct', target);
      return true;
    };

    // PostcodeSubmitted
    let submitted = await submit();
    if (!submitted && profile.directLink && (await goDirect())) {
      await driver.acceptCookies(profile.cookieSelectors);
      submitted = await submit();
    }
    if (!submitted) {
      submitted = await this.walkFallbacks(page, driver, counters, record, submit);
    }

    // RecoveryLoop
    if (this.policy && (await this.policy.isBroken(page))) {
      const outcome = await this.policy.recover({ page, driver, profile, postcode, counters, goDirect });
      if (outcome.recovered) {
        record('session_recovered', page.url(), outcome.postcodeSubmitted ? 'postcode submitted' : '');
      } else {
        record('session_broken', page.url(), this.policy.description);
        if (attempt < maxAttempts) {
          throw new SessionBrokenError(this.provider, attempt);
        }
      }
    }

    // WizardComplete
    try {
      await new WizardStateMachine(driver).driveToResults(this.request, profile.resultSelectors, counters);
      await page.waitForLoadState('networkidle');
      await page.waitForTimeout(TIMEOUTS.FINAL_SETTLE);
    } catch (error) {
      this.log.debug('Wizard did not complete', { error: errorMessage(error) });
      record('wizard_incomplete', this.url, errorMessage(error));
    }

    // Extracted
    const offers = extractOffers(await this.safeContent(page));
    record('offers_found', this.url, `${offers.length}`);
    if (offers.length === 0) {
      record('no_offers', this.url);
    }
    return offers;
  }

  private async walkFallbacks(
    page: ScrapePage,
    driver: NavigationDriver,
    counters: NavigationCounters,
    record: (step: string, url: string, detail?: string, allowed?: TriState) => void,
    submit: () => Promise<boolean>
  ): Promise<boolean> {
    const origin = hostOrigin(this.url);
    for (const path of this.profile.fallbackPaths) {
      const target = origin + path;
      if (!(await this.allowed(target))) {
        record('robots_blocked_fallback', target, path, false);
        continue;
      }
      try {
        await page.goto(target, { waitUntil: 'domcontentloaded' });
        counters.gotoCount++;
        record('navigated_fallback', target, path);
        await driver.acceptCookies(this.profile.cookieSelectors);
        await driver.runPreActions(this.profile, counters);
        if (await submit()) return true;
      } catch (error) {
        this.log.debug('Fallback path failed', { target, error: errorMessage(error) });
      }
    }
    return false;
  }

  private async allowed(url: string): Promise<boolean> {
    if (!this.request.respectRobots) return true;
    return this.options.robots.isAllowed(url);
  }

  private async pauseForInspector(page: ScrapePage): Promise<void> {
    try {
      await page.pause();
    } catch (error) {
      this.log.debug('Inspector pause failed', { error: errorMessage(error) });
    }
  }

  private async nudge(page: ScrapePage): Promise<void> {
    try {
      await page.mouse.wheel(0, 250);
      await page.waitForTimeout(TIMEOUTS.SCROLL_SETTLE);
    } catch (error) {
      this.log.debug('Scroll nudge failed', { error: errorMessage(error) });
    }
  }

  /**
   * Page HTML, or an empty document when the page is already gone
   */
  private async safeContent(page: ScrapePage): Promise<string> {
    if (page.isClosed()) return EMPTY_DOCUMENT;
    try {
      return await page.content();
    } catch (error) {
      if (isTargetClosedError(error)) {
        this.log.debug('Page closed before extraction');
        return EMPTY_DOCUMENT;
      }
      throw error;
    }
  }

  private async safeClose(page: ScrapePage): Promise<void> {
    try {
      if (!page.isClosed()) {
        await page.close();
      }
    } catch (error) {
      this.log.debug('Page close failed', { error: errorMessage(error) });
    }
  }
}
