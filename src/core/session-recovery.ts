/**
 * Session Recovery Policy
 *
 * Some providers drop the visitor onto a timeout or "intent" error page
 * partway through the checker. A profile that declares sessionBrokenSignals
 * gets a policy that recognises those pages and walks a short recovery
 * ladder: soft reload, then fresh cookies and the provider's deep link.
 * Each rung is re-checked before the next one runs.
 */

import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import {
  errorMessage,
  type NavigationCounters,
  type SessionBrokenSignals,
  type SiteProfile,
} from '../types/index.js';
import type { DriverPage, NavigationDriver } from './navigation-driver.js';

const log = logger.recovery;

const REGION_SELECTORS = ['main', 'body', "[role='main']"] as const;
const GENERIC_BROKEN = ":text-matches('went wrong|try again|error|blocked', 'i')";

export interface RecoverablePage extends DriverPage {
  reload(options?: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' }): Promise<unknown>;
  context(): { clearCookies(): Promise<void> };
}

export interface RecoveryContext {
  page: RecoverablePage;
  driver: NavigationDriver;
  profile: SiteProfile;
  postcode: string;
  counters: NavigationCounters;
  /** Navigate to the profile's deep link through the robots gate */
  goDirect: () => Promise<boolean>;
}

export interface RecoveryOutcome {
  recovered: boolean;
  /** A postcode submission happened during recovery */
  postcodeSubmitted: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class SessionRecoveryPolicy {
  private readonly phraseSelectors: readonly string[];

  constructor(
    private readonly signals: SessionBrokenSignals,
    /** Status detail used when the ladder fails */
    readonly description: string = 'intent/timeout page'
  ) {
    this.phraseSelectors = signals.phrases.map(
      (phrase) => `:text-matches(${JSON.stringify(escapeRegExp(phrase))}, "i")`
    );
  }

  /**
   * Whether the page shows a dead session
   */
  async isBroken(page: DriverPage): Promise<boolean> {
    const url = page.url().toLowerCase();
    if (this.signals.urlTokens.some((token) => url.includes(token.toLowerCase()))) {
      return true;
    }

    try {
      for (const phrase of this.phraseSelectors) {
        for (const region of REGION_SELECTORS) {
          if ((await page.locator(region).locator(phrase).count()) > 0) {
            return true;
          }
        }
      }
      return (await page.locator(GENERIC_BROKEN).count()) > 0;
    } catch (error) {
      log.debug('Broken-session probe failed', { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Soft reload, then cookie reset plus deep link
   */
  async recover(ctx: RecoveryContext): Promise<RecoveryOutcome> {
    const { page, driver, profile, postcode, counters } = ctx;
    let postcodeSubmitted = false;

    try {
      await page.reload({ waitUntil: 'domcontentloaded' });
      await page.waitForTimeout(TIMEOUTS.RELOAD_SETTLE);
      if (!(await this.isBroken(page))) {
        await driver.runPreActions(profile, counters);
        postcodeSubmitted = await driver.submitPostcode(
          postcode,
          profile.postcodeInputSelectors,
          profile.submitSelectors
        );
      }
    } catch (error) {
      log.debug('Soft reload failed', { provider: profile.domain, error: errorMessage(error) });
    }

    if (await this.isBroken(page)) {
      try {
        await page.context().clearCookies();
        if (await ctx.goDirect()) {
          await driver.acceptCookies(profile.cookieSelectors);
          await driver.runPreActions(profile, counters);
          postcodeSubmitted =
            (await driver.submitPostcode(postcode, profile.postcodeInputSelectors, profile.submitSelectors)) ||
            postcodeSubmitted;
        }
      } catch (error) {
        log.debug('Deep-link recovery failed', { provider: profile.domain, error: errorMessage(error) });
      }
    }

    const recovered = !(await this.isBroken(page));
    log.info(recovered ? 'Session recovered' : 'Session still broken', { provider: profile.domain });
    return { recovered, postcodeSubmitted };
  }
}

/**
 * Recovery policy for a profile, or null when it declares no signals
 */
export function recoveryPolicyFor(profile: SiteProfile): SessionRecoveryPolicy | null {
  return profile.sessionBrokenSignals ? new SessionRecoveryPolicy(profile.sessionBrokenSignals) : null;
}
