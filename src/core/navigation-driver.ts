/**
 * Navigation Driver
 *
 * Best-effort DOM interactions for provider availability wizards. Every
 * operation reports whether it did something; a missing selector, a click
 * target that went away or a malformed selector is "not found", never an
 * exception.
 *
 * The driver talks to the page through the small structural interfaces
 * below. Playwright's Page, Frame and Locator satisfy them as they are.
 */

import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { errorMessage, type NavigationCounters, type SiteProfile } from '../types/index.js';
import { pathOf } from '../utils/url.js';

const log = logger.driver;

export interface DriverLocator {
  count(): Promise<number>;
  first(): DriverLocator;
  nth(index: number): DriverLocator;
  locator(selector: string): DriverLocator;
  filter(options: { hasText?: string | RegExp }): DriverLocator;
  click(options?: { timeout?: number }): Promise<void>;
  fill(value: string): Promise<void>;
  pressSequentially(text: string, options?: { delay?: number }): Promise<void>;
  press(key: string): Promise<void>;
  check(): Promise<void>;
  selectOption(values: { label: string }): Promise<string[]>;
  isVisible(): Promise<boolean>;
  allTextContents(): Promise<string[]>;
  textContent(): Promise<string | null>;
  innerText(): Promise<string>;
  inputValue(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  waitFor(options?: { timeout?: number }): Promise<void>;
}

/**
 * Anything selectors can be resolved against: a page, a frame or a locator
 */
export interface DriverScope {
  locator(selector: string): DriverLocator;
}

export interface DriverPage extends DriverScope {
  url(): string;
  frames(): DriverScope[];
  waitForTimeout(timeout: number): Promise<void>;
  waitForLoadState(state?: 'load' | 'domcontentloaded' | 'networkidle'): Promise<void>;
  mouse: { wheel(deltaX: number, deltaY: number): Promise<void> };
}

/** Consent controls commonly rendered inside consent-manager iframes */
export const FRAME_CONSENT_SELECTORS = [
  "label:has-text('Accept all')",
  "button:has-text('Accept all')",
  "button:has-text('Accept All')",
  "button[mode='primary']:has-text('Accept')",
] as const;

export const CONTINUE_BUTTONS = [
  "button:has-text('Continue')",
  "button:has-text('Next')",
  "button:has-text('Confirm')",
  "button:has-text('Proceed')",
  "button:has-text('See deals')",
  "button:has-text('View deals')",
  "button:has-text('Go')",
  "a:has-text('Continue')",
  "a:has-text('Next')",
] as const;

export const LIVE_HERE_LABELS = [
  'I live here and am or have consent from the bill payer',
  'I live here',
  'I currently live at this address',
  'I’m staying at this address',
  'I am staying at this address',
] as const;

export const MOVING_LABELS = [
  'I am moving to this address or have moved here in the last 14 days',
  'I am moving to this address',
  "I'm moving to this address",
  'moving to this address',
  'I am moving home',
  "I'm moving home",
  'I have moved here in the last 14 days',
] as const;

export const ADDRESS_LIKE = /\d+|road|street|flat|house|avenue|close|drive|lane|rd|st/i;
export const REQUIRED_FIELD_LABEL = /(house|flat|unit|apartment|building|number|street|address line)/i;

const MOVING_SCOPE = ":text-matches('moving|live here', 'i')";
const TEXT_INPUTS = "input[type='text'], input:not([type])";

/**
 * Quote a value for use inside a Playwright selector
 */
function quoted(text: string): string {
  return JSON.stringify(text);
}

export class NavigationDriver {
  constructor(private readonly page: DriverPage) {}

  /**
   * Click the first consent control, main document first, then every frame
   */
  async acceptCookies(selectors: readonly string[]): Promise<boolean> {
    for (const selector of selectors) {
      const clicked = await this.tryAction('cookie', selector, async () => {
        const loc = this.page.locator(selector);
        if ((await loc.count()) === 0) return false;
        await loc.first().click({ timeout: TIMEOUTS.CLICK });
        return true;
      });
      if (clicked) {
        await this.page.waitForTimeout(TIMEOUTS.COOKIE_SETTLE);
        return true;
      }
    }

    const frameSelectors = [...FRAME_CONSENT_SELECTORS, ...selectors];
    for (const frame of this.page.frames()) {
      for (const selector of frameSelectors) {
        const clicked = await this.tryAction('frame cookie', selector, async () => {
          const loc = frame.locator(selector);
          if ((await loc.count()) === 0 || !(await loc.first().isVisible())) return false;
          await loc.first().click({ timeout: TIMEOUTS.CLICK });
          return true;
        });
        if (clicked) {
          await this.page.waitForTimeout(TIMEOUTS.COOKIE_SETTLE);
          return true;
        }
      }
    }

    return false;
  }

  /**
   * Type the postcode into the first matching field and submit it
   *
   * Reports that a submission happened, not that it was accepted.
   */
  async submitPostcode(
    postcode: string,
    inputSelectors: readonly string[],
    submitSelectors: readonly string[]
  ): Promise<boolean> {
    for (const selector of inputSelectors) {
      const field = await this.tryAction('postcode input', selector, async () => {
        const loc = this.page.locator(selector);
        if ((await loc.count()) === 0) return null;
        const first = loc.first();
        await first.fill('');
        await first.pressSequentially(postcode, { delay: TIMEOUTS.KEYSTROKE });
        return first;
      });
      if (!field) continue;

      for (const submit of submitSelectors) {
        const clicked = await this.tryAction('submit', submit, async () => {
          const button = this.page.locator(submit);
          if ((await button.count()) === 0) return false;
          await button.first().click({ timeout: TIMEOUTS.SUBMIT_CLICK });
          return true;
        });
        if (clicked) {
          await this.page.waitForTimeout(TIMEOUTS.POST_CLICK);
          return true;
        }
      }

      const pressed = await this.tryAction('enter', selector, async () => {
        await field.press('Enter');
        return true;
      });
      if (pressed) {
        await this.page.waitForTimeout(TIMEOUTS.POST_CLICK);
        return true;
      }
    }
    return false;
  }

  /**
   * Pick an address from a native dropdown or a custom list
   */
  async resolveAddressPicker(hint: string | null, index: number): Promise<boolean> {
    const picked =
      (await this.tryAction('address select', 'select', () => this.pickFromSelect(hint, index))) === true ||
      (await this.tryAction('address list', 'listbox', () => this.pickFromList(hint, index))) === true;
    if (picked) {
      await this.clickContinueLike();
    }
    return picked;
  }

  private async pickFromSelect(hint: string | null, index: number): Promise<boolean> {
    const selects = this.page.locator('select');
    const count = await selects.count();

    for (let i = 0; i < count; i++) {
      const select = selects.nth(i);
      const options = await select.locator('option').allTextContents();
      if (options.length < 2 || !options.some((o) => ADDRESS_LIKE.test(o))) continue;

      const needle = hint?.toLowerCase();
      const chosen =
        (needle ? options.find((o) => o.toLowerCase().includes(needle)) : undefined) ??
        options[Math.max(0, Math.min(options.length - 1, index - 1))];

      try {
        await select.selectOption({ label: chosen });
      } catch (error) {
        log.debug('selectOption failed, clicking option', { label: chosen, error: errorMessage(error) });
        if (!(await this.clickOptionByText(select, chosen))) continue;
      }
      await this.page.waitForTimeout(TIMEOUTS.ADDRESS_SETTLE);
      return true;
    }
    return false;
  }

  private async clickOptionByText(select: DriverLocator, label: string): Promise<boolean> {
    const options = select.locator('option');
    const count = await options.count();
    for (let j = 0; j < count; j++) {
      const text = ((await options.nth(j).textContent()) ?? '').trim();
      if (text === label.trim()) {
        await options.nth(j).click();
        return true;
      }
    }
    return false;
  }

  private async pickFromList(hint: string | null, index: number): Promise<boolean> {
    let items = this.page.locator("[role='listbox'] [role='option']");
    if ((await items.count()) === 0) {
      items = this.page.locator('ul li, ol li').filter({ hasText: ADDRESS_LIKE });
    }
    const count = await items.count();
    if (count < 2) return false;

    let target = 0;
    if (hint) {
      const needle = hint.toLowerCase();
      for (let i = 0; i < count; i++) {
        const text = (await items.nth(i).innerText()).trim();
        if (text.toLowerCase().includes(needle)) {
          target = i;
          break;
        }
      }
    } else {
      target = Math.max(0, Math.min(count - 1, index - 1));
    }

    await items.nth(target).click();
    await this.page.waitForTimeout(TIMEOUTS.ADDRESS_SETTLE);
    return true;
  }

  /**
   * Answer "are you moving?"; a null answer leaves the question alone
   */
  async answerMovingQuestion(moving: boolean | null): Promise<boolean> {
    if (moving === null) return false;

    let scope: DriverScope = this.page;
    const block = this.page.locator(MOVING_SCOPE);
    const hasBlock = await this.tryAction('moving scope', MOVING_SCOPE, async () => (await block.count()) > 0);
    if (hasBlock) {
      scope = block.first();
    }

    const phrases = moving ? MOVING_LABELS : LIVE_HERE_LABELS;
    const shortPhrase = moving ? 'moving' : 'live here';
    const picked =
      (await this.clickLabelWithText(scope, phrases)) ||
      (await this.clickLabelWithText(scope, [shortPhrase]));

    if (picked) {
      await this.clickContinueLike();
    }
    return picked;
  }

  private async clickLabelWithText(scope: DriverScope, phrases: readonly string[]): Promise<boolean> {
    const strategies: Array<(phrase: string) => Promise<boolean>> = [
      async (phrase) => {
        const label = scope.locator(`label:has-text(${quoted(phrase)})`);
        if ((await label.count()) === 0) return false;
        await label.first().click();
        return true;
      },
      async (phrase) => {
        const text = scope.locator(`:text(${quoted(phrase)})`);
        if ((await text.count()) === 0) return false;
        const ancestor = text.first().locator('xpath=ancestor::label[1]');
        if ((await ancestor.count()) === 0) return false;
        await ancestor.first().click();
        return true;
      },
      async (phrase) => {
        const radio = scope.locator(`input[type='radio'][aria-label*=${quoted(phrase)}]`);
        if ((await radio.count()) === 0) return false;
        await radio.first().check();
        return true;
      },
    ];

    for (const strategy of strategies) {
      for (const phrase of phrases) {
        if (await this.tryAction('moving label', phrase, () => strategy(phrase))) {
          await this.page.waitForTimeout(TIMEOUTS.LABEL_SETTLE);
          return true;
        }
      }
    }
    return false;
  }

  /**
   * Fill operator-supplied fields, then default empty address-like inputs to "1"
   */
  async fillAdditionalFields(extraFields: Readonly<Record<string, string>>): Promise<boolean> {
    let changed = false;

    for (const [labelText, value] of Object.entries(extraFields)) {
      const filled = await this.tryAction('extra field', labelText, () => this.fillByLabel(labelText, value));
      if (filled) {
        await this.page.waitForTimeout(TIMEOUTS.FIELD_SETTLE);
        changed = true;
      }
    }

    const inputs = this.page.locator(TEXT_INPUTS);
    const count = await this.tryAction('text inputs', TEXT_INPUTS, () => inputs.count());
    for (let i = 0; i < (count || 0); i++) {
      const filled = await this.tryAction('required field', `${TEXT_INPUTS} #${i}`, () =>
        this.fillRequiredDefault(inputs.nth(i))
      );
      if (filled) {
        await this.page.waitForTimeout(TIMEOUTS.FIELD_SETTLE);
        changed = true;
      }
    }

    if (changed) {
      await this.clickContinueLike();
    }
    return changed;
  }

  private async fillByLabel(labelText: string, value: string): Promise<boolean> {
    const label = this.page.locator(`label:has-text(${quoted(labelText)})`);
    if ((await label.count()) > 0) {
      const control = (await label.first().getAttribute('for')) ?? '';
      const input = control
        ? this.page.locator(`[id=${quoted(control)}]`)
        : label.first().locator('xpath=following::input[1]');
      if ((await input.count()) > 0) {
        await input.first().fill(value);
        return true;
      }
    }

    const q = quoted(labelText);
    const input = this.page.locator(`input[placeholder*=${q} i], input[name*=${q} i], input[id*=${q} i]`);
    if ((await input.count()) === 0) return false;
    await input.first().fill(value);
    return true;
  }

  private async fillRequiredDefault(input: DriverLocator): Promise<boolean> {
    const current = await input.inputValue();
    if (!(await input.isVisible()) || current.trim()) return false;

    let labelText: string | null = null;
    const preceding = input.locator('xpath=preceding::label[1]');
    if ((await preceding.count()) > 0) {
      labelText = ((await preceding.first().textContent()) ?? '').trim();
    } else {
      const ancestor = input.locator('xpath=ancestor::label[1]');
      if ((await ancestor.count()) > 0) {
        labelText = ((await ancestor.first().textContent()) ?? '').trim();
      }
    }
    if (labelText && !REQUIRED_FIELD_LABEL.test(labelText)) return false;

    await input.fill('1');
    return true;
  }

  /**
   * Click the first progression control (Continue, Next, See deals...)
   */
  async clickContinueLike(): Promise<boolean> {
    for (const selector of CONTINUE_BUTTONS) {
      const clicked = await this.tryAction('continue', selector, async () => {
        const button = this.page.locator(selector);
        if ((await button.count()) === 0) return false;
        await button.first().click({ timeout: TIMEOUTS.CLICK });
        return true;
      });
      if (clicked) {
        await this.page.waitForTimeout(TIMEOUTS.POST_CLICK);
        return true;
      }
    }
    return false;
  }

  /**
   * Whether any result marker is already on the page
   */
  async hasAnyResult(selectors: readonly string[]): Promise<boolean> {
    for (const selector of selectors) {
      const found = await this.tryAction('result check', selector, async () => {
        return (await this.page.locator(selector).first().count()) > 0;
      });
      if (found) return true;
    }
    return false;
  }

  /**
   * Race the result markers within one shared budget; settle instead of failing
   */
  async waitForAnyResult(selectors: readonly string[], timeoutMs: number = TIMEOUTS.RESULT_WAIT): Promise<boolean> {
    if (selectors.length > 0) {
      try {
        const selector = await Promise.any(
          selectors.map(async (candidate) => {
            await this.page.locator(candidate).first().waitFor({ timeout: timeoutMs });
            return candidate;
          })
        );
        log.debug('Result marker appeared', { selector });
        return true;
      } catch (error) {
        log.debug('No result marker within budget', { timeoutMs, error: errorMessage(error) });
      }
    }
    await this.page.waitForTimeout(TIMEOUTS.RESULT_SETTLE);
    return false;
  }

  /**
   * Click through a landing-page call to action before the postcode checker
   *
   * Only runs on the profile's landing path, never on its deep purchase path.
   * A click that loads a new document counts as a navigation.
   */
  async runPreActions(profile: SiteProfile, counters: NavigationCounters): Promise<boolean> {
    const preCta = profile.preCta;
    if (!preCta || preCta.selectors.length === 0) return false;

    const path = pathOf(this.page.url());
    const deepPath = profile.directLink ? pathOf(profile.directLink) : '';
    if (!path.includes(preCta.landingPath) || (deepPath && path.includes(deepPath))) {
      return false;
    }

    for (const selector of preCta.selectors) {
      const clicked = await this.tryAction('pre-action', selector, async () => {
        const loc = this.page.locator(selector);
        if ((await loc.count()) === 0 || !(await loc.first().isVisible())) return false;
        await loc.first().click({ timeout: TIMEOUTS.CLICK });
        await this.page.waitForLoadState('domcontentloaded');
        return true;
      });
      if (!clicked) continue;

      counters.gotoCount += 1;
      await this.tryAction('scroll', 'mouse.wheel', async () => {
        await this.page.mouse.wheel(0, 400);
        await this.page.waitForTimeout(TIMEOUTS.SCROLL_SETTLE);
        return true;
      });
      return true;
    }
    return false;
  }

  /**
   * Fixed delay on the driven page
   */
  async settle(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  /**
   * Run one selector-level action; a failure counts as "not found"
   */
  private async tryAction<T>(action: string, selector: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (error) {
      log.debug('Action did not complete', { action, selector, error: errorMessage(error) });
      return null;
    }
  }
}
