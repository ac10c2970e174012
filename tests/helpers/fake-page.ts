/**
 * In-process stand-ins for a Playwright page
 *
 * Selectors are opaque strings: a locator matches when its selector chain was
 * registered with `page.element(...)`. Chained locators join their selectors
 * with " >> ". Every interaction is appended to `page.actions`.
 */

import type { DriverLocator, DriverScope } from '../../src/core/navigation-driver.js';
import type { PageSource, ScrapePage } from '../../src/core/scrape-session.js';

export interface FakeElement {
  count?: number;
  visible?: boolean;
  texts?: string[];
  value?: string;
  attributes?: Record<string, string>;
  /** Thrown by click/fill/check */
  error?: Error;
  onClick?: () => void;
}

type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export class FakeLocator implements DriverLocator {
  constructor(
    private readonly page: FakePage,
    readonly selector: string,
    private readonly index: number = 0
  ) {}

  private get element(): FakeElement | undefined {
    return this.page.elements.get(this.selector);
  }

  private act(kind: string, detail?: string): void {
    const element = this.element;
    if (!element) {
      throw new Error(`No element for ${this.selector}`);
    }
    if (element.error) {
      throw element.error;
    }
    this.page.actions.push(detail === undefined ? `${kind}:${this.selector}` : `${kind}:${this.selector}=${detail}`);
  }

  async count(): Promise<number> {
    const element = this.element;
    if (!element) return 0;
    return element.count ?? element.texts?.length ?? 1;
  }

  first(): DriverLocator {
    return new FakeLocator(this.page, this.selector, 0);
  }

  nth(index: number): DriverLocator {
    return new FakeLocator(this.page, this.selector, index);
  }

  locator(selector: string): DriverLocator {
    return new FakeLocator(this.page, `${this.selector} >> ${selector}`);
  }

  filter(options: { hasText?: string | RegExp }): DriverLocator {
    return new FakeLocator(this.page, `${this.selector} >> filter(${String(options.hasText)})`);
  }

  async click(): Promise<void> {
    this.act('click', this.index > 0 ? `#${this.index}` : undefined);
    this.element?.onClick?.();
  }

  async fill(value: string): Promise<void> {
    this.act('fill', value);
  }

  async pressSequentially(text: string): Promise<void> {
    this.act('type', text);
  }

  async press(key: string): Promise<void> {
    this.act('press', key);
  }

  async check(): Promise<void> {
    this.act('check');
  }

  async selectOption(values: { label: string }): Promise<string[]> {
    this.act('select', values.label);
    return [values.label];
  }

  async isVisible(): Promise<boolean> {
    return this.element?.visible ?? this.element !== undefined;
  }

  async allTextContents(): Promise<string[]> {
    return this.element?.texts ?? [];
  }

  async textContent(): Promise<string | null> {
    return this.element?.texts?.[this.index] ?? null;
  }

  async innerText(): Promise<string> {
    return this.element?.texts?.[this.index] ?? '';
  }

  async inputValue(): Promise<string> {
    return this.element?.value ?? '';
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.element?.attributes?.[name] ?? null;
  }

  async waitFor(options: { timeout?: number } = {}): Promise<void> {
    this.page.waitFors.push({ selector: this.selector, timeout: options.timeout });
    if (this.element) return;
    this.page.pendingWaits++;
    this.page.peakPendingWaits = Math.max(this.page.peakPendingWaits, this.page.pendingWaits);
    // the timeout elapses "instantly" so tests never sleep for it
    await new Promise((resolve) => setTimeout(resolve, 0));
    this.page.pendingWaits--;
    throw new Error(`Timeout ${options.timeout}ms waiting for ${this.selector}`);
  }
}

export class FakePage implements ScrapePage {
  readonly elements = new Map<string, FakeElement>();
  readonly actions: string[] = [];
  readonly gotos: string[] = [];
  readonly waits: number[] = [];
  /** Every locator waitFor call, in call order */
  readonly waitFors: Array<{ selector: string; timeout: number | undefined }> = [];
  pendingWaits = 0;
  peakPendingWaits = 0;
  readonly loadStates: Array<LoadState | undefined> = [];
  readonly wheels: Array<[number, number]> = [];
  html = '<html><body></body></html>';
  currentUrl = 'about:blank';
  closed = false;
  reloads = 0;
  pauses = 0;
  cookiesCleared = 0;
  defaultTimeout = 0;
  defaultNavigationTimeout = 0;
  /** Return an error to make goto reject for that URL */
  gotoError: (url: string) => Error | null = () => null;
  contentError: Error | null = null;
  onGoto: (url: string) => void = () => {};
  onReload: () => void = () => {};

  readonly mouse = {
    wheel: async (deltaX: number, deltaY: number): Promise<void> => {
      this.wheels.push([deltaX, deltaY]);
    },
  };

  element(selector: string, element: FakeElement = {}): this {
    this.elements.set(selector, element);
    return this;
  }

  remove(selector: string): this {
    this.elements.delete(selector);
    return this;
  }

  locator(selector: string): DriverLocator {
    return new FakeLocator(this, selector);
  }

  frames(): DriverScope[] {
    return [];
  }

  url(): string {
    return this.currentUrl;
  }

  async goto(url: string): Promise<unknown> {
    this.gotos.push(url);
    const error = this.gotoError(url);
    if (error) throw error;
    this.currentUrl = url;
    this.onGoto(url);
    return null;
  }

  async pause(): Promise<void> {
    this.pauses++;
  }

  async reload(): Promise<unknown> {
    this.reloads++;
    this.onReload();
    return null;
  }

  context(): { clearCookies(): Promise<void> } {
    return {
      clearCookies: async () => {
        this.cookiesCleared++;
      },
    };
  }

  async waitForTimeout(timeout: number): Promise<void> {
    this.waits.push(timeout);
  }

  async waitForLoadState(state?: LoadState): Promise<void> {
    this.loadStates.push(state);
  }

  async content(): Promise<string> {
    if (this.contentError) throw this.contentError;
    return this.html;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  setDefaultTimeout(timeout: number): void {
    this.defaultTimeout = timeout;
  }

  setDefaultNavigationTimeout(timeout: number): void {
    this.defaultNavigationTimeout = timeout;
  }
}

/**
 * Hands out pages from a factory and remembers them
 */
export class FakePageSource implements PageSource {
  readonly pages: FakePage[] = [];

  constructor(private readonly factory: (index: number) => FakePage = () => new FakePage()) {}

  async newPage(): Promise<ScrapePage> {
    const page = this.factory(this.pages.length);
    this.pages.push(page);
    return page;
  }
}
