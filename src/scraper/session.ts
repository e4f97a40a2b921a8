import type { ElementHandle, Page } from 'playwright';
import { SessionError, isSessionFatal } from '../errors.js';
import type { SelectorList } from './selectors.js';

export interface QueryScope {
  find(selector: string): Promise<ElementRef | null>;
  findAll(selector: string): Promise<ElementRef[]>;
}

export interface ElementRef extends QueryScope {
  text(): Promise<string>;
  attr(name: string): Promise<string | null>;
  click(): Promise<void>;
}

/**
 * The capability set the scraping engine needs from a browser.
 * One session serves one batch; it is never shared between requests.
 */
export interface BrowserSession extends QueryScope {
  open(url: string, timeoutMs: number): Promise<void>;
  currentUrl(): string;
  /** Resolves to the first selector that matches, or null once the timeout passes. */
  waitForAny(selectors: SelectorList, timeoutMs: number): Promise<string | null>;
  count(selector: string): Promise<number>;
  /** Clicks the first match; false when nothing matches. */
  click(selector: string): Promise<boolean>;
  clickAll(selector: string): Promise<number>;
  type(selector: string, value: string, delayMs: number): Promise<void>;
  /** Scrolls the first existing container, or the window when none exists. */
  scrollToBottom(containers: SelectorList): Promise<void>;
  waitForUrl(fragment: string, timeoutMs: number): Promise<boolean>;
  pause(ms: number): Promise<void>;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<BrowserSession>;

/** The parts of a Playwright page the session drives. */
export type PageDriver = Pick<Page,
  '$' | '$$' | 'addInitScript' | 'evaluate' | 'goto' | 'locator' | 'url' | 'waitForTimeout' | 'waitForURL'>;

/** The parts of a Playwright browser context a session owns. */
export interface ContextDriver {
  newPage(): Promise<PageDriver>;
  close(): Promise<void>;
}

const POLL_INTERVAL_MS = 250;

async function guard<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isSessionFatal(err)) {
      throw new SessionError('Browser session is no longer usable', err);
    }
    throw err;
  }
}

class PlaywrightElement implements ElementRef {
  constructor(private readonly handle: ElementHandle) {}

  async text(): Promise<string> {
    return (await guard(() => this.handle.textContent())) ?? '';
  }

  async attr(name: string): Promise<string | null> {
    return guard(() => this.handle.getAttribute(name));
  }

  async find(selector: string): Promise<ElementRef | null> {
    const el = await guard(() => this.handle.$(selector));
    return el ? new PlaywrightElement(el) : null;
  }

  async findAll(selector: string): Promise<ElementRef[]> {
    const els = await guard(() => this.handle.$$(selector));
    return els.map(el => new PlaywrightElement(el));
  }

  async click(): Promise<void> {
    // A synthetic click is not intercepted by overlays covering the element
    await guard(() => this.handle.dispatchEvent('click'));
  }
}

export class PlaywrightSession implements BrowserSession {
  private constructor(
    private readonly context: ContextDriver,
    private readonly page: PageDriver,
  ) {}

  /** Opens a page in `context`; the context is closed again when page setup fails. */
  static async create(context: ContextDriver): Promise<PlaywrightSession> {
    try {
      const page = await context.newPage();
      await page.addInitScript(`
        Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
      `);
      return new PlaywrightSession(context, page);
    } catch (err) {
      await context.close();
      throw err;
    }
  }

  async open(url: string, timeoutMs: number): Promise<void> {
    await guard(() => this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' }));
  }

  currentUrl(): string {
    return this.page.url();
  }

  async waitForAny(selectors: SelectorList, timeoutMs: number): Promise<string | null> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      for (const selector of selectors) {
        if (await guard(() => this.page.$(selector))) return selector;
      }
      if (Date.now() >= deadline) return null;
      await this.pause(POLL_INTERVAL_MS);
    }
  }

  async find(selector: string): Promise<ElementRef | null> {
    const el = await guard(() => this.page.$(selector));
    return el ? new PlaywrightElement(el) : null;
  }

  async findAll(selector: string): Promise<ElementRef[]> {
    const els = await guard(() => this.page.$$(selector));
    return els.map(el => new PlaywrightElement(el));
  }

  async count(selector: string): Promise<number> {
    return guard(() => this.page.locator(selector).count());
  }

  async click(selector: string): Promise<boolean> {
    const el = await this.find(selector);
    if (!el) return false;
    await el.click();
    return true;
  }

  async clickAll(selector: string): Promise<number> {
    const els = await this.findAll(selector);
    for (const el of els) {
      await el.click();
    }
    return els.length;
  }

  async type(selector: string, value: string, delayMs: number): Promise<void> {
    await guard(() => this.page.locator(selector).first().pressSequentially(value, { delay: delayMs }));
  }

  async scrollToBottom(containers: SelectorList): Promise<void> {
    await guard(() => this.page.evaluate(`
      (() => {
        const selectors = ${JSON.stringify(containers)};
        for (const sel of selectors) {
          const el = document.querySelector(sel);
          if (el) {
            el.scrollTop = el.scrollHeight;
            return;
          }
        }
        window.scrollTo(0, document.body.scrollHeight);
      })()
    `));
  }

  async waitForUrl(fragment: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForURL(url => url.href.includes(fragment), { timeout: timeoutMs });
      return true;
    } catch (err) {
      if (isSessionFatal(err)) {
        throw new SessionError('Browser session is no longer usable', err);
      }
      return false;
    }
  }

  async pause(ms: number): Promise<void> {
    await guard(() => this.page.waitForTimeout(ms));
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}
