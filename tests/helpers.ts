import type { ScrapeConfig } from '../src/config.js';
import { createLogger } from '../src/logger.js';
import type { LogLevel, Logger } from '../src/logger.js';
import type { BrowserSession, ContextDriver, ElementRef, PageDriver } from '../src/scraper/session.js';
import type { ProfileSelectors, ReviewSelectors, SelectorConfig, SelectorList } from '../src/scraper/selectors.js';

// ── In-memory DOM ──

export interface FakeNode {
  text?: string;
  attrs?: Record<string, string>;
  children?: Record<string, FakeNode[]>;
  onClick?: (session: FakeSession) => void;
}

export type FakeElements = Record<string, FakeNode[]>;

export interface FakePage {
  /** Static elements, or a function read on every query for pages that change. */
  elements?: FakeElements | (() => FakeElements);
  /** Thrown from open(). */
  fail?: Error;
  /** URL the browser ends up on after open(). */
  redirect?: string;
  onScroll?: (session: FakeSession) => void;
}

export class FakeElement implements ElementRef {
  constructor(readonly node: FakeNode, private readonly session: FakeSession) {}

  async text(): Promise<string> {
    return this.node.text ?? '';
  }

  async attr(name: string): Promise<string | null> {
    return this.node.attrs?.[name] ?? null;
  }

  async find(selector: string): Promise<ElementRef | null> {
    const first = this.node.children?.[selector]?.[0];
    return first ? new FakeElement(first, this.session) : null;
  }

  async findAll(selector: string): Promise<ElementRef[]> {
    return (this.node.children?.[selector] ?? []).map(n => new FakeElement(n, this.session));
  }

  async click(): Promise<void> {
    this.node.onClick?.(this.session);
  }
}

/**
 * Browser session over a map of URL → page. Nothing waits: a selector
 * either matches the current page right away or never does.
 */
export class FakeSession implements BrowserSession {
  url = 'about:blank';
  page: FakePage = {};
  readonly visited: string[] = [];
  readonly clicks: string[] = [];
  readonly typed: Array<{ selector: string; value: string }> = [];
  readonly pauses: number[] = [];
  scrolls = 0;
  closed = false;

  constructor(readonly pages: Record<string, FakePage> = {}) {}

  /** Moves to a URL the way a redirect or a form submit would, without recording a visit. */
  goTo(url: string): void {
    this.url = url;
    this.page = this.pages[url] ?? {};
  }

  private elements(): FakeElements {
    const els = this.page.elements;
    if (!els) return {};
    return typeof els === 'function' ? els() : els;
  }

  private nodes(selector: string): FakeNode[] {
    return this.elements()[selector] ?? [];
  }

  async open(url: string): Promise<void> {
    this.visited.push(url);
    const page = this.pages[url];
    if (!page) throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    if (page.fail) throw page.fail;
    this.goTo(page.redirect ?? url);
  }

  currentUrl(): string {
    return this.url;
  }

  async waitForAny(selectors: SelectorList): Promise<string | null> {
    return selectors.find(s => this.nodes(s).length > 0) ?? null;
  }

  async find(selector: string): Promise<ElementRef | null> {
    const first = this.nodes(selector)[0];
    return first ? new FakeElement(first, this) : null;
  }

  async findAll(selector: string): Promise<ElementRef[]> {
    return this.nodes(selector).map(n => new FakeElement(n, this));
  }

  async count(selector: string): Promise<number> {
    return this.nodes(selector).length;
  }

  async click(selector: string): Promise<boolean> {
    const first = this.nodes(selector)[0];
    if (!first) return false;
    this.clicks.push(selector);
    first.onClick?.(this);
    return true;
  }

  async clickAll(selector: string): Promise<number> {
    const nodes = this.nodes(selector);
    for (const node of nodes) {
      this.clicks.push(selector);
      node.onClick?.(this);
    }
    return nodes.length;
  }

  async type(selector: string, value: string): Promise<void> {
    this.typed.push({ selector, value });
  }

  async scrollToBottom(): Promise<void> {
    this.scrolls++;
    this.page.onScroll?.(this);
  }

  async waitForUrl(fragment: string): Promise<boolean> {
    return this.url.includes(fragment);
  }

  async pause(ms: number): Promise<void> {
    this.pauses.push(ms);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// ── Playwright stand-ins ──

/** A page that matches nothing; override the calls a test cares about. */
export function fakePage(overrides: Partial<PageDriver> = {}): PageDriver {
  return {
    $: async () => null,
    $$: async () => [],
    addInitScript: async () => {},
    evaluate: async () => { throw new Error('evaluate is not scripted'); },
    goto: async () => null,
    locator: () => { throw new Error('locator is not scripted'); },
    url: () => 'about:blank',
    waitForTimeout: async () => {},
    waitForURL: async () => {},
    ...overrides,
  };
}

export class FakeContext implements ContextDriver {
  closed = false;

  constructor(private readonly makePage: () => Promise<PageDriver> = async () => fakePage()) {}

  newPage(): Promise<PageDriver> {
    return this.makePage();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// ── Logging ──

export interface CapturedLog {
  logger: Logger;
  entries: Array<Record<string, unknown>>;
}

export function captureLogger(level: LogLevel = 'debug'): CapturedLog {
  const entries: Array<Record<string, unknown>> = [];
  const logger = createLogger(level, {}, (_level, line) => {
    entries.push(JSON.parse(line));
  });
  return { logger, entries };
}

export const silentLogger: Logger = createLogger('error', {}, () => {});

// ── Settings ──

export const testConfig: ScrapeConfig = {
  pageTimeout: 1000,
  markerTimeout: 1000,
  searchTimeout: 1000,
  loginTimeout: 1000,
  requestDelay: 0,
  typingDelay: 0,
  maxLoadActions: 10,
  stallLimit: 2,
  maxReviews: 50,
  scraperRetries: 2,
  scraperRetryDelay: 0,
};

export const reviewSelectors: ReviewSelectors = {
  searchResult: ['a.result'],
  placeHeader: ['h1.place'],
  reviewsTab: ['button.reviews-tab'],
  moreReviews: ['button.more-reviews'],
  scrollContainer: ['div.feed'],
  expandText: ['button.expand'],
  item: ['div.review'],
  author: ['.author'],
  rating: ['.stars'],
  text: ['.text'],
  date: ['.date'],
  ownerResponse: ['.owner'],
  ownerResponseText: ['.owner-text'],
  ownerResponseDate: ['.owner-date'],
};

export const profileSelectors: ProfileSelectors = {
  loggedInMarker: ['img.me'],
  loginEmail: ['#username'],
  loginPassword: ['#password'],
  loginSubmit: ['button.sign-in'],
  companySearchResult: ['a.company'],
  peopleMarker: ['div.people'],
  showMore: ['button.show-more'],
  card: ['li.card'],
  cardLink: ['a.profile'],
  cardName: ['.name'],
  cardSubtitle: ['.subtitle'],
  profileHeader: ['h1.profile'],
  location: ['.location'],
  aboutExpand: ['button.about-more'],
  aboutText: ['.about'],
  latestJob: ['li.job'],
  latestJobTitle: ['.job-title'],
  latestJobCompany: ['.job-company'],
};

export const testSelectors: SelectorConfig = { reviews: reviewSelectors, profiles: profileSelectors };

// ── Page builders ──

export interface ReviewFixture {
  author?: string;
  rating?: string;
  text?: string;
  date?: string;
  owner?: { text: string; date?: string };
}

export function reviewNode(r: ReviewFixture): FakeNode {
  const children: Record<string, FakeNode[]> = {};
  if (r.author !== undefined) children['.author'] = [{ text: r.author }];
  if (r.rating !== undefined) children['.stars'] = [{ attrs: { 'aria-label': r.rating } }];
  if (r.text !== undefined) children['.text'] = [{ text: r.text }];
  if (r.date !== undefined) children['.date'] = [{ text: r.date }];
  if (r.owner) {
    const owner: Record<string, FakeNode[]> = { '.owner-text': [{ text: r.owner.text }] };
    if (r.owner.date !== undefined) owner['.owner-date'] = [{ text: r.owner.date }];
    children['.owner'] = [{ children: owner }];
  }
  return { children };
}

/** A complete review by `author`. */
export function rated(author: string, rating = '4 stars'): ReviewFixture {
  return { author, rating, text: `Visited with ${author}'s family.` };
}

/** A place page that search lands on directly, listing the given reviews. */
export function placePage(name: string, reviews: ReviewFixture[]): FakePage {
  return {
    elements: {
      'h1.place': [{ text: name }],
      'div.review': reviews.map(reviewNode),
    },
  };
}

export interface CardFixture {
  name?: string;
  href?: string;
  subtitle?: string;
}

export function cardNode(c: CardFixture): FakeNode {
  const children: Record<string, FakeNode[]> = {};
  if (c.href !== undefined) children['a.profile'] = [{ attrs: { href: c.href } }];
  if (c.name !== undefined) children['.name'] = [{ text: c.name }];
  if (c.subtitle !== undefined) children['.subtitle'] = [{ text: c.subtitle }];
  return { children };
}

export function personCard(i: number): FakeNode {
  return cardNode({ name: `Person ${i}`, href: `/in/person-${i}/?miniProfileUrn=x${i}`, subtitle: `Engineer ${i}` });
}

/**
 * A people page that renders `initial` cards and `perLoad` more on each
 * "show more" click, dropping the button once `total` cards are shown.
 */
export function growingPeoplePage(total: number, initial: number, perLoad: number): FakePage {
  let shown = initial;
  const button: FakeNode = {
    onClick: () => {
      shown = Math.min(total, shown + perLoad);
    },
  };
  return {
    elements: () => {
      const els: FakeElements = {
        'div.people': [{}],
        'li.card': Array.from({ length: shown }, (_, i) => personCard(i + 1)),
      };
      if (shown < total) els['button.show-more'] = [button];
      return els;
    },
  };
}
