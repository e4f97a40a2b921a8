import type { Logger } from '../logger.js';
import type { ElementRef, QueryScope } from './session.js';
import type { SelectorList } from './selectors.js';

export type Lookup<T> =
  | { found: true; value: T; selector: string }
  | { found: false };

const NOT_FOUND = { found: false } as const;

/** First non-empty trimmed text among the selector candidates. */
export async function findText(scope: QueryScope, selectors: SelectorList): Promise<Lookup<string>> {
  for (const selector of selectors) {
    const el = await scope.find(selector);
    if (!el) continue;
    const value = (await el.text()).trim();
    if (value) return { found: true, value, selector };
  }
  return NOT_FOUND;
}

/** First non-empty trimmed attribute value among the selector candidates. */
export async function findAttr(scope: QueryScope, selectors: SelectorList, attr: string): Promise<Lookup<string>> {
  for (const selector of selectors) {
    const el = await scope.find(selector);
    if (!el) continue;
    const value = (await el.attr(attr))?.trim();
    if (value) return { found: true, value, selector };
  }
  return NOT_FOUND;
}

export async function findElement(scope: QueryScope, selectors: SelectorList): Promise<Lookup<ElementRef>> {
  for (const selector of selectors) {
    const el = await scope.find(selector);
    if (el) return { found: true, value: el, selector };
  }
  return NOT_FOUND;
}

/** Items of the first selector that has any; an empty list when none does. */
export async function findItems(scope: QueryScope, selectors: SelectorList): Promise<Lookup<ElementRef[]>> {
  for (const selector of selectors) {
    const items = await scope.findAll(selector);
    if (items.length > 0) return { found: true, value: items, selector };
  }
  return NOT_FOUND;
}

export function valueOr<T, D>(lookup: Lookup<T>, fallback: D): T | D {
  return lookup.found ? lookup.value : fallback;
}

/** Per-field miss tally for one extraction run. */
export class MissCounter {
  private readonly misses = new Map<string, number>();

  track<T>(field: string, lookup: Lookup<T>): Lookup<T> {
    if (!lookup.found) {
      this.misses.set(field, (this.misses.get(field) ?? 0) + 1);
    }
    return lookup;
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.misses);
  }

  get total(): number {
    let sum = 0;
    for (const n of this.misses.values()) sum += n;
    return sum;
  }
}

export interface ExtractionOutcome<R> {
  records: R[];
  containerFound: boolean;
  skipped: number;
  misses: Record<string, number>;
}

export type ItemParser<R> = (item: ElementRef, misses: MissCounter) => Promise<R | null>;

/**
 * Walks the repeating item containers and parses each one independently.
 * An item the parser rejects (null) is skipped without affecting its siblings.
 */
export async function extractItems<R>(
  scope: QueryScope,
  itemSelectors: SelectorList,
  parse: ItemParser<R>,
  opts: { limit?: number; log?: Logger } = {},
): Promise<ExtractionOutcome<R>> {
  const items = await findItems(scope, itemSelectors);
  if (!items.found) {
    opts.log?.warn('Item container not found', { selectors: itemSelectors });
    return { records: [], containerFound: false, skipped: 0, misses: {} };
  }

  const misses = new MissCounter();
  const records: R[] = [];
  let skipped = 0;
  const elements = opts.limit !== undefined ? items.value.slice(0, opts.limit) : items.value;

  for (const item of elements) {
    const record = await parse(item, misses);
    if (record === null) {
      skipped++;
    } else {
      records.push(record);
    }
  }

  if (misses.total > 0 || skipped > 0) {
    opts.log?.warn('Selector misses during extraction', {
      selector: items.selector,
      items: elements.length,
      skipped,
      misses: misses.toJSON(),
    });
  }

  return { records, containerFound: true, skipped, misses: misses.toJSON() };
}
