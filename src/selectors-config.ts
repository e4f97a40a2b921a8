import { parse, stringify } from 'yaml';
import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import { config } from './config.js';
import { DEFAULT_SELECTORS } from './scraper/selectors.js';
import type { ProfileSelectors, ReviewSelectors, SelectorConfig, SelectorList } from './scraper/selectors.js';

const selectorValue = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);
const sectionSchema = z.record(selectorValue);
const overridesSchema = z.object({
  reviews: sectionSchema.optional(),
  profiles: sectionSchema.optional(),
}).strict();

export function getSelectorsPath(): string {
  return config.selectorsPath;
}

/**
 * Loads selector overrides from YAML and merges them over the defaults.
 * A missing file is not an error: the defaults are used as-is.
 */
export function loadSelectors(path?: string): SelectorConfig {
  const selectorsPath = path ?? getSelectorsPath();
  if (!existsSync(selectorsPath)) {
    return DEFAULT_SELECTORS;
  }
  const raw = readFileSync(selectorsPath, 'utf-8');
  return parseSelectorOverrides(raw);
}

export function parseSelectorOverrides(raw: string, base: SelectorConfig = DEFAULT_SELECTORS): SelectorConfig {
  const doc: unknown = parse(raw) ?? {};
  const result = overridesSchema.safeParse(doc);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new Error(`Invalid selectors config at ${where}: ${issue.message}`);
  }

  return {
    reviews: mergeSection('reviews', base.reviews, result.data.reviews),
    profiles: mergeSection('profiles', base.profiles, result.data.profiles),
  };
}

function mergeSection<S extends ReviewSelectors | ProfileSelectors>(
  name: string,
  defaults: S,
  overrides: Record<string, string | string[]> | undefined,
): S {
  if (!overrides) return defaults;
  const merged: Record<string, SelectorList> = {};
  for (const [field, value] of Object.entries(overrides)) {
    if (!(field in defaults)) {
      const known = Object.keys(defaults).join(', ');
      throw new Error(`Unknown selector "${name}.${field}". Known fields: ${known}`);
    }
    merged[field] = typeof value === 'string' ? [value] : value;
  }
  return { ...defaults, ...merged };
}

export function selectorsToYaml(selectors: SelectorConfig): string {
  return stringify(selectors);
}
