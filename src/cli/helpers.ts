import type { Config } from '../config.js';
import type { BrowserConfig } from '../scraper/browser.js';
import type { BrowserBackend } from '../types/index.js';

export function isJsonMode(opts: { json?: boolean }): boolean {
  return opts.json === true || !process.stdout.isTTY;
}

export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function outputTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => (r[i] ?? '').length))
  );
  const sep = widths.map(w => '─'.repeat(w + 2)).join('┼');

  const fmtRow = (cells: string[]) =>
    cells.map((c, i) => ` ${(c ?? '').padEnd(widths[i])} `).join('│');

  console.log(fmtRow(headers));
  console.log(sep);
  for (const row of rows) {
    console.log(fmtRow(row));
  }
}

export function truncate(s: string | null, max: number): string {
  if (!s) return '';
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + '…';
}

export interface BrowserOptions {
  backend?: string;
  browserUrl?: string;
}

export function parseBackendOption(value: string): BrowserBackend {
  if (value !== 'playwright' && value !== 'remote') {
    throw new Error(`Unknown browser backend "${value}". Must be: playwright, remote`);
  }
  return value;
}

/** Browser settings from config with command-line overrides applied. */
export function browserConfigFrom(cfg: Config, opts: BrowserOptions): BrowserConfig {
  return {
    browserBackend: opts.backend ? parseBackendOption(opts.backend) : cfg.browserBackend,
    browserWsUrl: opts.browserUrl ?? cfg.browserWsUrl,
    browserHeadless: cfg.browserHeadless,
    browserLocale: cfg.browserLocale,
  };
}

export function parsePositiveInt(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}
