import fsp from 'fs/promises';
import type { CopyrightFields } from './types';

const COPYRIGHT_MARKER = /^(?:copyright\b|\(c\)|©|:|\s)+/i;
const EARLIEST_YEAR = 1900;

/**
 * Drops leading `Copyright`, `(c)`, `©` and `:` markers:
 * `Copyright (c) 2015 Jane Doe` becomes `2015 Jane Doe`.
 */
export function stripCopyrightMarker(text: string): string {
  return text.trim().replace(COPYRIGHT_MARKER, '').trim();
}

/**
 * Holder lines from a license text. Lines starting with "copyright" that
 * carry no year ("copyright notice", "copyright holders") are prose.
 */
export function extractCopyrightLines(text: string): string[] {
  const lines: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    if (!/^copyright\b/i.test(raw.trim())) continue;
    const holder = stripCopyrightMarker(raw);
    if (!/\d/.test(holder)) continue;
    lines.push(holder);
  }
  return lines;
}

/**
 * Four-digit years found anywhere in the text, as a `first-last` range.
 * Returns undefined when any candidate falls outside 1900..currentYear,
 * which usually means the numbers are not years at all.
 */
export function extractYearRange(text: string, currentYear = new Date().getFullYear()): string | undefined {
  const years = Array.from(text.matchAll(/(?<!\d)\d{4}(?!\d)/g), (m) => Number(m[0]));
  if (years.length === 0) return undefined;
  if (years.some((year) => year < EARLIEST_YEAR || year > currentYear)) return undefined;
  const first = Math.min(...years);
  const last = Math.max(...years);
  return first === last ? String(first) : `${first}-${last}`;
}

export async function scrapeLicenseFile(filePath: string): Promise<CopyrightFields> {
  const text = await fsp.readFile(filePath, 'utf8').catch(() => undefined);
  if (text === undefined) return {};
  const lines = extractCopyrightLines(text);
  if (lines.length) return { authorYear: lines.join(', ') };
  const year = extractYearRange(text);
  return year ? { year } : {};
}
