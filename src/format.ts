import { UNKNOWN_LICENSE } from './constants';
import type { CopyrightFields } from './types';

const COPYRIGHT_PREFIX = 'Copyright: ';

type CopyrightRule = (fields: CopyrightFields) => string | undefined;

function present(value: string | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Multi-line values as DEP-5 field text: continuation lines start with a
 * single space and an empty line is written as `.`.
 */
export function continuationLines(value: string): string {
  return value
    .split('\n')
    .map((line) => line.trim() || '.')
    .join('\n ');
}

// Descriptors may also carry literal `\n` escapes.
function toFieldText(value: string): string {
  return continuationLines(value.replace(/\\n/g, '\n'));
}

// Highest precedence first. The first rule that yields a line wins; lower
// fields are ignored even when set.
const COPYRIGHT_RULES: readonly CopyrightRule[] = [
  ({ copyright }) => {
    if (!present(copyright)) return undefined;
    const text = toFieldText(copyright.trim());
    return text.startsWith(COPYRIGHT_PREFIX) ? text : `${COPYRIGHT_PREFIX}${text}`;
  },
  ({ authorYear }) => (present(authorYear) ? `${COPYRIGHT_PREFIX}${toFieldText(authorYear.trim())}` : undefined),
  ({ year, author }) => {
    const parts = [year, author].filter(present).map((part) => part.trim());
    return parts.length ? `${COPYRIGHT_PREFIX}${toFieldText(parts.join(' '))}` : undefined;
  }
];

export function formatCopyrightLine(fields: CopyrightFields): string | undefined {
  for (const rule of COPYRIGHT_RULES) {
    const line = rule(fields);
    if (line !== undefined) return line;
  }
  return undefined;
}

export function normalizeLicense(license: string | undefined): string {
  return present(license) ? license.trim() : UNKNOWN_LICENSE;
}
