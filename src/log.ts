import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LABELS: Record<LogLevel, string> = {
  debug: chalk.gray('debug'),
  info: chalk.blue('info'),
  warn: chalk.yellow('warn'),
  error: chalk.red('error')
};

let quiet = false;
const debugEnabled = process.env.DEP5_COPYRIGHT_DEBUG === '1';

/**
 * Quiet mode drops debug, info and warn output. Errors are always written.
 */
export function setQuiet(value: boolean): void {
  quiet = value;
}

export function isEnabled(level: LogLevel): boolean {
  if (level === 'error') return true;
  if (quiet) return false;
  return level !== 'debug' || debugEnabled;
}

function write(level: LogLevel, message: string): void {
  if (!isEnabled(level)) return;
  console.error(`${LABELS[level]} ${message}`);
}

export const log = {
  debug: (message: string) => write('debug', message),
  info: (message: string) => write('info', message),
  warn: (message: string) => write('warn', message),
  error: (message: string) => write('error', message)
};
