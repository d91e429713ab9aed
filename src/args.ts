import { DEFAULT_OUTPUT_FILE_NAME, PROJECT_COPYRIGHT_FILE_NAME } from './constants';
import { UsageError } from './errors';
import type { Ecosystem } from './types';

export interface CliOptions {
  copyright: string;
  output: string;
  list: boolean;
  quiet: boolean;
  disabled: Record<Ecosystem, boolean>;
  help: boolean;
  version: boolean;
}

const DISABLE_FLAGS = new Map<string, Ecosystem>([
  ['--disable_npm', 'npm'],
  ['--disable_pip_licenses', 'pip'],
  ['--disable_gradle', 'gradle'],
  ['--disable_nuget_license', 'nuget']
]);

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {
    copyright: PROJECT_COPYRIGHT_FILE_NAME,
    output: DEFAULT_OUTPUT_FILE_NAME,
    list: false,
    quiet: false,
    disabled: { npm: false, pip: false, gradle: false, nuget: false },
    help: false,
    version: false
  };

  const args = [...argv];
  while (args.length) {
    const raw = args.shift();
    if (raw === undefined) break;

    // --output=path is accepted as well as --output path
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const arg = eq > 0 ? raw.slice(0, eq) : raw;
    const inline = eq > 0 ? raw.slice(eq + 1) : undefined;
    const value = (): string => {
      const next = inline ?? args.shift();
      if (next === undefined || next === '') throw new UsageError(`Option '${arg}' needs a path`);
      return next;
    };

    if (arg === '-i' || arg === '--input' || arg === '-c' || arg === '--copyright') opts.copyright = value();
    else if (arg === '-o' || arg === '--output') opts.output = value();
    else if (arg === '-l' || arg === '--list') opts.list = true;
    else if (arg === '-q' || arg === '--quiet') opts.quiet = true;
    else if (arg === '-h' || arg === '--help') opts.help = true;
    else if (arg === '-v' || arg === '--version') opts.version = true;
    else {
      const ecosystem = DISABLE_FLAGS.get(arg);
      if (!ecosystem) throw new UsageError(`Unknown option '${raw}'`);
      opts.disabled[ecosystem] = true;
    }
  }

  return opts;
}

export const HELP_TEXT = `dep5-copyright [options]

Generates a COPYRIGHT file in the Debian copyright format (DEP-5) from
.copyright_meta descriptors and package-manager license data.

Options:
  -i, --input <path>         Project copyright file (default: ${PROJECT_COPYRIGHT_FILE_NAME})
  -c, --copyright <path>     Alias of --input
  -o, --output <path>        Output file (default: ${DEFAULT_OUTPUT_FILE_NAME})
  -l, --list                 Print the distinct licenses instead of writing the output file
  --disable_npm              Skip license-checker (npm)
  --disable_pip_licenses     Skip pip-licenses (Python)
  --disable_gradle           Skip Gradle-License-Report
  --disable_nuget_license    Skip nuget-license (.NET)
  -q, --quiet                Only print errors
  -v, --version              Print the version
  -h, --help                 Show this help
`;
