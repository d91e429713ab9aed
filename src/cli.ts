#!/usr/bin/env node
import path from 'path';
import { type CliOptions, HELP_TEXT, parseArgs } from './args';
import { CopyrightError, UsageError, isFatalToRun } from './errors';
import { generate } from './generate';
import { log, setQuiet } from './log';
import { getToolVersion } from './utils';

async function run(): Promise<void> {
  let opts: CliOptions;
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    console.error(HELP_TEXT);
    process.exitCode = 2;
    return;
  }

  if (opts.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (opts.version) {
    console.log(getToolVersion());
    return;
  }
  setQuiet(opts.quiet);

  const projectPath = process.cwd();
  try {
    const result = await generate({
      projectPath,
      copyrightPath: path.resolve(projectPath, opts.copyright),
      outputPath: path.resolve(projectPath, opts.output),
      list: opts.list,
      disabled: opts.disabled
    });

    if (result.licenses) {
      result.licenses.forEach((license) => console.log(license));
    }
    const skipped = result.failures.filter(isFatalToRun).length;
    if (skipped > 0) {
      log.error(`${skipped} descriptor problem${skipped === 1 ? '' : 's'}; the output is incomplete.`);
    }
    process.exitCode = result.exitCode;
  } catch (err) {
    if (!(err instanceof CopyrightError)) throw err;
    log.error(err.message);
    process.exitCode = 1;
  }
}

run().catch((err: unknown) => {
  console.error('Failed to generate copyright file:', err);
  process.exitCode = 1;
});
