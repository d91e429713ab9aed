import path from 'path';
import { type LicenseAdapter, discoverStanzas } from './adapters';
import { mergeStanzas } from './aggregator';
import { describeFailure, isFatalToRun } from './errors';
import { log } from './log';
import { loadManualStanzas } from './manual';
import { loadProjectDescriptor } from './project';
import { collectLicenses, renderDocument, writeDocument } from './report';
import type { DependencyStanza, Ecosystem, Failure, GenerateOptions } from './types';
import type { CommandRunner } from './utils';

export interface GenerateResult {
  stanzas: DependencyStanza[];
  failures: Failure[];
  // list mode only
  licenses?: string[];
  exitCode: 0 | 1;
}

export interface GenerateDeps {
  run?: CommandRunner;
  adapters?: Record<Ecosystem, LicenseAdapter>;
}

/**
 * load -> discover -> merge -> render. Throws only for fatal errors (bad
 * project descriptor, output not writable); per-descriptor and per-adapter
 * problems are collected in `failures`.
 */
export async function generate(options: GenerateOptions, deps: GenerateDeps = {}): Promise<GenerateResult> {
  const project = await loadProjectDescriptor(options.copyrightPath);
  const thirdpartyPath = path.resolve(options.projectPath, project.thirdpartyFolderPath);

  const manual = await loadManualStanzas(thirdpartyPath, options.projectPath);
  manual.failures.forEach((failure) => log.error(describeFailure(failure)));

  const discovered = await discoverStanzas({
    projectPath: options.projectPath,
    disabled: options.disabled,
    run: deps.run,
    adapters: deps.adapters
  });

  const stanzas = mergeStanzas(manual.stanzas, discovered.stanzas);
  const failures = [...manual.failures, ...discovered.failures];
  const exitCode = failures.some(isFatalToRun) ? 1 : 0;

  if (options.list) {
    return { stanzas, failures, licenses: collectLicenses(stanzas), exitCode };
  }

  await writeDocument(options.outputPath, renderDocument(project, stanzas));
  log.info(`Wrote ${stanzas.length} stanza${stanzas.length === 1 ? '' : 's'} to ${options.outputPath}`);
  return { stanzas, failures, exitCode };
}
