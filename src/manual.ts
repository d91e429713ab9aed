import fsp from 'fs/promises';
import path from 'path';
import { LICENSE_FILE_PREFIXES, METADATA_FILE_NAME } from './constants';
import { errorMessage } from './errors';
import { formatCopyrightLine } from './format';
import { type KeyValueSection, firstSection, optionalValue, parseKeyValue } from './keyValue';
import { log } from './log';
import type { DependencyStanza, Failure, LoadResult } from './types';
import { isFile, isLicenseFileName, listFileNames, pathExists } from './utils';

type DescriptorOutcome = { ok: true; stanza: DependencyStanza } | { ok: false; failures: Failure[] };

export function parseDependencyDescriptor(text: string, file: string): DescriptorOutcome {
  let section: KeyValueSection;
  try {
    section = firstSection(parseKeyValue(text));
  } catch (err) {
    return { ok: false, failures: [{ kind: 'UnreadableDescriptor', file, message: errorMessage(err) }] };
  }

  const name = optionalValue(section, 'name');
  const license = optionalValue(section, 'license');
  const failures: Failure[] = [];
  if (name === undefined) failures.push({ kind: 'MissingRequiredField', file, field: 'name' });
  if (license === undefined) failures.push({ kind: 'MissingRequiredField', file, field: 'license' });
  if (name === undefined || license === undefined) return { ok: false, failures };

  const copyrightLine = formatCopyrightLine({
    copyright: optionalValue(section, 'copyright'),
    authorYear: optionalValue(section, 'author_year'),
    year: optionalValue(section, 'year'),
    author: optionalValue(section, 'author')
  });

  const stanza: DependencyStanza = {
    name: name.trim(),
    license: license.trim(),
    origin: 'manual',
    source: file
  };
  if (copyrightLine !== undefined) stanza.copyrightLine = copyrightLine;
  return { ok: true, stanza };
}

/**
 * Descriptor files in the third-party folder: `*.copyright_meta` files
 * directly inside it, and `<dependency>/.copyright_meta` files one level
 * down. Entries are taken in descending name order, the order the
 * generated files have always listed dependencies in, independent of how
 * the OS returns directory entries.
 */
export async function findDescriptorFiles(folder: string): Promise<string[]> {
  const entries = await fsp.readdir(folder, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(folder, entry.name);
    if (entry.isFile() && entry.name.endsWith(METADATA_FILE_NAME)) {
      files.push(fullPath);
      continue;
    }
    if (!entry.isDirectory()) continue;

    const metaFile = path.join(fullPath, METADATA_FILE_NAME);
    if (!(await isFile(metaFile))) {
      log.warn(`Folder '${fullPath}' has no '${METADATA_FILE_NAME}' file, skipping.`);
      continue;
    }
    const names = await listFileNames(fullPath);
    if (!names.some((n) => isLicenseFileName(n, LICENSE_FILE_PREFIXES))) {
      log.warn(`Folder '${fullPath}' does not contain a license file.`);
    }
    files.push(metaFile);
  }
  return files;
}

/**
 * The project's own `.copyright_meta`, when it has one. It describes the
 * project itself and is listed after every third-party descriptor.
 */
export async function findProjectDescriptorFile(projectPath: string): Promise<string | undefined> {
  const metaFile = path.join(projectPath, METADATA_FILE_NAME);
  if (!(await isFile(metaFile))) return undefined;
  const names = await listFileNames(projectPath);
  if (!names.some((n) => isLicenseFileName(n, LICENSE_FILE_PREFIXES))) {
    log.warn(`Folder '${path.resolve(projectPath)}' does not contain a license file.`);
  }
  return metaFile;
}

export async function loadManualStanzas(folder: string, projectPath?: string): Promise<LoadResult> {
  const stanzas: DependencyStanza[] = [];
  const failures: Failure[] = [];
  const seen = new Map<string, string>();

  const files: string[] = [];
  if (await pathExists(folder)) {
    try {
      files.push(...(await findDescriptorFiles(folder)));
    } catch (err) {
      failures.push({ kind: 'UnreadableDescriptor', file: folder, message: errorMessage(err) });
    }
  } else {
    log.warn(`Third-party folder '${path.resolve(folder)}' does not exist.`);
  }

  if (projectPath !== undefined) {
    const projectFile = await findProjectDescriptorFile(projectPath);
    // the third-party folder may be the project root itself
    if (projectFile !== undefined && !files.some((f) => path.resolve(f) === path.resolve(projectFile))) {
      files.push(projectFile);
    }
  }

  for (const file of files) {
    let text: string;
    try {
      text = await fsp.readFile(file, 'utf8');
    } catch (err) {
      failures.push({ kind: 'UnreadableDescriptor', file, message: errorMessage(err) });
      continue;
    }

    const outcome = parseDependencyDescriptor(text, file);
    if (!outcome.ok) {
      failures.push(...outcome.failures);
      continue;
    }

    const { stanza } = outcome;
    const firstFile = seen.get(stanza.name);
    if (firstFile !== undefined) {
      log.warn(`'${file}' declares '${stanza.name}' again (first declared in '${firstFile}'), ignoring it.`);
      continue;
    }
    seen.set(stanza.name, file);
    stanzas.push(stanza);
  }

  log.debug(`Loaded ${stanzas.length} descriptor(s) from '${folder}'.`);
  return { stanzas, failures };
}
