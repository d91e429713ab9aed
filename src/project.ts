import fsp from 'fs/promises';
import { DEFAULT_PROJECT_DESCRIPTOR } from './constants';
import { ProjectDescriptorError, errorMessage } from './errors';
import { type KeyValueSection, firstSection, optionalValue, parseKeyValue } from './keyValue';
import { log } from './log';
import type { ProjectDescriptor } from './types';
import { pathExists } from './utils';

export function parseProjectDescriptor(text: string, file: string): ProjectDescriptor {
  let section: KeyValueSection;
  try {
    section = firstSection(parseKeyValue(text));
  } catch (err) {
    throw new ProjectDescriptorError(file, `Could not parse '${file}': ${errorMessage(err)}`, undefined, { cause: err });
  }

  const required = (key: string): string => {
    const value = optionalValue(section, key);
    if (value === undefined) {
      throw new ProjectDescriptorError(file, `'${file}' is missing required field '${key}'`, key);
    }
    return value.trim();
  };

  return Object.freeze({
    sourceUrl: required('source_url'),
    upstreamName: required('upstream_name'),
    upstreamContactName: required('upstream_contact_name'),
    upstreamContactEmail: required('upstream_contact_email'),
    thirdpartyFolderPath: required('thirdparty_folder_path')
  });
}

/**
 * Loads the project descriptor. A missing file is first created from a
 * placeholder template so a new project has something to edit.
 */
export async function loadProjectDescriptor(file: string): Promise<ProjectDescriptor> {
  if (!(await pathExists(file))) {
    try {
      await fsp.writeFile(file, DEFAULT_PROJECT_DESCRIPTOR, 'utf8');
    } catch (err) {
      throw new ProjectDescriptorError(file, `Could not create '${file}': ${errorMessage(err)}`, undefined, { cause: err });
    }
    log.warn(`'${file}' did not exist; wrote a placeholder. Edit it before publishing the output.`);
  }

  let text: string;
  try {
    text = await fsp.readFile(file, 'utf8');
  } catch (err) {
    throw new ProjectDescriptorError(file, `Could not read '${file}': ${errorMessage(err)}`, undefined, { cause: err });
  }
  return parseProjectDescriptor(text, file);
}
