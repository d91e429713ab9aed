import fs from 'fs/promises';
import path from 'path';
import { DEP5_FORMAT_URL } from './constants';
import { OutputWriteError } from './errors';
import { continuationLines } from './format';
import type { DependencyStanza, ProjectDescriptor } from './types';

export function renderHeader(project: ProjectDescriptor): string[] {
  return [
    `Format: ${DEP5_FORMAT_URL}`,
    `Upstream-Name: ${project.upstreamName}`,
    `Upstream-Contact: ${project.upstreamContactName} <${project.upstreamContactEmail}>`,
    `Source: ${project.sourceUrl}`
  ];
}

export function renderStanza(stanza: DependencyStanza): string[] {
  const lines = ['Files: *', `Comment: ${continuationLines(stanza.name)}`];
  if (stanza.copyrightLine) lines.push(stanza.copyrightLine);
  lines.push(`License: ${continuationLines(stanza.license)}`);
  return lines;
}

/**
 * The whole DEP-5 document: header stanza, then one stanza per dependency
 * in the given order, blank-line separated.
 */
export function renderDocument(project: ProjectDescriptor, stanzas: DependencyStanza[]): string {
  const blocks = [renderHeader(project), ...stanzas.map(renderStanza)];
  return `${blocks.map((lines) => lines.join('\n')).join('\n\n')}\n`;
}

export function collectLicenses(stanzas: DependencyStanza[]): string[] {
  return Array.from(new Set(stanzas.map((s) => s.license)));
}

export async function writeDocument(outputPath: string, content: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, content, 'utf8');
  } catch (err) {
    throw new OutputWriteError(outputPath, err);
  }
}
