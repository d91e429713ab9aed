import path from 'path';
import { scrapeLicenseFile } from '../licenseFile';
import type { DiscoveredPackage, ToolResult } from '../types';
import { type CommandRunner, findBin, isRecord, stringField } from '../utils';

export interface LicenseCheckerEntry {
  name: string;
  version?: string;
  license?: string;
  publisher?: string;
  path?: string;
  licenseFile?: string;
}

/**
 * license-checker keys its output by `name@version`; scoped packages keep
 * their leading `@`.
 */
export function splitPackageKey(key: string): { name: string; version?: string } {
  const at = key.lastIndexOf('@');
  if (at <= 0) return { name: key };
  return { name: key.slice(0, at), version: key.slice(at + 1) || undefined };
}

export function parseLicenseCheckerOutput(data: unknown): LicenseCheckerEntry[] {
  if (!isRecord(data)) throw new Error('expected a JSON object keyed by package');
  const entries: LicenseCheckerEntry[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (!isRecord(value)) continue;
    const licenses = value.licenses;
    const license = Array.isArray(licenses)
      ? licenses.filter((l): l is string => typeof l === 'string').join(' AND ') || undefined
      : stringField(value, 'licenses');
    entries.push({
      ...splitPackageKey(key),
      license,
      publisher: stringField(value, 'publisher'),
      path: stringField(value, 'path'),
      licenseFile: stringField(value, 'licenseFile')
    });
  }
  return entries;
}

export async function runLicenseChecker(
  projectPath: string,
  run: CommandRunner
): Promise<ToolResult<DiscoveredPackage[]>> {
  const bin = findBin(projectPath, 'license-checker');
  try {
    const result = await run(bin, ['--json'], { cwd: projectPath });
    let entries: LicenseCheckerEntry[] | undefined;
    try {
      entries = parseLicenseCheckerOutput(JSON.parse(result.stdout || '{}'));
    } catch {
      entries = undefined;
    }
    if (!entries || (result.code && result.code !== 0)) {
      const error = result.code && result.code !== 0 ? `license-checker exited with code ${result.code}` : 'Failed to parse license-checker output';
      return { ok: false, error };
    }

    const root = path.resolve(projectPath);
    const packages: DiscoveredPackage[] = [];
    for (const entry of entries) {
      // the scanned project lists itself; the header stanza already covers it
      if (entry.path && path.resolve(entry.path) === root) continue;
      const scraped = entry.licenseFile ? await scrapeLicenseFile(entry.licenseFile) : {};
      packages.push({
        name: entry.name,
        version: entry.version,
        license: entry.license,
        author: entry.publisher,
        ...scraped
      });
    }
    return { ok: true, data: packages };
  } catch (err) {
    return { ok: false, error: `license-checker failed: ${String(err)}` };
  }
}
