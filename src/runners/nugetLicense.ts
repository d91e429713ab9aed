import path from 'path';
import { stripCopyrightMarker } from '../licenseFile';
import type { DiscoveredPackage, ToolResult } from '../types';
import { type CommandRunner, isRecord, listFileNames, stringField } from '../utils';

/**
 * The solution file if there is one, else the first project file.
 */
export async function findDotnetProjectFile(projectPath: string): Promise<string | undefined> {
  const names = (await listFileNames(projectPath)).sort();
  const match = names.find((n) => n.endsWith('.sln')) ?? names.find((n) => n.endsWith('.csproj'));
  return match ? path.join(projectPath, match) : undefined;
}

export function parseNugetLicenseOutput(data: unknown): DiscoveredPackage[] {
  if (!Array.isArray(data)) throw new Error('expected a JSON array of packages');
  const packages: DiscoveredPackage[] = [];
  for (const item of data) {
    if (!isRecord(item)) continue;
    const name = stringField(item, 'PackageId');
    if (!name) continue;
    const notice = stringField(item, 'Copyright');
    packages.push({
      name,
      version: stringField(item, 'PackageVersion'),
      license: stringField(item, 'License'),
      author: stringField(item, 'Authors'),
      copyright: notice ? stripCopyrightMarker(notice) || undefined : undefined
    });
  }
  return packages;
}

export async function runNugetLicense(
  projectPath: string,
  run: CommandRunner
): Promise<ToolResult<DiscoveredPackage[]>> {
  const projectFile = await findDotnetProjectFile(projectPath);
  if (!projectFile) return { ok: true, data: [] };
  try {
    const result = await run('nuget-license', ['-i', path.resolve(projectFile), '-o', 'jsonPretty'], { cwd: projectPath });
    if (result.code !== 0) {
      return { ok: false, error: `nuget-license exited with code ${result.code}` };
    }
    return { ok: true, data: parseNugetLicenseOutput(JSON.parse(result.stdout || '[]')) };
  } catch (err) {
    return { ok: false, error: `nuget-license failed: ${String(err)}` };
  }
}
