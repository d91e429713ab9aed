import path from 'path';
import { errorMessage } from '../errors';
import { scrapeLicenseFile } from '../licenseFile';
import type { DiscoveredPackage, ToolResult } from '../types';
import { type CommandRunner, isRecord, listFileNames, pathExists, stringField } from '../utils';

const PIP_LICENSES_ARGS = ['--with-authors', '--with-license-file', '--format=json'];

export interface PipLicensesEntry {
  name: string;
  version?: string;
  license?: string;
  author?: string;
  licenseFile?: string;
}

export async function isPythonProject(projectPath: string): Promise<boolean> {
  const names = await listFileNames(projectPath);
  return names.some((n) => n.startsWith('requirements') || n === 'Pipfile' || n === 'pyproject.toml' || path.extname(n) === '.py');
}

/**
 * Invocations to try, in order. Inside a Pipfile project everything runs
 * through `pipenv run` so the project's virtualenv is inspected.
 */
export async function pipLicensesCommands(projectPath: string): Promise<Array<[string, string[]]>> {
  const direct: Array<[string, string[]]> = [
    ['pip-licenses', PIP_LICENSES_ARGS],
    ['python3', ['-m', 'piplicenses', ...PIP_LICENSES_ARGS]],
    ['python', ['-m', 'piplicenses', ...PIP_LICENSES_ARGS]]
  ];
  if (!(await pathExists(path.join(projectPath, 'Pipfile')))) return direct;
  return direct.map(([command, args]): [string, string[]] => ['pipenv', ['run', command, ...args]]);
}

function unknownToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value === 'UNKNOWN' ? undefined : value;
}

export function parsePipLicensesOutput(data: unknown): PipLicensesEntry[] {
  if (!Array.isArray(data)) throw new Error('expected a JSON array of packages');
  const entries: PipLicensesEntry[] = [];
  for (const item of data) {
    if (!isRecord(item)) continue;
    const name = stringField(item, 'Name');
    if (!name) continue;
    entries.push({
      name,
      version: stringField(item, 'Version'),
      license: unknownToUndefined(stringField(item, 'License')),
      author: unknownToUndefined(stringField(item, 'Author')),
      licenseFile: unknownToUndefined(stringField(item, 'LicenseFile'))
    });
  }
  return entries;
}

export async function runPipLicenses(
  projectPath: string,
  run: CommandRunner
): Promise<ToolResult<DiscoveredPackage[]>> {
  const errors: string[] = [];
  for (const [command, args] of await pipLicensesCommands(projectPath)) {
    const label = [command, ...args.slice(0, args.indexOf(PIP_LICENSES_ARGS[0]))].join(' ');
    try {
      const result = await run(command, args, { cwd: projectPath });
      if (result.code !== 0) {
        errors.push(`${label} exited with code ${result.code}`);
        continue;
      }
      const entries = parsePipLicensesOutput(JSON.parse(result.stdout || '[]'));
      const packages: DiscoveredPackage[] = [];
      for (const entry of entries) {
        const scraped = entry.licenseFile ? await scrapeLicenseFile(entry.licenseFile) : {};
        packages.push({
          name: entry.name,
          version: entry.version,
          license: entry.license,
          author: entry.author,
          ...scraped
        });
      }
      return { ok: true, data: packages };
    } catch (err) {
      errors.push(`${label} failed: ${errorMessage(err)}`);
    }
  }
  return { ok: false, error: errors.join('; ') };
}
