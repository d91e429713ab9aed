import path from 'path';
import { ECOSYSTEMS } from './constants';
import { errorMessage } from './errors';
import { formatCopyrightLine, normalizeLicense } from './format';
import { log } from './log';
import { runLicenseChecker } from './runners/licenseChecker';
import { isGradleProject, runGradleLicenseReport } from './runners/gradleLicenseReport';
import { findDotnetProjectFile, runNugetLicense } from './runners/nugetLicense';
import { isPythonProject, runPipLicenses } from './runners/pipLicenses';
import type { DependencyStanza, DiscoveredPackage, Ecosystem, Failure, LoadResult, ToolResult } from './types';
import { type CommandRunner, pathExists, runCommand } from './utils';

export interface LicenseAdapter {
  tool: string;
  installHint: string;
  // cheap filesystem check; a project the adapter does not apply to is skipped silently
  detect(projectPath: string): Promise<boolean>;
  discover(projectPath: string, run: CommandRunner): Promise<ToolResult<DiscoveredPackage[]>>;
}

export const ADAPTERS: Record<Ecosystem, LicenseAdapter> = {
  npm: {
    tool: 'license-checker',
    installHint: "Install it with 'npm install --save-dev license-checker'.",
    detect: (projectPath) => pathExists(path.join(projectPath, 'package.json')),
    discover: runLicenseChecker
  },
  pip: {
    tool: 'pip-licenses',
    installHint: "Install it into the project environment with 'pip install pip-licenses'.",
    detect: isPythonProject,
    discover: runPipLicenses
  },
  gradle: {
    tool: 'Gradle-License-Report',
    installHint: "Apply the 'com.github.jk1.dependency-license-report' plugin with a JsonReportRenderer('report.json') renderer.",
    detect: isGradleProject,
    discover: runGradleLicenseReport
  },
  nuget: {
    tool: 'nuget-license',
    installHint: "Install it with 'dotnet tool install --global nuget-license'.",
    detect: async (projectPath) => (await findDotnetProjectFile(projectPath)) !== undefined,
    discover: runNugetLicense
  }
};

export function toStanza(pkg: DiscoveredPackage, ecosystem: Ecosystem, tool: string): DependencyStanza {
  const stanza: DependencyStanza = {
    name: pkg.name,
    license: normalizeLicense(pkg.license),
    origin: `auto-${ecosystem}`,
    source: tool
  };
  const copyrightLine = formatCopyrightLine(pkg);
  if (copyrightLine !== undefined) stanza.copyrightLine = copyrightLine;
  if (pkg.version) stanza.version = pkg.version;
  return stanza;
}

export interface DiscoverOptions {
  projectPath: string;
  disabled: Record<Ecosystem, boolean>;
  run?: CommandRunner;
  adapters?: Record<Ecosystem, LicenseAdapter>;
}

/**
 * Runs every enabled adapter in ecosystem order. An adapter that fails
 * contributes no stanzas and one AdapterUnavailable failure.
 */
export async function discoverStanzas(options: DiscoverOptions): Promise<LoadResult> {
  const run = options.run ?? runCommand;
  const adapters = options.adapters ?? ADAPTERS;
  const stanzas: DependencyStanza[] = [];
  const failures: Failure[] = [];

  for (const ecosystem of ECOSYSTEMS) {
    const adapter = adapters[ecosystem];
    if (options.disabled[ecosystem]) {
      log.debug(`${adapter.tool} disabled.`);
      continue;
    }
    if (!(await adapter.detect(options.projectPath))) {
      log.debug(`No ${ecosystem} project found, skipping ${adapter.tool}.`);
      continue;
    }

    let result: ToolResult<DiscoveredPackage[]>;
    try {
      result = await adapter.discover(options.projectPath, run);
    } catch (err) {
      result = { ok: false, error: errorMessage(err) };
    }

    if (!result.ok || !result.data) {
      const message = result.error || 'unknown error';
      failures.push({ kind: 'AdapterUnavailable', ecosystem, message });
      log.warn(`Could not run ${adapter.tool}: ${message}. ${adapter.installHint}`);
      continue;
    }

    log.info(`${adapter.tool}: ${result.data.length} package${result.data.length === 1 ? '' : 's'} found.`);
    stanzas.push(...result.data.map((pkg) => toStanza(pkg, ecosystem, adapter.tool)));
  }

  return { stanzas, failures };
}
