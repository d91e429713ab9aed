import path from 'path';
import type { DiscoveredPackage, ToolResult } from '../types';
import { type CommandRunner, isFile, isRecord, readJsonFile, stringField } from '../utils';

// Written by the Gradle-License-Report plugin's JsonReportRenderer.
export const GRADLE_REPORT_PATH = path.join('build', 'reports', 'dependency-license', 'report.json');

export function gradleWrapperPath(projectPath: string): string {
  return path.join(projectPath, process.platform === 'win32' ? 'gradlew.bat' : 'gradlew');
}

export async function isGradleProject(projectPath: string): Promise<boolean> {
  return isFile(gradleWrapperPath(projectPath));
}

export function parseGradleLicenseReport(data: unknown): DiscoveredPackage[] {
  if (!isRecord(data) || !Array.isArray(data.dependencies)) {
    throw new Error("report has no 'dependencies' list");
  }
  const packages: DiscoveredPackage[] = [];
  for (const item of data.dependencies) {
    if (!isRecord(item)) continue;
    const name = stringField(item, 'moduleName');
    if (!name) continue;
    packages.push({
      name,
      version: stringField(item, 'moduleVersion'),
      license: stringField(item, 'moduleLicense')
    });
  }
  return packages;
}

export async function runGradleLicenseReport(
  projectPath: string,
  run: CommandRunner
): Promise<ToolResult<DiscoveredPackage[]>> {
  const wrapper = gradleWrapperPath(projectPath);
  const reportFile = path.join(projectPath, GRADLE_REPORT_PATH);
  try {
    const result = await run(wrapper, ['generateLicenseReport'], { cwd: projectPath });
    if (result.code !== 0) {
      return { ok: false, error: `gradlew generateLicenseReport exited with code ${result.code}`, file: reportFile };
    }
    if (!(await isFile(reportFile))) {
      return {
        ok: false,
        error: `No report at '${reportFile}'; add JsonReportRenderer('report.json') to the licenseReport renderers`,
        file: reportFile
      };
    }
    const packages = parseGradleLicenseReport(await readJsonFile(reportFile));
    return { ok: true, data: packages, file: reportFile };
  } catch (err) {
    return { ok: false, error: `gradle license report failed: ${String(err)}`, file: reportFile };
  }
}
