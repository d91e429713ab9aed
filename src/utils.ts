import { spawn } from 'child_process';
import fs, { type Dirent } from 'fs';
import fsp from 'fs/promises';
import path from 'path';

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number | null;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string }
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      shell: false
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout.on('data', (d) => stdoutChunks.push(Buffer.from(d)));
    child.stderr.on('data', (d) => stderrChunks.push(Buffer.from(d)));

    child.on('error', (err) => reject(err));
    child.on('close', (code) => {
      resolve({
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        code
      });
    });
  });
};

export function getToolVersion(): string {
  try {
    const pkgPath = path.join(__dirname, '..', 'package.json');
    const raw = fs.readFileSync(pkgPath, 'utf8');
    const pkg: unknown = JSON.parse(raw);
    return (isRecord(pkg) && stringField(pkg, 'version')) || 'unknown';
  } catch {
    return 'unknown';
  }
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fsp.access(target);
    return true;
  } catch {
    return false;
  }
}

export async function isFile(target: string): Promise<boolean> {
  const stat = await fsp.stat(target).catch(() => undefined);
  return Boolean(stat && stat.isFile());
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fsp.readFile(filePath, 'utf8');
  return JSON.parse(raw);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

export async function listFileNames(dir: string): Promise<string[]> {
  const entries = await fsp.readdir(dir, { withFileTypes: true }).catch((): Dirent[] => []);
  return entries.filter((e) => e.isFile()).map((e) => e.name);
}

export function findBin(projectPath: string, binName: string): string {
  const ext = process.platform === 'win32' ? '.cmd' : '';
  const candidates = [
    path.join(projectPath, 'node_modules', '.bin', `${binName}${ext}`),
    path.join(__dirname, '..', 'node_modules', '.bin', `${binName}${ext}`),
    `${binName}${ext}`
  ];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) return candidate;
  }
  return candidates[candidates.length - 1];
}

export function isLicenseFileName(fileName: string, prefixes: readonly string[]): boolean {
  const lower = fileName.toLowerCase();
  return prefixes.some((prefix) => lower.startsWith(prefix));
}
