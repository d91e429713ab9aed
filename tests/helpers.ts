import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'dep5-copyright-'));
}

/**
 * Writes `files` (relative path -> content) under `root`, creating folders.
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf8');
  }
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const PROJECT_DESCRIPTOR = [
  'source_url = https://example.com/src/widget',
  'upstream_name = Widget',
  'upstream_contact_name = Sam Maintainer',
  'upstream_contact_email = sam@example.com',
  'thirdparty_folder_path = thirdparty',
  ''
].join('\n');
