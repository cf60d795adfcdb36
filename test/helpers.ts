import fs from 'fs-extra';
import os from 'os';
import path from 'path';

process.env.SYMTRAIL_LOG_LEVEL = 'silent';

/** Files are back-dated so a scan taken right after writing sees nothing as modified. */
export const FIXTURE_MTIME = new Date(Date.now() - 60 * 60 * 1000);

export async function createTempDir(prefix = 'symtrail-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.ensureDir(path.dirname(abs));
    await fs.writeFile(abs, content, 'utf-8');
    await fs.utimes(abs, FIXTURE_MTIME, FIXTURE_MTIME);
  }
}

export async function createProject(files: Record<string, string>): Promise<string> {
  const root = await createTempDir();
  await writeFiles(root, files);
  return root;
}

export async function removeProject(root: string): Promise<void> {
  await fs.remove(root);
}
