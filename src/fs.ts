import fs from 'node:fs/promises';
import path from 'node:path';

export async function ensureDir(dir: string) {
  await fs.mkdir(dir, { recursive: true });
}

export async function pathExists(p: string) {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, 'utf-8');
}

/**
 * Replace `filePath` with `content` in one step: write a sibling temp file through an
 * explicitly opened handle, sync and close it on every path, then rename over the target.
 * A crash before the rename leaves the previous file intact.
 */
export async function writeTextAtomic(filePath: string, content: string) {
  await ensureDir(path.dirname(filePath));
  const tmp = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  const handle = await fs.open(tmp, 'w');
  try {
    await handle.writeFile(content, 'utf-8');
    await handle.sync();
  } catch (e) {
    await handle.close();
    await fs.rm(tmp, { force: true });
    throw e;
  }
  await handle.close();
  try {
    await fs.rename(tmp, filePath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown) {
  await writeTextAtomic(filePath, JSON.stringify(data, null, 2));
}

export async function appendJsonl(filePath: string, items: unknown[]): Promise<number> {
  if (items.length === 0) return 0;
  await ensureDir(path.dirname(filePath));
  const lines = items.map((x) => JSON.stringify(x)).join('\n') + '\n';
  await fs.appendFile(filePath, lines, 'utf-8');
  return items.length;
}

// Missing file reads as empty; blank lines are skipped
export async function readJsonlLines(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') return [];
    throw e;
  }
  return raw.split(/\r?\n/).filter((l) => l.trim().length > 0);
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}
