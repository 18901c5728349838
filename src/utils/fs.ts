import { access, mkdir, open, readFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname } from 'node:path';
import { GenerationWriteError } from '../errors.js';

export async function ensureDir(path: string) {
  await mkdir(path, { recursive: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readJson<T = unknown>(file: string): Promise<T> {
  const buf = await readFile(file, 'utf8');
  return JSON.parse(buf) as T;
}

/**
 * Writes `contents` through a file handle that is closed on every path.
 * Any failure surfaces as a GenerationWriteError naming the file.
 */
export async function writeTextFile(file: string, contents: string): Promise<void> {
  try {
    await ensureDir(dirname(file));
    const handle = await open(file, 'w');
    try {
      await handle.writeFile(contents, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  } catch (error) {
    throw new GenerationWriteError(file, { cause: error });
  }
}

export async function writeJson(file: string, data: unknown) {
  await writeTextFile(file, `${JSON.stringify(data, null, 2)}\n`);
}
