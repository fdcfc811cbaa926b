import { access, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { basename, dirname, join } from 'node:path';

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

export async function isReadableDirectory(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isDirectory()) return false;
    await access(path, constants.R_OK | constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readJson(file: string): Promise<unknown> {
  const buf = await readFile(file, 'utf8');
  // Generator output is sometimes written with a byte-order mark.
  return JSON.parse(buf.replace(/^\uFEFF/, ''));
}

export async function readText(file: string): Promise<string> {
  const buf = await readFile(file, 'utf8');
  return buf.replace(/^\uFEFF/, '');
}

export async function writeJson(file: string, data: unknown) {
  await ensureDir(dirname(file));
  await writeFile(file, JSON.stringify(data, null, 2), 'utf8');
}

let tempCounter = 0;

/** Full-file replace through a sibling temp file and rename. */
export async function writeJsonAtomic(file: string, data: unknown) {
  const dir = dirname(file);
  await ensureDir(dir);
  tempCounter += 1;
  const tmpPath = join(dir, `.${basename(file)}.${process.pid}.${tempCounter}.tmp`);
  try {
    await writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf8');
    await rename(tmpPath, file);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}
