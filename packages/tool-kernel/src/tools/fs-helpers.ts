/**
 * Write paths shared by the file-producing tools. Each one is a distinct
 * approach a retry strategy can select.
 */

import { randomBytes } from 'node:crypto';
import { copyFile, mkdir, open, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

const siblingPath = (fullPath: string, tag: string): string =>
  join(
    dirname(fullPath),
    `.${basename(fullPath)}.${randomBytes(4).toString('hex')}.${tag}`,
  );

/** Plain string write. */
export async function writeText(
  fullPath: string,
  content: string,
  signal: AbortSignal,
): Promise<void> {
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content, { encoding: 'utf-8', signal });
}

/**
 * Encode to UTF-8 bytes up front and write them through a file handle,
 * flushing to disk before closing.
 */
export async function writeEncoded(
  fullPath: string,
  content: string,
): Promise<void> {
  await mkdir(dirname(fullPath), { recursive: true });
  const bytes = new TextEncoder().encode(content);
  const handle = await open(fullPath, 'w');
  try {
    await handle.writeFile(bytes);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Write a sibling temp file, then rename it over the target.
 * Replaces the directory entry, so it works where the target itself is
 * not writable but its directory is.
 */
export async function writeViaTempFile(
  fullPath: string,
  content: string,
): Promise<void> {
  await mkdir(dirname(fullPath), { recursive: true });
  const tmp = siblingPath(fullPath, 'tmp');
  try {
    await writeFile(tmp, content, 'utf-8');
    await rename(tmp, fullPath);
  } finally {
    await rm(tmp, { force: true });
  }
}

/**
 * Copy the current target aside, unlink it, write fresh, and copy the
 * original back if the write fails.
 */
export async function writeWithBackup(
  fullPath: string,
  content: string,
  exists: boolean,
): Promise<void> {
  await mkdir(dirname(fullPath), { recursive: true });
  if (!exists) {
    await writeFile(fullPath, content, 'utf-8');
    return;
  }

  const backup = siblingPath(fullPath, 'bak');
  await copyFile(fullPath, backup);
  try {
    await rm(fullPath, { force: true });
    await writeFile(fullPath, content, 'utf-8');
  } catch (err) {
    await copyFile(backup, fullPath);
    throw err;
  } finally {
    await rm(backup, { force: true });
  }
}

/** Move a path aside under a trash name inside the same directory. */
export async function moveAside(fullPath: string): Promise<string> {
  const trash = siblingPath(fullPath, 'trash');
  await rename(fullPath, trash);
  return trash;
}
