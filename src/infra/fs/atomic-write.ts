/**
 * Crash-safe file replacement helpers.
 *
 * Content is written to a sibling temporary file first, so the target is
 * either the old or the new content, never a partial write.
 */

import { randomBytes } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

const tempPathFor = (target: string): string =>
  path.join(
    path.dirname(target),
    `.${path.basename(target)}.${String(process.pid)}.${randomBytes(6).toString('hex')}.tmp`
  );

/**
 * Replaces `target` with `data` (write temp, then rename over the target).
 */
export const writeFileAtomic = async (target: string, data: string | Uint8Array): Promise<void> => {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const tempPath = tempPathFor(target);

  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, target);
  } finally {
    await fs.rm(tempPath, { force: true });
  }
};

/**
 * Creates `target` with `data` only when it does not exist yet.
 * @returns false when another writer got there first
 */
export const createFileExclusive = async (
  target: string,
  data: string | Uint8Array
): Promise<boolean> => {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const tempPath = tempPathFor(target);

  try {
    await fs.writeFile(tempPath, data);
    // link() fails with EEXIST instead of replacing, unlike rename()
    await fs.link(tempPath, target);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
      return false;
    }
    throw error;
  } finally {
    await fs.rm(tempPath, { force: true });
  }
};

/**
 * Whether a path exists. Errors other than "not found" propagate.
 */
export const pathExists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};
