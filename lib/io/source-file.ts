// Source File I/O - Reads the input and writes the output atomically

import { randomBytes } from 'crypto';
import { chmod, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import { OutputWriteError, SourceReadError } from '../errors';

export async function readSource(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SourceReadError(filePath, error);
  }
}

/**
 * Write to a temporary file beside the destination and rename it into place.
 * An existing destination keeps its permission bits. On failure the
 * temporary file is removed and the destination is untouched.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString('hex')}.tmp`);

  try {
    const mode = await existingMode(filePath);
    await writeFile(tempPath, content, { encoding: 'utf-8', flag: 'wx' });
    if (mode !== undefined) {
      await chmod(tempPath, mode);
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new OutputWriteError(filePath, error);
  }
}

async function existingMode(filePath: string): Promise<number | undefined> {
  try {
    return (await stat(filePath)).mode & 0o7777;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}
