/**
 * Temp-then-rename file writes
 */

import { randomBytes } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { IoError } from '@mdd/contracts';

/**
 * Writes `content` to `path` through a temporary sibling
 * (`.{name}.{pid}.{random}.tmp`) renamed into place, creating parent
 * directories and replacing an existing file. Readers never see a partial
 * target file.
 *
 * @throws IoError carrying the target path
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  const tmp = join(dir, `.${basename(path)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`);

  let dirReady = false;
  try {
    await mkdir(dir, { recursive: true });
    dirReady = true;
    await writeFile(tmp, content, 'utf8');
    await rename(tmp, path);
  } catch (error) {
    if (dirReady) {
      await rm(tmp, { force: true });
    }
    const code = isErrnoException(error) ? error.code : undefined;
    throw new IoError(`Cannot write ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      path,
      code,
    });
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
