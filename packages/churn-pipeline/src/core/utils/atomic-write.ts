/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename: the target path holds either the old content or
 * the new content, never a partial file. The scoring process must never see
 * a half-written input table.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomBytes } from 'node:crypto';

/**
 * Atomically write string data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile(join(dir, 'customers.csv'), formatCsv(table));
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* temp file may never have been created */
    });
    throw error;
  }
}
