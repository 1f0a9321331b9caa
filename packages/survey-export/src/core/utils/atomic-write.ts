/**
 * Atomic Write Utilities
 *
 * Every artifact the pipeline produces (page JSON, CSV, KML, merged JSON) is
 * written to a temporary sibling and renamed into place, so a failed write
 * never leaves a partial file under the final name.
 *
 * **Pattern:**
 * 1. Write to temporary file (unique name with PID to prevent conflicts)
 * 2. Rename temp file to target path (atomic operation on POSIX)
 * 3. Remove temp file on error
 */

import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'atomic-write' });

/**
 * Atomically write string data to file
 *
 * @param encoding - File encoding (default: 'utf-8')
 * @throws Error if write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/exports/wifi-search-1700000000/wifi-search-1700000000.csv', csv);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      // ENOENT here means the temp file was never created
      log.debug('Temp file cleanup skipped', {
        tempPath,
        reason: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 *
 * Compact by default; page files mirror the response body byte-for-byte
 * apart from whitespace.
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space?: number | string
): Promise<void> {
  const json = JSON.stringify(data, null, space);
  await atomicWriteFile(filePath, json, 'utf-8');
}
