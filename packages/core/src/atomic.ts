import writeFileAtomic from 'write-file-atomic';
import * as fs from 'fs';
import * as path from 'path';
import { BrdError } from './errors';

/**
 * Write a tracked file through a temp sibling and rename, creating the
 * parent directory when needed.
 */
export async function atomicWrite(filePath: string, data: string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, { encoding: 'utf8' });
  } catch (error) {
    throw BrdError.io(`atomic write failed: ${filePath}`, error);
  }
}

/**
 * Returns null when the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw BrdError.io(`failed to read ${filePath}`, error);
  }
}

/**
 * Leftovers of interrupted atomic writes: `<name>.<hash>` beside a tracked file.
 */
export function isStaleTempFile(fileName: string): boolean {
  return /\.(md|toml)\.[0-9a-f]+$/.test(fileName);
}
