/**
 * Small filesystem helpers shared by the pipeline stages.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Size in bytes, or null when the path is missing or not a regular file.
 */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

/**
 * True when the file exists and is non-empty.
 */
export async function hasContent(filePath: string): Promise<boolean> {
  const size = await fileSize(filePath);
  return size !== null && size > 0;
}

export async function directoryExists(dir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Sibling path an operation writes to before it is renamed into place,
 * e.g. finals/Birthday.mp4 -> finals/Birthday.partial.mp4.
 */
export function partialPathFor(filePath: string): string {
  const ext = path.extname(filePath);
  return path.join(path.dirname(filePath), `${path.basename(filePath, ext)}.partial${ext}`);
}

export function isPartialPath(filePath: string): boolean {
  return /\.partial\.[^.]+$/.test(path.basename(filePath));
}

/**
 * Write through a temp file and rename, so readers never see a torn file.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, data, 'utf-8');
  await fs.rename(tempPath, filePath);
}

/**
 * Same path with a different extension.
 */
export function withExtension(filePath: string, ext: string): string {
  const current = path.extname(filePath);
  return path.join(path.dirname(filePath), `${path.basename(filePath, current)}${ext}`);
}
