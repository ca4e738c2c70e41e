/**
 * WorkingCopy.ts - Private scratch duplicate of an input
 *
 * All processing reads from the working copy; the original is only ever
 * read once, here. A copy whose size matches the source is reused, which is
 * what makes re-running after a crash cheap.
 */

import { createReadStream, createWriteStream } from 'fs';
import { mkdir, rename, rm } from 'fs/promises';
import { once } from 'events';
import { finished } from 'stream/promises';
import { basename, join } from 'path';
import { UsageError } from '../errors';
import type { Logger } from '../logging/Logger';
import { fileSize, partialPathFor } from '../output/files';
import type { ProgressListener, ProgressTick } from '../../shared/types';

const COPY_CHUNK_BYTES = 1024 * 1024;

/**
 * Copy `source` to `destination`, yielding the byte count after each chunk.
 */
export async function* copyWithProgress(source: string, destination: string): AsyncGenerator<ProgressTick> {
  const total = (await fileSize(source)) ?? undefined;
  const reader = createReadStream(source, { highWaterMark: COPY_CHUNK_BYTES });
  const writer = createWriteStream(destination);
  let processed = 0;

  try {
    for await (const chunk of reader) {
      if (!Buffer.isBuffer(chunk)) continue;
      if (!writer.write(chunk)) {
        await once(writer, 'drain');
      }
      processed += chunk.length;
      yield { unit: 'bytes', processed, total };
    }
    writer.end();
    await finished(writer);
  } catch (error) {
    writer.destroy();
    throw error;
  }
}

export interface WorkingCopyOptions {
  logger: Logger;
  onProgress?: ProgressListener;
}

/**
 * Make sure `<workDir>/<file name>` is a complete copy of `source`.
 * @returns Path of the working copy
 */
export async function establishWorkingCopy(
  source: string,
  workDir: string,
  options: WorkingCopyOptions,
): Promise<string> {
  const { logger } = options;
  const target = join(workDir, basename(source));
  await mkdir(workDir, { recursive: true });

  const sourceSize = await fileSize(source);
  if (sourceSize === null) {
    throw new UsageError(`Input file not found: ${source}`);
  }

  const existingSize = await fileSize(target);
  if (existingSize === sourceSize) {
    logger.info(`Reusing working copy with matching size: ${target}`);
    return target;
  }
  if (existingSize !== null) {
    logger.warn(`Working copy size mismatch (${existingSize} != ${sourceSize}), copying again: ${target}`);
    await rm(target, { force: true });
  }

  const partial = partialPathFor(target);
  logger.info(`Copying input to working directory: ${target}`);
  for await (const tick of copyWithProgress(source, partial)) {
    options.onProgress?.(basename(source), tick);
  }
  await rename(partial, target);
  return target;
}
