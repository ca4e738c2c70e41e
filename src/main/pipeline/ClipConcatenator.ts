/**
 * ClipConcatenator.ts - Join an operator folder into one lossless file
 *
 * Uses ffmpeg's concat demuxer with stream copy. Clips are joined in natural name
 * order, which is the order the materializer numbered them in.
 */

import { readdir, rename, rm, writeFile } from 'fs/promises';
import { extname, join } from 'path';
import { ConcatError } from '../errors';
import type { Logger } from '../logging/Logger';
import { lastStderrLine, type ToolRunner } from '../media/ToolRunner';
import { hasContent, isPartialPath, partialPathFor } from '../output/files';

export const CLIP_EXTENSION = '.mov';

const naturalOrder = new Intl.Collator('en', { numeric: true });

/**
 * Clip files directly inside `dir`, in natural name order (scene_99 before
 * scene_100).
 */
export async function listClips(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter(
      (entry) =>
        entry.isFile() &&
        extname(entry.name).toLowerCase() === CLIP_EXTENSION &&
        !isPartialPath(entry.name),
    )
    .map((entry) => entry.name)
    .sort(naturalOrder.compare)
    .map((name) => join(dir, name));
}

/**
 * Quote a path for a concat list: file '...' with ' written as '\''
 */
export function concatListLine(filePath: string): string {
  return `file '${filePath.replace(/'/g, "'\\''")}'`;
}

export class ClipConcatenator {
  constructor(
    private readonly tools: ToolRunner,
    private readonly ffmpegPath: string,
    private readonly logger: Logger,
  ) {}

  /**
   * Concatenate `clips` (absolute paths, already ordered) into `outputPath`.
   * @throws ConcatError when there is nothing to join or ffmpeg fails
   */
  async concat(clips: string[], outputPath: string): Promise<string> {
    if (clips.length === 0) {
      throw new ConcatError('No clips to concatenate', outputPath);
    }

    const partialPath = partialPathFor(outputPath);
    const listPath = `${outputPath}.list.txt`;
    await writeFile(listPath, clips.map(concatListLine).join('\n') + '\n', 'utf-8');

    this.logger.info(`Combining ${clips.length} clip(s) into ${outputPath}`);
    try {
      const result = await this.tools.run(this.ffmpegPath, [
        '-hide_banner',
        '-loglevel', 'error',
        '-f', 'concat',
        '-safe', '0',
        '-i', listPath,
        '-c', 'copy',
        '-y',
        partialPath,
      ]);

      if (result.code !== 0) {
        throw new ConcatError(
          `ffmpeg concat exited with code ${result.code}: ${lastStderrLine(result.stderr) || 'no output'}`,
          outputPath,
        );
      }
      if (!(await hasContent(partialPath))) {
        throw new ConcatError('ffmpeg concat produced no output', outputPath);
      }

      await rename(partialPath, outputPath);
      return outputPath;
    } catch (error) {
      await rm(partialPath, { force: true });
      throw error;
    } finally {
      await rm(listPath, { force: true });
    }
  }
}
