/**
 * SegmentMaterializer.ts - Lossless clip extraction via ffmpeg
 *
 * Writes one stream-copied file per segment, numbered in segment order:
 * <prefix>_01.mov, <prefix>_02.mov, ... A failed extraction stops the batch.
 * There is no retry here: extraction is cheap and deterministic and every
 * output is overwritten, so the caller simply reruns the whole batch.
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import { ExtractionError } from '../errors';
import type { Logger } from '../logging/Logger';
import { lastStderrLine, type ToolRunner } from '../media/ToolRunner';
import type { Segment } from '../../shared/types';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Seconds as an ffmpeg time argument, without float noise.
 */
export function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(6)));
}

/**
 * Clip numbers are padded to the width of the largest one (at least two
 * digits) so name order is segment order.
 */
export function clipNumberWidth(count: number): number {
  return Math.max(2, String(count).length);
}

export function clipFileName(prefix: string, index: number, width = 2): string {
  return `${prefix}_${String(index + 1).padStart(width, '0')}.mov`;
}

// ============================================================================
// SegmentMaterializer Class
// ============================================================================

export class SegmentMaterializer {
  constructor(
    private readonly tools: ToolRunner,
    private readonly ffmpegPath: string,
    private readonly logger: Logger,
  ) {}

  /**
   * Extract every segment of `input` into `outputDir`.
   *
   * @returns Output paths in segment order
   * @throws ExtractionError on the first segment ffmpeg fails on
   */
  async materialize(
    input: string,
    segments: Segment[],
    outputDir: string,
    prefix: string,
  ): Promise<string[]> {
    await mkdir(outputDir, { recursive: true });
    this.logger.info(`Extracting ${segments.length} segment(s) from ${input}`);

    const width = clipNumberWidth(segments.length);
    const outputs: string[] = [];
    for (let i = 0; i < segments.length; i++) {
      const { start, end } = segments[i];
      const outputPath = join(outputDir, clipFileName(prefix, i, width));

      // -ss before -i for fast input seeking; -t is a duration, not an end time
      const result = await this.tools.run(this.ffmpegPath, [
        '-hide_banner',
        '-loglevel', 'error',
        '-ss', formatSeconds(start),
        '-i', input,
        '-t', formatSeconds(end - start),
        '-c', 'copy',
        '-y',
        outputPath,
      ]);

      if (result.code !== 0) {
        throw new ExtractionError(
          `ffmpeg failed to extract segment ${i + 1} (${start.toFixed(3)}s-${end.toFixed(3)}s): ` +
            (lastStderrLine(result.stderr) || `exit code ${result.code}`),
          input,
          i,
        );
      }

      this.logger.debug(`Extracted segment ${i + 1}: ${start.toFixed(2)}s-${end.toFixed(2)}s -> ${outputPath}`);
      outputs.push(outputPath);
    }

    this.logger.info(`Extracted ${outputs.length} clip(s) into ${outputDir}`);
    return outputs;
  }
}
