/**
 * DeliveryTranscoder.ts - Playback-optimized HEVC renders
 *
 * Renders a lossless clip into the delivery format (H.265 in MP4, tagged
 * hvc1, AAC audio) scaled to the operator's geometry preset. Each render
 * is attempted a bounded number of times; an attempt only counts when
 * ffmpeg exits 0 AND the output exists with a non-zero size. ffmpeg writes
 * to a ".partial" sibling that is renamed on success, so an interrupted
 * render never looks finished.
 */

import { rename, rm } from 'fs/promises';
import { basename } from 'path';
import { TranscodeError } from '../errors';
import type { Logger } from '../logging/Logger';
import type { MediaProbe } from '../media/MediaProbe';
import { parseProgress } from '../media/progress';
import { lastStderrLine, type ToolExit, type ToolRunner } from '../media/ToolRunner';
import { hasContent, partialPathFor, withExtension } from '../output/files';
import type { GeometryPreset, ProgressListener, ProgressTick } from '../../shared/types';
import { withRetry } from './retry';

// ============================================================================
// Presets
// ============================================================================

export const GEOMETRY_DIMENSIONS: Record<GeometryPreset, { width: number; height: number }> = {
  '4:3': { width: 640, height: 480 },
  'anamorphic-16:9': { width: 854, height: 480 },
};

export const DELIVERY_EXTENSION = '.mp4';

export function deliveryPathFor(inputPath: string): string {
  return withExtension(inputPath, DELIVERY_EXTENSION);
}

export function buildTranscodeArgs(input: string, output: string, preset: GeometryPreset): string[] {
  const { width, height } = GEOMETRY_DIMENSIONS[preset];
  return [
    '-hide_banner',
    '-i', input,
    '-vf', `scale=${width}:${height}`,
    '-c:v', 'libx265',
    '-pix_fmt', 'yuv420p',
    '-tag:v', 'hvc1',
    '-crf', '23',
    '-preset', 'slow',
    '-c:a', 'aac',
    '-b:a', '192k',
    '-progress', 'pipe:1',
    '-nostats',
    '-y',
    output,
  ];
}

// ============================================================================
// Types
// ============================================================================

export interface DeliveryTranscoderOptions {
  ffmpegPath: string;
  attempts: number;
}

export interface TranscodeResult {
  outputPath: string;
  attempts: number;
}

// ============================================================================
// DeliveryTranscoder Class
// ============================================================================

export class DeliveryTranscoder {
  constructor(
    private readonly tools: ToolRunner,
    private readonly probe: MediaProbe,
    private readonly options: DeliveryTranscoderOptions,
    private readonly logger: Logger,
    private readonly onProgress: ProgressListener = () => {},
  ) {}

  /**
   * One render attempt. Yields progress as ffmpeg reports it and returns
   * ffmpeg's exit once the stream ends.
   */
  async *render(
    input: string,
    output: string,
    preset: GeometryPreset,
    duration?: number,
  ): AsyncGenerator<ProgressTick, ToolExit> {
    const { output: lines, done } = this.tools.lines(
      this.options.ffmpegPath,
      buildTranscodeArgs(input, output, preset),
    );
    yield* parseProgress(lines, duration);
    return await done;
  }

  /**
   * Render `input` to `outputPath` with bounded retries.
   * @throws TranscodeError once every attempt has failed
   */
  async transcode(
    input: string,
    preset: GeometryPreset,
    outputPath: string = deliveryPathFor(input),
  ): Promise<TranscodeResult> {
    const partialPath = partialPathFor(outputPath);
    const info = await this.probe.probeOrDefault(input);
    const duration = info.duration ?? undefined;
    const label = basename(outputPath);

    const outcome = await withRetry(
      async (attempt) => {
        this.logger.info(`Rendering ${label} (attempt ${attempt}/${this.options.attempts})`);
        await rm(partialPath, { force: true });
        const ticks = this.render(input, partialPath, preset, duration);
        let step = await ticks.next();
        while (!step.done) {
          this.onProgress(label, step.value);
          step = await ticks.next();
        }
        return step.value;
      },
      {
        attempts: this.options.attempts,
        validate: async (exit) => exit.code === 0 && (await hasContent(partialPath)),
        describeInvalid: (exit) =>
          exit.code !== 0
            ? `ffmpeg exited with code ${exit.code}: ${lastStderrLine(exit.stderr) || 'no output'}`
            : 'ffmpeg exited cleanly but the output is missing or empty',
        onAttemptFailed: ({ attempt, attempts, reason }) => {
          const level = attempt < attempts ? 'warn' : 'error';
          this.logger[level](`transcode ${input} attempt ${attempt}/${attempts} failed: ${reason}`);
        },
      },
    );

    if (!outcome.ok) {
      await rm(partialPath, { force: true });
      throw new TranscodeError(
        `Delivery render failed after ${outcome.attempts} attempt(s): ${outcome.reason}`,
        input,
        outcome.attempts,
        { cause: outcome.error },
      );
    }

    await rename(partialPath, outputPath);
    this.logger.info(`Created delivery render: ${outputPath}`);
    return { outputPath, attempts: outcome.attempts };
  }
}
