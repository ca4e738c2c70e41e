/**
 * FrameSignalExtractor.ts - Per-frame colour descriptors via ffmpeg
 *
 * ffmpeg decodes the video, scales every frame down to a small thumbnail
 * and writes packed RGB24 to stdout. Frames are sliced off the byte stream
 * as they arrive and turned into histogram descriptors lazily, so a
 * multi-hour tape is never held in memory.
 */

import { stat } from 'fs/promises';
import { DecodeError } from '../errors';
import type { Logger } from '../logging/Logger';
import type { MediaProbe } from '../media/MediaProbe';
import { lastStderrLine, type ToolRunner } from '../media/ToolRunner';
import type { FrameDescriptor } from '../../shared/types';
import { computeHistogram } from './histogram';

// ============================================================================
// Types
// ============================================================================

export interface FrameSignalOptions {
  ffmpegPath: string;
  /** Used when the probe cannot tell the frame rate */
  defaultFrameRate: number;
  /** Thumbnail size the histogram is computed on (default 64x48) */
  width?: number;
  height?: number;
}

export interface FrameStream {
  videoPath: string;
  frameRate: number;
  /** Container duration when the probe knew it */
  probedDuration: number | null;
  descriptors: AsyncIterable<FrameDescriptor>;
}

const DEFAULT_WIDTH = 64;
const DEFAULT_HEIGHT = 48;

// ============================================================================
// FrameSignalExtractor Class
// ============================================================================

export class FrameSignalExtractor {
  private readonly width: number;
  private readonly height: number;

  constructor(
    private readonly tools: ToolRunner,
    private readonly probe: MediaProbe,
    private readonly options: FrameSignalOptions,
    private readonly logger: Logger,
  ) {
    this.width = options.width ?? DEFAULT_WIDTH;
    this.height = options.height ?? DEFAULT_HEIGHT;
  }

  /**
   * Validate the input and prepare a lazy descriptor stream.
   * @throws DecodeError for a missing, non-regular or empty file.
   */
  async open(videoPath: string): Promise<FrameStream> {
    let size: number;
    try {
      const stats = await stat(videoPath);
      if (!stats.isFile()) {
        throw new DecodeError('Not a regular file', videoPath);
      }
      size = stats.size;
    } catch (error) {
      if (error instanceof DecodeError) throw error;
      throw new DecodeError('Video file cannot be read', videoPath, { cause: error });
    }
    if (size === 0) {
      throw new DecodeError('Video file is empty (0 bytes)', videoPath);
    }

    const info = await this.probe.probeOrDefault(videoPath);
    let frameRate = info.frameRate;
    if (frameRate === null) {
      this.logger.warn(
        `Frame rate unknown for ${videoPath}, assuming ${this.options.defaultFrameRate} fps`,
      );
      frameRate = this.options.defaultFrameRate;
    }

    return {
      videoPath,
      frameRate,
      probedDuration: info.duration,
      descriptors: this.decode(videoPath, frameRate),
    };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async *decode(videoPath: string, frameRate: number): AsyncGenerator<FrameDescriptor> {
    const frameSize = this.width * this.height * 3;
    const { output, done } = this.tools.chunks(this.options.ffmpegPath, [
      '-hide_banner',
      '-loglevel', 'error',
      '-i', videoPath,
      '-an',
      '-vf', `scale=${this.width}:${this.height},format=rgb24`,
      '-pix_fmt', 'rgb24',
      '-f', 'rawvideo',
      '-',
    ]);

    this.logger.debug(`Decoding ${videoPath} at ${frameRate.toFixed(3)} fps`);

    let pending: Buffer = Buffer.alloc(0);
    let index = 0;

    for await (const chunk of output) {
      pending = pending.length === 0 ? chunk : Buffer.concat([pending, chunk]);
      let offset = 0;
      while (pending.length - offset >= frameSize) {
        const frame = pending.subarray(offset, offset + frameSize);
        offset += frameSize;
        yield {
          index,
          time: index / frameRate,
          histogram: computeHistogram(frame),
        };
        index++;
      }
      pending = pending.subarray(offset);
    }

    const exit = await done;
    if (exit.code !== 0) {
      throw new DecodeError(
        `ffmpeg decode exited with code ${exit.code}: ${lastStderrLine(exit.stderr) || 'no output'}`,
        videoPath,
      );
    }
    if (pending.length > 0) {
      this.logger.warn(`Discarded ${pending.length} trailing bytes of an incomplete frame`);
    }
    if (index === 0) {
      throw new DecodeError('No frames could be decoded', videoPath);
    }
    this.logger.debug(`Decoded ${index} frames from ${videoPath}`);
  }
}
