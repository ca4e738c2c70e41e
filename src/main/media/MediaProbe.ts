/**
 * MediaProbe.ts - Structured metadata via ffprobe
 *
 * Probing is advisory: callers that only need hints (frame rate for the
 * decoder, duration for progress) use `probeOrDefault`, which logs and
 * returns an all-null result instead of throwing.
 */

import { z } from 'zod';
import { ProbeError } from '../errors';
import type { Logger } from '../logging/Logger';
import { lastStderrLine, type ToolRunner } from './ToolRunner';

// ============================================================================
// Types
// ============================================================================

export interface MediaInfo {
  duration: number | null;
  width: number | null;
  height: number | null;
  frameRate: number | null;
  frameCount: number | null;
  sampleAspectRatio: string | null;
}

export const UNKNOWN_MEDIA: MediaInfo = {
  duration: null,
  width: null,
  height: null,
  frameRate: null,
  frameCount: null,
  sampleAspectRatio: null,
};

// ffprobe reports most numbers as strings
const numeric = z.union([z.number(), z.string()]).optional();

const probeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        width: z.number().optional(),
        height: z.number().optional(),
        sample_aspect_ratio: z.string().optional(),
        r_frame_rate: z.string().optional(),
        avg_frame_rate: z.string().optional(),
        nb_frames: numeric,
      }),
    )
    .default([]),
  format: z.object({ duration: numeric }).partial().default({}),
});

// ============================================================================
// Parsing helpers
// ============================================================================

function toPositiveNumber(value: number | string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

/**
 * Parse an ffprobe rational such as "30000/1001"; "0/0" yields null.
 */
export function parseRational(value: string | undefined): number | null {
  if (!value) return null;
  const [num, den] = value.split('/');
  if (den === undefined) return toPositiveNumber(num);
  const n = Number.parseFloat(num);
  const d = Number.parseFloat(den);
  if (!Number.isFinite(n) || !Number.isFinite(d) || d === 0) return null;
  const rate = n / d;
  return rate > 0 ? rate : null;
}

export function parseProbeOutput(stdout: string, target: string): MediaInfo {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new ProbeError('ffprobe returned invalid JSON', target, { cause: error });
  }

  const parsed = probeOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProbeError(`Unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'unknown'}`, target);
  }

  const stream = parsed.data.streams[0];
  const frameCount = toPositiveNumber(stream?.nb_frames);
  return {
    duration: toPositiveNumber(parsed.data.format.duration),
    width: stream?.width ?? null,
    height: stream?.height ?? null,
    frameRate: parseRational(stream?.avg_frame_rate) ?? parseRational(stream?.r_frame_rate),
    frameCount: frameCount === null ? null : Math.round(frameCount),
    sampleAspectRatio: stream?.sample_aspect_ratio ?? null,
  };
}

// ============================================================================
// MediaProbe Class
// ============================================================================

export class MediaProbe {
  constructor(
    private readonly tools: ToolRunner,
    private readonly ffprobePath: string,
    private readonly logger: Logger,
  ) {}

  /**
   * Probe the first video stream and the container duration.
   * @throws ProbeError when ffprobe fails or its output is unusable.
   */
  async probe(filePath: string): Promise<MediaInfo> {
    const result = await this.tools.run(this.ffprobePath, [
      '-v', 'error',
      '-select_streams', 'v:0',
      '-show_entries', 'format=duration:stream=width,height,sample_aspect_ratio,r_frame_rate,avg_frame_rate,nb_frames',
      '-of', 'json',
      filePath,
    ]);

    if (result.code !== 0) {
      throw new ProbeError(
        `ffprobe exited with code ${result.code}: ${lastStderrLine(result.stderr) || 'no output'}`,
        filePath,
      );
    }
    return parseProbeOutput(result.stdout, filePath);
  }

  async probeOrDefault(filePath: string): Promise<MediaInfo> {
    try {
      return await this.probe(filePath);
    } catch (error) {
      if (!(error instanceof ProbeError)) throw error;
      this.logger.warn(`Probe failed for ${filePath}, using defaults: ${error.message}`);
      return UNKNOWN_MEDIA;
    }
  }
}
