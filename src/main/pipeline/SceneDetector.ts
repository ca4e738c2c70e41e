/**
 * SceneDetector.ts - Scene-cut segmentation
 *
 * Turns a stream of frame descriptors into an ordered list of segments that
 * covers [0, duration) exactly:
 *
 *   1. Score every consecutive frame pair (1 - histogram correlation).
 *   2. A pair scoring above the high threshold is a cut candidate, timed at
 *      the later frame.
 *   3. Candidates are sorted, then walked: a candidate closes the open
 *      segment only when that segment would be at least minSceneLength long.
 *      Shorter candidates are treated as noise and dropped.
 *   4. The open segment always runs to the end, however short.
 *
 * The same pass also collects every pair above the low threshold, without
 * the minimum-length rule. That list is written to the audit trail only.
 */

import type { Logger } from '../logging/Logger';
import { silentLogger } from '../logging/Logger';
import { DecodeError } from '../errors';
import type {
  CutCandidate,
  FrameDescriptor,
  SceneDetectionResult,
  Segment,
} from '../../shared/types';
import { dissimilarity } from './histogram';

// ============================================================================
// Types
// ============================================================================

export interface SceneDetectionOptions {
  highThreshold: number;
  /** Minimum length of a closed segment in seconds (default 2.0) */
  minSceneLength?: number;
  /** Threshold for the diagnostic boundary list (default: no diagnostic list) */
  lowThreshold?: number;
  frameRate: number;
  /** Overrides frameCount / frameRate as the end of the last segment */
  totalDuration?: number;
  /** Name used in error messages */
  source?: string;
}

export const DEFAULT_MIN_SCENE_LENGTH = 2.0;

/** How many of the strongest candidates to log */
const TOP_CANDIDATES_LOGGED = 10;

// ============================================================================
// Candidate handling
// ============================================================================

/**
 * Sort candidates by time. Out-of-order input is reported, never trusted.
 */
export function sortCandidates(candidates: CutCandidate[], logger: Logger = silentLogger): CutCandidate[] {
  let outOfOrder = 0;
  for (let i = 1; i < candidates.length; i++) {
    if (candidates[i].time < candidates[i - 1].time) outOfOrder++;
  }
  if (outOfOrder > 0) {
    logger.warn(`${outOfOrder} cut candidate(s) arrived out of time order; sorting before use`);
  }
  return [...candidates].sort((a, b) => a.time - b.time || b.dissimilarity - a.dissimilarity);
}

/**
 * Merge sorted-or-unsorted candidate times into covering segments.
 */
export function buildSegments(
  candidates: CutCandidate[],
  totalDuration: number,
  minSceneLength: number = DEFAULT_MIN_SCENE_LENGTH,
  logger: Logger = silentLogger,
): Segment[] {
  if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
    throw new RangeError(`Total duration must be a positive number of seconds, got ${totalDuration}`);
  }

  const segments: Segment[] = [];
  let segmentStart = 0;

  for (const candidate of sortCandidates(candidates, logger)) {
    const time = candidate.time;
    if (!Number.isFinite(time)) {
      logger.warn(`Ignored candidate with invalid time ${time}`);
      continue;
    }
    if (time <= segmentStart) {
      logger.debug(`Ignored candidate at ${time.toFixed(3)}s: not after segment start ${segmentStart.toFixed(3)}s`);
      continue;
    }
    if (time >= totalDuration) {
      logger.debug(`Ignored candidate at ${time.toFixed(3)}s: at or past the end (${totalDuration.toFixed(3)}s)`);
      continue;
    }

    const length = time - segmentStart;
    if (length >= minSceneLength) {
      segments.push({ start: segmentStart, end: time });
      logger.debug(`Cut accepted: ${segmentStart.toFixed(3)}s -> ${time.toFixed(3)}s (${length.toFixed(3)}s)`);
      segmentStart = time;
    } else {
      logger.debug(`Ignored short candidate at ${time.toFixed(3)}s (${length.toFixed(3)}s)`);
    }
  }

  segments.push({ start: segmentStart, end: totalDuration });
  return segments;
}

/**
 * Boundaries above the low threshold, sorted and de-duplicated, no merging.
 */
export function buildDiagnosticBoundaries(candidates: CutCandidate[]): CutCandidate[] {
  const boundaries: CutCandidate[] = [];
  for (const candidate of [...candidates].sort((a, b) => a.time - b.time)) {
    const previous = boundaries[boundaries.length - 1];
    if (previous && previous.time === candidate.time) {
      previous.dissimilarity = Math.max(previous.dissimilarity, candidate.dissimilarity);
      continue;
    }
    boundaries.push({ ...candidate });
  }
  return boundaries;
}

/**
 * Check the covering invariant: ordered, contiguous, non-empty ranges
 * spanning exactly [0, totalDuration).
 */
export function isCovering(segments: Segment[], totalDuration: number): boolean {
  if (segments.length === 0) return false;
  if (segments[0].start !== 0) return false;
  if (segments[segments.length - 1].end !== totalDuration) return false;
  return segments.every(
    (segment, i) => segment.start < segment.end && (i === 0 || segments[i - 1].end === segment.start),
  );
}

// ============================================================================
// Detection
// ============================================================================

/**
 * Run both threshold passes over one descriptor stream.
 * @throws DecodeError when the stream yields no frames.
 */
export async function detectScenes(
  descriptors: AsyncIterable<FrameDescriptor> | Iterable<FrameDescriptor>,
  options: SceneDetectionOptions,
  logger: Logger = silentLogger,
): Promise<SceneDetectionResult> {
  const minSceneLength = options.minSceneLength ?? DEFAULT_MIN_SCENE_LENGTH;
  const source = options.source ?? 'frame stream';

  const candidates: CutCandidate[] = [];
  const lowCandidates: CutCandidate[] = [];
  let previous: FrameDescriptor | null = null;
  let frameCount = 0;
  let nonMonotonic = 0;

  for await (const descriptor of descriptors) {
    frameCount++;
    if (previous !== null) {
      if (descriptor.time < previous.time) {
        nonMonotonic++;
        logger.warn(
          `Non-monotonic timestamp at frame ${descriptor.index}: ${descriptor.time.toFixed(3)}s < ${previous.time.toFixed(3)}s`,
        );
      }
      const score = dissimilarity(previous.histogram, descriptor.histogram);
      if (score > options.highThreshold) {
        candidates.push({ time: descriptor.time, dissimilarity: score });
      }
      if (options.lowThreshold !== undefined && score > options.lowThreshold) {
        lowCandidates.push({ time: descriptor.time, dissimilarity: score });
      }
    }
    previous = descriptor;
  }

  if (frameCount === 0) {
    throw new DecodeError('No frames to analyze', source);
  }
  if (nonMonotonic > 0) {
    logger.warn(`${nonMonotonic} non-monotonic timestamp(s) in ${source}`);
  }

  const totalDuration = options.totalDuration ?? frameCount / options.frameRate;
  const sorted = sortCandidates(candidates, logger);
  const segments = buildSegments(sorted, totalDuration, minSceneLength, logger);

  logger.info(
    `${frameCount} frames, ${sorted.length} candidate(s) above ${options.highThreshold}, ${segments.length} segment(s)`,
  );
  logTopCandidates(sorted, logger);

  return {
    segments,
    candidates: sorted,
    diagnosticBoundaries: buildDiagnosticBoundaries(lowCandidates),
    totalDuration,
    frameCount,
    frameRate: options.frameRate,
  };
}

function logTopCandidates(candidates: CutCandidate[], logger: Logger): void {
  if (candidates.length === 0) return;
  const top = [...candidates]
    .sort((a, b) => b.dissimilarity - a.dissimilarity)
    .slice(0, TOP_CANDIDATES_LOGGED);
  logger.debug('Strongest candidates:');
  for (const { time, dissimilarity: score } of top) {
    logger.debug(`  ${time.toFixed(3)}s  diff=${score.toFixed(4)}`);
  }
}
