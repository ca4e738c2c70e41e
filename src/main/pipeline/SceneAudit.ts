/**
 * SceneAudit.ts - Audit trail for a detection run
 *
 * Writes, per input stem, into the analysis directory:
 *   <stem>_scenes.json          segments as ISO-8601 durations
 *   <stem>_diffs.csv            every primary candidate and its score
 *   <stem>_boundaries_low.json  the dense low-threshold boundary list
 *
 * These files are for the operator. The pipeline never reads them back.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { SceneDetectionResult, Segment } from '../../shared/types';

// ============================================================================
// Duration formatting
// ============================================================================

/**
 * Seconds to an ISO-8601 duration, e.g. 3725.5 -> "PT1H2M5.500S".
 */
export function formatIsoDuration(seconds: number): string {
  // Work in whole milliseconds so 59.9996 rolls over to the next minute
  const totalMs = Math.round(seconds * 1000);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = (totalMs % 60_000) / 1000;

  let iso = 'PT';
  if (hours > 0) iso += `${hours}H`;
  if (minutes > 0) iso += `${minutes}M`;
  iso += `${secs.toFixed(3)}S`;
  return iso;
}

const ISO_DURATION = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?$/;

export function parseIsoDuration(value: string): number {
  const match = ISO_DURATION.exec(value);
  if (!match || value === 'PT') {
    throw new Error(`Invalid ISO 8601 duration: ${value}`);
  }
  const hours = Number(match[1] ?? 0);
  const minutes = Number(match[2] ?? 0);
  const seconds = Number(match[3] ?? 0);
  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Clock form for summaries, e.g. 3725.5 -> "1:02:05.500".
 */
export function formatClock(seconds: number): string {
  const totalMs = Math.round(seconds * 1000);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = (totalMs % 60_000) / 1000;
  return `${hours}:${String(minutes).padStart(2, '0')}:${secs.toFixed(3).padStart(6, '0')}`;
}

// ============================================================================
// Export
// ============================================================================

export interface SceneAuditPaths {
  scenesPath: string;
  diffsPath: string;
  boundariesPath: string;
}

export interface LowBoundaryScene {
  sceneNumber: number;
  startTime: string;
  endTime: string;
  startFrame: number;
  endFrame: number;
}

export interface LowBoundaryReport {
  videoFile: string;
  duration: string;
  threshold: number;
  totalScenes: number;
  scenes: LowBoundaryScene[];
}

export function buildLowBoundaryReport(
  videoFile: string,
  result: SceneDetectionResult,
  threshold: number,
): LowBoundaryReport {
  const { totalDuration, frameCount } = result;
  const frameAt = (time: number) => Math.floor((time / totalDuration) * frameCount);

  const scenes: LowBoundaryScene[] = [];
  let previous = 0;
  for (const boundary of result.diagnosticBoundaries) {
    if (boundary.time <= previous || boundary.time >= totalDuration) continue;
    scenes.push({
      sceneNumber: scenes.length + 1,
      startTime: previous.toFixed(3),
      endTime: boundary.time.toFixed(3),
      startFrame: frameAt(previous),
      endFrame: frameAt(boundary.time),
    });
    previous = boundary.time;
  }
  scenes.push({
    sceneNumber: scenes.length + 1,
    startTime: previous.toFixed(3),
    endTime: totalDuration.toFixed(3),
    startFrame: frameAt(previous),
    endFrame: frameCount,
  });

  return {
    videoFile,
    duration: totalDuration.toFixed(3),
    threshold,
    totalScenes: scenes.length,
    scenes,
  };
}

export function formatDiffsCsv(result: SceneDetectionResult): string {
  const rows = result.candidates.map(
    (candidate) => `${candidate.time.toFixed(3)},${candidate.dissimilarity.toFixed(6)}`,
  );
  return ['time_sec,diff', ...rows].join('\n') + '\n';
}

export async function writeSceneAudit(
  analysisDir: string,
  stem: string,
  videoFile: string,
  result: SceneDetectionResult,
  lowThreshold: number,
): Promise<SceneAuditPaths> {
  await mkdir(analysisDir, { recursive: true });

  const scenesPath = join(analysisDir, `${stem}_scenes.json`);
  const diffsPath = join(analysisDir, `${stem}_diffs.csv`);
  const boundariesPath = join(analysisDir, `${stem}_boundaries_low.json`);

  const scenes = result.segments.map((segment) => ({
    start: formatIsoDuration(segment.start),
    end: formatIsoDuration(segment.end),
  }));

  await writeFile(scenesPath, JSON.stringify(scenes, null, 2) + '\n', 'utf-8');
  await writeFile(diffsPath, formatDiffsCsv(result), 'utf-8');
  await writeFile(
    boundariesPath,
    JSON.stringify(buildLowBoundaryReport(videoFile, result, lowThreshold), null, 2) + '\n',
    'utf-8',
  );

  return { scenesPath, diffsPath, boundariesPath };
}

// ============================================================================
// Read-back for the summary command
// ============================================================================

const sceneListSchema = z.array(z.object({ start: z.string(), end: z.string() }));

export async function readSceneList(filePath: string): Promise<Segment[]> {
  const raw = await readFile(filePath, 'utf-8');
  const parsed = sceneListSchema.parse(JSON.parse(raw));
  return parsed.map((scene) => ({
    start: parseIsoDuration(scene.start),
    end: parseIsoDuration(scene.end),
  }));
}
