/**
 * SceneAudit Unit Tests
 *
 * - ISO-8601 duration formatting and parsing, millisecond rounding
 * - clock formatting for summaries
 * - diff CSV and low-threshold boundary report contents
 * - writeSceneAudit file layout and readSceneList read-back
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  buildLowBoundaryReport,
  formatClock,
  formatDiffsCsv,
  formatIsoDuration,
  parseIsoDuration,
  readSceneList,
  writeSceneAudit,
} from '../../../src/main/pipeline/SceneAudit';
import type { SceneDetectionResult } from '../../../src/shared/types';

function makeResult(overrides: Partial<SceneDetectionResult> = {}): SceneDetectionResult {
  return {
    segments: [
      { start: 0, end: 3 },
      { start: 3, end: 10 },
    ],
    candidates: [
      { time: 3, dissimilarity: 0.5 },
      { time: 3.25, dissimilarity: 0.123456789 },
    ],
    diagnosticBoundaries: [
      { time: 2.5, dissimilarity: 0.31 },
      { time: 5, dissimilarity: 0.9 },
    ],
    totalDuration: 10,
    frameCount: 300,
    frameRate: 30,
    ...overrides,
  };
}

// ============================================================================
// Durations
// ============================================================================

describe('formatIsoDuration', () => {
  it('formats hours, minutes and milliseconds', () => {
    expect(formatIsoDuration(3725.5)).toBe('PT1H2M5.500S');
    expect(formatIsoDuration(3)).toBe('PT3.000S');
    expect(formatIsoDuration(0)).toBe('PT0.000S');
  });

  it('rounds to the millisecond before splitting', () => {
    expect(formatIsoDuration(59.9996)).toBe('PT1M0.000S');
  });
});

describe('parseIsoDuration', () => {
  it('reads back what formatIsoDuration writes', () => {
    expect(parseIsoDuration('PT1H2M5.500S')).toBe(3725.5);
    expect(parseIsoDuration('PT3.000S')).toBe(3);
    expect(parseIsoDuration('PT2M')).toBe(120);
  });

  it('rejects malformed values', () => {
    expect(() => parseIsoDuration('PT')).toThrow('Invalid ISO 8601 duration: PT');
    expect(() => parseIsoDuration('5S')).toThrow('Invalid ISO 8601 duration: 5S');
  });
});

describe('formatClock', () => {
  it('pads minutes and seconds', () => {
    expect(formatClock(3725.5)).toBe('1:02:05.500');
    expect(formatClock(0)).toBe('0:00:00.000');
    expect(formatClock(61.25)).toBe('0:01:01.250');
  });
});

// ============================================================================
// Reports
// ============================================================================

describe('formatDiffsCsv', () => {
  it('writes one row per primary candidate', () => {
    expect(formatDiffsCsv(makeResult())).toBe('time_sec,diff\n3.000,0.500000\n3.250,0.123457\n');
  });

  it('writes only the header when there are no candidates', () => {
    expect(formatDiffsCsv(makeResult({ candidates: [] }))).toBe('time_sec,diff\n');
  });
});

describe('buildLowBoundaryReport', () => {
  it('numbers scenes between diagnostic boundaries', () => {
    expect(buildLowBoundaryReport('tape.mov', makeResult(), 0.3)).toEqual({
      videoFile: 'tape.mov',
      duration: '10.000',
      threshold: 0.3,
      totalScenes: 3,
      scenes: [
        { sceneNumber: 1, startTime: '0.000', endTime: '2.500', startFrame: 0, endFrame: 75 },
        { sceneNumber: 2, startTime: '2.500', endTime: '5.000', startFrame: 75, endFrame: 150 },
        { sceneNumber: 3, startTime: '5.000', endTime: '10.000', startFrame: 150, endFrame: 300 },
      ],
    });
  });

  it('reports the whole video as one scene without boundaries', () => {
    const report = buildLowBoundaryReport('tape.mov', makeResult({ diagnosticBoundaries: [] }), 0.3);
    expect(report.totalScenes).toBe(1);
    expect(report.scenes).toEqual([
      { sceneNumber: 1, startTime: '0.000', endTime: '10.000', startFrame: 0, endFrame: 300 },
    ]);
  });
});

// ============================================================================
// Files
// ============================================================================

describe('writeSceneAudit', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tapecut-audit-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the three audit files under the stem name', async () => {
    const analysisDir = join(dir, 'analysis');
    const paths = await writeSceneAudit(analysisDir, 'tape', 'tape.mov', makeResult(), 0.3);

    expect(paths).toEqual({
      scenesPath: join(analysisDir, 'tape_scenes.json'),
      diffsPath: join(analysisDir, 'tape_diffs.csv'),
      boundariesPath: join(analysisDir, 'tape_boundaries_low.json'),
    });
    expect(JSON.parse(await readFile(paths.scenesPath, 'utf-8'))).toEqual([
      { start: 'PT0.000S', end: 'PT3.000S' },
      { start: 'PT3.000S', end: 'PT10.000S' },
    ]);
    expect(await readFile(paths.diffsPath, 'utf-8')).toBe('time_sec,diff\n3.000,0.500000\n3.250,0.123457\n');
    expect(JSON.parse(await readFile(paths.boundariesPath, 'utf-8')).totalScenes).toBe(3);
  });

  it('reads a written scene list back as seconds', async () => {
    const paths = await writeSceneAudit(dir, 'tape', 'tape.mov', makeResult(), 0.3);
    expect(await readSceneList(paths.scenesPath)).toEqual([
      { start: 0, end: 3 },
      { start: 3, end: 10 },
    ]);
  });
});
