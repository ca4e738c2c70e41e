/**
 * BatchRunner Unit Tests
 *
 * - resolveInputs for files, directories and bad paths
 * - one failing input does not stop the batch
 * - summary counts and exit code mapping
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  BatchRunner,
  EXIT_SUCCESS,
  EXIT_SYSTEM_ERROR,
  exitCodeFor,
  resolveInputs,
  type BatchCallbacks,
  type InputProcessor,
} from '../../../src/cli/BatchRunner';
import { StateCorruptionError, UsageError } from '../../../src/main/errors';
import { PipelineStateStore } from '../../../src/main/state/PipelineStateStore';
import type { InputRunResult } from '../../../src/shared/types';
import { createRecordingLogger } from '../../helpers/logger';

function makeResult(inputPath: string, overrides: Partial<InputRunResult> = {}): InputRunResult {
  return {
    inputPath,
    stem: 'tape',
    outcome: 'complete',
    state: 'PLEX_DONE',
    workDir: '/scratch/tape',
    failedUnits: [],
    ...overrides,
  };
}

function makeCallbacks() {
  return {
    onInputStart: vi.fn(),
    onInputComplete: vi.fn(),
    onInputError: vi.fn(),
  } satisfies BatchCallbacks;
}

describe('resolveInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tapecut-inputs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns a single file as is', async () => {
    await writeFile(join(dir, 'tape.mov'), 'x');
    await expect(resolveInputs(join(dir, 'tape.mov'), ['.mov'])).resolves.toEqual([join(dir, 'tape.mov')]);
  });

  it('expands a directory to matching files in name order', async () => {
    await writeFile(join(dir, 'b.mov'), 'x');
    await writeFile(join(dir, 'a.MOV'), 'x');
    await writeFile(join(dir, 'notes.txt'), 'x');
    await mkdir(join(dir, 'c.mov'));

    await expect(resolveInputs(dir, ['.mov'])).resolves.toEqual([join(dir, 'a.MOV'), join(dir, 'b.mov')]);
  });

  it('rejects a missing path', async () => {
    await expect(resolveInputs(join(dir, 'nope'), ['.mov'])).rejects.toThrow(`Input not found: ${join(dir, 'nope')}`);
  });

  it('rejects a directory without inputs', async () => {
    const error = await resolveInputs(dir, ['.mov']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UsageError);
    expect(error).toMatchObject({ message: `No .mov files found in ${dir}` });
  });
});

describe('BatchRunner', () => {
  let scratchRoot: string;

  beforeEach(async () => {
    scratchRoot = await mkdtemp(join(tmpdir(), 'tapecut-batch-'));
  });

  afterEach(async () => {
    await rm(scratchRoot, { recursive: true, force: true });
  });

  it('runs every input in order and counts outcomes', async () => {
    const processor: InputProcessor = {
      run: vi.fn(async (inputPath: string) =>
        makeResult(inputPath, inputPath.endsWith('b.mov') ? { outcome: 'partial', failedUnits: ['Birthday'] } : {}),
      ),
    };
    const callbacks = makeCallbacks();
    const runner = new BatchRunner(processor, scratchRoot, callbacks, createRecordingLogger());

    const summary = await runner.run(['/in/a.mov', '/in/b.mov']);

    expect(callbacks.onInputStart.mock.calls).toEqual([
      ['/in/a.mov', 1, 2],
      ['/in/b.mov', 2, 2],
    ]);
    expect(summary).toMatchObject({ complete: 1, partial: 1, failed: 0 });
    expect(exitCodeFor(summary)).toBe(EXIT_SYSTEM_ERROR);
  });

  it('reports a thrown error and moves on to the next input', async () => {
    const store = new PipelineStateStore(join(scratchRoot, 'a'), createRecordingLogger());
    await store.advance(await store.loadOrCreate('a'), 'SCENES_EXTRACTED');

    const failure = new StateCorruptionError('Unrecognized state record', '/scratch/a/pipeline-state.json');
    const processor: InputProcessor = {
      run: vi.fn(async (inputPath: string) => {
        if (inputPath === '/in/a.mov') throw failure;
        return makeResult(inputPath);
      }),
    };
    const callbacks = makeCallbacks();
    const runner = new BatchRunner(processor, scratchRoot, callbacks, createRecordingLogger());

    const summary = await runner.run(['/in/a.mov', '/in/b.mov']);

    expect(callbacks.onInputError).toHaveBeenCalledWith('/in/a.mov', failure);
    expect(summary.results[0]).toEqual({
      inputPath: '/in/a.mov',
      stem: 'a',
      outcome: 'failed',
      state: 'SCENES_EXTRACTED',
      workDir: join(scratchRoot, 'a'),
      failedUnits: [],
      message: '[load-state] /scratch/a/pipeline-state.json: Unrecognized state record',
    });
    expect(summary.results[1].outcome).toBe('complete');
    expect(summary).toMatchObject({ complete: 1, partial: 0, failed: 1 });
  });

  it('exits 0 only when every input completed', () => {
    expect(exitCodeFor({ results: [], complete: 2, partial: 0, failed: 0 })).toBe(EXIT_SUCCESS);
    expect(exitCodeFor({ results: [], complete: 1, partial: 0, failed: 1 })).toBe(EXIT_SYSTEM_ERROR);
  });
});
