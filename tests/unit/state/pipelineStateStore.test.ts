/**
 * PipelineStateStore Unit Tests
 *
 * - create, save and reload round trip through disk
 * - forward-only single-step transitions
 * - corrupt or unrecognized records raise StateCorruptionError
 * - legacy status.txt / aspect_choice.txt markers are converted
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { StateCorruptionError } from '../../../src/main/errors';
import { PipelineStateStore, STATE_FILENAME, stateIndex } from '../../../src/main/state/PipelineStateStore';
import { createRecordingLogger, type RecordingLogger } from '../../helpers/logger';

describe('PipelineStateStore', () => {
  let root: string;
  let workDir: string;
  let logger: RecordingLogger;
  let store: PipelineStateStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'tapecut-state-'));
    workDir = join(root, 'tape');
    logger = createRecordingLogger();
    store = new PipelineStateStore(workDir, logger);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('orders the states', () => {
    expect(stateIndex('NEW')).toBe(0);
    expect(stateIndex('PLEX_DONE')).toBe(3);
  });

  it('returns null for a stem that was never started', async () => {
    await expect(store.load()).resolves.toBeNull();
  });

  it('creates a NEW record on disk and reloads it', async () => {
    const created = await store.loadOrCreate('tape');

    expect(created).toMatchObject({ version: 1, stem: 'tape', state: 'NEW', geometry: null, units: {} });
    const onDisk = JSON.parse(await readFile(join(workDir, STATE_FILENAME), 'utf-8'));
    expect(onDisk.state).toBe('NEW');
    await expect(store.loadOrCreate('tape')).resolves.toMatchObject({ state: 'NEW' });
  });

  it('persists geometry, units and transitions', async () => {
    let record = await store.loadOrCreate('tape');
    record = await store.setGeometry(record, '4:3');
    record = await store.advance(record, 'SCENES_EXTRACTED');
    record = await store.recordUnit(record, 'Birthday', { kind: 'folder', status: 'done', attempts: 1 });

    const reloaded = await new PipelineStateStore(workDir, logger).load();
    expect(reloaded).toMatchObject({
      state: 'SCENES_EXTRACTED',
      geometry: '4:3',
      units: { Birthday: { kind: 'folder', status: 'done', attempts: 1 } },
    });
    expect(logger.linesAt('info')).toContain('[tapecut] State: NEW -> SCENES_EXTRACTED');
  });

  it('rejects skipped and backward transitions', async () => {
    const record = await store.loadOrCreate('tape');

    await expect(store.advance(record, 'CONCATENATED')).rejects.toThrow(
      'Illegal state transition NEW -> CONCATENATED',
    );
    const extracted = await store.advance(record, 'SCENES_EXTRACTED');
    await expect(store.advance(extracted, 'NEW')).rejects.toThrow('Illegal state transition SCENES_EXTRACTED -> NEW');
  });

  describe('corruption', () => {
    beforeEach(async () => {
      await mkdir(workDir, { recursive: true });
    });

    it('rejects invalid JSON', async () => {
      await writeFile(join(workDir, STATE_FILENAME), '{"state": ');
      await expect(store.load()).rejects.toThrow('State file is not valid JSON');
    });

    it('rejects an unknown state name', async () => {
      await writeFile(
        join(workDir, STATE_FILENAME),
        JSON.stringify({ version: 1, stem: 'tape', state: 'HALF_DONE', geometry: null, units: {}, updatedAt: 'x' }),
      );

      const error = await store.load().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(StateCorruptionError);
      expect(error).toMatchObject({ message: expect.stringMatching(/^Unrecognized state record \(state: /) });
    });

    it('rejects a record that belongs to another stem', async () => {
      await store.loadOrCreate('other');
      await expect(store.loadOrCreate('tape')).rejects.toThrow('State file belongs to "other", expected "tape"');
    });
  });

  describe('legacy markers', () => {
    beforeEach(async () => {
      await mkdir(workDir, { recursive: true });
    });

    it('converts status and aspect choice into a record', async () => {
      await writeFile(join(workDir, 'status.txt'), 'concatenated\n');
      await writeFile(join(workDir, 'aspect_choice.txt'), 'b\n');

      const record = await store.load();

      expect(record).toMatchObject({ stem: 'tape', state: 'CONCATENATED', geometry: 'anamorphic-16:9', units: {} });
      const onDisk = JSON.parse(await readFile(join(workDir, STATE_FILENAME), 'utf-8'));
      expect(onDisk.state).toBe('CONCATENATED');
    });

    it('keeps NEW when only the aspect choice exists', async () => {
      await writeFile(join(workDir, 'aspect_choice.txt'), 'A');
      await expect(store.load()).resolves.toMatchObject({ state: 'NEW', geometry: '4:3' });
    });

    it('rejects an unknown status marker', async () => {
      await writeFile(join(workDir, 'status.txt'), 'halfway');
      await expect(store.load()).rejects.toThrow('Unrecognized status marker "halfway"');
    });
  });
});
