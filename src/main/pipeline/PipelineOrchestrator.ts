/**
 * PipelineOrchestrator.ts - Resumable per-input state machine
 *
 *   NEW -> SCENES_EXTRACTED -> CONCATENATED -> PLEX_DONE
 *
 * NEW               working copy, geometry choice, scene detection, audit
 *                   files, lossless clips in clips/
 * SCENES_EXTRACTED  operator sorts clips into folders; each folder is joined
 *                   and rendered, loose clips are rendered beside themselves
 * CONCATENATED      render whatever still lacks a delivery output
 * PLEX_DONE         copy Archive/ and Plex/ next to the input, verify, write
 *                   the manifest, delete the scratch tree
 *
 * The persisted record is the only resume source. A transition is saved only
 * after the work it stands for is on disk, so a crash at any point replays at
 * most the stage that was running.
 */

import { mkdir, readdir, rename, rm } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import type { TapecutConfig } from '../config';
import { describeError, TranscodeError, VerificationError } from '../errors';
import type { Logger } from '../logging/Logger';
import { MediaProbe } from '../media/MediaProbe';
import type { ToolRunner } from '../media/ToolRunner';
import {
  fileSize,
  hasContent,
  isPartialPath,
  partialPathFor,
  writeFileAtomic,
} from '../output/files';
import { PipelineStateStore } from '../state/PipelineStateStore';
import { StemLock, type ProcessAliveCheck } from '../state/StemLock';
import type {
  GeometryPreset,
  InputRunResult,
  PipelineRecord,
  ProgressListener,
  UnitKind,
} from '../../shared/types';
import { CLIP_EXTENSION, ClipConcatenator, listClips } from './ClipConcatenator';
import { DeliveryTranscoder, deliveryPathFor } from './DeliveryTranscoder';
import { FrameSignalExtractor } from './FrameSignalExtractor';
import { writeSceneAudit } from './SceneAudit';
import { detectScenes } from './SceneDetector';
import { SegmentMaterializer } from './SegmentMaterializer';
import { copyWithProgress, establishWorkingCopy } from './WorkingCopy';

// ============================================================================
// Layout
// ============================================================================

export const CLIPS_DIRNAME = 'clips';
export const ANALYSIS_DIRNAME = 'analysis';
export const FINALS_DIRNAME = 'finals';
export const ARCHIVE_DIRNAME = 'Archive';
export const PLEX_DIRNAME = 'Plex';
export const MANIFEST_FILENAME = 'tapecut-manifest.json';
export const CLIP_PREFIX = 'clip_01_scene';

export function stemOf(inputPath: string): string {
  return basename(inputPath, extname(inputPath));
}

export function workDirFor(scratchRoot: string, stem: string): string {
  return join(resolve(scratchRoot), stem);
}

/**
 * `<input dir>/<stem>/`, where Archive/, Plex/ and the manifest end up.
 */
export function destinationDirFor(inputPath: string): string {
  const absolute = resolve(inputPath);
  return join(dirname(absolute), stemOf(absolute));
}

// ============================================================================
// Types
// ============================================================================

/**
 * The two points where the operator is asked something.
 */
export interface OperatorPrompts {
  chooseGeometry(stem: string): Promise<GeometryPreset>;
  /** Resolves once the operator has finished sorting clips */
  awaitManualSort(clipsDir: string): Promise<void>;
}

export interface OrchestratorOptions {
  config: TapecutConfig;
  tools: ToolRunner;
  prompts: OperatorPrompts;
  logger: Logger;
  /** Skip the geometry prompt for stems that have not chosen one yet */
  geometry?: GeometryPreset;
  /** Wait for the operator at SCENES_EXTRACTED (default true) */
  pause?: boolean;
  onProgress?: ProgressListener;
  isProcessAlive?: ProcessAliveCheck;
}

/**
 * One operator folder or one loose clip, with the files it produces.
 */
export interface OutputUnit {
  name: string;
  kind: UnitKind;
  /** Lossless file kept in Archive/ */
  archivePath: string;
  /** H.265 render kept in Plex/ */
  deliveryPath: string;
  /** Clips to join; empty for loose clips */
  clips: string[];
}

export interface DeliveryManifest {
  version: 1;
  stem: string;
  source: string;
  completedAt: string;
  archive: string[];
  plex: string[];
}

interface UnitsOutcome {
  record: PipelineRecord;
  failed: string[];
  total: number;
}

// ============================================================================
// Unit discovery
// ============================================================================

/**
 * Re-scan the clips directory. Sub-folders are operator groups; `.mov`
 * files directly inside are loose clips.
 */
export async function discoverUnits(clipsDir: string, logger: Logger): Promise<OutputUnit[]> {
  const entries = await readdir(clipsDir, { withFileTypes: true });
  const names = entries.map((entry) => entry.name).sort();
  const byName = new Map(entries.map((entry) => [entry.name, entry]));
  const units: OutputUnit[] = [];

  for (const name of names) {
    const entry = byName.get(name);
    if (!entry) continue;
    const fullPath = join(clipsDir, name);

    if (entry.isDirectory()) {
      const clips = await listClips(fullPath);
      if (clips.length === 0) {
        logger.warn(`Folder has no clips, skipping: ${fullPath}`);
        continue;
      }
      const archivePath = join(fullPath, FINALS_DIRNAME, `${name}${CLIP_EXTENSION}`);
      units.push({
        name,
        kind: 'folder',
        archivePath,
        deliveryPath: deliveryPathFor(archivePath),
        clips,
      });
    } else if (
      entry.isFile() &&
      extname(name).toLowerCase() === CLIP_EXTENSION &&
      !isPartialPath(name)
    ) {
      units.push({
        name,
        kind: 'loose',
        archivePath: fullPath,
        deliveryPath: deliveryPathFor(fullPath),
        clips: [],
      });
    }
  }
  return units;
}

// ============================================================================
// PipelineOrchestrator Class
// ============================================================================

export class PipelineOrchestrator {
  private readonly config: TapecutConfig;
  private readonly logger: Logger;
  private readonly onProgress: ProgressListener;
  private readonly probe: MediaProbe;
  private readonly extractor: FrameSignalExtractor;
  private readonly materializer: SegmentMaterializer;
  private readonly concatenator: ClipConcatenator;
  private readonly transcoder: DeliveryTranscoder;

  constructor(private readonly options: OrchestratorOptions) {
    const { config, tools, logger } = options;
    this.config = config;
    this.logger = logger;
    this.onProgress = options.onProgress ?? (() => {});
    this.probe = new MediaProbe(tools, config.ffprobePath, logger.child('probe'));
    this.extractor = new FrameSignalExtractor(
      tools,
      this.probe,
      { ffmpegPath: config.ffmpegPath, defaultFrameRate: config.defaultFrameRate },
      logger.child('decode'),
    );
    this.materializer = new SegmentMaterializer(tools, config.ffmpegPath, logger.child('extract'));
    this.concatenator = new ClipConcatenator(tools, config.ffmpegPath, logger.child('concat'));
    this.transcoder = new DeliveryTranscoder(
      tools,
      this.probe,
      { ffmpegPath: config.ffmpegPath, attempts: config.transcodeAttempts },
      logger.child('transcode'),
      this.onProgress,
    );
  }

  /**
   * Drive one input as far as it can go in this invocation.
   * Unit failures produce a 'partial' result; anything else throws.
   */
  async run(input: string): Promise<InputRunResult> {
    const inputPath = resolve(input);
    const stem = stemOf(inputPath);
    const workDir = workDirFor(this.config.scratchRoot, stem);
    const destinationDir = destinationDirFor(inputPath);
    const base = { inputPath, stem, workDir };

    if ((await fileSize(join(destinationDir, MANIFEST_FILENAME))) !== null) {
      this.logger.info(`${stem} already delivered to ${destinationDir}, nothing to do`);
      return { ...base, outcome: 'complete', state: 'PLEX_DONE', failedUnits: [], message: 'already complete' };
    }

    const lock = new StemLock(workDir, this.logger, this.options.isProcessAlive);
    await lock.acquire();
    try {
      const store = new PipelineStateStore(workDir, this.logger.child('state'));
      let record = await store.loadOrCreate(stem);
      this.logger.info(`${stem}: resuming at ${record.state}`);

      const geometry = await this.resolveGeometry(store, record);
      record = geometry.record;

      for (;;) {
        switch (record.state) {
          case 'NEW': {
            record = await this.extractScenes(store, record, inputPath, workDir);
            break;
          }
          case 'SCENES_EXTRACTED': {
            const clipsDir = join(workDir, CLIPS_DIRNAME);
            if (this.options.pause !== false) {
              await this.options.prompts.awaitManualSort(clipsDir);
            }
            const outcome = await this.processUnits(store, record, clipsDir, geometry.preset);
            if (outcome.failed.length > 0 || outcome.total === 0) {
              return this.partial(base, outcome);
            }
            record = await store.advance(outcome.record, 'CONCATENATED');
            break;
          }
          case 'CONCATENATED': {
            const outcome = await this.processUnits(
              store,
              record,
              join(workDir, CLIPS_DIRNAME),
              geometry.preset,
            );
            if (outcome.failed.length > 0 || outcome.total === 0) {
              return this.partial(base, outcome);
            }
            record = await store.advance(outcome.record, 'PLEX_DONE');
            break;
          }
          case 'PLEX_DONE': {
            await this.deliver(inputPath, stem, workDir, destinationDir);
            return { ...base, outcome: 'complete', state: 'PLEX_DONE', failedUnits: [] };
          }
        }
      }
    } finally {
      await lock.release();
    }
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async resolveGeometry(
    store: PipelineStateStore,
    record: PipelineRecord,
  ): Promise<{ record: PipelineRecord; preset: GeometryPreset }> {
    if (record.geometry !== null) {
      if (this.options.geometry && this.options.geometry !== record.geometry) {
        this.logger.warn(
          `Keeping geometry ${record.geometry} chosen on the first run (ignoring ${this.options.geometry})`,
        );
      }
      return { record, preset: record.geometry };
    }
    const preset = this.options.geometry ?? (await this.options.prompts.chooseGeometry(record.stem));
    this.logger.info(`Geometry: ${preset}`);
    return { record: await store.setGeometry(record, preset), preset };
  }

  private async extractScenes(
    store: PipelineStateStore,
    record: PipelineRecord,
    inputPath: string,
    workDir: string,
  ): Promise<PipelineRecord> {
    const workingCopy = await establishWorkingCopy(inputPath, workDir, {
      logger: this.logger,
      onProgress: this.onProgress,
    });

    const stream = await this.extractor.open(workingCopy);
    const result = await detectScenes(
      stream.descriptors,
      {
        highThreshold: this.config.highThreshold,
        lowThreshold: this.config.lowThreshold,
        minSceneLength: this.config.minSceneLength,
        frameRate: stream.frameRate,
        source: workingCopy,
      },
      this.logger.child('scenes'),
    );

    const audit = await writeSceneAudit(
      join(workDir, ANALYSIS_DIRNAME),
      record.stem,
      basename(workingCopy),
      result,
      this.config.lowThreshold,
    );
    this.logger.debug(`Scene list written to ${audit.scenesPath}`);

    await this.materializer.materialize(
      workingCopy,
      result.segments,
      join(workDir, CLIPS_DIRNAME),
      CLIP_PREFIX,
    );
    return store.advance(record, 'SCENES_EXTRACTED');
  }

  /**
   * Bring every unit up to having both its archive file and its delivery
   * render. Failures are recorded per unit and do not stop siblings.
   */
  private async processUnits(
    store: PipelineStateStore,
    initial: PipelineRecord,
    clipsDir: string,
    preset: GeometryPreset,
  ): Promise<UnitsOutcome> {
    let record = initial;
    const units = await discoverUnits(clipsDir, this.logger);
    if (units.length === 0) {
      this.logger.warn(`No clips or folders found in ${clipsDir}`);
    }
    const failed: string[] = [];

    for (const unit of units) {
      const previous = record.units[unit.name];
      if (previous?.status === 'done' && (await this.unitComplete(unit))) {
        this.logger.debug(`Skipping finished unit ${unit.name}`);
        continue;
      }

      try {
        const attempts = await this.processUnit(unit, preset, previous?.status === 'done');
        record = await store.recordUnit(record, unit.name, { kind: unit.kind, status: 'done', attempts });
      } catch (error) {
        const message = describeError(error);
        this.logger.error(`${unit.kind} ${unit.name} failed: ${message}`);
        record = await store.recordUnit(record, unit.name, {
          kind: unit.kind,
          status: 'failed',
          attempts: error instanceof TranscodeError ? error.attempts : 0,
          error: message,
        });
        failed.push(unit.name);
      }
    }

    return { record, failed, total: units.length };
  }

  /**
   * A folder not yet recorded done is joined again from its current clips,
   * since the operator may have changed it after a failed attempt. Its old
   * render goes with the old join.
   *
   * @returns Transcode attempts used; 0 when the render already existed
   */
  private async processUnit(unit: OutputUnit, preset: GeometryPreset, wasDone: boolean): Promise<number> {
    if (unit.kind === 'folder' && (!wasDone || !(await hasContent(unit.archivePath)))) {
      await rm(unit.deliveryPath, { force: true });
      await mkdir(dirname(unit.archivePath), { recursive: true });
      await this.concatenator.concat(unit.clips, unit.archivePath);
    }
    if (await hasContent(unit.deliveryPath)) {
      return 0;
    }
    const result = await this.transcoder.transcode(unit.archivePath, preset, unit.deliveryPath);
    return result.attempts;
  }

  private async unitComplete(unit: OutputUnit): Promise<boolean> {
    return (await hasContent(unit.archivePath)) && (await hasContent(unit.deliveryPath));
  }

  /**
   * Copy both groups next to the input, verify, write the manifest, and only
   * then delete the scratch tree.
   * @throws VerificationError leaving the scratch tree in place
   */
  private async deliver(
    inputPath: string,
    stem: string,
    workDir: string,
    destinationDir: string,
  ): Promise<void> {
    const units = await discoverUnits(join(workDir, CLIPS_DIRNAME), this.logger);
    if (units.length === 0) {
      throw new VerificationError('No outputs to deliver', destinationDir, []);
    }

    const archiveDir = join(destinationDir, ARCHIVE_DIRNAME);
    const plexDir = join(destinationDir, PLEX_DIRNAME);
    await mkdir(archiveDir, { recursive: true });
    await mkdir(plexDir, { recursive: true });

    const expected: string[] = [];
    for (const unit of units) {
      for (const [source, dir] of [
        [unit.archivePath, archiveDir],
        [unit.deliveryPath, plexDir],
      ] as const) {
        const target = join(dir, basename(source));
        expected.push(target);
        await this.copyInto(source, target);
      }
    }

    const missing: string[] = [];
    for (const target of expected) {
      if (!(await hasContent(target))) missing.push(target);
    }
    if (missing.length > 0) {
      throw new VerificationError(
        `${missing.length} output(s) missing or empty after copy; scratch kept at ${workDir}`,
        destinationDir,
        missing,
      );
    }

    const manifest: DeliveryManifest = {
      version: 1,
      stem,
      source: inputPath,
      completedAt: new Date().toISOString(),
      archive: units.map((unit) => basename(unit.archivePath)),
      plex: units.map((unit) => basename(unit.deliveryPath)),
    };
    await writeFileAtomic(join(destinationDir, MANIFEST_FILENAME), JSON.stringify(manifest, null, 2) + '\n');
    this.logger.info(`Delivered ${units.length} unit(s) to ${destinationDir}`);

    await rm(workDir, { recursive: true, force: true });
    this.logger.info(`Removed scratch directory ${workDir}`);
  }

  private async copyInto(source: string, target: string): Promise<void> {
    const sourceSize = await fileSize(source);
    if (sourceSize === null) {
      this.logger.warn(`Expected output is missing: ${source}`);
      return;
    }
    if ((await fileSize(target)) === sourceSize) {
      this.logger.debug(`Already copied: ${target}`);
      return;
    }
    const partial = partialPathFor(target);
    for await (const tick of copyWithProgress(source, partial)) {
      this.onProgress(basename(target), tick);
    }
    await rename(partial, target);
  }

  private partial(
    base: { inputPath: string; stem: string; workDir: string },
    outcome: UnitsOutcome,
  ): InputRunResult {
    const message =
      outcome.total === 0
        ? 'no clips found to process'
        : `${outcome.failed.length} of ${outcome.total} unit(s) failed; rerun to retry them`;
    return {
      ...base,
      outcome: 'partial',
      state: outcome.record.state,
      failedUnits: outcome.failed,
      message,
    };
  }
}
