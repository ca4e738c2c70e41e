/**
 * PipelineStateStore - Disk-persisted progress for one input stem.
 *
 * Storage layout:
 *   <scratchRoot>/<stem>/
 *     pipeline-state.json   PipelineRecord
 *     <input file>          working copy
 *     ...
 *
 * The record is the only thing a resumed run trusts. Anything unreadable or
 * unrecognized raises StateCorruptionError: silently starting over from NEW
 * would re-materialize clips the operator may already have sorted.
 *
 * Plain-text markers from older runs (status.txt, aspect_choice.txt) are
 * converted into a record the first time they are seen.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { StateCorruptionError } from '../errors';
import type { Logger } from '../logging/Logger';
import { writeFileAtomic } from '../output/files';
import {
  GEOMETRY_PRESETS,
  PIPELINE_STATES,
  type GeometryPreset,
  type PipelineRecord,
  type PipelineState,
  type UnitRecord,
} from '../../shared/types';

export const STATE_FILENAME = 'pipeline-state.json';
const LEGACY_STATUS_FILENAME = 'status.txt';
const LEGACY_CHOICE_FILENAME = 'aspect_choice.txt';

const LEGACY_STATES: Record<string, PipelineState> = {
  scenes_extracted: 'SCENES_EXTRACTED',
  concatenated: 'CONCATENATED',
  plex_done: 'PLEX_DONE',
};

const LEGACY_CHOICES: Record<string, GeometryPreset> = {
  A: '4:3',
  B: 'anamorphic-16:9',
};

const unitRecordSchema = z.object({
  kind: z.enum(['folder', 'loose']),
  status: z.enum(['done', 'failed']),
  attempts: z.number().int().nonnegative(),
  error: z.string().optional(),
});

const pipelineRecordSchema = z.object({
  version: z.literal(1),
  stem: z.string().min(1),
  state: z.enum(PIPELINE_STATES),
  geometry: z.enum(GEOMETRY_PRESETS).nullable(),
  units: z.record(unitRecordSchema),
  updatedAt: z.string(),
});

export function stateIndex(state: PipelineState): number {
  return PIPELINE_STATES.indexOf(state);
}

export class PipelineStateStore {
  private readonly statePath: string;

  constructor(
    private readonly workDir: string,
    private readonly logger: Logger,
  ) {
    this.statePath = path.join(workDir, STATE_FILENAME);
  }

  getStatePath(): string {
    return this.statePath;
  }

  /**
   * Read the record; null when this stem has never been started.
   * @throws StateCorruptionError for anything present but unusable
   */
  async load(): Promise<PipelineRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.statePath, 'utf-8');
    } catch (error) {
      if (isMissing(error)) return this.loadLegacy();
      throw new StateCorruptionError('State file cannot be read', this.statePath, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StateCorruptionError('State file is not valid JSON', this.statePath, { cause: error });
    }

    const parsed = pipelineRecordSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StateCorruptionError(
        `Unrecognized state record (${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}); ` +
          'fix or remove the file by hand to continue',
        this.statePath,
      );
    }
    return parsed.data;
  }

  /**
   * Load the record, or create and persist a NEW one.
   */
  async loadOrCreate(stem: string): Promise<PipelineRecord> {
    const existing = await this.load();
    if (existing) {
      if (existing.stem !== stem) {
        throw new StateCorruptionError(
          `State file belongs to "${existing.stem}", expected "${stem}"`,
          this.statePath,
        );
      }
      return existing;
    }

    const record: PipelineRecord = {
      version: 1,
      stem,
      state: 'NEW',
      geometry: null,
      units: {},
      updatedAt: new Date().toISOString(),
    };
    await this.save(record);
    this.logger.debug(`Created state record for ${stem}`);
    return record;
  }

  async save(record: PipelineRecord): Promise<PipelineRecord> {
    await fs.mkdir(this.workDir, { recursive: true });
    const updated: PipelineRecord = { ...record, updatedAt: new Date().toISOString() };
    await writeFileAtomic(this.statePath, JSON.stringify(updated, null, 2) + '\n');
    return updated;
  }

  /**
   * Move to the next state. Only single forward steps are allowed.
   */
  async advance(record: PipelineRecord, next: PipelineState): Promise<PipelineRecord> {
    if (stateIndex(next) !== stateIndex(record.state) + 1) {
      throw new Error(`Illegal state transition ${record.state} -> ${next}`);
    }
    const saved = await this.save({ ...record, state: next });
    this.logger.info(`State: ${record.state} -> ${next}`);
    return saved;
  }

  async setGeometry(record: PipelineRecord, geometry: GeometryPreset): Promise<PipelineRecord> {
    return this.save({ ...record, geometry });
  }

  async recordUnit(record: PipelineRecord, name: string, unit: UnitRecord): Promise<PipelineRecord> {
    return this.save({ ...record, units: { ...record.units, [name]: unit } });
  }

  // ==========================================================================
  // Legacy markers
  // ==========================================================================

  private async loadLegacy(): Promise<PipelineRecord | null> {
    const status = await readTrimmed(path.join(this.workDir, LEGACY_STATUS_FILENAME));
    const choice = await readTrimmed(path.join(this.workDir, LEGACY_CHOICE_FILENAME));
    if (status === null && choice === null) return null;

    let state: PipelineState = 'NEW';
    if (status !== null) {
      const mapped = LEGACY_STATES[status];
      if (!mapped) {
        throw new StateCorruptionError(
          `Unrecognized status marker "${status}"`,
          path.join(this.workDir, LEGACY_STATUS_FILENAME),
        );
      }
      state = mapped;
    }

    let geometry: GeometryPreset | null = null;
    if (choice !== null) {
      geometry = LEGACY_CHOICES[choice.toUpperCase()] ?? null;
      if (geometry === null) {
        throw new StateCorruptionError(
          `Unrecognized aspect choice "${choice}"`,
          path.join(this.workDir, LEGACY_CHOICE_FILENAME),
        );
      }
    }

    this.logger.info(`Converting legacy markers in ${this.workDir} (state ${state})`);
    return this.save({
      version: 1,
      stem: path.basename(this.workDir),
      state,
      geometry,
      units: {},
      updatedAt: new Date().toISOString(),
    });
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readTrimmed(filePath: string): Promise<string | null> {
  try {
    return (await fs.readFile(filePath, 'utf-8')).trim();
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
}
