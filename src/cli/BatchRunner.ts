/**
 * BatchRunner.ts - Sequential processing of one input or a directory of inputs
 *
 * Each input runs through the orchestrator on its own. A failure on one
 * input is reported and the batch moves on; the exit code reflects the worst
 * outcome once everything has been attempted.
 */

import type { Stats } from 'fs';
import { readdir, stat } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { describeError, UsageError } from '../main/errors';
import type { Logger } from '../main/logging/Logger';
import { stemOf, workDirFor } from '../main/pipeline/PipelineOrchestrator';
import { PipelineStateStore } from '../main/state/PipelineStateStore';
import type { InputRunResult, PipelineState } from '../shared/types';

// ============================================================================
// Exit code constants
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

// ============================================================================
// Types
// ============================================================================

export interface InputProcessor {
  run(inputPath: string): Promise<InputRunResult>;
}

export interface BatchCallbacks {
  onInputStart: (inputPath: string, position: number, total: number) => void;
  onInputComplete: (result: InputRunResult) => void;
  onInputError: (inputPath: string, error: unknown) => void;
}

export interface BatchSummary {
  results: InputRunResult[];
  complete: number;
  partial: number;
  failed: number;
}

// ============================================================================
// Input resolution
// ============================================================================

/**
 * A file argument is taken as is; a directory expands to the files directly
 * inside it whose extension is accepted, in name order.
 * @throws UsageError for a missing path or a directory with no matches
 */
export async function resolveInputs(target: string, extensions: string[]): Promise<string[]> {
  const absolute = resolve(target);
  let stats: Stats;
  try {
    stats = await stat(absolute);
  } catch {
    throw new UsageError(`Input not found: ${absolute}`);
  }

  if (stats.isFile()) {
    return [absolute];
  }
  if (!stats.isDirectory()) {
    throw new UsageError(`Input is neither a file nor a directory: ${absolute}`);
  }

  const accepted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const entries = await readdir(absolute, { withFileTypes: true });
  const inputs = entries
    .filter((entry) => entry.isFile() && accepted.has(extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(absolute, name));

  if (inputs.length === 0) {
    throw new UsageError(`No ${[...accepted].join('/')} files found in ${absolute}`);
  }
  return inputs;
}

export function exitCodeFor(summary: BatchSummary): number {
  return summary.partial + summary.failed > 0 ? EXIT_SYSTEM_ERROR : EXIT_SUCCESS;
}

// ============================================================================
// BatchRunner Class
// ============================================================================

export class BatchRunner {
  constructor(
    private readonly processor: InputProcessor,
    private readonly scratchRoot: string,
    private readonly callbacks: BatchCallbacks,
    private readonly logger: Logger,
  ) {}

  async run(inputs: string[]): Promise<BatchSummary> {
    const results: InputRunResult[] = [];

    for (let i = 0; i < inputs.length; i++) {
      const inputPath = inputs[i];
      this.callbacks.onInputStart(inputPath, i + 1, inputs.length);

      let result: InputRunResult;
      try {
        result = await this.processor.run(inputPath);
      } catch (error) {
        this.callbacks.onInputError(inputPath, error);
        result = await this.failedResult(inputPath, error);
      }

      this.callbacks.onInputComplete(result);
      results.push(result);
    }

    return {
      results,
      complete: results.filter((r) => r.outcome === 'complete').length,
      partial: results.filter((r) => r.outcome === 'partial').length,
      failed: results.filter((r) => r.outcome === 'failed').length,
    };
  }

  private async failedResult(inputPath: string, error: unknown): Promise<InputRunResult> {
    const stem = stemOf(inputPath);
    const workDir = workDirFor(this.scratchRoot, stem);
    return {
      inputPath,
      stem,
      outcome: 'failed',
      state: await this.persistedState(workDir),
      workDir,
      failedUnits: [],
      message: describeError(error),
    };
  }

  private async persistedState(workDir: string): Promise<PipelineState | null> {
    try {
      const record = await new PipelineStateStore(workDir, this.logger).load();
      return record?.state ?? null;
    } catch (error) {
      this.logger.debug(`State unavailable for summary: ${describeError(error)}`);
      return null;
    }
  }
}
