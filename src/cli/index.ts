#!/usr/bin/env node
/**
 * tapecut CLI - Clean up home-video tapes from the command line
 *
 * Usage:
 *   tapecut process <file-or-directory> [options]
 *
 * Runs every input through the resumable pipeline:
 *   1. Copy the input into a private working directory
 *   2. Detect scene cuts and split the tape into lossless clips
 *   3. Wait while the operator sorts clips into folders
 *   4. Join each folder and render H.265 delivery copies
 *   5. Deliver Archive/ and Plex/ next to the input and clean up
 */

import { basename, join, resolve } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import packageJson from '../../package.json';
import { loadConfig, type TapecutConfig } from '../main/config';
import { describeError, isUserError, UsageError } from '../main/errors';
import { createLogger } from '../main/logging/Logger';
import { MediaProbe } from '../main/media/MediaProbe';
import { ProcessToolRunner } from '../main/media/ToolRunner';
import { fileSize } from '../main/output/files';
import { DeliveryTranscoder, deliveryPathFor } from '../main/pipeline/DeliveryTranscoder';
import { FrameSignalExtractor } from '../main/pipeline/FrameSignalExtractor';
import {
  destinationDirFor,
  MANIFEST_FILENAME,
  PipelineOrchestrator,
  stemOf,
  workDirFor,
} from '../main/pipeline/PipelineOrchestrator';
import { formatClock, readSceneList, writeSceneAudit } from '../main/pipeline/SceneAudit';
import { detectScenes } from '../main/pipeline/SceneDetector';
import { PipelineStateStore } from '../main/state/PipelineStateStore';
import type { GeometryPreset, ProgressListener, Segment } from '../shared/types';
import {
  BatchRunner,
  EXIT_SIGINT,
  EXIT_SUCCESS,
  EXIT_SYSTEM_ERROR,
  EXIT_USER_ERROR,
  exitCodeFor,
  resolveInputs,
  type BatchSummary,
} from './BatchRunner';
import { runDoctorChecks } from './doctor';
import { createPrompts, parseGeometry, type CliPrompts } from './prompts';

const VERSION = packageJson.version;

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '\u2714',    // checkmark
  cross: '\u2718',    // cross
  arrow: '\u2192',    // right arrow
  bullet: '\u2022',   // bullet
  warn: '\u26A0',     // warning sign
  line: '\u2500',     // horizontal line
} as const;

function banner(): void {
  console.log();
  console.log(`  tapecut v${VERSION} ${SYMBOLS.bullet} home video cleanup`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

function formatBytes(bytes: number): string {
  if (bytes >= 1024 ** 3) return `${(bytes / 1024 ** 3).toFixed(2)} GB`;
  if (bytes >= 1024 ** 2) return `${(bytes / 1024 ** 2).toFixed(1)} MB`;
  return `${Math.round(bytes / 1024)} KB`;
}

/**
 * Progress on stderr: a rewritten line on a terminal, 10% steps otherwise.
 */
function createProgressPrinter(): ProgressListener {
  const interactive = Boolean(process.stderr.isTTY);
  let lastLine = '';

  return (label, tick) => {
    const percent = tick.total ? Math.min(100, Math.floor((tick.processed / tick.total) * 100)) : null;
    if (!interactive && (percent === null || percent % 10 !== 0)) return;

    const amount = tick.unit === 'bytes' ? formatBytes(tick.processed) : formatClock(tick.processed);
    const line = `  ${SYMBOLS.arrow} ${label}  ${percent !== null ? `${percent}%` : amount}`;
    if (line === lastLine) return;
    lastLine = line;

    if (interactive) {
      process.stderr.write(`\r${line.padEnd(60)}${percent === 100 ? '\n' : ''}`);
    } else {
      process.stderr.write(`${line}\n`);
    }
  };
}

function exitWithError(error: unknown, verbose: boolean): never {
  console.log();
  fail(describeError(error));
  if (verbose && error instanceof Error && error.stack) {
    console.log();
    console.log(error.stack);
  }
  process.exit(isUserError(error) ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR);
}

// ============================================================================
// Option parsing
// ============================================================================

function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseGeometryOption(value: string): GeometryPreset {
  const preset = parseGeometry(value);
  if (!preset) {
    throw new InvalidArgumentError('Expected 4:3 or 16:9.');
  }
  return preset;
}

interface ConfigFlags {
  config?: string;
  scratch?: string;
  highThreshold?: number;
  lowThreshold?: number;
  minSceneLength?: number;
  attempts?: number;
  verbose?: boolean;
}

function resolveConfig(flags: ConfigFlags): Promise<TapecutConfig> {
  return loadConfig({
    configFile: flags.config ? resolve(flags.config) : undefined,
    overrides: {
      scratchRoot: flags.scratch ? resolve(flags.scratch) : undefined,
      highThreshold: flags.highThreshold,
      lowThreshold: flags.lowThreshold,
      minSceneLength: flags.minSceneLength,
      transcodeAttempts: flags.attempts,
      verbose: flags.verbose ? true : undefined,
    },
  });
}

function withConfigOptions(command: Command): Command {
  return command
    .option('--config <file>', 'JSON config file')
    .option('--scratch <dir>', 'Scratch root for working directories (default ~/tapecut-work)')
    .option('--verbose', 'Verbose output', false);
}

function withDetectionOptions(command: Command): Command {
  return command
    .option('--high-threshold <value>', 'Cut threshold on 1 - histogram correlation (default 0.35)', parseNumberOption)
    .option('--low-threshold <value>', 'Threshold for the audit-only boundary pass (default 0.3)', parseNumberOption)
    .option('--min-scene-length <seconds>', 'Shortest scene kept as its own clip (default 2.0)', parseNumberOption);
}

// ============================================================================
// Signal handling
// ============================================================================

let activeTools: ProcessToolRunner | null = null;

function setupSignalHandlers(): void {
  const handler = () => {
    console.log('\n  Interrupted, stopping ffmpeg. Rerun to resume.');
    activeTools?.abort();
    process.exit(EXIT_SIGINT);
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

setupSignalHandlers();

function createTools(): ProcessToolRunner {
  activeTools = new ProcessToolRunner();
  return activeTools;
}

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('tapecut')
  .description('Split home-video tapes into scenes, reassemble sorted folders and render delivery copies')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// process command
// ============================================================================

interface ProcessOptions extends ConfigFlags {
  geometry?: GeometryPreset;
  pause: boolean;
  verbose: boolean;
}

function printSummary(summary: BatchSummary): void {
  console.log();
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  for (const result of summary.results) {
    const symbol =
      result.outcome === 'complete' ? SYMBOLS.check : result.outcome === 'partial' ? SYMBOLS.warn : SYMBOLS.cross;
    console.log(`  ${symbol} ${result.stem}  ${result.outcome}  ${result.state ?? 'unknown state'}`);
    if (result.outcome !== 'complete') {
      console.log(`      scratch: ${result.workDir}`);
      if (result.failedUnits.length > 0) {
        console.log(`      failed:  ${result.failedUnits.join(', ')}`);
      }
      if (result.message) {
        console.log(`      ${result.message}`);
      }
    }
  }
  console.log();
  console.log(`  ${summary.complete} complete, ${summary.partial} partial, ${summary.failed} failed`);
  console.log();
}

withDetectionOptions(withConfigOptions(
  program
    .command('process')
    .description('Run a tape (or every tape in a directory) through the pipeline, resuming where it stopped')
    .argument('<input>', 'Video file, or directory of .mov files')
    .option('--geometry <preset>', 'Output geometry for new inputs: 4:3 or 16:9', parseGeometryOption)
    .option('--no-pause', 'Do not wait for manual sorting after clips are extracted')
    .option('--attempts <n>', 'Delivery render attempts per output (default 3)', parseNumberOption),
)).action(async (input: string, options: ProcessOptions) => {
  banner();

  let prompts: CliPrompts | null = null;
  try {
    const config = await resolveConfig(options);
    const logger = createLogger({ verbose: config.verbose });
    const inputs = await resolveInputs(input, config.inputExtensions);

    step(`Inputs:  ${inputs.length}`);
    step(`Scratch: ${config.scratchRoot}`);

    prompts = createPrompts();
    const orchestrator = new PipelineOrchestrator({
      config,
      tools: createTools(),
      prompts,
      logger,
      geometry: options.geometry,
      pause: options.pause,
      onProgress: createProgressPrinter(),
    });

    const runner = new BatchRunner(
      orchestrator,
      config.scratchRoot,
      {
        onInputStart: (inputPath, position, total) => {
          console.log();
          step(`[${position}/${total}] ${inputPath}`);
        },
        onInputComplete: (result) => {
          if (result.outcome === 'complete') {
            success(`${result.stem}: ${result.message ?? 'complete'}`);
          } else {
            fail(`${result.stem}: ${result.outcome}${result.message ? ` (${result.message})` : ''}`);
          }
        },
        onInputError: (inputPath, error) => {
          logger.error(`${inputPath}: ${describeError(error)}`);
          if (options.verbose && error instanceof Error && error.stack) {
            console.log(error.stack);
          }
        },
      },
      logger,
    );

    const summary = await runner.run(inputs);
    printSummary(summary);
    process.exit(exitCodeFor(summary));
  } catch (error) {
    exitWithError(error, options.verbose);
  } finally {
    prompts?.close();
    activeTools = null;
  }
});

// ============================================================================
// scenes command
// ============================================================================

interface ScenesOptions extends ConfigFlags {
  output: string;
  verbose: boolean;
}

function printSegments(segments: Segment[]): void {
  segments.forEach((segment, i) => {
    const length = (segment.end - segment.start).toFixed(2).padStart(8);
    console.log(
      `  ${String(i + 1).padStart(3)}  ${formatClock(segment.start)}  ${formatClock(segment.end)}  ${length}s`,
    );
  });
}

withDetectionOptions(withConfigOptions(
  program
    .command('scenes')
    .description('Detect scene cuts and write the audit files without extracting clips')
    .argument('<video>', 'Video file to analyze')
    .option('--output <dir>', 'Directory for the audit files', '.'),
)).action(async (video: string, options: ScenesOptions) => {
  banner();

  try {
    const config = await resolveConfig(options);
    const logger = createLogger({ verbose: config.verbose });
    const videoPath = resolve(video);
    const tools = createTools();

    const probe = new MediaProbe(tools, config.ffprobePath, logger.child('probe'));
    const extractor = new FrameSignalExtractor(
      tools,
      probe,
      { ffmpegPath: config.ffmpegPath, defaultFrameRate: config.defaultFrameRate },
      logger.child('decode'),
    );

    step(`Analyzing ${videoPath}`);
    const stream = await extractor.open(videoPath);
    const result = await detectScenes(
      stream.descriptors,
      {
        highThreshold: config.highThreshold,
        lowThreshold: config.lowThreshold,
        minSceneLength: config.minSceneLength,
        frameRate: stream.frameRate,
        source: videoPath,
      },
      logger.child('scenes'),
    );
    const paths = await writeSceneAudit(
      resolve(options.output),
      stemOf(videoPath),
      basename(videoPath),
      result,
      config.lowThreshold,
    );

    console.log();
    printSegments(result.segments);
    console.log();
    success(`${result.segments.length} scene(s) in ${formatClock(result.totalDuration)}`);
    step(`Scenes:     ${paths.scenesPath}`);
    step(`Scores:     ${paths.diffsPath}`);
    step(`Boundaries: ${paths.boundariesPath}`);
    console.log();
    process.exit(EXIT_SUCCESS);
  } catch (error) {
    exitWithError(error, options.verbose);
  } finally {
    activeTools = null;
  }
});

// ============================================================================
// summary command
// ============================================================================

program
  .command('summary')
  .description('Print a scene list written by "process" or "scenes"')
  .argument('<scenes-json>', 'Path to a <stem>_scenes.json file')
  .action(async (scenesJson: string) => {
    const scenesPath = resolve(scenesJson);
    try {
      let segments: Segment[];
      try {
        segments = await readSceneList(scenesPath);
      } catch (error) {
        throw new UsageError(`Not a readable scene list: ${scenesPath} (${describeError(error)})`);
      }

      console.log();
      console.log(`  ${basename(scenesPath)}`);
      console.log(`  ${SYMBOLS.line.repeat(40)}`);
      printSegments(segments);
      const total = segments.length > 0 ? segments[segments.length - 1].end : 0;
      console.log();
      console.log(`  ${segments.length} scene(s), ${formatClock(total)} total`);
      console.log();
    } catch (error) {
      exitWithError(error, false);
    }
  });

// ============================================================================
// transcode command
// ============================================================================

interface TranscodeOptions extends ConfigFlags {
  geometry: GeometryPreset;
  output?: string;
  verbose: boolean;
}

withConfigOptions(
  program
    .command('transcode')
    .description('Render one file into the delivery format, with retries')
    .argument('<file>', 'Lossless clip to render')
    .option('--geometry <preset>', 'Output geometry: 4:3 or 16:9', parseGeometryOption, '4:3')
    .option('--output <file>', 'Output path (default: beside the input, .mp4)')
    .option('--attempts <n>', 'Render attempts (default 3)', parseNumberOption),
).action(async (file: string, options: TranscodeOptions) => {
  banner();

  try {
    const config = await resolveConfig(options);
    const logger = createLogger({ verbose: config.verbose });
    const inputPath = resolve(file);
    if ((await fileSize(inputPath)) === null) {
      throw new UsageError(`Input file not found: ${inputPath}`);
    }

    const tools = createTools();
    const transcoder = new DeliveryTranscoder(
      tools,
      new MediaProbe(tools, config.ffprobePath, logger.child('probe')),
      { ffmpegPath: config.ffmpegPath, attempts: config.transcodeAttempts },
      logger.child('transcode'),
      createProgressPrinter(),
    );

    const outputPath = options.output ? resolve(options.output) : deliveryPathFor(inputPath);
    step(`Rendering ${inputPath} (${options.geometry})`);
    const result = await transcoder.transcode(inputPath, options.geometry, outputPath);
    success(`Created ${result.outputPath} in ${result.attempts} attempt(s)`);
    console.log();
    process.exit(EXIT_SUCCESS);
  } catch (error) {
    exitWithError(error, options.verbose);
  } finally {
    activeTools = null;
  }
});

// ============================================================================
// status command
// ============================================================================

interface StatusOptions {
  config?: string;
  scratch?: string;
  verbose: boolean;
}

withConfigOptions(
  program
    .command('status')
    .description('Show where an input stands in the pipeline')
    .argument('<input>', 'Input video file'),
).action(async (input: string, options: StatusOptions) => {
  try {
    const config = await resolveConfig(options);
    const logger = createLogger({ verbose: config.verbose });
    const inputPath = resolve(input);
    const stem = stemOf(inputPath);
    const workDir = workDirFor(config.scratchRoot, stem);
    const manifestPath = join(destinationDirFor(inputPath), MANIFEST_FILENAME);

    console.log();
    if ((await fileSize(manifestPath)) !== null) {
      success(`${stem}: delivered (${manifestPath})`);
      console.log();
      return;
    }

    const record = await new PipelineStateStore(workDir, logger).load();
    if (!record) {
      step(`${stem}: not started (${workDir})`);
      console.log();
      return;
    }

    step(`${stem}: ${record.state}`);
    console.log(`    geometry: ${record.geometry ?? 'not chosen'}`);
    console.log(`    updated:  ${record.updatedAt}`);
    console.log(`    scratch:  ${workDir}`);
    for (const [name, unit] of Object.entries(record.units)) {
      const symbol = unit.status === 'done' ? SYMBOLS.check : SYMBOLS.cross;
      const detail = unit.error ? `  ${unit.error}` : '';
      console.log(`    ${symbol} ${unit.kind} ${name} (${unit.attempts} attempt(s))${detail}`);
    }
    console.log();
  } catch (error) {
    exitWithError(error, options.verbose);
  }
});

// ============================================================================
// doctor command
// ============================================================================

withConfigOptions(
  program
    .command('doctor')
    .description('Check that ffmpeg, ffprobe and the scratch root are usable'),
).action(async (options: StatusOptions) => {
  banner();

  try {
    const config = await resolveConfig(options);
    const result = await runDoctorChecks(config, createTools());

    for (const check of result.checks) {
      const symbol =
        check.status === 'pass' ? SYMBOLS.check : check.status === 'warn' ? SYMBOLS.warn : SYMBOLS.cross;
      console.log(`  ${symbol} ${check.name.padEnd(14)} ${check.message}`);
      if (check.hint && check.status !== 'pass') {
        for (const line of check.hint.split('\n')) {
          console.log(`      ${line}`);
        }
      }
    }

    console.log();
    console.log(`  ${result.passed} passed, ${result.warned} warning(s), ${result.failed} failed`);
    console.log();
    process.exit(result.failed > 0 ? EXIT_SYSTEM_ERROR : EXIT_SUCCESS);
  } catch (error) {
    exitWithError(error, options.verbose);
  } finally {
    activeTools = null;
  }
});

// Show help if no command provided
if (process.argv.length <= 2) {
  banner();
  program.outputHelp();
  process.exit(EXIT_SUCCESS);
}

program.parseAsync().catch((error: unknown) => exitWithError(error, false));
