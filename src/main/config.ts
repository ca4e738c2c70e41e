/**
 * config.ts - Run configuration
 *
 * Resolution order (later wins): built-in defaults, JSON config file,
 * environment variables, CLI flags. The merged object is validated once
 * with zod and then passed explicitly to every component.
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { UsageError } from './errors';

// ============================================================================
// Schema
// ============================================================================

export const configSchema = z.object({
  scratchRoot: z.string().min(1),
  highThreshold: z.number().gt(0).lt(2),
  lowThreshold: z.number().gt(0).lt(2),
  minSceneLength: z.number().nonnegative(),
  defaultFrameRate: z.number().positive(),
  transcodeAttempts: z.number().int().min(1).max(10),
  inputExtensions: z.array(z.string().regex(/^\.[a-z0-9]+$/i)).min(1),
  ffmpegPath: z.string().min(1),
  ffprobePath: z.string().min(1),
  verbose: z.boolean(),
});

export type TapecutConfig = z.infer<typeof configSchema>;

export type ConfigOverrides = Partial<TapecutConfig>;

export const DEFAULT_CONFIG: TapecutConfig = {
  scratchRoot: join(homedir(), 'tapecut-work'),
  highThreshold: 0.35,
  lowThreshold: 0.3,
  minSceneLength: 2.0,
  defaultFrameRate: 29.97,
  transcodeAttempts: 3,
  inputExtensions: ['.mov'],
  ffmpegPath: 'ffmpeg',
  ffprobePath: 'ffprobe',
  verbose: false,
};

// ============================================================================
// Sources
// ============================================================================

/**
 * Pick configuration values out of the environment.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env.TAPECUT_SCRATCH_ROOT) overrides.scratchRoot = env.TAPECUT_SCRATCH_ROOT;
  const ffmpeg = env.FFMPEG_PATH || env.FFMPEG_BIN;
  if (ffmpeg) overrides.ffmpegPath = ffmpeg;
  const ffprobe = env.FFPROBE_PATH || env.FFPROBE_BIN;
  if (ffprobe) overrides.ffprobePath = ffprobe;
  if (env.TAPECUT_VERBOSE === '1' || env.TAPECUT_VERBOSE === 'true') overrides.verbose = true;
  return overrides;
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch {
    throw new UsageError(`Config file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new UsageError(`Config file is not valid JSON: ${filePath} (${error instanceof Error ? error.message : String(error)})`);
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new UsageError(`Config file must contain a JSON object: ${filePath}`);
  }
  return { ...parsed };
}

function dropUndefined(overrides: ConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
}

// ============================================================================
// Entry point
// ============================================================================

export interface LoadConfigOptions {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<TapecutConfig> {
  const fromFile = options.configFile ? await readConfigFile(options.configFile) : {};
  const merged = {
    ...DEFAULT_CONFIG,
    ...fromFile,
    ...configFromEnv(options.env ?? process.env),
    ...dropUndefined(options.overrides ?? {}),
  };
  return validateConfig(merged);
}

export function validateConfig(input: unknown): TapecutConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new UsageError(`Invalid configuration: ${problems}`);
  }
  if (result.data.lowThreshold > result.data.highThreshold) {
    throw new UsageError(
      `Invalid configuration: lowThreshold (${result.data.lowThreshold}) must not exceed highThreshold (${result.data.highThreshold})`,
    );
  }
  return result.data;
}
