/**
 * doctor.ts - Environment health check for the tapecut CLI
 *
 * Checks that everything a run depends on is available:
 * - ffmpeg / ffprobe (required for every stage)
 * - the libx265 encoder (required for delivery renders)
 * - Node.js version compatibility
 * - a writable scratch root with room for working copies
 */

import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { platform } from 'os';
import type { TapecutConfig } from '../main/config';
import type { ToolRunner } from '../main/media/ToolRunner';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

const MIN_NODE_MAJOR = 20;
const LOW_SPACE_GB = 20;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Run a tool and return stdout, or null when it is missing or fails.
 */
async function execQuiet(tools: ToolRunner, command: string, args: string[]): Promise<string | null> {
  const result = await tools.run(command, args);
  return result.code === 0 ? result.stdout.trim() : null;
}

/**
 * Parse a semver string into [major, minor, patch].
 */
export function parseSemver(version: string): [number, number, number] | null {
  const match = version.match(/(\d+)\.(\d+)\.(\d+)/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
}

function installHint(): string {
  const os = platform();
  return os === 'darwin'
    ? 'brew install ffmpeg'
    : os === 'win32'
      ? 'winget install ffmpeg (or download from https://ffmpeg.org)'
      : 'apt install ffmpeg (or your package manager)';
}

// ============================================================================
// Check functions
// ============================================================================

export function checkNodeVersion(version: string = process.version): DoctorCheck {
  const parsed = parseSemver(version);

  if (!parsed) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: `tapecut requires Node.js >= ${MIN_NODE_MAJOR}.0.0`,
    };
  }

  if (parsed[0] >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'pass', message: `${version} (>= ${MIN_NODE_MAJOR}.0.0)` };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: `tapecut requires Node.js >= ${MIN_NODE_MAJOR}.0.0. Upgrade at https://nodejs.org`,
  };
}

async function checkTool(tools: ToolRunner, name: string, command: string): Promise<DoctorCheck> {
  const stdout = await execQuiet(tools, command, ['-version']);

  if (stdout === null) {
    return {
      name,
      status: 'fail',
      message: `Not found (${command})`,
      hint:
        name === 'ffprobe'
          ? 'ffprobe is usually installed alongside ffmpeg'
          : `Install via: ${installHint()}, or set FFMPEG_PATH`,
    };
  }

  // First line looks like "ffmpeg version 6.1.1 Copyright ..."
  const versionMatch = stdout.match(/version (\S+)/);
  return {
    name,
    status: 'pass',
    message: `Installed (${versionMatch ? versionMatch[1] : 'unknown'})`,
  };
}

async function checkHevcEncoder(tools: ToolRunner, ffmpegPath: string): Promise<DoctorCheck> {
  const stdout = await execQuiet(tools, ffmpegPath, ['-hide_banner', '-encoders']);

  if (stdout === null) {
    return { name: 'libx265', status: 'warn', message: 'Could not list ffmpeg encoders' };
  }
  if (/\blibx265\b/.test(stdout)) {
    return { name: 'libx265', status: 'pass', message: 'HEVC encoder available' };
  }
  return {
    name: 'libx265',
    status: 'fail',
    message: 'ffmpeg was built without libx265',
    hint: 'Delivery renders need an ffmpeg build with --enable-libx265',
  };
}

async function checkScratchRoot(scratchRoot: string): Promise<DoctorCheck> {
  const probeFile = join(scratchRoot, `.doctor-${process.pid}`);
  try {
    await mkdir(scratchRoot, { recursive: true });
    await writeFile(probeFile, 'ok');
    await rm(probeFile, { force: true });
    return { name: 'Scratch root', status: 'pass', message: `Writable: ${scratchRoot}` };
  } catch (error) {
    return {
      name: 'Scratch root',
      status: 'fail',
      message: `Not writable: ${scratchRoot}`,
      hint: `${error instanceof Error ? error.message : String(error)}. Set TAPECUT_SCRATCH_ROOT or pass --scratch`,
    };
  }
}

/**
 * Free space under the scratch root, from `df -k`.
 */
async function checkDiskSpace(tools: ToolRunner, scratchRoot: string): Promise<DoctorCheck> {
  if (platform() === 'win32') {
    return { name: 'Disk space', status: 'warn', message: 'Not checked on Windows' };
  }

  const dfOutput = await execQuiet(tools, 'df', ['-k', scratchRoot]);
  // Filesystem 1K-blocks Used Available Use% Mounted
  const parts = dfOutput?.split('\n')[1]?.split(/\s+/) ?? [];
  const availableKB = parts.length >= 4 ? parseInt(parts[3], 10) : NaN;

  if (isNaN(availableKB)) {
    return { name: 'Disk space', status: 'warn', message: 'Could not determine available disk space' };
  }

  const availableGB = availableKB / (1024 * 1024);
  if (availableGB < LOW_SPACE_GB) {
    return {
      name: 'Disk space',
      status: 'warn',
      message: `${availableGB.toFixed(1)} GB available (low)`,
      hint: 'A tape needs room for its working copy, the clips and both renders',
    };
  }
  return { name: 'Disk space', status: 'pass', message: `${availableGB.toFixed(1)} GB available` };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result.
 */
export async function runDoctorChecks(config: TapecutConfig, tools: ToolRunner): Promise<DoctorResult> {
  const scratch = await checkScratchRoot(config.scratchRoot);
  const checks: DoctorCheck[] = [
    checkNodeVersion(),
    await checkTool(tools, 'ffmpeg', config.ffmpegPath),
    await checkTool(tools, 'ffprobe', config.ffprobePath),
    await checkHevcEncoder(tools, config.ffmpegPath),
    scratch,
    scratch.status === 'pass'
      ? await checkDiskSpace(tools, config.scratchRoot)
      : { name: 'Disk space', status: 'warn', message: 'Skipped (scratch root unavailable)' },
  ];

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
