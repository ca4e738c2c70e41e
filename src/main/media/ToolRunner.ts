/**
 * ToolRunner.ts - Child-process plumbing for ffmpeg and ffprobe
 *
 * Every external call in the pipeline goes through a ToolRunner so the
 * pipeline never touches child_process directly. Output can be consumed
 * whole (`run`) or incrementally as it arrives (`lines`, `chunks`); in the
 * streaming forms the caller MUST drain `output`, otherwise the child blocks
 * on a full pipe.
 */

import { spawn, type ChildProcess } from 'child_process';
import { createInterface } from 'readline';

// ============================================================================
// Types
// ============================================================================

export interface ToolExit {
  /** Exit status; -1 when the process was killed or never started */
  code: number;
  stderr: string;
}

export interface ToolResult extends ToolExit {
  stdout: string;
}

export interface ToolStream<T> {
  output: AsyncIterable<T>;
  done: Promise<ToolExit>;
}

export interface ToolRunner {
  run(command: string, args: string[]): Promise<ToolResult>;
  lines(command: string, args: string[]): ToolStream<string>;
  chunks(command: string, args: string[]): ToolStream<Buffer>;
  /** Kill every child still running */
  abort(): void;
}

// ============================================================================
// Constants
// ============================================================================

/** Keep only the tail of stderr; ffmpeg can be very chatty */
const STDERR_LIMIT = 64 * 1024;

const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR || process.env.TEMP,
  TEMP: process.env.TEMP,
};

// ============================================================================
// ProcessToolRunner Class
// ============================================================================

export class ProcessToolRunner implements ToolRunner {
  private activeProcesses: Set<ChildProcess> = new Set();

  async run(command: string, args: string[]): Promise<ToolResult> {
    const { child, done } = this.start(command, args);
    let stdout = '';
    child.stdout?.setEncoding('utf-8');
    child.stdout?.on('data', (data: string) => {
      stdout += data;
    });
    const exit = await done;
    return { ...exit, stdout };
  }

  lines(command: string, args: string[]): ToolStream<string> {
    const { child, done } = this.start(command, args);
    const stdout = child.stdout;
    if (!stdout) {
      return { output: emptyIterable<string>(), done };
    }
    const reader = createInterface({ input: stdout, crlfDelay: Infinity });
    return { output: reader, done };
  }

  chunks(command: string, args: string[]): ToolStream<Buffer> {
    const { child, done } = this.start(command, args);
    const stdout = child.stdout;
    return { output: stdout ?? emptyIterable<Buffer>(), done };
  }

  abort(): void {
    for (const proc of this.activeProcesses) {
      proc.kill('SIGTERM');
    }
    this.activeProcesses.clear();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Spawn a child with piped output and a promise for its exit.
   * The promise never rejects: spawn failures resolve with code -1.
   */
  private start(command: string, args: string[]): { child: ChildProcess; done: Promise<ToolExit> } {
    const child = spawn(command, args, {
      env: SAFE_CHILD_ENV,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.activeProcesses.add(child);

    let stderr = '';
    child.stderr?.setEncoding('utf-8');
    child.stderr?.on('data', (data: string) => {
      stderr += data;
      if (stderr.length > STDERR_LIMIT) {
        stderr = stderr.slice(-STDERR_LIMIT);
      }
    });

    const done = new Promise<ToolExit>((resolve) => {
      let settled = false;
      const settle = (exit: ToolExit) => {
        if (settled) return;
        settled = true;
        this.activeProcesses.delete(child);
        resolve(exit);
      };

      child.once('error', (error: Error) => {
        const reason =
          'code' in error && error.code === 'ENOENT'
            ? `${command} not found on PATH`
            : error.message;
        settle({ code: -1, stderr: stderr || reason });
      });

      child.once('close', (code: number | null) => {
        settle({ code: code ?? -1, stderr });
      });
    });

    return { child, done };
  }
}

async function* emptyIterable<T>(): AsyncGenerator<T> {
  // nothing to yield
}

/**
 * Last non-empty stderr line, for error messages.
 */
export function lastStderrLine(stderr: string): string {
  const lines = stderr
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1] ?? '';
}
