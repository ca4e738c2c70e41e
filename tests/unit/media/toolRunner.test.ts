/**
 * ProcessToolRunner Unit Tests
 *
 * child_process.spawn is mocked with EventEmitter children:
 * - run() collects stdout and stderr and resolves with the exit code
 * - lines() yields stdout line by line
 * - spawn errors resolve with code -1 instead of rejecting
 * - abort() kills children that are still running
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';

// =============================================================================
// Hoisted mocks
// =============================================================================

const { mockSpawn } = vi.hoisted(() => ({
  mockSpawn: vi.fn(),
}));

vi.mock('child_process', () => ({
  spawn: mockSpawn,
}));

import { ProcessToolRunner, lastStderrLine } from '../../../src/main/media/ToolRunner';

// =============================================================================
// Helpers
// =============================================================================

class FakeChild extends EventEmitter {
  stdout = new PassThrough();
  stderr = new PassThrough();
  kill = vi.fn(() => true);

  finish(code: number | null): void {
    this.stdout.end();
    this.stderr.end();
    // close fires after the stdio streams have ended
    setImmediate(() => this.emit('close', code));
  }
}

function nextChild(): FakeChild {
  const child = new FakeChild();
  mockSpawn.mockReturnValueOnce(child);
  return child;
}

describe('ProcessToolRunner', () => {
  let runner: ProcessToolRunner;

  beforeEach(() => {
    vi.clearAllMocks();
    runner = new ProcessToolRunner();
  });

  it('spawns with a restricted environment and piped output', async () => {
    const child = nextChild();
    const result = runner.run('ffprobe', ['-version']);
    child.finish(0);
    await result;

    expect(mockSpawn).toHaveBeenCalledWith('ffprobe', ['-version'], {
      env: expect.objectContaining({ PATH: process.env.PATH }),
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    const env = mockSpawn.mock.calls[0][2].env;
    expect(Object.keys(env).sort()).toEqual(['HOME', 'LANG', 'PATH', 'TEMP', 'TMPDIR', 'USERPROFILE']);
  });

  it('run() collects stdout and stderr', async () => {
    const child = nextChild();
    const result = runner.run('ffprobe', ['x']);

    child.stdout.write('{"streams":');
    child.stdout.write('[]}');
    child.stderr.write('warning: something\n');
    child.finish(0);

    await expect(result).resolves.toEqual({
      code: 0,
      stdout: '{"streams":[]}',
      stderr: 'warning: something\n',
    });
  });

  it('lines() yields stdout line by line', async () => {
    const child = nextChild();
    const { output, done } = runner.lines('ffmpeg', ['-progress', 'pipe:1']);
    const collected = (async () => {
      const lines: string[] = [];
      for await (const line of output) lines.push(line);
      return lines;
    })();

    child.stdout.write('out_time=00:00:01.000000\nprogress=con');
    child.stdout.write('tinue\nprogress=end\n');
    child.finish(0);

    expect(await collected).toEqual(['out_time=00:00:01.000000', 'progress=continue', 'progress=end']);
    await expect(done).resolves.toEqual({ code: 0, stderr: '' });
  });

  it('reports a missing binary as code -1', async () => {
    const child = nextChild();
    const result = runner.run('ffmpeg', []);

    child.emit('error', Object.assign(new Error('spawn ffmpeg ENOENT'), { code: 'ENOENT' }));

    await expect(result).resolves.toEqual({ code: -1, stdout: '', stderr: 'ffmpeg not found on PATH' });
  });

  it('maps a signal exit (null code) to -1', async () => {
    const child = nextChild();
    const result = runner.run('ffmpeg', []);
    child.finish(null);

    await expect(result).resolves.toMatchObject({ code: -1 });
  });

  it('abort() kills running children only', async () => {
    const finished = nextChild();
    const first = runner.run('ffmpeg', ['a']);
    finished.finish(0);
    await first;

    const running = nextChild();
    void runner.run('ffmpeg', ['b']);
    runner.abort();

    expect(finished.kill).not.toHaveBeenCalled();
    expect(running.kill).toHaveBeenCalledWith('SIGTERM');
  });
});

describe('lastStderrLine', () => {
  it('returns the last non-empty line', () => {
    expect(lastStderrLine('first\nsecond\n\n  \n')).toBe('second');
    expect(lastStderrLine('')).toBe('');
  });
});
