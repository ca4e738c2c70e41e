/**
 * In-process stand-in for ffmpeg/ffprobe.
 *
 * Every call is recorded and answered by a handler, which may also write the
 * files the real tool would have produced.
 */

import type { ToolExit, ToolResult, ToolRunner, ToolStream } from '../../src/main/media/ToolRunner';

export interface FakeResponse {
  code: number;
  stdout?: string;
  stderr?: string;
  /** Lines for `lines()` consumers */
  lines?: string[];
  /** Buffers for `chunks()` consumers */
  chunks?: Buffer[];
}

export type FakeHandler = (command: string, args: string[]) => FakeResponse | Promise<FakeResponse>;

export interface FakeCall {
  command: string;
  args: string[];
}

export class FakeToolRunner implements ToolRunner {
  readonly calls: FakeCall[] = [];
  aborted = false;

  constructor(public handler: FakeHandler) {}

  async run(command: string, args: string[]): Promise<ToolResult> {
    const response = await this.respond(command, args);
    return { code: response.code, stdout: response.stdout ?? '', stderr: response.stderr ?? '' };
  }

  lines(command: string, args: string[]): ToolStream<string> {
    const response = this.respond(command, args);
    async function* output(): AsyncGenerator<string> {
      yield* (await response).lines ?? [];
    }
    return { output: output(), done: response.then(toExit) };
  }

  chunks(command: string, args: string[]): ToolStream<Buffer> {
    const response = this.respond(command, args);
    async function* output(): AsyncGenerator<Buffer> {
      yield* (await response).chunks ?? [];
    }
    return { output: output(), done: response.then(toExit) };
  }

  abort(): void {
    this.aborted = true;
  }

  /** Calls whose arguments include `marker` */
  callsWith(marker: string): FakeCall[] {
    return this.calls.filter((call) => call.args.includes(marker));
  }

  private respond(command: string, args: string[]): Promise<FakeResponse> {
    this.calls.push({ command, args: [...args] });
    return Promise.resolve().then(() => this.handler(command, args));
  }
}

function toExit(response: FakeResponse): ToolExit {
  return { code: response.code, stderr: response.stderr ?? '' };
}

/**
 * Packed RGB24 frames of one solid colour.
 */
export function solidFrames(count: number, rgb: [number, number, number], width = 64, height = 48): Buffer {
  const frameBytes = width * height * 3;
  const buffer = Buffer.alloc(frameBytes * count);
  for (let i = 0; i < buffer.length; i += 3) {
    buffer[i] = rgb[0];
    buffer[i + 1] = rgb[1];
    buffer[i + 2] = rgb[2];
  }
  return buffer;
}

export function probeJson(options: { frameRate?: string; duration?: string; frames?: string } = {}): string {
  return JSON.stringify({
    streams: [
      {
        width: 720,
        height: 480,
        sample_aspect_ratio: '8:9',
        r_frame_rate: options.frameRate ?? '10/1',
        avg_frame_rate: options.frameRate ?? '10/1',
        nb_frames: options.frames ?? '60',
      },
    ],
    format: { duration: options.duration ?? '6.000000' },
  });
}
