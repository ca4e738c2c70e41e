/**
 * DeliveryTranscoder Unit Tests
 *
 * - argument list per geometry preset
 * - an attempt only counts when ffmpeg exits 0 and the output has content
 * - exhaustion throws TranscodeError and removes the partial output
 * - progress ticks reach the listener under the output's file name
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { TranscodeError } from '../../../src/main/errors';
import { MediaProbe } from '../../../src/main/media/MediaProbe';
import {
  DeliveryTranscoder,
  buildTranscodeArgs,
  deliveryPathFor,
} from '../../../src/main/pipeline/DeliveryTranscoder';
import type { ProgressTick } from '../../../src/shared/types';
import { FakeToolRunner, probeJson, type FakeHandler } from '../../helpers/FakeToolRunner';
import { createRecordingLogger, type RecordingLogger } from '../../helpers/logger';

describe('buildTranscodeArgs', () => {
  it('scales to the preset and encodes HEVC tagged hvc1 with AAC audio', () => {
    const args = buildTranscodeArgs('/in.mov', '/out.mp4', 'anamorphic-16:9');

    expect(args.slice(0, 5)).toEqual(['-hide_banner', '-i', '/in.mov', '-vf', 'scale=854:480']);
    expect(args).toContain('libx265');
    expect(args[args.indexOf('-tag:v') + 1]).toBe('hvc1');
    expect(args[args.indexOf('-c:a') + 1]).toBe('aac');
    expect(args[args.length - 1]).toBe('/out.mp4');
  });

  it('uses 640x480 for 4:3', () => {
    expect(buildTranscodeArgs('/in.mov', '/out.mp4', '4:3')).toContain('scale=640:480');
  });
});

describe('deliveryPathFor', () => {
  it('swaps the extension for .mp4', () => {
    expect(deliveryPathFor('/work/finals/Birthday.mov')).toBe('/work/finals/Birthday.mp4');
  });
});

describe('DeliveryTranscoder', () => {
  let dir: string;
  let input: string;
  let logger: RecordingLogger;
  let ticks: Array<{ label: string; tick: ProgressTick }>;

  function makeTranscoder(handler: FakeHandler, attempts = 3): { transcoder: DeliveryTranscoder; tools: FakeToolRunner } {
    const tools = new FakeToolRunner(handler);
    const probe = new MediaProbe(tools, 'ffprobe', logger);
    const transcoder = new DeliveryTranscoder(tools, probe, { ffmpegPath: 'ffmpeg', attempts }, logger, (label, tick) =>
      ticks.push({ label, tick }),
    );
    return { transcoder, tools };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tapecut-transcode-'));
    input = join(dir, 'Birthday.mov');
    await writeFile(input, 'lossless');
    logger = createRecordingLogger();
    ticks = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('renders through a partial file and reports progress', async () => {
    const { transcoder } = makeTranscoder(async (command, args) => {
      if (command === 'ffprobe') return { code: 0, stdout: probeJson() };
      await writeFile(args[args.length - 1], 'hevc');
      return { code: 0, lines: ['out_time=00:00:03.000000', 'progress=end'] };
    });

    const result = await transcoder.transcode(input, '4:3');

    expect(result).toEqual({ outputPath: join(dir, 'Birthday.mp4'), attempts: 1 });
    expect((await readdir(dir)).sort()).toEqual(['Birthday.mov', 'Birthday.mp4']);
    expect(ticks).toEqual([
      { label: 'Birthday.mp4', tick: { unit: 'seconds', processed: 3, total: 6 } },
      { label: 'Birthday.mp4', tick: { unit: 'seconds', processed: 6, total: 6 } },
    ]);
  });

  it('retries until an attempt produces output', async () => {
    let renders = 0;
    const { transcoder, tools } = makeTranscoder(async (command, args) => {
      if (command === 'ffprobe') return { code: 0, stdout: probeJson() };
      renders++;
      if (renders === 1) return { code: 1, stderr: 'Error while opening encoder' };
      // clean exit without output is still a failed attempt
      if (renders === 2) return { code: 0 };
      await writeFile(args[args.length - 1], 'hevc');
      return { code: 0 };
    });

    const result = await transcoder.transcode(input, '4:3');

    expect(result.attempts).toBe(3);
    expect(tools.callsWith('libx265')).toHaveLength(3);
    expect(logger.linesAt('warn')).toEqual([
      `[tapecut] WARN transcode ${input} attempt 1/3 failed: ffmpeg exited with code 1: Error while opening encoder`,
      `[tapecut] WARN transcode ${input} attempt 2/3 failed: ffmpeg exited cleanly but the output is missing or empty`,
    ]);
  });

  it('throws TranscodeError after the last attempt and removes the partial file', async () => {
    const { transcoder, tools } = makeTranscoder(async (command, args) => {
      if (command === 'ffprobe') return { code: 0, stdout: probeJson() };
      await writeFile(args[args.length - 1], 'truncated');
      return { code: 1, stderr: 'No space left on device' };
    }, 2);

    const error = await transcoder.transcode(input, '4:3').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscodeError);
    expect(error).toMatchObject({
      attempts: 2,
      message: 'Delivery render failed after 2 attempt(s): ffmpeg exited with code 1: No space left on device',
    });
    expect(tools.callsWith('libx265')).toHaveLength(2);
    expect(await readdir(dir)).toEqual(['Birthday.mov']);
    expect(logger.linesAt('error')).toEqual([
      `[tapecut] ERROR transcode ${input} attempt 2/2 failed: ffmpeg exited with code 1: No space left on device`,
    ]);
  });
});
