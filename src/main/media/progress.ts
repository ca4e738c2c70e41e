/**
 * ffmpeg `-progress pipe:1` parsing.
 *
 * ffmpeg writes blocks of key=value lines, each closed by `progress=continue`
 * or `progress=end`. Only the output position matters here; it is turned
 * into a lazy sequence of ticks so callers never see the wire format.
 */

import type { ProgressTick } from '../../shared/types';

/**
 * Parse "HH:MM:SS.ffffff" into seconds; null for N/A or garbage.
 */
export function parseClockTime(value: string): number | null {
  const match = /^(-?\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/.exec(value.trim());
  if (!match) return null;
  const seconds = Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}

export async function* parseProgress(
  lines: AsyncIterable<string>,
  total?: number,
): AsyncGenerator<ProgressTick> {
  let last = -1;

  for await (const line of lines) {
    const separator = line.indexOf('=');
    if (separator < 0) continue;
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();

    if (key === 'out_time') {
      const seconds = parseClockTime(value);
      if (seconds !== null && seconds > last) {
        last = seconds;
        yield { unit: 'seconds', processed: seconds, total };
      }
    } else if (key === 'progress' && value === 'end' && total !== undefined && last < total) {
      last = total;
      yield { unit: 'seconds', processed: total, total };
    }
  }
}
