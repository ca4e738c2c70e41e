/**
 * prompts.ts - Terminal questions put to the operator
 */

import { createInterface, type Interface } from 'readline';
import { UsageError } from '../main/errors';
import type { OperatorPrompts } from '../main/pipeline/PipelineOrchestrator';
import type { GeometryPreset } from '../shared/types';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Accepts the menu letters as well as the preset names.
 */
export function parseGeometry(value: string): GeometryPreset | null {
  switch (value.trim().toLowerCase()) {
    case 'a':
    case '4:3':
      return '4:3';
    case 'b':
    case '16:9':
    case 'anamorphic-16:9':
      return 'anamorphic-16:9';
    default:
      return null;
  }
}

export interface CliPrompts extends OperatorPrompts {
  /** Release the terminal; questions after this reject */
  close(): void;
}

/**
 * One readline interface serves every question of a CLI run. Lines are read
 * through its async iterator, which buffers them, so piped answers that
 * arrive in a single chunk are each kept for the question they answer.
 */
export function createPrompts(streams: PromptStreams = { input: process.stdin, output: process.stdout }): CliPrompts {
  let rl: Interface | null = null;
  let lines: AsyncIterator<string> | null = null;

  const ask = async (query: string): Promise<string> => {
    if (!lines) {
      rl = createInterface({ input: streams.input, terminal: false });
      lines = rl[Symbol.asyncIterator]();
    }
    streams.output.write(query);
    const next = await lines.next();
    if (next.done) {
      throw new UsageError('Input closed before an answer was given');
    }
    return next.value;
  };

  return {
    async chooseGeometry(stem: string): Promise<GeometryPreset> {
      streams.output.write(
        `\n  Output geometry for ${stem}:\n` +
          '    A) 4:3              640x480\n' +
          '    B) anamorphic 16:9  854x480\n',
      );
      for (;;) {
        const preset = parseGeometry(await ask('  Choose A or B: '));
        if (preset) return preset;
        streams.output.write('  Please answer A or B.\n');
      }
    },

    async awaitManualSort(clipsDir: string): Promise<void> {
      streams.output.write(
        `\n  Clips are ready in ${clipsDir}\n` +
          '  Sort them into folders (one folder per final clip), leave the rest loose.\n',
      );
      await ask('  Press ENTER when done... ');
    },

    close(): void {
      rl?.close();
    },
  };
}
