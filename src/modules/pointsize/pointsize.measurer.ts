import { CommandError, runCommand, type CommandRunner } from '../../lib/command.js';
import {
  MeasurementError,
  errorMessage,
  type MeasurementFailureReason,
  type MeasurementQuery,
} from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';

const logger = createChildLogger('pointsize-measurer');

export interface TextMeasurer {
  /** Largest point size at which `text` still fits the box, as suggested by the measuring tool */
  measure(query: MeasurementQuery, signal?: AbortSignal): Promise<number>;
}

export interface MagickMeasurerOptions {
  binary: string;
  timeoutMs: number;
  run?: CommandRunner;
}

/**
 * Escape text for an ImageMagick `caption:` / `label:` argument.
 * `%` and `\` are escape introducers and a leading `@` reads the text from a file.
 */
export function escapeCaptionText(text: string): string {
  const escaped = text.replace(/\\/g, '\\\\').replace(/%/g, '%%');
  return escaped.startsWith('@') ? `\\${escaped}` : escaped;
}

export function buildMeasureArgs(query: MeasurementQuery): string[] {
  return [
    '-background', 'none',
    '-font', query.font,
    '-size', `${query.width}x${query.height}`,
    '-gravity', 'center',
    `caption:${escapeCaptionText(query.text)}`,
    '-format', '%[caption:pointsize]',
    'info:',
  ];
}

/** Parse the `%[caption:pointsize]` output into a whole point size */
export function parsePointSize(output: string): number | null {
  const trimmed = output.trim();
  if (!/^\d+(?:\.\d+)?$/.test(trimmed)) return null;
  const value = Math.floor(Number(trimmed));
  return value > 0 ? value : null;
}

function failureReason(error: unknown): MeasurementFailureReason {
  if (error instanceof CommandError) return error.kind;
  return 'spawn';
}

/** Measures captions with ImageMagick's auto-sizing `caption:` coder in dry-run (`info:`) mode */
export function createMagickTextMeasurer(options: MagickMeasurerOptions): TextMeasurer {
  const run = options.run ?? runCommand;

  return {
    async measure(query, signal) {
      let stdout: string;
      try {
        stdout = await run({
          bin: options.binary,
          args: buildMeasureArgs(query),
          timeoutMs: options.timeoutMs,
          signal,
        });
      } catch (error) {
        throw new MeasurementError(failureReason(error), query, {
          detail: errorMessage(error),
          cause: error,
        });
      }

      const pointSize = parsePointSize(stdout);
      if (pointSize === null) {
        throw new MeasurementError('parse', query, {
          detail: `unexpected output ${JSON.stringify(stdout.trim())}`,
        });
      }

      logger.debug({ ...query, pointSize }, 'Measured caption point size');
      return pointSize;
    },
  };
}
