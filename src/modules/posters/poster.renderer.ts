import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { runCommand, type CommandRunner } from '../../lib/command.js';
import { RenderError, errorMessage } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import { escapeCaptionText } from '../pointsize/pointsize.measurer.js';
import type { Size } from './catalog.schemas.js';

const logger = createChildLogger('poster-renderer');

export interface RenderParams {
  text: string;
  font: string;
  pointSize: number;
  canvas: Size;
  box: Size;
  background: string;
  textColor: string;
  outputPath: string;
}

export interface PosterRenderer {
  /** Writes the poster and resolves with its path */
  render(params: RenderParams, signal?: AbortSignal): Promise<string>;
}

export interface MagickRendererOptions {
  binary: string;
  timeoutMs: number;
  quality?: number;
  run?: CommandRunner;
}

export function buildRenderArgs(params: RenderParams, quality = 92): string[] {
  return [
    '-size', `${params.canvas.width}x${params.canvas.height}`,
    `xc:${params.background}`,
    '(',
    '-size', `${params.box.width}x${params.box.height}`,
    '-background', 'none',
    '-font', params.font,
    '-pointsize', String(params.pointSize),
    '-fill', params.textColor,
    '-gravity', 'center',
    `caption:${escapeCaptionText(params.text)}`,
    ')',
    '-gravity', 'center',
    '-composite',
    '-quality', String(quality),
    params.outputPath,
  ];
}

/**
 * Renders a solid-background poster with a centered caption through ImageMagick
 */
export function createMagickPosterRenderer(options: MagickRendererOptions): PosterRenderer {
  const run = options.run ?? runCommand;
  const quality = options.quality ?? 92;

  return {
    async render(params, signal) {
      try {
        await mkdir(dirname(params.outputPath), { recursive: true });
        await run({
          bin: options.binary,
          args: buildRenderArgs(params, quality),
          timeoutMs: options.timeoutMs,
          signal,
        });
      } catch (error) {
        throw new RenderError(
          `Rendering "${params.text}" to ${params.outputPath} failed: ${errorMessage(error)}`,
          { outputPath: params.outputPath, cause: error }
        );
      }

      logger.debug({ outputPath: params.outputPath, pointSize: params.pointSize }, 'Poster rendered');
      return params.outputPath;
    },
  };
}
