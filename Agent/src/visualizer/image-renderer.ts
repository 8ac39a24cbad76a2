/**
 * Turns an attempt's rationale into an image, one PNG per attempt.
 *
 * Purely a side-channel: failures are logged and reported as null, and the
 * orchestrator carries on without an artifact.
 */

import { experimental_generateImage as generateImage } from 'ai';
import type { ImageModel } from 'ai';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '@mender/shared/Utils/logger.js';
import type { RenderContext, ThoughtRenderer } from '../core/types.js';

const logger = new Logger('agent:visualizer');

const MAX_THOUGHT_CHARS = 800;

export interface ImageThoughtRendererOptions {
  model: ImageModel;
  outputDir: string;
  size?: `${number}x${number}`;
}

export function buildImagePrompt(rationale: string): string {
  const thought = rationale.replace(/\s+/g, ' ').trim().slice(0, MAX_THOUGHT_CHARS);
  return (
    "Digital art, an abstract and minimalistic visualization of a programmer's reasoning. " +
    `Nodes, glowing connections and logic flows representing the idea: "${thought}".`
  );
}

export function imagePath(outputDir: string, context: RenderContext): string {
  return join(outputDir, `${context.episodeId}-attempt-${context.iteration + 1}.png`);
}

export class ImageThoughtRenderer implements ThoughtRenderer {
  constructor(private readonly options: ImageThoughtRendererOptions) {}

  async render(rationale: string, context: RenderContext): Promise<string | null> {
    try {
      const { image } = await generateImage({
        model: this.options.model,
        prompt: buildImagePrompt(rationale),
        size: this.options.size ?? '1024x1024',
      });

      await mkdir(this.options.outputDir, { recursive: true });
      const path = imagePath(this.options.outputDir, context);
      await writeFile(path, image.uint8Array);
      logger.info(`Thought image saved to ${path}`);
      return path;
    } catch (error) {
      logger.warn(`Failed to render thought for attempt ${context.iteration + 1}`, error);
      return null;
    }
  }
}
