/**
 * Generator backed by the Vercel AI SDK.
 *
 * One generateText call per attempt, bounded by generationTimeoutMs and the
 * caller's signal. Every failure comes out as a GenerationError whose
 * message is safe to store; the provider error is kept in `details` and
 * logged.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { GenerationError, errorMessage } from '@mender/shared/Types/errors.js';
import { Logger } from '@mender/shared/Utils/logger.js';
import type { Prompt } from '../core/prompt.js';
import type { GenerateOptions, Generation, GenerationUsage, Generator, Language } from '../core/types.js';
import { parseModelResponse } from './response-parser.js';

const logger = new Logger('agent:generator');

export interface LanguageModelGeneratorOptions {
  model: LanguageModel;
  language: Language;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

export class LanguageModelGenerator implements Generator {
  constructor(private readonly options: LanguageModelGeneratorOptions) {}

  async generate(prompt: Prompt, options: GenerateOptions = {}): Promise<Generation> {
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const abortSignal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
    const startTime = Date.now();

    let text: string;
    let usage: GenerationUsage;
    try {
      const result = await generateText({
        model: this.options.model,
        system: prompt.system,
        prompt: prompt.user,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        abortSignal,
      });
      text = result.text;
      usage = {
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
        totalTokens: result.usage.totalTokens,
      };
    } catch (error) {
      if (options.signal?.aborted) {
        throw new GenerationError('generation cancelled', error);
      }
      if (timeout.aborted) {
        throw new GenerationError(`generation timed out after ${this.options.timeoutMs}ms`, error);
      }
      logger.error('Provider call failed', error);
      throw new GenerationError(`provider error: ${errorMessage(error)}`, error);
    }

    logger.debug(`Generation finished in ${Date.now() - startTime}ms`, usage);

    if (text.trim() === '') {
      throw new GenerationError('model returned an empty response');
    }

    const parsed = parseModelResponse(text, this.options.language);
    if (parsed.code === '') {
      throw new GenerationError('no code found in model response', { response: text });
    }
    return { code: parsed.code, rationale: parsed.rationale, usage };
  }
}
