/**
 * Production wiring: env config -> model, sandbox, history, renderer.
 */

import { SubprocessSandbox } from '@mender/sandbox';
import { Logger } from '@mender/shared/Utils/logger.js';
import type { Config } from './config.js';
import { ResultClassifier } from './core/classifier.js';
import { Orchestrator } from './core/orchestrator.js';
import type { Language, ThoughtRenderer } from './core/types.js';
import { createHistoryStore } from './history/index.js';
import type { HistoryStore } from './history/types.js';
import { createLanguageModel, getProviderInfo } from './llm/factory.js';
import { LanguageModelGenerator } from './llm/generator.js';
import { createOpenAIProvider } from './llm/providers.js';
import { ImageThoughtRenderer } from './visualizer/image-renderer.js';

const logger = new Logger('agent:runtime');

export function openHistory(config: Config): HistoryStore {
  logger.debug(`Opening ${config.historyBackend} history in ${config.historyDir}`);
  return createHistoryStore(config.historyBackend, config.historyDir);
}

function createRenderer(config: Config): ThoughtRenderer | undefined {
  if (!config.imagesEnabled) {
    return undefined;
  }
  const openai = createOpenAIProvider(config);
  return new ImageThoughtRenderer({ model: openai.image(config.imageModel), outputDir: config.imagesDir });
}

export function createOrchestrator(config: Config, history: HistoryStore, language: Language): Orchestrator {
  const { provider, model } = getProviderInfo(config);
  logger.info(`Generator: ${provider} / ${model}`);

  const generator = new LanguageModelGenerator({
    model: createLanguageModel(config),
    language,
    timeoutMs: config.generationTimeoutMs,
    temperature: config.temperature,
    maxTokens: config.maxOutputTokens,
  });

  return new Orchestrator({
    generator,
    createSandbox: (lang) => new SubprocessSandbox({ language: lang }),
    history,
    classifier: new ResultClassifier({ maxFeedbackChars: config.maxFeedbackChars }),
    renderer: createRenderer(config),
  });
}
