import type { LanguageModel } from 'ai';
import type { Config } from '../config.js';
import { Logger } from '@mender/shared/Utils/logger.js';
import {
  createGroqProvider,
  createLMStudioProvider,
  createOllamaProvider,
  createOpenAIProvider,
  getModelId,
  getProviderDisplayName,
} from './providers.js';

const logger = new Logger('agent:llm');

/**
 * Create a language model instance based on configuration
 */
export function createLanguageModel(config: Config): LanguageModel {
  const modelId = getModelId(config);
  const providerName = getProviderDisplayName(config.llmProvider);

  logger.info(`Initializing ${providerName} with model: ${modelId}`);

  switch (config.llmProvider) {
    case 'groq':
      return createGroqProvider(config)(modelId);
    case 'openai':
      return createOpenAIProvider(config)(modelId);
    case 'lmstudio':
      return createLMStudioProvider(config)(modelId);
    case 'ollama':
      return createOllamaProvider(config)(modelId);
  }
}

/**
 * Provider and model in use, for logs and episode output
 */
export function getProviderInfo(config: Config): { provider: string; model: string } {
  return {
    provider: getProviderDisplayName(config.llmProvider),
    model: getModelId(config),
  };
}
