import { createOpenAI } from '@ai-sdk/openai';
import { createGroq } from '@ai-sdk/groq';
import type { Config } from '../config.js';
import type { ProviderName } from './types.js';

/**
 * Create Groq provider using the dedicated @ai-sdk/groq package.
 */
export function createGroqProvider(config: Config) {
  return createGroq({
    apiKey: config.groqApiKey ?? '',
  });
}

export function createOpenAIProvider(config: Config) {
  return createOpenAI({
    apiKey: config.openaiApiKey ?? '',
    compatibility: 'strict',
  });
}

/**
 * Create LM Studio provider using OpenAI-compatible API
 */
export function createLMStudioProvider(config: Config) {
  return createOpenAI({
    baseURL: config.lmstudioBaseUrl,
    apiKey: 'lm-studio', // LM Studio ignores API key
  });
}

/**
 * Create Ollama provider using OpenAI-compatible API
 */
export function createOllamaProvider(config: Config) {
  // Ollama's OpenAI-compatible endpoint is at /v1
  const baseUrl = config.ollamaBaseUrl.endsWith('/v1') ? config.ollamaBaseUrl : `${config.ollamaBaseUrl}/v1`;

  return createOpenAI({
    baseURL: baseUrl,
    apiKey: 'ollama', // Ollama ignores API key
  });
}

/**
 * Get the model ID for the selected provider
 */
export function getModelId(config: Config): string {
  if (config.model) {
    return config.model;
  }
  switch (config.llmProvider) {
    case 'groq':
      return config.groqModel;
    case 'openai':
      return config.openaiModel;
    case 'lmstudio':
      return config.lmstudioModel || 'local-model';
    case 'ollama':
      return config.ollamaModel;
  }
}

/**
 * Get provider name for logging
 */
export function getProviderDisplayName(provider: ProviderName): string {
  switch (provider) {
    case 'groq':
      return 'Groq';
    case 'openai':
      return 'OpenAI';
    case 'lmstudio':
      return 'LM Studio';
    case 'ollama':
      return 'Ollama';
  }
}
