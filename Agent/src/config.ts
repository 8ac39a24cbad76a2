import { z } from 'zod';
import { resolve } from 'node:path';
import { ConfigurationError } from '@mender/shared/Types/errors.js';
import { expandPath, getEnvBoolean, pickEnv } from '@mender/shared/Utils/config.js';

/**
 * LLM providers the generator can talk to
 */
export const LLMProviderSchema = z.enum(['groq', 'openai', 'lmstudio', 'ollama']);
export type LLMProvider = z.infer<typeof LLMProviderSchema>;

export const HistoryBackendSchema = z.enum(['sqlite', 'jsonl']);

/**
 * Configuration schema with Zod validation
 */
export const ConfigSchema = z.object({
  // LLM Provider settings
  llmProvider: LLMProviderSchema.default('groq'),
  /** Overrides the provider's default model */
  model: z.string().min(1).optional(),
  temperature: z.coerce.number().min(0).max(2).default(0.2),
  maxOutputTokens: z.coerce.number().int().positive().default(4_096),
  generationTimeoutMs: z.coerce.number().int().positive().default(120_000),

  // Groq settings
  groqApiKey: z.string().optional(),
  groqModel: z.string().default('llama-3.3-70b-versatile'),

  // OpenAI settings
  openaiApiKey: z.string().optional(),
  openaiModel: z.string().default('gpt-4o-mini'),

  // LM Studio settings
  lmstudioBaseUrl: z.string().url().default('http://localhost:1234/v1'),
  lmstudioModel: z.string().optional(),

  // Ollama settings
  ollamaBaseUrl: z.string().url().default('http://localhost:11434'),
  ollamaModel: z.string().default('qwen2.5-coder'),

  // Run defaults (overridable per run from the CLI)
  maxIterations: z.coerce.number().int().positive().default(5),
  perAttemptTimeoutMs: z.coerce.number().int().positive().default(15_000),
  maxConsecutiveInfraFailures: z.coerce.number().int().positive().default(3),
  memoryLimitMb: z.coerce.number().int().positive().optional(),
  cpuLimitSeconds: z.coerce.number().positive().optional(),
  maxFeedbackChars: z.coerce.number().int().positive().default(2_000),

  // Storage
  historyBackend: HistoryBackendSchema.default('sqlite'),
  historyDir: z.string().default('~/.mender/history'),
  solutionsDir: z.string().default('~/.mender/solutions'),

  // Thought images
  imagesEnabled: z.boolean().default(false),
  imageModel: z.string().default('dall-e-3'),
  imagesDir: z.string().default('~/.mender/images'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Env var for each config field. Unset and empty vars are left out so the
 * schema defaults apply.
 */
const ENV_KEYS = {
  llmProvider: 'MENDER_LLM_PROVIDER',
  model: 'MENDER_MODEL',
  temperature: 'MENDER_TEMPERATURE',
  maxOutputTokens: 'MENDER_MAX_OUTPUT_TOKENS',
  generationTimeoutMs: 'MENDER_GENERATION_TIMEOUT_MS',
  groqApiKey: 'GROQ_API_KEY',
  groqModel: 'GROQ_MODEL',
  openaiApiKey: 'OPENAI_API_KEY',
  openaiModel: 'OPENAI_MODEL',
  lmstudioBaseUrl: 'LMSTUDIO_BASE_URL',
  lmstudioModel: 'LMSTUDIO_MODEL',
  ollamaBaseUrl: 'OLLAMA_BASE_URL',
  ollamaModel: 'OLLAMA_MODEL',
  maxIterations: 'MENDER_MAX_ITERATIONS',
  perAttemptTimeoutMs: 'MENDER_ATTEMPT_TIMEOUT_MS',
  maxConsecutiveInfraFailures: 'MENDER_MAX_INFRA_FAILURES',
  memoryLimitMb: 'MENDER_MEMORY_LIMIT_MB',
  cpuLimitSeconds: 'MENDER_CPU_LIMIT_SECONDS',
  maxFeedbackChars: 'MENDER_MAX_FEEDBACK_CHARS',
  historyBackend: 'MENDER_HISTORY_BACKEND',
  historyDir: 'MENDER_HISTORY_DIR',
  solutionsDir: 'MENDER_SOLUTIONS_DIR',
  imageModel: 'MENDER_IMAGE_MODEL',
  imagesDir: 'MENDER_IMAGES_DIR',
};

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const rawConfig = {
    ...pickEnv(ENV_KEYS),
    imagesEnabled: getEnvBoolean('MENDER_IMAGES_ENABLED', false),
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Configuration validation failed:\n${errors}`, result.error.errors);
  }

  const config = result.data;
  config.historyDir = resolve(expandPath(config.historyDir));
  config.solutionsDir = resolve(expandPath(config.solutionsDir));
  config.imagesDir = resolve(expandPath(config.imagesDir));
  return config;
}

/**
 * Validate that required config for selected provider is present
 */
export function validateProviderConfig(config: Config): void {
  if (config.llmProvider === 'groq' && !config.groqApiKey) {
    throw new ConfigurationError('GROQ_API_KEY is required when using Groq provider');
  }
  if (config.llmProvider === 'openai' && !config.openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is required when using OpenAI provider');
  }
  if (config.imagesEnabled && !config.openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is required when MENDER_IMAGES_ENABLED is set');
  }
}
