import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { homedir } from 'node:os';
import { ConfigurationError } from '@mender/shared/Types/errors.js';
import { loadConfig, validateProviderConfig } from '../../src/config.js';
import { DEFAULT_RUN_CONFIG, parseRunConfig, parseTask } from '../../src/core/run-config.js';

const ENV_KEYS = [
  'MENDER_LLM_PROVIDER',
  'MENDER_MAX_ITERATIONS',
  'MENDER_HISTORY_BACKEND',
  'MENDER_HISTORY_DIR',
  'MENDER_IMAGES_ENABLED',
  'MENDER_TEMPERATURE',
  'GROQ_API_KEY',
  'OPENAI_API_KEY',
];

function clearEnv(): void {
  for (const key of ENV_KEYS) delete process.env[key];
}

beforeEach(clearEnv);
afterEach(clearEnv);

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig();
    expect(config.llmProvider).toBe('groq');
    expect(config.maxIterations).toBe(5);
    expect(config.perAttemptTimeoutMs).toBe(15_000);
    expect(config.historyBackend).toBe('sqlite');
    expect(config.historyDir).toBe(`${homedir()}/.mender/history`);
    expect(config.imagesEnabled).toBe(false);
  });

  it('reads env overrides', () => {
    process.env.MENDER_LLM_PROVIDER = 'ollama';
    process.env.MENDER_MAX_ITERATIONS = '8';
    process.env.MENDER_HISTORY_BACKEND = 'jsonl';
    process.env.MENDER_HISTORY_DIR = '/tmp/mender-history';
    process.env.MENDER_IMAGES_ENABLED = 'true';

    const config = loadConfig();
    expect(config.llmProvider).toBe('ollama');
    expect(config.maxIterations).toBe(8);
    expect(config.historyBackend).toBe('jsonl');
    expect(config.historyDir).toBe('/tmp/mender-history');
    expect(config.imagesEnabled).toBe(true);
  });

  it('treats empty env vars as unset', () => {
    process.env.MENDER_LLM_PROVIDER = '';
    expect(loadConfig().llmProvider).toBe('groq');
  });

  it('throws a ConfigurationError on invalid values', () => {
    process.env.MENDER_TEMPERATURE = '7';
    expect(() => loadConfig()).toThrow(ConfigurationError);
    expect(() => loadConfig()).toThrow(/temperature/);
  });
});

describe('validateProviderConfig', () => {
  it('requires an API key for hosted providers', () => {
    expect(() => validateProviderConfig(loadConfig())).toThrow('GROQ_API_KEY is required when using Groq provider');

    process.env.GROQ_API_KEY = 'test-secret';
    expect(() => validateProviderConfig(loadConfig())).not.toThrow();
  });

  it('needs no key for local providers', () => {
    process.env.MENDER_LLM_PROVIDER = 'lmstudio';
    expect(() => validateProviderConfig(loadConfig())).not.toThrow();
  });
});

describe('parseRunConfig', () => {
  it('fills defaults', () => {
    expect(parseRunConfig({})).toEqual({ maxIterations: 5, perAttemptTimeoutMs: 15_000, maxConsecutiveInfraFailures: 3 });
    expect(DEFAULT_RUN_CONFIG.maxIterations).toBe(5);
  });

  it('rejects non-positive bounds and unknown keys', () => {
    expect(() => parseRunConfig({ maxIterations: 0 })).toThrow('Invalid run config: maxIterations');
    expect(() => parseRunConfig({ perAttemptTimeoutMs: 1.5 })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ retries: 3 })).toThrow(ConfigurationError);
  });
});

describe('parseTask', () => {
  it('defaults the language to python', () => {
    expect(parseTask({ statement: 'Print 1' })).toEqual({ statement: 'Print 1', language: 'python' });
  });

  it('rejects an empty statement and unknown languages', () => {
    expect(() => parseTask({ statement: '' })).toThrow('Invalid task: statement: statement must not be empty');
    expect(() => parseTask({ statement: 'x', language: 'ruby' })).toThrow(ConfigurationError);
  });
});
