/**
 * Supported LLM provider names
 */
export type ProviderName = 'groq' | 'openai' | 'lmstudio' | 'ollama';

/**
 * Thought and code pulled out of a raw model response
 */
export interface ParsedResponse {
  rationale: string;
  code: string;
}
