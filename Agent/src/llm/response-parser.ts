/**
 * Split a raw model response into rationale and code.
 *
 * Rationale: the <thinking> block, else any prose before the first fence.
 * Code, first hit wins:
 *   1. a fenced block tagged with one of the language's fence tags
 *   2. any fenced block
 *   3. an unterminated fence running to the end (response cut off)
 *   4. whatever follows </thinking>, or the whole response
 */

import type { Language } from '../core/types.js';
import { languageProfile } from '../core/languages.js';
import type { ParsedResponse } from './types.js';

const THINKING = /<thinking>([\s\S]*?)<\/thinking>/i;
const FENCED_BLOCK = /```([\w+-]*)[^\n]*\n([\s\S]*?)```/g;
const OPEN_FENCE = /```[\w+-]*[^\n]*\n([\s\S]*)$/;

export function parseModelResponse(text: string, language: Language): ParsedResponse {
  const thinking = THINKING.exec(text);
  const closeIdx = text.search(/<\/thinking>/i);
  const afterThinking = closeIdx >= 0 ? text.slice(closeIdx + '</thinking>'.length) : text;

  return {
    rationale: thinking ? thinking[1].trim() : preamble(text),
    code: extractCode(afterThinking, language),
  };
}

function extractCode(text: string, language: Language): string {
  const tags = languageProfile(language).fenceTags;
  const blocks = [...text.matchAll(FENCED_BLOCK)].map((m) => ({ tag: m[1].toLowerCase(), body: m[2] }));

  const tagged = blocks.find((b) => tags.includes(b.tag));
  if (tagged) {
    return tagged.body.trim();
  }
  if (blocks.length > 0) {
    return blocks[0].body.trim();
  }

  const open = OPEN_FENCE.exec(text);
  if (open) {
    return open[1].trim();
  }

  return text.trim();
}

function preamble(text: string): string {
  const fence = text.indexOf('```');
  return fence > 0 ? text.slice(0, fence).trim() : '';
}
