import type { Language } from './types.js';

interface LanguageProfile {
  /** Name used in prompts */
  displayName: string;
  /** Fence info strings a model may tag a block of this language with */
  fenceTags: readonly string[];
  commentPrefix: string;
  extension: string;
}

const PROFILES: Record<Language, LanguageProfile> = {
  python: { displayName: 'Python', fenceTags: ['python', 'py', 'python3'], commentPrefix: '#', extension: 'py' },
  node: {
    displayName: 'JavaScript (Node.js, ES module)',
    fenceTags: ['javascript', 'js', 'node', 'mjs'],
    commentPrefix: '//',
    extension: 'mjs',
  },
  bash: { displayName: 'Bash', fenceTags: ['bash', 'sh', 'shell'], commentPrefix: '#', extension: 'sh' },
};

export function languageProfile(language: Language): LanguageProfile {
  return PROFILES[language];
}

/**
 * Code as it is handed to the sandbox: the attempt, then the task's test
 * harness under a marker comment.
 */
export function withTestCode(code: string, language: Language, testCode?: string): string {
  if (!testCode || testCode.trim() === '') {
    return code;
  }
  const { commentPrefix } = PROFILES[language];
  return `${code}\n\n${commentPrefix} Test cases\n${testCode}\n`;
}
