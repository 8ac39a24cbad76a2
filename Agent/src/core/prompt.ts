/**
 * Prompt construction.
 *
 * A prompt is a pure fold over the task and the episode's triples so far:
 * the same prefix always yields the same prompt, which keeps the transcript
 * free of hidden state.
 */

import { languageProfile } from './languages.js';
import type { DiagnosisCategory, Task, Triple } from './types.js';

export interface Prompt {
  system: string;
  user: string;
}

/** Diagnoses caused by the generated code itself; only these feed back into prompts */
const CORRECTABLE: ReadonlySet<DiagnosisCategory> = new Set(['CodeError', 'AssertionFailure', 'Timeout']);

export function isCorrectable(category: DiagnosisCategory): boolean {
  return CORRECTABLE.has(category);
}

export function buildSystemPrompt(task: Task): string {
  const { displayName, fenceTags } = languageProfile(task.language);
  const fence = fenceTags[0];

  return `You are an expert ${displayName} programmer working in a write-run-fix loop.

Every answer has two parts:
1. Reasoning. Think step by step about the problem, or about the error when fixing earlier code. Name the root cause before changing anything. Put all of this inside <thinking></thinking> tags.
2. Code. Write the complete, self-contained program in a single \`\`\`${fence} block. It is run as-is, so it must not wait for input. Do not write anything after the code block.

If test cases are given they are appended to your program and run with it. Do not copy them into your answer.`;
}

export function buildPrompt(task: Task, triples: readonly Triple[]): Prompt {
  const { displayName, fenceTags } = languageProfile(task.language);
  const fence = fenceTags[0];
  const sections: string[] = [`## Problem\n${task.statement.trim()}`];

  if (task.testCode && task.testCode.trim() !== '') {
    sections.push(`## Test cases\n\`\`\`${fence}\n${task.testCode.trim()}\n\`\`\``);
  }

  const predicate = task.predicate;
  if (predicate?.expectedStdout !== undefined) {
    sections.push(`## Expected output\nThe program must print exactly:\n\`\`\`\n${predicate.expectedStdout.trimEnd()}\n\`\`\``);
  } else if (predicate?.stdoutContains !== undefined) {
    sections.push(`## Expected output\nThe output must contain: ${JSON.stringify(predicate.stdoutContains)}`);
  }

  const correctable = triples.filter((t) => isCorrectable(t.diagnosis.category));
  const last = correctable.at(-1);

  if (!last) {
    sections.push(`Write a ${displayName} program that solves this problem.`);
  } else {
    const history = correctable
      .map((t) => `### Attempt ${t.attempt.iteration + 1}: ${t.diagnosis.category}\n${t.diagnosis.feedback}`)
      .join('\n\n');
    sections.push(`## Previous failures (oldest first)\n${history}`);
    sections.push(`## Your most recent code\n\`\`\`${fence}\n${last.attempt.code.trim()}\n\`\`\``);
    sections.push(
      'The code above failed. Do not apologize. Explain the failure in <thinking> tags, then give the complete corrected program.',
    );
  }

  return { system: buildSystemPrompt(task), user: sections.join('\n\n') };
}
