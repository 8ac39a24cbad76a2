/**
 * Human-readable rendering of progress events, episodes and episode lists.
 */

import type { RunEvent } from '../core/events.js';
import type { Episode, Triple } from '../core/types.js';
import type { EpisodeSummary } from '../history/types.js';

function firstLine(text: string): string {
  const line = text.split('\n', 1)[0] ?? '';
  return line.length > 120 ? `${line.slice(0, 117)}...` : line;
}

function countLines(code: string): number {
  return code.trimEnd().split('\n').length;
}

export function formatEvent(event: RunEvent): string | null {
  switch (event.type) {
    case 'episode_started':
      return `Episode ${event.episodeId} started (${event.task.language})`;
    case 'attempt_started':
      return `Attempt ${event.iteration + 1}: generating`;
    case 'attempt_generated': {
      const tokens = event.usage ? `, ${event.usage.totalTokens} tokens` : '';
      const artifact = event.attempt.artifactRef ? `, thought image ${event.attempt.artifactRef}` : '';
      return `Attempt ${event.attempt.iteration + 1}: ${countLines(event.attempt.code)} line(s) of code${tokens}${artifact}`;
    }
    case 'attempt_executed':
      if (!event.result) return null;
      if (event.result.timedOut) {
        return `Attempt ${event.iteration + 1}: timed out after ${event.result.durationMs}ms`;
      }
      return `Attempt ${event.iteration + 1}: ran in ${event.result.durationMs}ms, exit ${event.result.exitStatus ?? 'none'}`;
    case 'attempt_diagnosed':
      return `Attempt ${event.iteration + 1}: ${event.diagnosis.category} - ${firstLine(event.diagnosis.feedback)}`;
    case 'episode_finished':
      return `Episode ${event.episode.id} ${event.episode.status} after ${event.episode.triples.length} attempt(s)`;
  }
}

function formatTriple(triple: Triple): string {
  const { attempt, result, diagnosis } = triple;
  const lines = [`--- Attempt ${attempt.iteration + 1} (${attempt.createdAt}) ---`, `Diagnosis: ${diagnosis.category}`];
  if (diagnosis.feedback) lines.push(diagnosis.feedback);
  if (attempt.rationale) lines.push('', 'Rationale:', attempt.rationale);
  if (attempt.artifactRef) lines.push(`Thought image: ${attempt.artifactRef}`);
  if (attempt.code) lines.push('', 'Code:', attempt.code);
  if (result) {
    lines.push('', `Exit status: ${result.exitStatus ?? 'none'}, ${result.durationMs}ms${result.timedOut ? ', timed out' : ''}`);
    if (result.stdout) lines.push('stdout:', result.stdout.trimEnd());
    if (result.stderr) lines.push('stderr:', result.stderr.trimEnd());
  }
  return lines.join('\n');
}

export function formatEpisode(episode: Episode): string {
  const header = [
    `Episode ${episode.id}`,
    `Status:    ${episode.status}${episode.stopReason ? ` (${episode.stopReason})` : ''}`,
    `Language:  ${episode.task.language}`,
    `Started:   ${episode.startedAt}`,
    `Ended:     ${episode.endedAt ?? '-'}`,
    `Attempts:  ${episode.triples.length}`,
    '',
    'Task:',
    episode.task.statement,
  ];
  const body = episode.triples.map(formatTriple);
  const footer = episode.finalCode !== undefined ? ['', '=== Final code ===', episode.finalCode] : [];
  return [...header, '', ...body, ...footer].join('\n');
}

/** One-screen result of `mender run` */
export function formatOutcome(episode: Episode, solutionPath: string | null): string {
  const lines = [`${episode.status}: episode ${episode.id} after ${episode.triples.length} attempt(s)`];
  const last = episode.triples.at(-1);
  if (episode.status !== 'SUCCEEDED' && last) {
    lines.push(`Last diagnosis: ${last.diagnosis.category} - ${firstLine(last.diagnosis.feedback)}`);
  }
  if (solutionPath) {
    lines.push(`Solution: ${solutionPath}`);
  }
  return lines.join('\n');
}

export function formatSummaries(summaries: readonly EpisodeSummary[]): string {
  if (summaries.length === 0) {
    return 'No episodes found';
  }
  return summaries
    .map((s) => {
      const statement = firstLine(s.statement);
      const short = statement.length > 50 ? `${statement.slice(0, 47)}...` : statement;
      return `${s.id}  ${s.status.padEnd(9)}  ${String(s.attempts).padStart(2)}  ${s.language.padEnd(6)}  ${s.startedAt}  ${short}`;
    })
    .join('\n');
}
