import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { languageProfile } from '../core/languages.js';
import type { Episode } from '../core/types.js';

export function solutionPath(solutionsDir: string, episode: Pick<Episode, 'id' | 'task'>): string {
  return join(solutionsDir, `solution-${episode.id}.${languageProfile(episode.task.language).extension}`);
}

/**
 * Write the code of a successful episode to the solutions directory.
 * Returns null when the episode has no final code.
 */
export async function saveSolution(solutionsDir: string, episode: Episode): Promise<string | null> {
  if (episode.finalCode === undefined) {
    return null;
  }
  await mkdir(solutionsDir, { recursive: true });
  const path = solutionPath(solutionsDir, episode);
  await writeFile(path, episode.finalCode.endsWith('\n') ? episode.finalCode : `${episode.finalCode}\n`, 'utf-8');
  return path;
}
