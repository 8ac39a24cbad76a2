import { randomUUID } from 'node:crypto';

export function generateEpisodeId(): string {
  return `ep_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
