import type { TerminalStatus } from '../core/types.js';

export const EXIT_CODES = {
  SUCCEEDED: 0,
  FAILED: 1,
  ABORTED: 2,
  CONFIGURATION_ERROR: 3,
  UNEXPECTED_ERROR: 4,
} as const;

export function exitCodeFor(status: TerminalStatus): number {
  return EXIT_CODES[status];
}
