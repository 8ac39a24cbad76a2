/**
 * Pull the exception/trace part out of captured stderr.
 *
 * Only runtimes with a recognizable uncaught-error format yield a trace;
 * anything else leaves it undefined and the caller falls back to stderr.
 */

import type { Language } from '@mender/shared/Types/execution.js';

const PYTHON_TRACEBACK = 'Traceback (most recent call last):';
// Compile-time errors (SyntaxError, IndentationError) print no Traceback header
const PYTHON_LOCATION = /^ {2}File ".*", line \d+/m;

// `Error: boom`, `TypeError [ERR_X]: ...`, `Uncaught SomeException: ...`
const NODE_ERROR_LINE = /^(?:Uncaught )?(?:[A-Za-z_$][\w$]*)?(?:Error|Exception)(?: \[\w+\])?:.*$/m;
const NODE_VERSION_FOOTER = /\n+Node\.js v\d+\.\d+\.\d+\s*$/;

export function extractTrace(language: Language, stderr: string): string | undefined {
  switch (language) {
    case 'python':
      return extractPythonTrace(stderr);
    case 'node':
      return extractNodeTrace(stderr);
    case 'bash':
      return undefined;
  }
}

function extractPythonTrace(stderr: string): string | undefined {
  const idx = stderr.lastIndexOf(PYTHON_TRACEBACK);
  if (idx >= 0) {
    return stderr.slice(idx).trim();
  }
  const location = PYTHON_LOCATION.exec(stderr);
  if (location) {
    return stderr.slice(location.index).trim();
  }
  return undefined;
}

function extractNodeTrace(stderr: string): string | undefined {
  const match = NODE_ERROR_LINE.exec(stderr);
  if (!match) {
    return undefined;
  }
  return stderr.slice(match.index).replace(NODE_VERSION_FOOTER, '').trim();
}
