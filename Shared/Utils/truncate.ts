/**
 * Output truncation.
 *
 * - truncateOutput(): head+tail, for captured process output where both the
 *   first lines (results) and the last lines (errors/status) matter.
 * - truncateTail(): keeps only the end, for error feedback where the final
 *   frames of a trace carry the cause.
 */

export interface TruncateConfig {
  maxChars: number;
  head: number;
  tail: number;
}

export interface TruncateResult {
  text: string;
  truncated: boolean;
}

export function truncateOutput(
  output: string,
  config: TruncateConfig,
): TruncateResult {
  if (output.length <= config.maxChars) {
    return { text: output, truncated: false };
  }

  const dropped = output.length - config.head - config.tail;
  const separator = `\n\n[... truncated ${dropped} characters ...]\n\n`;
  const text =
    output.slice(0, config.head) + separator + output.slice(-config.tail);

  return { text, truncated: true };
}

export function truncateTail(text: string, maxChars: number): TruncateResult {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  const dropped = text.length - maxChars;
  return {
    text: `[... truncated ${dropped} characters ...]\n${text.slice(-maxChars)}`,
    truncated: true,
  };
}
