/**
 * Markdown output formatting.
 *
 * Responses are produced as markdown; `plaintext` strips the markup for
 * clients that render raw text.
 */

import type { OutputFormat } from "@shared/schema";

interface FormatRule {
  pattern: RegExp;
  replacement: string;
}

const formatters: Record<OutputFormat, FormatRule[]> = {
  markdown: [],
  plaintext: [
    { pattern: /\*\*(.+?)\*\*/g, replacement: '$1' },
    { pattern: /\*(.+?)\*/g, replacement: '$1' },
    { pattern: /~~(.+?)~~/g, replacement: '$1' },
    { pattern: /`(.+?)`/g, replacement: '$1' },
    { pattern: /^#+\s+/gm, replacement: '' },
    { pattern: /^[-*]\s+/gm, replacement: '- ' },
  ],
};

/**
 * Convert markdown to the requested output format.
 */
export function formatMarkdown(text: string, format: OutputFormat): string {
  let result = text;
  for (const rule of formatters[format]) {
    result = result.replace(rule.pattern, rule.replacement);
  }
  return result;
}
