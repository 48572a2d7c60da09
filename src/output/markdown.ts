/**
 * Markdown building blocks shared by the document renderers.
 */

export type BlockLanguage = 'json' | 'html' | 'text';

/**
 * Wrap content in a fenced block whose fence is longer than any backtick
 * run inside the content.
 */
export function fencedBlock(content: string, language: BlockLanguage = 'text'): string {
  const longestRun = Math.max(0, ...(content.match(/`+/g) ?? []).map((run) => run.length));
  const fence = '`'.repeat(Math.max(3, longestRun + 1));
  const body = content.endsWith('\n') ? content : `${content}\n`;
  return `${fence}${language}\n${body}${fence}`;
}

/**
 * Escape text for use inside a table cell.
 */
export function tableCell(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function tableRow(cells: Array<string | number>): string {
  return `| ${cells.map((cell) => tableCell(String(cell))).join(' | ')} |`;
}

/**
 * Seconds with two decimals, or `fallback` for a missing value.
 */
export function formatSeconds(seconds: number | null, fallback = 'n/a'): string {
  return seconds === null ? fallback : seconds.toFixed(2);
}

export function durationLabel(seconds: number, missing: boolean): string {
  return missing ? 'missing' : `${seconds.toFixed(2)}s`;
}

const MARKUP_PATTERN = /^\s*<(!doctype|[a-z][\w-]*)(\s[^>]*)?\/?>/i;

/**
 * Guess how a block of message content should be presented.
 */
export function detectLanguage(content: string): BlockLanguage {
  const trimmed = content.trim();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (typeof parsed === 'object' && parsed !== null) return 'json';
    } catch {
      return 'text';
    }
  }
  return MARKUP_PATTERN.test(trimmed) ? 'html' : 'text';
}
