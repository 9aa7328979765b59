import { DIAGNOSTIC_SOURCE, SEVERITY_ERROR, type Diagnostic, type Range } from './types.js';
import { byteColumn, charIndex, toLines } from './edits.js';

// Position formats seen in parser errors, most specific first (1-based line and column)
const POSITION_PATTERNS = [/line (\d+), column (\d+)/, /line (\d+):(\d+)/, /(\d+):(\d+)/];
const POSITION_PREFIXES = [/error parsing at line \d+, column \d+: /g, /line \d+:\d+: /g, /\d+:\d+: /g];

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Zero-based position named in a parser error message; start of document when none is found. */
export function extractPosition(message: string): { line: number; column: number } {
  for (const re of POSITION_PATTERNS) {
    const m = re.exec(message);
    if (m && m[1] !== undefined && m[2] !== undefined) {
      return {
        line: Math.max(0, Number.parseInt(m[1], 10) - 1),
        column: Math.max(0, Number.parseInt(m[2], 10) - 1),
      };
    }
  }
  return { line: 0, column: 0 };
}

export function cleanErrorMessage(message: string): string {
  return POSITION_PREFIXES.reduce((acc, re) => acc.replace(re, ''), message).trim();
}

/** Range covering the word at a position, at least one column wide. */
export function positionToRange(text: string, line: number, column: number): Range {
  const lines = toLines(text);
  const ln = Math.max(0, Math.min(lines.length - 1, line));
  const lineText = lines[ln] ?? '';
  const startIdx = charIndex(lineText, Math.max(0, column));
  let endIdx = startIdx;
  while (endIdx < lineText.length && !/\s/.test(lineText.charAt(endIdx))) endIdx++;
  const start = byteColumn(lineText, startIdx);
  const end = endIdx === startIdx ? start + 1 : byteColumn(lineText, endIdx);
  return { start: { line: ln, character: start }, end: { line: ln, character: end } };
}

export function parseErrorToDiagnostic(text: string, err: unknown): Diagnostic {
  const message = errorMessage(err);
  const { line, column } = extractPosition(message);
  return {
    range: positionToRange(text, line, column),
    severity: SEVERITY_ERROR,
    source: DIAGNOSTIC_SOURCE,
    message: cleanErrorMessage(message),
  };
}
