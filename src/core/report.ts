import { SEVERITY_ERROR, type Diagnostic } from './types.js';
import { charIndex, toLines } from './edits.js';

export type OutputFormat = 'text' | 'json';

export function isError(d: Diagnostic): boolean {
  return (d.severity ?? SEVERITY_ERROR) === SEVERITY_ERROR;
}

export function groupDiagnostics(diagnostics: readonly Diagnostic[]) {
  const errs = diagnostics.filter(isError);
  const warns = diagnostics.filter((d) => !isError(d));
  return { errs, warns };
}

export function textReport(filename: string, content: string, diagnostics: readonly Diagnostic[]): string {
  const { errs, warns } = groupDiagnostics(diagnostics);
  if (errs.length === 0 && warns.length === 0) return 'Valid';

  const allLines = toLines(content);
  const numWidth = String(allLines.length).length;
  const fmtNum = (n: number) => String(n).padStart(numWidth, ' ');
  const lines: string[] = [];

  const printBlock = (kind: 'error' | 'warning', d: Diagnostic) => {
    const kindColor = kind === 'error' ? '\x1b[31merror\x1b[0m' : '\x1b[33mwarning\x1b[0m';
    const code = d.code !== undefined ? `[${d.code}]` : '';
    const idx = Math.max(0, Math.min(allLines.length - 1, d.range.start.line));
    const text = allLines[idx] ?? '';
    // Ranges count UTF-8 bytes; the frame and the printed column count characters
    const startIdx = charIndex(text, d.range.start.character);
    const endIdx = d.range.end.line === d.range.start.line ? charIndex(text, d.range.end.character) : text.length;

    lines.push(`${kindColor}${code}: ${d.message}`);
    lines.push(`at ${filename}:${idx + 1}:${startIdx + 1}`);
    if (idx > 0) lines.push(`  ${fmtNum(idx)} | ${allLines[idx - 1] ?? ''}`);
    lines.push(`  ${fmtNum(idx + 1)} | ${text}`);
    const caretLen = Math.max(1, endIdx - startIdx);
    lines.push(`  ${' '.repeat(numWidth)} | ${' '.repeat(startIdx)}\x1b[31m${'^'.repeat(caretLen)}\x1b[0m`);
    if (idx + 1 < allLines.length) lines.push(`  ${fmtNum(idx + 2)} | ${allLines[idx + 1] ?? ''}`);
    lines.push('');
  };

  for (const e of errs) printBlock('error', e);
  for (const w of warns) printBlock('warning', w);
  return lines.join('\n');
}

export function toJsonResult(filename: string, diagnostics: readonly Diagnostic[]) {
  const { errs, warns } = groupDiagnostics(diagnostics);
  return {
    file: filename,
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
  };
}
