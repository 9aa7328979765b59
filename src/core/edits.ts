import type { Position, Range, TextEdit } from './types.js';

// Positions are zero-based; `character` counts UTF-8 bytes within the line.

export function toLines(text: string): string[] {
  return text.split('\n');
}

export function byteLength(s: string): number {
  return Buffer.byteLength(s, 'utf8');
}

/** UTF-8 byte column of a UTF-16 index within a line. */
export function byteColumn(lineText: string, index: number): number {
  return byteLength(lineText.slice(0, index));
}

/** UTF-16 index of a UTF-8 byte column; columns inside a multi-byte character snap to its start. */
export function charIndex(lineText: string, column: number): number {
  let bytes = 0;
  let index = 0;
  for (const ch of lineText) {
    const size = byteLength(ch);
    if (bytes + size > column) break;
    bytes += size;
    index += ch.length;
  }
  return index;
}

export function positionToOffset(text: string, pos: Position): number {
  const lines = toLines(text);
  const lineIdx = Math.max(0, Math.min(lines.length - 1, pos.line));
  let off = 0;
  for (let i = 0; i < lineIdx; i++) off += (lines[i]?.length ?? 0) + 1; // +1 for newline
  return off + charIndex(lines[lineIdx] ?? '', Math.max(0, pos.character));
}

export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line < b.line ? -1 : 1;
  if (a.character !== b.character) return a.character < b.character ? -1 : 1;
  return 0;
}

export function rangesOverlap(a: Range, b: Range): boolean {
  return comparePositions(a.start, b.end) < 0 && comparePositions(b.start, a.end) < 0;
}

/** True when the range addresses existing lines and columns of `text`. */
export function rangeInBounds(text: string, range: Range): boolean {
  const lines = toLines(text);
  const inBounds = (p: Position) => {
    const lineText = lines[p.line];
    return lineText !== undefined && p.character >= 0 && p.character <= byteLength(lineText);
  };
  return inBounds(range.start) && inBounds(range.end) && comparePositions(range.start, range.end) <= 0;
}

/**
 * Apply edits one after another, resolving each range against the text as modified so far.
 * Batches from `composeFixAll` are ordered bottom-up, so every range still refers to
 * untouched text when its turn comes.
 */
export function applyEdits(text: string, edits: readonly TextEdit[]): string {
  let out = text;
  for (const e of edits) {
    const startOff = positionToOffset(out, e.range.start);
    const endOff = Math.max(startOff, positionToOffset(out, e.range.end));
    out = out.slice(0, startOff) + e.newText + out.slice(endOff);
  }
  return out;
}

export function replaceRange(line: number, start: number, end: number, newText: string): TextEdit {
  return { range: { start: { line, character: start }, end: { line, character: end } }, newText };
}
