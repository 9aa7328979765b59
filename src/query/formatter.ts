import type { FormatOptions, Token } from '../core/types.js';
import { DEFAULT_FORMAT_OPTIONS, indentUnit } from '../core/options.js';
import { tokenize } from './lexer.js';

const OPENING = new Set(['(', '[', '{']);
const CLOSING = new Set([')', ']', '}']);
// No spaces are added around these; '/' is tight so that reformatting never turns a division into a regex
const TIGHT_OPERATORS = new Set(['.', '...', '::', '->', '/']);

function isOpening(tok: Token | undefined): boolean {
  return tok?.kind === 'punctuation' && OPENING.has(tok.literal);
}

function suppressesSpaceAfterOperator(next: Token | undefined): boolean {
  if (!next) return true;
  if (next.kind === 'newline' || next.kind === 'whitespace') return true;
  return next.kind === 'punctuation' && (CLOSING.has(next.literal) || next.literal === ',');
}

function needsSpaceBefore(prev: Token | undefined): boolean {
  if (!prev) return false;
  switch (prev.kind) {
    case 'whitespace':
    case 'newline':
    case 'pipe':
      return false;
    case 'punctuation':
      return !OPENING.has(prev.literal) && prev.literal !== '.' && prev.literal !== ':';
    case 'operator':
      return !TIGHT_OPERATORS.has(prev.literal);
    default:
      return true;
  }
}

// Missing or non-finite widths fall back to the default; the rest is clamped to the schema's range
function withDefaults(options: Partial<FormatOptions>): FormatOptions {
  const d = DEFAULT_FORMAT_OPTIONS;
  const width = options.indentWidth;
  return {
    indentWidth: width !== undefined && Number.isFinite(width) ? Math.min(16, Math.max(0, Math.floor(width))) : d.indentWidth,
    useSpaces: options.useSpaces ?? d.useSpaces,
    trimTrailingWhitespace: options.trimTrailingWhitespace ?? d.trimTrailingWhitespace,
    insertFinalNewline: options.insertFinalNewline ?? d.insertFinalNewline,
    trimFinalNewlines: options.trimFinalNewlines ?? d.trimFinalNewlines,
  };
}

function finish(text: string, options: FormatOptions): string {
  let formatted = text;
  if (options.trimTrailingWhitespace) {
    formatted = formatted.split('\n').map((line) => line.trimEnd()).join('\n');
  }
  if (options.trimFinalNewlines) {
    formatted = formatted.replace(/\n+$/, '');
  }
  if (options.insertFinalNewline && !formatted.endsWith('\n')) {
    formatted += '\n';
  }
  return formatted;
}

/**
 * Render a token sequence in canonical layout: one pipeline stage per line, indentation
 * from bracket depth, single spaces between tokens. Spacing decisions look only at the
 * token and its immediate neighbours, so formatting formatted output is a no-op.
 */
export function formatTokens(tokens: Token[], options: Partial<FormatOptions> = {}): string {
  const opts = withDefaults(options);
  const unit = indentUnit(opts);
  const out: string[] = [];
  let depth = 0;
  let lineStart = true;
  // A single pending space, written only if something visible follows on the same line
  let space = false;
  let prev: Token | undefined;

  const emit = (literal: string) => {
    if (lineStart) {
      out.push(unit.repeat(depth));
      lineStart = false;
    } else if (space) {
      out.push(' ');
    }
    space = false;
    out.push(literal);
  };

  tokens.forEach((tok, i) => {
    const next: Token | undefined = tokens[i + 1];
    switch (tok.kind) {
      case 'newline':
        out.push('\n');
        lineStart = true;
        space = false;
        break;

      case 'whitespace':
        if (!lineStart && prev?.kind !== 'pipe') space = true;
        break;

      case 'lineComment':
      case 'blockComment':
        emit(tok.literal);
        break;

      case 'pipe':
        if (!lineStart) {
          out.push('\n');
          lineStart = true;
        }
        space = false;
        emit(tok.literal);
        space = true;
        break;

      case 'punctuation':
        if (CLOSING.has(tok.literal)) {
          depth = Math.max(0, depth - 1);
          emit(tok.literal);
        } else if (OPENING.has(tok.literal)) {
          emit(tok.literal);
          depth++;
        } else if (tok.literal === ',') {
          emit(tok.literal);
          if (next && next.kind !== 'newline') space = true;
        } else if (tok.literal === ':') {
          // record field heuristic: {name: value}
          emit(tok.literal);
          if (prev?.kind === 'identifier' || prev?.kind === 'string') space = true;
        } else {
          emit(tok.literal);
        }
        break;

      case 'operator':
        if (TIGHT_OPERATORS.has(tok.literal)) {
          emit(tok.literal);
          break;
        }
        if (!lineStart && !isOpening(prev)) space = true;
        emit(tok.literal);
        if (!suppressesSpaceAfterOperator(next)) space = true;
        break;

      default:
        if (!lineStart && needsSpaceBefore(prev)) space = true;
        emit(tok.literal);
    }
    prev = tok;
  });

  return finish(out.join(''), opts);
}

export function format(text: string, options: Partial<FormatOptions> = {}): string {
  return formatTokens(tokenize(text), options);
}
