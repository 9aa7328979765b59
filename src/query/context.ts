import {
  COMPLETION_KIND_CLASS,
  COMPLETION_KIND_FUNCTION,
  COMPLETION_KIND_KEYWORD,
  INSERT_TEXT_SNIPPET,
  type CompletionItem,
  type Hover,
  type ParameterInformation,
  type Position,
  type SignatureHelp,
} from '../core/types.js';
import { byteLength, charIndex, toLines } from '../core/edits.js';
import { FUNCTIONS, TYPES, lookupFunction, lookupType, type FunctionDoc } from './builtins.js';
import { KEYWORDS, isKeyword } from './lexer.js';

// Cursor lookups are line-local text scans; they do not need the query to lex or parse cleanly.

export type CompletionContext = 'type' | 'function' | 'general';

export interface FunctionContext {
  name: string;
  // zero-based index of the argument the cursor is in
  activeParameter: number;
}

function isIdentifierChar(ch: string): boolean {
  return /^[A-Za-z0-9_]$/.test(ch);
}

function count(s: string, ch: string): number {
  return s.split(ch).length - 1;
}

export function wordAtPosition(text: string, pos: Position): string {
  const lineText = toLines(text)[pos.line];
  if (lineText === undefined || pos.character > byteLength(lineText)) return '';
  const at = charIndex(lineText, pos.character);
  let start = at;
  let end = at;
  while (start > 0 && isIdentifierChar(lineText.charAt(start - 1))) start--;
  while (end < lineText.length && isIdentifierChar(lineText.charAt(end))) end++;
  return lineText.slice(start, end);
}

/** What kind of name fits at `column`, judged from the line text before it. */
export function completionContext(lineText: string, column: number): CompletionContext {
  const prefix = lineText.slice(0, charIndex(lineText, column)).toLowerCase();
  if (prefix.includes('cast(') || prefix.includes('::') || prefix.trimEnd().endsWith('<')) return 'type';
  return count(prefix, '(') - count(prefix, ')') > 0 ? 'function' : 'general';
}

/**
 * Innermost call the cursor sits in, found by walking back to the first unmatched '('.
 * Commas inside nested calls do not advance the argument index.
 */
export function functionContext(text: string, pos: Position): FunctionContext | undefined {
  const lines = toLines(text);
  const lineText = lines[pos.line];
  if (lineText === undefined) return undefined;
  const before = [...lines.slice(0, pos.line), lineText.slice(0, charIndex(lineText, pos.character))].join('\n');

  let depth = 0;
  let open = -1;
  for (let i = before.length - 1; i >= 0 && open < 0; i--) {
    const ch = before.charAt(i);
    if (ch === ')') depth++;
    else if (ch === '(') {
      if (depth === 0) open = i;
      else depth--;
    }
  }
  if (open < 0) return undefined;

  let start = open;
  while (start > 0 && isIdentifierChar(before.charAt(start - 1))) start--;
  if (start === open) return undefined;

  let activeParameter = 0;
  depth = 0;
  for (const ch of before.slice(open + 1)) {
    if (ch === '(') depth++;
    else if (ch === ')') depth--;
    else if (ch === ',' && depth === 0) activeParameter++;
  }
  return { name: before.slice(start, open), activeParameter };
}

function functionItem(f: FunctionDoc): CompletionItem {
  return {
    label: f.name,
    kind: COMPLETION_KIND_FUNCTION,
    detail: `function: ${f.doc}`,
    insertText: `${f.name}($1)`,
    insertTextFormat: INSERT_TEXT_SNIPPET,
  };
}

export function completions(text: string, pos: Position): CompletionItem[] {
  const lineText = toLines(text)[pos.line];
  if (lineText === undefined) return [];

  let prefix = '';
  if (pos.character <= byteLength(lineText)) {
    const at = charIndex(lineText, pos.character);
    let start = at;
    while (start > 0 && isIdentifierChar(lineText.charAt(start - 1))) start--;
    prefix = lineText.slice(start, at).toLowerCase();
  }
  const matches = (name: string) => name.toLowerCase().startsWith(prefix);

  const types = TYPES.filter((t) => matches(t.name)).map(
    (t): CompletionItem => ({ label: t.name, kind: COMPLETION_KIND_CLASS, detail: `type: ${t.doc}` }),
  );
  const functions = FUNCTIONS.filter((f) => matches(f.name)).map(functionItem);

  switch (completionContext(lineText, pos.character)) {
    case 'type':
      return types;
    case 'function':
      return functions;
    default: {
      const keywords = [...KEYWORDS].filter(matches).map(
        (k): CompletionItem => ({ label: k, kind: COMPLETION_KIND_KEYWORD, detail: 'keyword' }),
      );
      return [...keywords, ...functions, ...types];
    }
  }
}

/** Markdown hover for the keyword, function or type under the cursor; keywords win on a clash. */
export function hover(text: string, pos: Position): Hover | undefined {
  const word = wordAtPosition(text, pos);
  if (word === '') return undefined;
  const name = word.toLowerCase();

  let value: string | undefined;
  if (isKeyword(name)) {
    value = `**${name}** (keyword)`;
  } else {
    const f = lookupFunction(name);
    const t = f ? undefined : lookupType(name);
    if (f) value = `\`\`\`pql\n${f.label}\n\`\`\`\n\n${f.doc}`;
    else if (t) value = `**${t.name}** (type)\n\n${t.doc}`;
  }
  return value === undefined ? undefined : { contents: { kind: 'markdown', value } };
}

// Parameter labels are [start, end) offsets into the signature label
function parameterInformation(f: FunctionDoc): ParameterInformation[] {
  const params: ParameterInformation[] = [];
  let offset = f.label.indexOf('(') + 1;
  for (const p of f.parameters) {
    const start = f.label.indexOf(p.name, offset);
    if (start < 0) continue;
    let end = start + p.name.length;
    while (end < f.label.length && f.label.charAt(end) !== ',' && f.label.charAt(end) !== ')') end++;
    params.push({ label: [start, end], documentation: { kind: 'plaintext', value: p.doc } });
    offset = end + 1;
  }
  return params;
}

export function signatureHelp(text: string, pos: Position): SignatureHelp | undefined {
  const call = functionContext(text, pos);
  const f = call ? lookupFunction(call.name) : undefined;
  if (!call || !f) return undefined;
  const parameters = parameterInformation(f);
  const activeParameter = Math.max(0, Math.min(parameters.length - 1, call.activeParameter));
  return {
    signatures: [{ label: f.label, documentation: { kind: 'plaintext', value: f.doc }, parameters }],
    activeSignature: 0,
    activeParameter,
  };
}
