import { createToken, Lexer, type CustomPatternMatcherFunc, type IToken, type TokenType } from 'chevrotain';
import type { Token, TokenKind } from '../core/types.js';

// Words that format as keywords; matched case-insensitively
export const KEYWORDS: ReadonlySet<string> = new Set([
  'select', 'from', 'where', 'group', 'by', 'having', 'order', 'limit', 'offset', 'with',
  'join', 'inner', 'left', 'right', 'outer', 'full', 'cross', 'anti', 'on', 'using',
  'and', 'or', 'not', 'in', 'like', 'is', 'between', 'case', 'when', 'then', 'else',
  'end', 'as', 'distinct', 'all', 'union',
  'const', 'fn', 'op', 'type', 'let',
  'true', 'false', 'null', 'asc', 'desc',
]);

export function isKeyword(word: string): boolean {
  return KEYWORDS.has(word.toLowerCase());
}

// Custom matchers run a sticky copy of the pattern at the lexer's offset.
function sticky(source: RegExp): CustomPatternMatcherFunc {
  const re = new RegExp(source.source, 'y');
  return (text, offset) => {
    re.lastIndex = offset;
    return re.exec(text);
  };
}

const OPENERS_BEFORE_REGEX = new Set(['(', '[', ',', ':']);

function canPrecedeRegex(prev: IToken): boolean {
  switch (kindOf(prev)) {
    case 'whitespace':
    case 'newline':
    case 'pipe':
    case 'operator':
    case 'keyword':
      return true;
    case 'punctuation':
      return OPENERS_BEFORE_REGEX.has(prev.image);
    default:
      return false;
  }
}

// A '/' opens a regex only in value position and only when it closes on the same line;
// otherwise the matcher declines and the '/' falls through to the operator tokens.
const matchRegexBody = sticky(/\/(?:\\[\s\S]|[^/\\\n])*\//);
const matchRegexLiteral: CustomPatternMatcherFunc = (text, offset, tokens, groups) => {
  const prev = tokens.length > 0 ? tokens[tokens.length - 1] : undefined;
  if (prev && !canPrecedeRegex(prev)) return null;
  return matchRegexBody(text, offset, tokens, groups);
};

export const Newline = createToken({ name: 'Newline', pattern: /\n/, line_breaks: true });
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t\r]+/ });
export const LineComment = createToken({ name: 'LineComment', pattern: /--[^\n]*/ });
// Unterminated block comments, strings and backtick names run to end of input
export const BlockComment = createToken({
  name: 'BlockComment',
  pattern: sticky(/\/\*[\s\S]*?(?:\*\/|$)/),
  line_breaks: true,
  start_chars_hint: ['/'],
});
export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: sticky(/[fr]?(["'])(?:\\[\s\S]|(?!\1)[\s\S])*\1?/),
  line_breaks: true,
  start_chars_hint: ['"', "'", 'f', 'r'],
});
export const RegexLiteral = createToken({
  name: 'RegexLiteral',
  pattern: matchRegexLiteral,
  line_breaks: true,
  start_chars_hint: ['/'],
});
export const PipeForward = createToken({ name: 'PipeForward', pattern: /\|>/ });
export const Concat = createToken({ name: 'Concat', pattern: /\|\|/ });
export const Pipe = createToken({ name: 'Pipe', pattern: /\|/ });
export const Spread = createToken({ name: 'Spread', pattern: /\.\.\./ });
export const TwoCharOperator = createToken({ name: 'TwoCharOperator', pattern: /:=|::|->|==|!=|<>|<=|>=|!~/ });
export const Operator = createToken({ name: 'Operator', pattern: /[+\-*/%<>=!~]/ });
export const Punctuation = createToken({ name: 'Punctuation', pattern: /[()[\]{},:;.?]/ });
// Trailing letters are duration/unit suffixes (5ms, 2h); not validated here
export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /0[xX][0-9a-fA-F]*[A-Za-z]*|[0-9][0-9.]*(?:[eE][+-]?[0-9]*)?[A-Za-z]*/,
});
export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z_][A-Za-z0-9_]*|`[^`]*`?/, line_breaks: true });
// Anything else becomes a single-character token (a whole surrogate pair where there is one)
export const Unknown = createToken({
  name: 'Unknown',
  pattern: sticky(/[\uD800-\uDBFF][\uDC00-\uDFFF]|[\s\S]/),
  line_breaks: true,
});

const KIND_BY_TYPE = new Map<TokenType, TokenKind>([
  [Newline, 'newline'],
  [WhiteSpace, 'whitespace'],
  [LineComment, 'lineComment'],
  [BlockComment, 'blockComment'],
  [StringLiteral, 'string'],
  [RegexLiteral, 'regex'],
  [PipeForward, 'pipe'],
  [Concat, 'operator'],
  [Pipe, 'pipe'],
  [Spread, 'operator'],
  [TwoCharOperator, 'operator'],
  [Operator, 'operator'],
  [Punctuation, 'punctuation'],
  [NumberLiteral, 'number'],
  [Identifier, 'identifier'],
  [Unknown, 'punctuation'],
]);

export const allTokens = [
  Newline,
  WhiteSpace,
  // comments before strings and operators so '--' and '/*' win
  LineComment,
  BlockComment,
  StringLiteral,
  RegexLiteral,
  // pipe family: '|>' and '|' are stage separators, '||' is concatenation
  PipeForward,
  Concat,
  Pipe,
  // operators longest first
  Spread,
  TwoCharOperator,
  Operator,
  Punctuation,
  NumberLiteral,
  Identifier,
  // must stay last
  Unknown,
];

export const QueryLexer = new Lexer(allTokens, {
  positionTracking: 'onlyOffset',
  ensureOptimizations: false,
});

function kindOf(tok: IToken): TokenKind {
  const kind = KIND_BY_TYPE.get(tok.tokenType) ?? 'punctuation';
  if (kind === 'identifier' && isKeyword(tok.image)) return 'keyword';
  return kind;
}

export function tokenize(text: string): Token[] {
  const { tokens } = QueryLexer.tokenize(text);
  return tokens.map((tok) => ({ kind: kindOf(tok), literal: tok.image }));
}
