import { describe, it, expect } from 'vitest';
import { tokenize, isKeyword } from '../query/lexer.js';
import type { Token } from '../core/types.js';

function kinds(text: string) {
  return tokenize(text).map((t) => [t.kind, t.literal]);
}

function join(tokens: Token[]) {
  return tokens.map((t) => t.literal).join('');
}

describe('tokenize', () => {
  it('splits a cast into identifier, operator, identifier', () => {
    const tokens = tokenize('x::int64');
    expect(tokens).toEqual([
      { kind: 'identifier', literal: 'x' },
      { kind: 'operator', literal: '::' },
      { kind: 'identifier', literal: 'int64' },
    ]);
    expect(join(tokens)).toBe('x::int64');
  });

  it('keeps whitespace, pipes and brackets as tokens', () => {
    expect(kinds('from test | count()')).toEqual([
      ['keyword', 'from'],
      ['whitespace', ' '],
      ['identifier', 'test'],
      ['whitespace', ' '],
      ['pipe', '|'],
      ['whitespace', ' '],
      ['identifier', 'count'],
      ['punctuation', '('],
      ['punctuation', ')'],
    ]);
  });

  it('tells pipes from the concatenation operator', () => {
    expect(kinds('a || b |> c')).toEqual([
      ['identifier', 'a'],
      ['whitespace', ' '],
      ['operator', '||'],
      ['whitespace', ' '],
      ['identifier', 'b'],
      ['whitespace', ' '],
      ['pipe', '|>'],
      ['whitespace', ' '],
      ['identifier', 'c'],
    ]);
  });

  it('matches keywords case-insensitively', () => {
    expect(kinds('SELECT Foo')).toEqual([
      ['keyword', 'SELECT'],
      ['whitespace', ' '],
      ['identifier', 'Foo'],
    ]);
    expect(isKeyword('Where')).toBe(true);
    expect(isKeyword('yield')).toBe(false);
  });

  it('reads backtick-quoted names as one identifier', () => {
    expect(kinds('`my field`.x')).toEqual([
      ['identifier', '`my field`'],
      ['punctuation', '.'],
      ['identifier', 'x'],
    ]);
  });

  it('lexes longest operators first', () => {
    expect(kinds('...a != b')).toEqual([
      ['operator', '...'],
      ['identifier', 'a'],
      ['whitespace', ' '],
      ['operator', '!='],
      ['whitespace', ' '],
      ['identifier', 'b'],
    ]);
    expect(kinds('x:=1')).toEqual([
      ['identifier', 'x'],
      ['operator', ':='],
      ['number', '1'],
    ]);
  });

  it('reads numbers with unit suffixes, hex and exponents', () => {
    expect(kinds('10ms 0xFF 1.5e-3 3days')).toEqual([
      ['number', '10ms'],
      ['whitespace', ' '],
      ['number', '0xFF'],
      ['whitespace', ' '],
      ['number', '1.5e-3'],
      ['whitespace', ' '],
      ['number', '3days'],
    ]);
  });

  it('treats carriage returns as whitespace', () => {
    expect(kinds('a\r\nb')).toEqual([
      ['identifier', 'a'],
      ['whitespace', '\r'],
      ['newline', '\n'],
      ['identifier', 'b'],
    ]);
  });
});

describe('strings and comments', () => {
  it('keeps escaped quotes inside the string', () => {
    expect(kinds('"a\\"b" \'c')).toEqual([
      ['string', '"a\\"b"'],
      ['whitespace', ' '],
      ['string', "'c"],
    ]);
  });

  it('reads f- and r-prefixed strings', () => {
    expect(kinds("f\"x{y}\" r'\\d'")).toEqual([
      ['string', 'f"x{y}"'],
      ['whitespace', ' '],
      ['string', "r'\\d'"],
    ]);
  });

  it('separates line and block comments', () => {
    expect(kinds('-- hi\n/* a\n b */x')).toEqual([
      ['lineComment', '-- hi'],
      ['newline', '\n'],
      ['blockComment', '/* a\n b */'],
      ['identifier', 'x'],
    ]);
  });

  it('runs unterminated block comments and strings to end of input', () => {
    expect(kinds('a /* open')).toEqual([
      ['identifier', 'a'],
      ['whitespace', ' '],
      ['blockComment', '/* open'],
    ]);
    expect(kinds("x = 'abc\ndef")).toEqual([
      ['identifier', 'x'],
      ['whitespace', ' '],
      ['operator', '='],
      ['whitespace', ' '],
      ['string', "'abc\ndef"],
    ]);
  });
});

describe('regex literals', () => {
  it('reads a regex after an opening parenthesis', () => {
    expect(kinds('grep(/err/)')).toEqual([
      ['identifier', 'grep'],
      ['punctuation', '('],
      ['regex', '/err/'],
      ['punctuation', ')'],
    ]);
  });

  it('keeps escaped slashes inside the regex', () => {
    expect(kinds('where /a\\/b/')).toEqual([
      ['keyword', 'where'],
      ['whitespace', ' '],
      ['regex', '/a\\/b/'],
    ]);
  });

  it('reads division after a value', () => {
    expect(kinds('a/b/c')).toEqual([
      ['identifier', 'a'],
      ['operator', '/'],
      ['identifier', 'b'],
      ['operator', '/'],
      ['identifier', 'c'],
    ]);
  });

  it('falls back to an operator when no closing slash follows on the line', () => {
    expect(kinds('x / 2')).toEqual([
      ['identifier', 'x'],
      ['whitespace', ' '],
      ['operator', '/'],
      ['whitespace', ' '],
      ['number', '2'],
    ]);
    expect(kinds('x = /ab\ncd/')).toEqual([
      ['identifier', 'x'],
      ['whitespace', ' '],
      ['operator', '='],
      ['whitespace', ' '],
      ['operator', '/'],
      ['identifier', 'ab'],
      ['newline', '\n'],
      ['identifier', 'cd'],
      ['operator', '/'],
    ]);
  });
});

describe('losslessness', () => {
  it('emits unknown characters one at a time', () => {
    expect(kinds('a @ é')).toEqual([
      ['identifier', 'a'],
      ['whitespace', ' '],
      ['punctuation', '@'],
      ['whitespace', ' '],
      ['punctuation', 'é'],
    ]);
    expect(kinds('😀')).toEqual([['punctuation', '😀']]);
  });

  it('reproduces the input exactly', () => {
    const inputs = [
      '',
      'from test | count()',
      "values {a:1, b:'x\\'y'} |> sort -r a",
      'yield x // old comment\nfunc f(): ( grep(/a\\/b/, this) )',
      '/* unterminated\n block',
      '"unterminated string\nwith newline',
      '`unterminated name',
      'x = /ab\ncd/ ~ 5ms * 0x1f',
      '\t\r\n  @#$   😀 é ||| |>|',
      '))((][}{ ::: ... .. -> => !~',
    ];
    for (const input of inputs) {
      expect(join(tokenize(input))).toBe(input);
    }
  });
});
