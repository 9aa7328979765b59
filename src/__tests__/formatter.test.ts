import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { format } from '../query/formatter.js';
import { tokenize } from '../query/lexer.js';
import { DEFAULT_FORMAT_OPTIONS, resolveFormatOptions } from '../core/options.js';

describe('format', () => {
  it('puts each pipeline stage on its own line', () => {
    expect(format('from   test  |   count()', { indentWidth: 2, useSpaces: true })).toBe('from test\n| count()');
    expect(format('from test|sort x|head 5')).toBe('from test\n| sort x\n| head 5');
  });

  it('keeps comments and the line structure around them', () => {
    expect(format('-- comment\nfrom test')).toBe('-- comment\nfrom test');
    expect(format('count() -- total')).toBe('count() -- total');
  });

  it('drops leading whitespace and the space after a pipe', () => {
    expect(format('  |  y')).toBe('| y');
  });

  it('indents by bracket depth', () => {
    expect(format('from (\nfile a\n|count()\n)')).toBe('from (\n  file a\n  | count()\n)');
    expect(format('from (\nfile a\n|count()\n)', { useSpaces: false })).toBe('from (\n\tfile a\n\t| count()\n)');
    expect(format('from (\nfile a\n)', { indentWidth: 4 })).toBe('from (\n    file a\n)');
  });

  it('never lets depth go below zero', () => {
    expect(format('))\n(\nx')).toBe('))\n(\n  x');
  });

  it('spaces record fields and list items', () => {
    expect(format('values {a:1,b:[1,2]}')).toBe('values {a: 1, b: [1, 2]}');
    expect(format("{'k':1}")).toBe("{'k': 1}");
    expect(format('x[1:2]')).toBe('x[1:2]');
    expect(format('a,\nb')).toBe('a,\nb');
  });

  it('surrounds binary operators with spaces', () => {
    expect(format('x:=a+b*2')).toBe('x := a + b * 2');
    expect(format('x>=1 and y!=2')).toBe('x >= 1 and y != 2');
    expect(format('f(a+)')).toBe('f(a +)');
  });

  it('leaves tight operators alone', () => {
    expect(format('a.b::c->d')).toBe('a.b::c->d');
    expect(format('a/b/c')).toBe('a/b/c');
    expect(format('rate / 2')).toBe('rate / 2');
  });

  it('does not touch string and regex contents', () => {
    expect(format("values 'a   b', /x  y/")).toBe("values 'a   b', /x  y/");
  });
});

describe('format options', () => {
  it('trims trailing whitespace when asked', () => {
    expect(format('-- note   \nx')).toBe('-- note   \nx');
    expect(format('-- note   \nx', { trimTrailingWhitespace: true })).toBe('-- note\nx');
  });

  it('manages final newlines', () => {
    expect(format('a', { insertFinalNewline: true })).toBe('a\n');
    expect(format('a\n', { insertFinalNewline: true })).toBe('a\n');
    expect(format('a\n\n\n')).toBe('a\n\n\n');
    expect(format('a\n\n\n', { trimFinalNewlines: true })).toBe('a');
    expect(format('a\n\n\n', { trimFinalNewlines: true, insertFinalNewline: true })).toBe('a\n');
  });

  it('falls back to the default width for missing or non-finite values', () => {
    expect(format('(\nx', { indentWidth: Infinity })).toBe('(\n  x');
    expect(format('(\nx', { indentWidth: Number.NaN })).toBe('(\n  x');
    expect(format('(\nx', { indentWidth: undefined })).toBe('(\n  x');
    expect(format('(\nx', { useSpaces: undefined })).toBe('(\n  x');
  });

  it('clamps the indent width', () => {
    expect(format('(\nx', { indentWidth: 99 })).toBe(`(\n${' '.repeat(16)}x`);
    expect(format('(\nx', { indentWidth: -3 })).toBe('(\nx');
    expect(format('(\nx', { indentWidth: 2.7 })).toBe('(\n  x');
  });

  it('fills defaults and rejects bad values', () => {
    expect(resolveFormatOptions()).toEqual({
      indentWidth: 2,
      useSpaces: true,
      trimTrailingWhitespace: false,
      insertFinalNewline: false,
      trimFinalNewlines: false,
    });
    expect(resolveFormatOptions({ useSpaces: false })).toEqual({ ...DEFAULT_FORMAT_OPTIONS, useSpaces: false });
    expect(() => resolveFormatOptions({ indentWidth: -1 })).toThrow(z.ZodError);
    expect(() => resolveFormatOptions({ indentWidth: 1.5 })).toThrow(z.ZodError);
  });
});

describe('format properties', () => {
  const samples = [
    'from   test  |   count()',
    'values {a:1,b:[1,2]}',
    'from (\nfile a\n|count()\n)',
    'x:=a+b*2',
    'a/b/c',
    'where msg=="x" or /err/ | sort -r ts',
    '  -- c\n  x  |  y  ',
    ')) a\n(b,',
    'f(\n  a,\n  b\n)',
    'op double(x): ( x*2 ) |> yield double(3) /* done */',
  ];

  it('is idempotent', () => {
    for (const input of samples) {
      const once = format(input);
      expect(format(once)).toBe(once);
    }
  });

  it('starts every pipe on its own line', () => {
    for (const input of samples) {
      const pipes = tokenize(input).filter((t) => t.kind === 'pipe').length;
      const pipeLines = format(input)
        .split('\n')
        .filter((line) => line.trimStart().startsWith('|')).length;
      expect(pipeLines).toBe(pipes);
    }
  });

  it('formats the same in every indent style apart from indentation', () => {
    const spaced = format('from (\nfile a\n)', { indentWidth: 2 });
    const tabbed = format('from (\nfile a\n)', { useSpaces: false });
    expect(tabbed.replace(/\t/g, '  ')).toBe(spaced);
  });
});
