import { SEVERITY_ERROR, SEVERITY_WARNING, type MigrationRule } from '../core/types.js';

export const COMMENT_SLASH_CODE = 'deprecated-comment-slash';

const GREP_ARG = /\bgrep\s*\(\s*(\/[^/]*\/|'[^']*'|"[^"]*")\s*\)/;
const IS_TYPE_ARG = /\bis\s*\(\s*(<[^>]+>)\s*\)/;

function castRule(type: string): MigrationRule {
  const shape = new RegExp(`\\b${type}\\s*\\(\\s*('[^']*'|"[^"]*")\\s*\\)`);
  return {
    code: `deprecated-cast-${type}`,
    pattern: new RegExp(shape.source, 'g'),
    message: `Function-style cast deprecated, use '::${type}'`,
    severity: SEVERITY_WARNING,
    fix: (matched) => {
      const literal = shape.exec(matched)?.[1];
      return literal === undefined ? matched : `${literal}::${type}`;
    },
  };
}

function removedRule(name: string): MigrationRule {
  return {
    code: `removed-${name}`,
    pattern: new RegExp(`\\b${name}\\s*\\(`, 'g'),
    message: `'${name}()' was removed, use explicit casting`,
    severity: SEVERITY_ERROR,
  };
}

// Scanned in this order; patterns carry the g flag and are only ever used through matchAll
export const MIGRATION_RULES: readonly MigrationRule[] = [
  {
    code: 'deprecated-yield',
    pattern: /\byield\b/g,
    message: "'yield' is deprecated, use 'values'",
    severity: SEVERITY_WARNING,
    fix: 'values',
  },
  {
    code: 'deprecated-func',
    pattern: /\bfunc\b/g,
    message: "'func' is deprecated, use 'fn'",
    severity: SEVERITY_WARNING,
    fix: 'fn',
  },
  {
    code: 'deprecated-arrow',
    pattern: /=>/g,
    message: "'=>' is deprecated, use 'into'",
    severity: SEVERITY_WARNING,
    fix: 'into',
  },
  {
    // the leading character keeps ':' of URLs from matching; u so it is a whole code point
    code: COMMENT_SLASH_CODE,
    pattern: /(^|[^:])\/\//gu,
    message: "'//' comments are deprecated, use '--'",
    severity: SEVERITY_WARNING,
    fix: (matched) => `${matched.slice(0, -2)}--`,
  },
  {
    code: 'deprecated-parse-zson',
    pattern: /\bparse_zson\s*\(/g,
    message: "'parse_zson' is deprecated, use 'parse_sup'",
    severity: SEVERITY_WARNING,
    fix: 'parse_sup(',
  },
  {
    code: 'implicit-this-grep',
    pattern: new RegExp(GREP_ARG.source, 'g'),
    message: "grep() requires explicit 'this' argument",
    severity: SEVERITY_WARNING,
    fix: (matched) => {
      const arg = GREP_ARG.exec(matched)?.[1];
      if (arg === undefined) return matched;
      // a /regex/ argument becomes a quoted pattern string
      if (arg.length >= 2 && arg.startsWith('/') && arg.endsWith('/')) {
        return `grep('${arg.slice(1, -1)}', this)`;
      }
      return `grep(${arg}, this)`;
    },
  },
  {
    code: 'implicit-this-is',
    pattern: new RegExp(IS_TYPE_ARG.source, 'g'),
    message: "is() requires explicit 'this' argument",
    severity: SEVERITY_WARNING,
    fix: (matched) => {
      const typeArg = IS_TYPE_ARG.exec(matched)?.[1];
      return typeArg === undefined ? matched : `is(this, ${typeArg})`;
    },
  },
  {
    code: 'implicit-this-nest-dotted',
    pattern: /\bnest_dotted\s*\(\s*\)/g,
    message: "nest_dotted() requires explicit 'this' argument",
    severity: SEVERITY_WARNING,
    fix: 'nest_dotted(this)',
  },
  castRule('time'),
  castRule('duration'),
  castRule('ip'),
  castRule('net'),
  removedRule('crop'),
  removedRule('fill'),
  removedRule('fit'),
  removedRule('order'),
  removedRule('shape'),
];

export function replacementFor(rule: MigrationRule, matched: string): string | undefined {
  if (rule.fix === undefined) return undefined;
  return typeof rule.fix === 'string' ? rule.fix : rule.fix(matched);
}
