// Public SDK surface for programmatic use
export type {
  Token,
  TokenKind,
  FormatOptions,
  MigrationRule,
  MigrationDiagnostic,
  FixFunction,
  CodeAction,
  CompletionItem,
  Diagnostic,
  Hover,
  SignatureHelp,
  Position,
  Range,
  TextEdit,
} from './core/types.js';
export { SEVERITY_ERROR, SEVERITY_WARNING, CODE_ACTION_QUICK_FIX, CODE_ACTION_FIX_ALL } from './core/types.js';

// Lexer and formatter
export { tokenize, isKeyword, KEYWORDS } from './query/lexer.js';
export { format, formatTokens } from './query/formatter.js';
export type { FormatOptionsInput } from './core/options.js';
export { resolveFormatOptions, DEFAULT_FORMAT_OPTIONS, FormatOptionsSchema } from './core/options.js';

// Migrations and fixes
export { MIGRATION_RULES } from './query/rules.js';
export { scanMigrations, buildCodeActions, fixText } from './query/migrations.js';
export type { FixAllBatch } from './core/fixes.js';
export { composeFixAll, diagnosticKey } from './core/fixes.js';
export { applyEdits, positionToOffset } from './core/edits.js';

// Cursor context: completion, hover, signature help
export type { CompletionContext, FunctionContext } from './query/context.js';
export { completions, completionContext, functionContext, hover, signatureHelp, wordAtPosition } from './query/context.js';
export type { FunctionDoc, ParameterDoc, TypeDoc } from './query/builtins.js';
export { FUNCTIONS, TYPES } from './query/builtins.js';

// Linting with a host parser
export type { QueryParser, LintOptions } from './core/pipeline.js';
export { lintQuery } from './core/pipeline.js';
export { parseErrorToDiagnostic } from './core/diagnostics.js';

// Reports
export { textReport, toJsonResult } from './core/report.js';
