import type {
  CodeAction,
  CompletionItem,
  CompletionItemKind,
  Diagnostic,
  DiagnosticSeverity,
  Hover,
  InsertTextFormat,
  ParameterInformation,
  Position,
  Range,
  SignatureHelp,
  TextEdit,
} from 'vscode-languageserver-types';

export type {
  CodeAction,
  CompletionItem,
  CompletionItemKind,
  Diagnostic,
  DiagnosticSeverity,
  Hover,
  InsertTextFormat,
  ParameterInformation,
  Position,
  Range,
  SignatureHelp,
  TextEdit,
};

export type TokenKind =
  | 'whitespace'
  | 'newline'
  | 'lineComment'
  | 'blockComment'
  | 'string'
  | 'regex'
  | 'identifier'
  | 'keyword'
  | 'number'
  | 'pipe'
  | 'operator'
  | 'punctuation';

export interface Token {
  kind: TokenKind;
  literal: string;
}

export interface FormatOptions {
  indentWidth: number;
  useSpaces: boolean;
  trimTrailingWhitespace: boolean;
  insertFinalNewline: boolean;
  trimFinalNewlines: boolean;
}

// LSP severities (vscode-languageserver-types ships them as a runtime namespace we only use for types)
export const SEVERITY_ERROR = 1 satisfies DiagnosticSeverity;
export const SEVERITY_WARNING = 2 satisfies DiagnosticSeverity;

export const DIAGNOSTIC_SOURCE = 'pql';

export type FixFunction = (matched: string) => string;

export interface MigrationRule {
  readonly code: string;
  readonly pattern: RegExp;
  readonly message: string;
  readonly severity: DiagnosticSeverity;
  // Replacement for the whole match; absent for pure removal notices
  readonly fix?: string | FixFunction;
}

export interface MigrationDiagnostic {
  diagnostic: Diagnostic;
  fix?: TextEdit;
}

export const CODE_ACTION_QUICK_FIX = 'quickfix';
export const CODE_ACTION_FIX_ALL = 'source.fixAll';

export const COMPLETION_KIND_FUNCTION = 3 satisfies CompletionItemKind;
export const COMPLETION_KIND_CLASS = 7 satisfies CompletionItemKind;
export const COMPLETION_KIND_KEYWORD = 14 satisfies CompletionItemKind;
export const INSERT_TEXT_SNIPPET = 2 satisfies InsertTextFormat;
