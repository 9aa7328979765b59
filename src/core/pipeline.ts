import type { Diagnostic } from './types.js';
import { parseErrorToDiagnostic } from './diagnostics.js';
import { scanMigrations } from '../query/migrations.js';

/**
 * Grammar-aware parser supplied by the host. `parse` throws on a syntax error; the message
 * may carry a position such as "line 2, column 5".
 */
export interface QueryParser {
  parse(text: string): unknown;
}

export interface LintOptions {
  parser?: QueryParser;
}

export function lintQuery(text: string, options: LintOptions = {}): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  if (options.parser) {
    try {
      options.parser.parse(text);
    } catch (e) {
      diagnostics.push(parseErrorToDiagnostic(text, e));
    }
  }

  // Deprecated syntax is reported whether or not the parse succeeded
  diagnostics.push(...scanMigrations(text).map((md) => md.diagnostic));
  return diagnostics;
}
