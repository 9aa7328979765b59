import {
  DIAGNOSTIC_SOURCE,
  type CodeAction,
  type Diagnostic,
  type MigrationDiagnostic,
  type MigrationRule,
} from '../core/types.js';
import { applyEdits, byteColumn, replaceRange, toLines } from '../core/edits.js';
import {
  composeFixAll,
  diagnosticKey,
  fixAllAction,
  isFixable,
  quickFixAction,
  type FixableDiagnostic,
} from '../core/fixes.js';
import { COMMENT_SLASH_CODE, MIGRATION_RULES, replacementFor } from './rules.js';

function globalPattern(re: RegExp): RegExp {
  return re.global ? re : new RegExp(re.source, `${re.flags}g`);
}

function scanLine(lineText: string, line: number, rules: readonly MigrationRule[], out: MigrationDiagnostic[]) {
  // Line-local: anything after the first '--' is treated as comment, even inside a string
  const commentIdx = lineText.indexOf('--');
  for (const rule of rules) {
    for (const m of lineText.matchAll(globalPattern(rule.pattern))) {
      const matched = m[0];
      const matchStart = m.index ?? 0;
      const matchEnd = matchStart + matched.length;
      if (commentIdx >= 0 && matchStart > commentIdx) continue;

      let reportStart = matchStart;
      if (rule.code === COMMENT_SLASH_CODE) {
        if (matched.includes('://')) continue;
        // report only the '//' marker, not the character kept in front of it
        reportStart = matchEnd - 2;
      }

      const start = byteColumn(lineText, matchStart);
      const end = byteColumn(lineText, matchEnd);
      const diagnostic: Diagnostic = {
        range: {
          start: { line, character: byteColumn(lineText, reportStart) },
          end: { line, character: end },
        },
        severity: rule.severity,
        code: rule.code,
        source: DIAGNOSTIC_SOURCE,
        message: rule.message,
      };
      const newText = replacementFor(rule, matched);
      out.push(newText === undefined ? { diagnostic } : { diagnostic, fix: replaceRange(line, start, end, newText) });
    }
  }
}

export function scanMigrations(text: string, rules: readonly MigrationRule[] = MIGRATION_RULES): MigrationDiagnostic[] {
  const out: MigrationDiagnostic[] = [];
  toLines(text).forEach((lineText, line) => scanLine(lineText, line, rules, out));
  return out;
}

/**
 * Code actions for the diagnostics a client asks about: one quick-fix per requested
 * diagnostic we can fix, plus a fix-all when more than one non-overlapping fix remains.
 */
export function buildCodeActions(documentId: string, text: string, requested: readonly Diagnostic[]): CodeAction[] {
  const fixable = new Map<string, FixableDiagnostic>();
  for (const md of scanMigrations(text)) {
    if (!isFixable(md)) continue;
    const key = diagnosticKey(md.diagnostic);
    if (!fixable.has(key)) fixable.set(key, md);
  }

  const actions: CodeAction[] = [];
  for (const req of requested) {
    const md = fixable.get(diagnosticKey(req));
    if (md) actions.push(quickFixAction(documentId, md));
  }
  // overlapping fixes drop out of the batch, so count what is left
  const batch = composeFixAll([...fixable.values()]);
  if (batch.edits.length > 1) actions.push(fixAllAction(documentId, batch));
  return actions;
}

/**
 * Apply fix-all batches until nothing fixable remains (max 5 passes).
 * Returns the fixed text and the migration diagnostics still present in it.
 */
export function fixText(text: string): { fixed: string; diagnostics: Diagnostic[] } {
  let current = text;
  for (let i = 0; i < 5; i++) {
    const results = scanMigrations(current);
    const { edits } = composeFixAll(results);
    const next = edits.length > 0 ? applyEdits(current, edits) : current;
    if (next === current) return { fixed: current, diagnostics: results.map((r) => r.diagnostic) };
    current = next;
  }
  return { fixed: current, diagnostics: scanMigrations(current).map((r) => r.diagnostic) };
}
