import {
  CODE_ACTION_FIX_ALL,
  CODE_ACTION_QUICK_FIX,
  type CodeAction,
  type Diagnostic,
  type MigrationDiagnostic,
  type TextEdit,
} from './types.js';
import { comparePositions, rangesOverlap } from './edits.js';

export type FixableDiagnostic = MigrationDiagnostic & { fix: TextEdit };

export interface FixAllBatch {
  // bottom-up order; apply as given
  edits: TextEdit[];
  diagnostics: Diagnostic[];
}

export const FIX_ALL_TITLE = 'Fix all deprecated syntax';

export function isFixable(md: MigrationDiagnostic): md is FixableDiagnostic {
  return md.fix !== undefined;
}

/** Identity of a diagnostic across requests: code plus exact range. */
export function diagnosticKey(d: Diagnostic): string {
  const { start, end } = d.range;
  return `${d.code ?? ''}:${start.line}:${start.character}:${end.line}:${end.character}`;
}

/**
 * Collect every fix into one batch sorted from the end of the document backwards.
 * An edit overlapping one already taken is left out; its diagnostic keeps its own quick-fix.
 */
export function composeFixAll(results: readonly MigrationDiagnostic[]): FixAllBatch {
  const ordered = results
    .filter(isFixable)
    .sort((a, b) => comparePositions(b.fix.range.start, a.fix.range.start));
  const edits: TextEdit[] = [];
  const diagnostics: Diagnostic[] = [];
  let last: TextEdit | undefined;
  for (const md of ordered) {
    // everything taken so far starts at or after `last`, so one check suffices
    if (last && rangesOverlap(md.fix.range, last.range)) continue;
    edits.push(md.fix);
    diagnostics.push(md.diagnostic);
    last = md.fix;
  }
  return { edits, diagnostics };
}

export function quickFixAction(documentId: string, md: FixableDiagnostic): CodeAction {
  return {
    title: `Replace with '${md.fix.newText}'`,
    kind: CODE_ACTION_QUICK_FIX,
    diagnostics: [md.diagnostic],
    isPreferred: true,
    edit: { changes: { [documentId]: [md.fix] } },
  };
}

export function fixAllAction(documentId: string, batch: FixAllBatch): CodeAction {
  return {
    title: FIX_ALL_TITLE,
    kind: CODE_ACTION_FIX_ALL,
    diagnostics: batch.diagnostics,
    edit: { changes: { [documentId]: batch.edits } },
  };
}
