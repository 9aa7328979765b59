#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { z } from 'zod';
import type { Diagnostic, FormatOptions } from './core/types.js';
import { lintQuery } from './core/pipeline.js';
import { isError, textReport, toJsonResult, type OutputFormat } from './core/report.js';
import { resolveFormatOptions, type FormatOptionsInput } from './core/options.js';
import { fixText } from './query/migrations.js';
import { format } from './query/formatter.js';

function printUsage() {
    console.log('Usage: pql [check] <file|directory|->');
    console.log('       pql fmt <file|directory|-> [--write|--check]');
    console.log('  - "check" reports deprecated and removed syntax (default command)');
    console.log('  - "fmt" prints the formatted query, or rewrites/checks files in place');
    console.log('  - When a directory is given, scans recursively for .pql files');
    console.log('Options:');
    console.log('  --include, -I   Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E   Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --no-gitignore  Do not respect .gitignore when scanning directories');
    console.log('Check options:');
    console.log('  --format, -f    Output format: text|json (default: text)');
    console.log('  --fix           Apply every available migration fix');
    console.log('  --dry-run, -n   Do not write files (useful with --fix)');
    console.log('  --print-fixed   With --fix, print fixed content for a single file/stdin');
    console.log('Fmt options:');
    console.log('  --write, -w                 Rewrite files in place');
    console.log('  --check, -c                 Exit with 1 when a file is not formatted');
    console.log('  --indent-width <n>          Spaces per indent level (default: 2)');
    console.log('  --tabs                      Indent with tabs');
    console.log('  --trim-trailing-whitespace  Strip trailing whitespace from lines');
    console.log('  --insert-final-newline      End files with a newline');
    console.log('  --trim-final-newlines       Remove trailing newlines');
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) {
        console.error(`File not found: ${arg}`);
        process.exit(1);
    }
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

const DEFAULT_INCLUDE_GLOBS = ['**/*.pql'];

const DEFAULT_IGNORE_DIRS = [
  '**/.git/**',
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/out/**',
  '**/coverage/**'
];

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
    const ignore = [
      ...excludes,
      ...(useGitignore ? [] : DEFAULT_IGNORE_DIRS),
    ];
    const files = await globby(patterns, {
      cwd: path.resolve(root),
      absolute: true,
      dot: true,
      gitignore: useGitignore,
      ignore,
      followSymbolicLinks: false,
    });
    return files.sort();
}

function splitGlobs(v: string): string[] {
    return v.split(',').map(s => s.trim()).filter(Boolean);
}

interface CommonArgs {
    positionals: string[];
    includeGlobs: string[];
    excludeGlobs: string[];
    useGitignore: boolean;
}

// Consumes the flags shared by both commands; returns the index to continue from, or -1 if not handled
function parseCommonFlag(args: string[], i: number, common: CommonArgs): number {
    const a = args[i] ?? '';
    if (a === '--include' || a === '-I') {
        const v = args[i + 1];
        if (v) { common.includeGlobs.push(...splitGlobs(v)); return i + 1; }
    }
    if (a === '--exclude' || a === '-E') {
        const v = args[i + 1];
        if (v) { common.excludeGlobs.push(...splitGlobs(v)); return i + 1; }
    }
    if (a === '--no-gitignore') { common.useGitignore = false; return i; }
    if (a === '--gitignore') { common.useGitignore = true; return i; }
    if (a === '-' || !a.startsWith('-')) { common.positionals.push(a); return i; }
    return -1;
}

async function resolveTargets(common: CommonArgs): Promise<{ files: string[]; directory: boolean }> {
    const target = common.positionals[0] ?? '-';
    if (isDirectory(target)) {
        return { files: await listCandidateFiles(target, common.includeGlobs, common.excludeGlobs, common.useGitignore), directory: true };
    }
    return { files: [target], directory: false };
}

async function runCheck(args: string[]) {
    let outputFormat: OutputFormat = 'text';
    let fix = false;
    let dryRun = false;
    let printFixed = false;
    const common: CommonArgs = { positionals: [], includeGlobs: [], excludeGlobs: [], useGitignore: true };
    for (let i = 0; i < args.length; i++) {
        const a = args[i] ?? '';
        if (a === '--format' || a === '-f') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v === 'json' || v === 'text') { outputFormat = v; i++; continue; }
        }
        if (a === '--fix') { fix = true; continue; }
        if (a === '--dry-run' || a === '-n') { dryRun = true; continue; }
        if (a === '--print-fixed') { printFixed = true; continue; }
        const next = parseCommonFlag(args, i, common);
        if (next >= 0) { i = next; continue; }
        console.error(`Unknown option: ${a}`);
        process.exit(1);
    }

    const { files, directory } = await resolveTargets(common);
    type FileResult = { file: string; content: string; diagnostics: Diagnostic[] };
    const results: FileResult[] = [];
    let modifiedCount = 0;
    for (const target of files) {
        const { content, filename } = readInput(target);
        let checked = content;
        if (fix) {
            const { fixed } = fixText(content);
            if (fixed !== content && !dryRun && filename !== '<stdin>') {
                fs.writeFileSync(filename, fixed, 'utf8');
                modifiedCount++;
            }
            if (!directory && (printFixed || filename === '<stdin>')) process.stdout.write(fixed);
            checked = fixed;
        }
        results.push({ file: filename, content: checked, diagnostics: lintQuery(checked) });
    }

    const errorCount = results.reduce((n, r) => n + r.diagnostics.filter(isError).length, 0);
    if (outputFormat === 'json') {
        const jsonFiles = results.map(r => toJsonResult(r.file, r.diagnostics));
        const payload = directory
            ? { valid: errorCount === 0, files: jsonFiles, errorCount, warningCount: jsonFiles.reduce((n, jf) => n + jf.warningCount, 0) }
            : jsonFiles[0];
        console.log(JSON.stringify(payload, null, 2));
        process.exit(errorCount > 0 ? 1 : 0);
    }

    const withFindings = results.filter(r => r.diagnostics.length > 0);
    if (withFindings.length === 0) {
        if (directory && files.length === 0) console.log('No query files found.');
        else if (!fix || directory) console.log(modifiedCount > 0 ? `All queries clean after fixes. Modified ${modifiedCount} file(s).` : 'All queries clean.');
        process.exit(0);
    }
    for (const r of withFindings) {
        const report = textReport(r.file, r.content, r.diagnostics);
        if (errorCount > 0) console.error(report.trimEnd()); else console.log(report.trimEnd());
    }
    process.exit(errorCount > 0 ? 1 : 0);
}

async function runFormat(args: string[]) {
    let write = false;
    let check = false;
    const input: FormatOptionsInput = {};
    const common: CommonArgs = { positionals: [], includeGlobs: [], excludeGlobs: [], useGitignore: true };
    for (let i = 0; i < args.length; i++) {
        const a = args[i] ?? '';
        if (a === '--write' || a === '-w') { write = true; continue; }
        if (a === '--check' || a === '-c') { check = true; continue; }
        if (a === '--indent-width') { input.indentWidth = Number(args[i + 1]); i++; continue; }
        if (a === '--tabs') { input.useSpaces = false; continue; }
        if (a === '--trim-trailing-whitespace') { input.trimTrailingWhitespace = true; continue; }
        if (a === '--insert-final-newline') { input.insertFinalNewline = true; continue; }
        if (a === '--trim-final-newlines') { input.trimFinalNewlines = true; continue; }
        const next = parseCommonFlag(args, i, common);
        if (next >= 0) { i = next; continue; }
        console.error(`Unknown option: ${a}`);
        process.exit(1);
    }

    let options: FormatOptions;
    try {
        options = resolveFormatOptions(input);
    } catch (e) {
        if (e instanceof z.ZodError) {
            console.error(`Invalid format options: ${e.issues.map(iss => `${iss.path.join('.')}: ${iss.message}`).join('; ')}`);
            process.exit(1);
        }
        throw e;
    }

    const { files, directory } = await resolveTargets(common);
    if (directory && !write && !check) {
        console.error('Formatting a directory needs --write or --check');
        process.exit(1);
    }
    const unformatted: string[] = [];
    for (const target of files) {
        const { content, filename } = readInput(target);
        const formatted = format(content, options);
        if (check) {
            if (formatted !== content) unformatted.push(filename);
            continue;
        }
        if (write && filename !== '<stdin>') {
            if (formatted !== content) {
                fs.writeFileSync(filename, formatted, 'utf8');
                console.log(`Formatted ${filename}`);
            }
            continue;
        }
        process.stdout.write(formatted);
    }
    if (check) {
        for (const f of unformatted) console.error(`Not formatted: ${f}`);
        process.exit(unformatted.length > 0 ? 1 : 0);
    }
}

async function main() {
    const args = process.argv.slice(2);

    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    if (args[0] === 'fmt') {
        await runFormat(args.slice(1));
        return;
    }
    await runCheck(args[0] === 'check' ? args.slice(1) : args);
}

main().catch((err: unknown) => {
    console.error(err instanceof Error && err.stack ? err.stack : String(err));
    process.exit(1);
});
