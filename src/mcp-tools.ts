import { z } from 'zod';
import { lintQuery } from './core/pipeline.js';
import { groupDiagnostics } from './core/report.js';
import { FormatOptionsSchema } from './core/options.js';
import { fixText } from './query/migrations.js';
import { format } from './query/formatter.js';

/**
 * Tool definitions and handlers for the MCP server, kept apart from the stdio transport.
 */

// Input schemas using Zod
export const CheckQuerySchema = z.object({
  text: z.string().describe('The query text to check'),
  autofix: z.boolean().optional().describe('If true, apply every migration fix and return the rewritten query'),
});

export const FormatQuerySchema = FormatOptionsSchema.extend({
  text: z.string().describe('The query text to format'),
});

export const TOOLS = [
  {
    name: 'check_query',
    description:
      'Check a pipe query for deprecated or removed syntax. With autofix=true, rewrites deprecated constructs ' +
      '(yield, func, =>, // comments, implicit this arguments, function-style casts) and returns the fixed query ' +
      'together with whatever diagnostics remain.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'Query text' },
        autofix: { type: 'boolean', description: 'Apply all available fixes' },
      },
      required: ['text'],
    },
  },
  {
    name: 'format_query',
    description: 'Format a pipe query: one pipeline stage per line, bracket-based indentation, normalized spacing.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'Query text' },
        indentWidth: { type: 'number', description: 'Spaces per indent level (default 2)' },
        useSpaces: { type: 'boolean', description: 'Indent with spaces instead of tabs (default true)' },
        trimTrailingWhitespace: { type: 'boolean', description: 'Strip trailing whitespace' },
        insertFinalNewline: { type: 'boolean', description: 'End with a newline' },
        trimFinalNewlines: { type: 'boolean', description: 'Remove trailing newlines' },
      },
      required: ['text'],
    },
  },
];

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
};

function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export function callTool(name: string, args: unknown): ToolResult {
  try {
    if (name === 'check_query') {
      const parsed = CheckQuerySchema.parse(args);
      if (parsed.autofix) {
        const { fixed, diagnostics } = fixText(parsed.text);
        const { errs, warns } = groupDiagnostics(diagnostics);
        return jsonResult({ fixed, valid: errs.length === 0, errorCount: errs.length, warningCount: warns.length, diagnostics });
      }
      const diagnostics = lintQuery(parsed.text);
      const { errs, warns } = groupDiagnostics(diagnostics);
      return jsonResult({ valid: errs.length === 0, errorCount: errs.length, warningCount: warns.length, diagnostics });
    }

    if (name === 'format_query') {
      const { text, ...options } = FormatQuerySchema.parse(args);
      const formatted = format(text, options);
      return jsonResult({ formatted, changed: formatted !== text });
    }

    throw new Error(`Unknown tool: ${name}`);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error(`Invalid arguments: ${error.message}`);
    }
    throw error;
  }
}
