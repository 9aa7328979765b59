import { z } from 'zod';
import type { FormatOptions } from './types.js';

export const FormatOptionsSchema = z.object({
  indentWidth: z.number().int().min(0).max(16).default(2).describe('Spaces per indent level when useSpaces is set'),
  useSpaces: z.boolean().default(true).describe('Indent with spaces instead of tabs'),
  trimTrailingWhitespace: z.boolean().default(false).describe('Strip trailing whitespace from every line'),
  insertFinalNewline: z.boolean().default(false).describe('End the document with exactly one newline'),
  trimFinalNewlines: z.boolean().default(false).describe('Remove newlines at the end of the document'),
});

export type FormatOptionsInput = z.input<typeof FormatOptionsSchema>;

export const DEFAULT_FORMAT_OPTIONS: FormatOptions = FormatOptionsSchema.parse({});

/**
 * Complete partial options with defaults. Throws `z.ZodError` on values of the wrong type;
 * callers at the edges (CLI, MCP) turn that into a usage error.
 */
export function resolveFormatOptions(input: FormatOptionsInput = {}): FormatOptions {
  return FormatOptionsSchema.parse(input);
}

export function indentUnit(options: FormatOptions): string {
  return options.useSpaces ? ' '.repeat(options.indentWidth) : '\t';
}
