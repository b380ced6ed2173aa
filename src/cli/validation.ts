/**
 * Zod validation schemas for CLI inputs
 *
 * Commander parses the arguments; these schemas coerce and check them
 * and turn the result into typed options for the command handlers.
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';

const extensionList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((ext) => ext.trim().replace(/^\./, '').toLowerCase())
      .filter(Boolean)
  )
  .refine((list) => list.length > 0, 'At least one extension is required');

const positiveInt = z.coerce.number().int('Must be a whole number').positive('Must be greater than 0');

/**
 * Options shared by the commands that read a directory.
 */
export const SourceOptionsSchema = z.object({
  ext: extensionList.optional(),
  repository: z.string().min(1).optional(),
  branch: z.string().min(1).optional(),
  commit: z.string().min(1).optional(),
});

export const ChunkOptionsSchema = SourceOptionsSchema.extend({
  show: positiveInt.optional(),
});

export const IngestOptionsSchema = SourceOptionsSchema.extend({
  out: z.string().min(1, 'Output file cannot be empty').optional(),
  dryRun: z.boolean().default(false),
  tokenLimit: positiveInt.optional(),
}).refine((options) => options.dryRun || options.out !== undefined, {
  message: 'Either --out <file> or --dry-run is required',
  path: ['out'],
});

export type SourceOptions = z.output<typeof SourceOptionsSchema>;
export type ChunkOptions = z.output<typeof ChunkOptionsSchema>;
export type IngestOptions = z.output<typeof IngestOptionsSchema>;

/** dryRun -> dry-run */
function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

/**
 * Parse options with a schema, turning zod issues into a ValidationError.
 */
export function validateOptions<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `--${toFlag(String(issue.path[0]))}: ${issue.message}` : issue.message
    );
    throw new ValidationError('Invalid command options', issues);
  }
  return result.data;
}
