/**
 * Zod schemas for validating migration declarations handed to the engine
 */

import { z } from 'zod';
import { JOIN_TYPES } from '../types/index.js';

/** `table.column` */
export const qualifiedColumnSchema = z
  .string()
  .regex(/^[a-zA-Z_][a-zA-Z0-9_]*\.[a-zA-Z_][a-zA-Z0-9_]*$/, 'Expected a qualified column (table.column)');

/** Join type, case-insensitive */
export const joinTypeSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toUpperCase() : value),
  z.enum(JOIN_TYPES)
);

export const joinSpecSchema = z
  .object({
    table: z.string().min(1),
    onClause: z.string().min(1),
    type: joinTypeSchema.optional(),
  })
  .strict();

export const paginationSchema = z.discriminatedUnion('mode', [
  z
    .object({
      mode: z.literal('offset'),
      orderBy: z.array(qualifiedColumnSchema).min(1).optional(),
    })
    .strict(),
  z
    .object({
      mode: z.literal('keyset'),
      key: qualifiedColumnSchema,
    })
    .strict(),
]);

export const writeModeSchema = z.enum(['insert', 'upsert']);

export const pageSizeSchema = z.number().int().min(1).max(100_000);
export const batchSizeSchema = z.number().int().min(1).max(10_000);

export const migrationSpecSchema = z
  .object({
    name: z.string().min(1),
    rootTable: z.string().min(1),
    targetTable: z.string().min(1).optional(),
    joins: z.array(joinSpecSchema).optional(),
    columnMapping: z
      .record(z.string().min(1))
      .refine((mapping) => Object.keys(mapping).length > 0, 'At least one column must be mapped'),
    transformFunction: z.string().min(1).optional(),
    extraTargetColumns: z.array(z.string().min(1)).optional(),
    pagination: paginationSchema.optional(),
    writeMode: writeModeSchema.optional(),
    conflictColumns: z.array(z.string().min(1)).min(1).optional(),
    pageSize: pageSizeSchema.optional(),
    batchSize: batchSizeSchema.optional(),
  })
  .strict()
  .superRefine((spec, ctx) => {
    if (spec.writeMode === 'upsert' && !spec.conflictColumns) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Upsert requires conflictColumns',
        path: ['conflictColumns'],
      });
    }
  });

export const failureRateSchema = z.number().min(0).max(1);

export type JoinSpecInput = z.infer<typeof joinSpecSchema>;
export type MigrationSpecInput = z.infer<typeof migrationSpecSchema>;

/**
 * Flatten zod issues into one line per path
 */
export function formatZodIssues(
  label: string,
  err: { issues: Array<{ path: Array<string | number>; message: string }> }
): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
