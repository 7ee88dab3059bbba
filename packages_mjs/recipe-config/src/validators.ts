/**
 * Recipe schema.
 *
 * Checks the shape every pipeline needs. Connector-specific fields
 * (hosts, tables, file formats) pass through unchecked.
 */

import { z } from 'zod';

import { RecipeValidationError } from './errors.js';

export const TransformStepSchema = z.object({
    type: z.string().min(1)
}).passthrough();

export const TransformSchema = z.object({
    steps: z.array(TransformStepSchema).default([])
});

export const IncrementalSchema = z.object({
    strategy: z.literal('cursor'),
    cursor_column: z.string().min(1)
});

export const SourceSchema = z.object({
    type: z.string().min(1),
    incremental: IncrementalSchema.optional()
}).passthrough();

export const DestinationSchema = z.object({
    type: z.string().min(1),
    write_mode: z.enum(['append', 'overwrite', 'merge']).default('append'),
    merge_keys: z.array(z.string().min(1)).optional()
}).passthrough().superRefine((dest, ctx) => {
    if (dest.write_mode === 'merge' && !dest.merge_keys?.length) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['merge_keys'],
            message: "merge_keys is required when write_mode is 'merge'"
        });
    }
});

export const RuntimeSchema = z.object({
    batch_size: z.number().int().positive().default(10000),
    max_retries: z.number().int().nonnegative().default(0)
});

export const RecipeSchema = z.object({
    name: z.string().min(1),
    source: SourceSchema,
    transform: TransformSchema,
    destination: DestinationSchema,
    runtime: RuntimeSchema.default({}),
    schema: z.record(z.unknown()).optional()
});

export type TransformStep = z.infer<typeof TransformStepSchema>;
export type Recipe = z.infer<typeof RecipeSchema>;

export function validateRecipe(raw: unknown, recipeId: string): Recipe {
    const result = RecipeSchema.safeParse(raw);
    if (!result.success) {
        throw new RecipeValidationError(recipeId, result.error.issues, { cause: result.error });
    }
    return result.data;
}
