/**
 * Option schemas
 *
 * Options arrive from callers as plain objects, so they are validated with zod
 * before the parser or renderer reads them.
 */

import { z } from 'zod';

export const unknownPlaceholderPolicySchema = z.enum(['error', 'empty', 'echo']);

/**
 * What to substitute for a name with no binding:
 * - `error`: fail the render (default)
 * - `empty`: substitute an empty string
 * - `echo`: substitute the placeholder's source text
 */
export type UnknownPlaceholderPolicy = z.infer<typeof unknownPlaceholderPolicySchema>;

export const parseOptionsSchema = z.object({
    trimArguments: z.boolean().default(false),
});

export const renderOptionsSchema = z.object({
    unknownPlaceholder: unknownPlaceholderPolicySchema.default('error'),
});

export type ParseOptions = z.input<typeof parseOptionsSchema>;
export type ResolvedParseOptions = z.output<typeof parseOptionsSchema>;

export type RenderOptions = z.input<typeof renderOptionsSchema>;
export type ResolvedRenderOptions = z.output<typeof renderOptionsSchema>;

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
    return parseOptionsSchema.parse(options);
}

export function resolveRenderOptions(options: RenderOptions = {}): ResolvedRenderOptions {
    return renderOptionsSchema.parse(options);
}
