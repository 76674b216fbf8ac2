/**
 * Typed handlers
 *
 * Handlers receive raw string arguments. defineHandler validates and converts
 * them with a zod schema first, so `render` works with typed values:
 *
 * ```ts
 * const repeat = defineHandler({
 *     args: z.tuple([z.string(), z.coerce.number().int().min(0)]),
 *     render: ([text, times]) => text.repeat(times),
 * });
 * template.registerHandler('repeat', repeat);
 * ```
 *
 * A schema mismatch throws the ZodError, which the renderer reports as a
 * HANDLER_FAILED render error.
 */

import { z } from 'zod';
import { Handler } from './types';

export interface HandlerDefinition<TArgs, TContext> {
    /** Schema applied to the raw argument array */
    args: z.ZodSchema<TArgs>;

    /** Produce the substitution from validated arguments */
    render: (args: TArgs, context: TContext) => string;
}

export function defineHandler<TArgs, TContext = unknown>(definition: HandlerDefinition<TArgs, TContext>): Handler<TContext> {
    return (rawArgs, context) => definition.render(definition.args.parse(rawArgs), context);
}
