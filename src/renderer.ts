/**
 * Renderer
 *
 * Resolves parsed segments against a registry, strictly left to right.
 * A failed render produces no output: the error is the only result.
 */

import debug from 'debug';
import { RenderError } from './errors';
import { RenderOptions, ResolvedRenderOptions, resolveRenderOptions } from './options';
import { BindingRegistry } from './registry';
import { PlaceholderSegment, SafeResult, Segment } from './types';

const log = debug('bracer:renderer');

/**
 * Render segments to a string
 *
 * @throws RenderError when a name has no binding (under the default policy) or a handler fails
 */
export function renderSegments<TContext>(
    segments: readonly Segment[],
    registry: BindingRegistry<TContext>,
    context: TContext,
    options?: RenderOptions,
): string {
    const resolved = resolveRenderOptions(options);
    const parts: string[] = [];

    for (const segment of segments) {
        if (segment.kind === 'literal') {
            parts.push(segment.text);
        } else {
            parts.push(substitute(segment, registry, context, resolved));
        }
    }

    return parts.join('');
}

/**
 * Same as renderSegments, but returns the error instead of throwing it
 */
export function safeRenderSegments<TContext>(
    segments: readonly Segment[],
    registry: BindingRegistry<TContext>,
    context: TContext,
    options?: RenderOptions,
): SafeResult<string, RenderError> {
    try {
        return { success: true, data: renderSegments(segments, registry, context, options) };
    } catch (error) {
        if (error instanceof RenderError) {
            return { success: false, error };
        }
        throw error;
    }
}

function substitute<TContext>(
    segment: PlaceholderSegment,
    registry: BindingRegistry<TContext>,
    context: TContext,
    options: ResolvedRenderOptions,
): string {
    const binding = registry.resolve(segment.name);

    if (!binding) {
        return substituteUnknown(segment, options);
    }

    switch (binding.kind) {
        case 'static':
            return binding.value;
        case 'handler':
            return invokeHandler(segment, binding.handler, context);
    }
}

function substituteUnknown(segment: PlaceholderSegment, options: ResolvedRenderOptions): string {
    switch (options.unknownPlaceholder) {
        case 'empty':
            return '';
        case 'echo':
            return segment.raw;
        case 'error':
            log('Unknown placeholder', { name: segment.name, offset: segment.offset });
            throw new RenderError('UNKNOWN_PLACEHOLDER', segment.name);
    }
}

function invokeHandler<TContext>(
    segment: PlaceholderSegment,
    handler: (args: readonly string[], context: TContext) => unknown,
    context: TContext,
): string {
    let output: unknown;
    try {
        output = handler(segment.args, context);
    } catch (error) {
        log('Handler failed', { name: segment.name, error });
        throw new RenderError('HANDLER_FAILED', segment.name, { cause: error });
    }

    if (typeof output !== 'string') {
        const cause = new TypeError(`Handler returned ${typeof output}, expected string`);
        log('Handler returned a non-string value', { name: segment.name, type: typeof output });
        throw new RenderError('HANDLER_FAILED', segment.name, { cause });
    }

    return output;
}
