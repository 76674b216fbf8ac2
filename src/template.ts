/**
 * Template
 *
 * A template is parsed once, at construction, and rendered any number of
 * times. By default it owns its own registry; pass `registry` to share one
 * between templates.
 */

import debug from 'debug';
import { ParseError, RenderError } from './errors';
import { ParseOptions, RenderOptions, ResolvedRenderOptions, resolveRenderOptions } from './options';
import { parseTemplate } from './parser';
import { BindingRegistry } from './registry';
import { renderSegments, safeRenderSegments } from './renderer';
import { Handler, SafeResult, Segment } from './types';

const log = debug('bracer:template');

export interface TemplateOptions<TContext> extends ParseOptions, RenderOptions {
    /** Registry to resolve names against instead of a private one */
    registry?: BindingRegistry<TContext>;
}

export class Template<TContext = unknown> {
    readonly source: string;
    readonly segments: readonly Segment[];
    readonly registry: BindingRegistry<TContext>;
    private readonly renderOptions: ResolvedRenderOptions;

    /**
     * @throws ParseError on malformed placeholder syntax
     */
    constructor(source: string, options: TemplateOptions<TContext> = {}) {
        const { registry, trimArguments, unknownPlaceholder } = options;
        this.source = source;
        this.segments = parseTemplate(source, { trimArguments });
        this.renderOptions = resolveRenderOptions({ unknownPlaceholder });
        this.registry = registry ?? new BindingRegistry<TContext>();
        log('Created template', { segments: this.segments.length, sharedRegistry: registry !== undefined });
    }

    /**
     * Construct without throwing on malformed syntax
     */
    static safeCreate<TContext = unknown>(
        source: string,
        options?: TemplateOptions<TContext>,
    ): SafeResult<Template<TContext>, ParseError> {
        try {
            return { success: true, data: new Template<TContext>(source, options) };
        } catch (error) {
            if (error instanceof ParseError) {
                return { success: false, error };
            }
            throw error;
        }
    }

    registerStatic(name: string, value: string): void {
        this.registry.registerStatic(name, value);
    }

    registerHandler(name: string, handler: Handler<TContext>): void {
        this.registry.registerHandler(name, handler);
    }

    /**
     * Render with the given context. Per-call options override the template's.
     *
     * @throws RenderError
     */
    render(context: TContext, options?: RenderOptions): string {
        return renderSegments(this.segments, this.registry, context, this.overrideOptions(options));
    }

    safeRender(context: TContext, options?: RenderOptions): SafeResult<string, RenderError> {
        return safeRenderSegments(this.segments, this.registry, context, this.overrideOptions(options));
    }

    /**
     * Distinct placeholder names in order of first appearance
     */
    placeholders(): string[] {
        const names = new Set<string>();
        for (const segment of this.segments) {
            if (segment.kind === 'placeholder') {
                names.add(segment.name);
            }
        }
        return Array.from(names);
    }

    /**
     * Referenced names that have no binding yet
     */
    missingBindings(): string[] {
        return this.placeholders().filter((name) => !this.registry.has(name));
    }

    private overrideOptions(options?: RenderOptions): RenderOptions {
        return {
            unknownPlaceholder: options?.unknownPlaceholder ?? this.renderOptions.unknownPlaceholder,
        };
    }
}
