/**
 * Core types shared by the parser, registry and renderer.
 */

// ═══════════════════════════════════════════════════════════════════════════
// SEGMENTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A run of text emitted verbatim
 */
export interface LiteralSegment {
    kind: 'literal';
    text: string;
    /** Index in the source where the run starts */
    offset: number;
}

/**
 * A parsed `{name}` or `{name(a, b)}` token
 */
export interface PlaceholderSegment {
    kind: 'placeholder';
    /** Non-empty, case-sensitive binding name */
    name: string;
    /** Raw argument strings, never resolved as placeholders */
    args: readonly string[];
    /** Index of the opening `{` */
    offset: number;
    /** Exact source text, braces included */
    raw: string;
}

/**
 * Unit of a parsed template
 */
export type Segment = LiteralSegment | PlaceholderSegment;

// ═══════════════════════════════════════════════════════════════════════════
// BINDINGS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Produces the substitution for a placeholder.
 * Throwing marks the render as failed; the thrown value becomes the cause.
 */
export type Handler<TContext = unknown> = (args: readonly string[], context: TContext) => string;

export interface StaticBinding {
    kind: 'static';
    value: string;
}

export interface HandlerBinding<TContext = unknown> {
    kind: 'handler';
    handler: Handler<TContext>;
}

/**
 * Registered substitution source for a name
 */
export type Binding<TContext = unknown> = StaticBinding | HandlerBinding<TContext>;

/**
 * Bulk registration input: strings become static bindings, functions handlers
 */
export type BindingMap<TContext = unknown> = Record<string, string | Handler<TContext>>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Non-throwing outcome, shaped like zod's safeParse result
 */
export type SafeResult<T, E extends Error> = { success: true; data: T } | { success: false; error: E };
