// Library entry point

// ─── Core ────────────────────────────────────────────────────────────────
export { Template } from './template';
export type { TemplateOptions } from './template';

// ─── Parsing ─────────────────────────────────────────────────────────────
export { parseTemplate, safeParseTemplate } from './parser';

// ─── Bindings ────────────────────────────────────────────────────────────
export { BindingRegistry } from './registry';
export type { BindingSnapshot } from './registry';
export { defineHandler } from './handler';
export type { HandlerDefinition } from './handler';

// ─── Rendering ───────────────────────────────────────────────────────────
export { renderSegments, safeRenderSegments } from './renderer';

// ─── Options ─────────────────────────────────────────────────────────────
export { parseOptionsSchema, renderOptionsSchema, unknownPlaceholderPolicySchema } from './options';
export type { ParseOptions, RenderOptions, UnknownPlaceholderPolicy } from './options';

// ─── Errors ──────────────────────────────────────────────────────────────
export { ParseError, RenderError } from './errors';
export type { ParseErrorCode, RenderErrorCode } from './errors';

// ─── Types ───────────────────────────────────────────────────────────────
export type {
    Segment, LiteralSegment, PlaceholderSegment,
    Binding, StaticBinding, HandlerBinding, Handler, BindingMap,
    SafeResult,
} from './types';
