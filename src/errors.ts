/**
 * Errors raised while parsing or rendering a template
 */

export type ParseErrorCode = 'EMPTY_NAME' | 'UNTERMINATED_PLACEHOLDER' | 'UNEXPECTED_CHARACTER';

export type RenderErrorCode = 'UNKNOWN_PLACEHOLDER' | 'HANDLER_FAILED';

const PARSE_MESSAGES: Record<ParseErrorCode, string> = {
    EMPTY_NAME: 'Placeholder has an empty name',
    UNTERMINATED_PLACEHOLDER: 'Placeholder is not terminated',
    UNEXPECTED_CHARACTER: 'Unexpected character in placeholder',
};

/**
 * Malformed placeholder syntax. `offset` indexes into the template source.
 */
export class ParseError extends Error {
    readonly code: ParseErrorCode;
    readonly offset: number;

    constructor(code: ParseErrorCode, offset: number) {
        super(`${PARSE_MESSAGES[code]} at offset ${offset}`);
        this.name = 'ParseError';
        this.code = code;
        this.offset = offset;
    }
}

/**
 * A placeholder could not be resolved during render
 */
export class RenderError extends Error {
    readonly code: RenderErrorCode;
    readonly placeholder: string;

    constructor(code: RenderErrorCode, placeholder: string, options?: { cause?: unknown }) {
        super(RenderError.describe(code, placeholder, options?.cause), options);
        this.name = 'RenderError';
        this.code = code;
        this.placeholder = placeholder;
    }

    private static describe(code: RenderErrorCode, placeholder: string, cause: unknown): string {
        if (code === 'UNKNOWN_PLACEHOLDER') {
            return `Unknown placeholder: ${placeholder}`;
        }
        const reason = cause instanceof Error ? cause.message : String(cause);
        return `Handler for placeholder "${placeholder}" failed: ${reason}`;
    }
}
