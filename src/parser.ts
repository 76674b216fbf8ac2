/**
 * Template Parser
 *
 * Scans a template once, left to right, splitting it into literal runs and
 * placeholders. Offsets are string indices (UTF-16 code units).
 */

import debug from 'debug';
import { ParseError } from './errors';
import {
    CLOSE_ARGUMENTS,
    CLOSE_PLACEHOLDER,
    OPEN_ARGUMENTS,
    OPEN_PLACEHOLDER,
    isNameTerminator,
    splitArguments,
} from './grammar';
import { ParseOptions, resolveParseOptions } from './options';
import { LiteralSegment, PlaceholderSegment, SafeResult, Segment } from './types';

const log = debug('bracer:parser');

/**
 * Parse a template source into frozen segments
 *
 * @throws ParseError on malformed placeholder syntax
 */
export function parseTemplate(source: string, options?: ParseOptions): readonly Segment[] {
    const { trimArguments } = resolveParseOptions(options);
    const segments: Segment[] = [];

    let literalStart = 0;
    let pos = 0;

    while (pos < source.length) {
        if (source[pos] !== OPEN_PLACEHOLDER) {
            pos++;
            continue;
        }

        if (pos > literalStart) {
            segments.push(literal(source.slice(literalStart, pos), literalStart));
        }

        const placeholder = readPlaceholder(source, pos, trimArguments);
        segments.push(placeholder);
        pos += placeholder.raw.length;
        literalStart = pos;
    }

    if (literalStart < source.length) {
        segments.push(literal(source.slice(literalStart), literalStart));
    }

    log('Parsed template', { length: source.length, segments: segments.length });
    return Object.freeze(segments);
}

/**
 * Same as parseTemplate, but returns the error instead of throwing it
 */
export function safeParseTemplate(source: string, options?: ParseOptions): SafeResult<readonly Segment[], ParseError> {
    try {
        return { success: true, data: parseTemplate(source, options) };
    } catch (error) {
        if (error instanceof ParseError) {
            return { success: false, error };
        }
        throw error;
    }
}

/**
 * Read one placeholder whose '{' sits at `start`
 */
function readPlaceholder(source: string, start: number, trimArguments: boolean): PlaceholderSegment {
    let pos = start + 1;
    while (pos < source.length && !isNameTerminator(source[pos])) {
        pos++;
    }
    if (pos >= source.length) {
        throw new ParseError('UNTERMINATED_PLACEHOLDER', start);
    }

    const name = source.slice(start + 1, pos);
    if (name === '') {
        throw new ParseError('EMPTY_NAME', start);
    }

    let args: string[] = [];
    if (source[pos] === OPEN_ARGUMENTS) {
        const close = source.indexOf(CLOSE_ARGUMENTS, pos + 1);
        if (close === -1) {
            throw new ParseError('UNTERMINATED_PLACEHOLDER', start);
        }
        args = splitArguments(source.slice(pos + 1, close), trimArguments);
        pos = close + 1;
        if (pos >= source.length) {
            throw new ParseError('UNTERMINATED_PLACEHOLDER', start);
        }
    }

    if (source[pos] !== CLOSE_PLACEHOLDER) {
        throw new ParseError('UNEXPECTED_CHARACTER', pos);
    }

    const segment: PlaceholderSegment = {
        kind: 'placeholder',
        name,
        args: Object.freeze(args),
        offset: start,
        raw: source.slice(start, pos + 1),
    };
    return Object.freeze(segment);
}

function literal(text: string, offset: number): LiteralSegment {
    const segment: LiteralSegment = { kind: 'literal', text, offset };
    return Object.freeze(segment);
}
