/**
 * Placeholder grammar
 *
 *   placeholder := '{' name [ '(' args ')' ] '}'
 *   name        := maximal run of characters other than '(' ')' '}'
 *   args        := arg { ',' arg }
 *
 * Every '{' opens a placeholder; there is no escape for a literal brace.
 * A '}' outside a placeholder is plain text.
 */

export const OPEN_PLACEHOLDER = '{';
export const CLOSE_PLACEHOLDER = '}';
export const OPEN_ARGUMENTS = '(';
export const CLOSE_ARGUMENTS = ')';
export const ARGUMENT_SEPARATOR = ',';

/**
 * Characters that end a placeholder name
 */
export function isNameTerminator(char: string): boolean {
    return char === OPEN_ARGUMENTS || char === CLOSE_ARGUMENTS || char === CLOSE_PLACEHOLDER;
}

/**
 * Split the text between '(' and ')' into raw arguments.
 * `()` has no arguments; `(a,)` has two, the second empty.
 */
export function splitArguments(text: string, trim = false): string[] {
    if (text === '' || (trim && text.trim() === '')) {
        return [];
    }
    const args = text.split(ARGUMENT_SEPARATOR);
    return trim ? args.map((arg) => arg.trim()) : args;
}
