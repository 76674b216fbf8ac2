import { parseTemplate, safeParseTemplate } from '../parser';
import { ParseError } from '../errors';
import { captureError } from './helpers';

describe('parseTemplate', () => {
  describe('literals and placeholders', () => {
    it('splits text around a placeholder', () => {
      expect(parseTemplate('Hello {name}!')).toEqual([
        { kind: 'literal', text: 'Hello ', offset: 0 },
        { kind: 'placeholder', name: 'name', args: [], offset: 6, raw: '{name}' },
        { kind: 'literal', text: '!', offset: 12 },
      ]);
    });

    it('parses a comma-separated argument list', () => {
      const [segment] = parseTemplate('{greet(Alice,Bob)}');
      expect(segment).toEqual({
        kind: 'placeholder',
        name: 'greet',
        args: ['Alice', 'Bob'],
        offset: 0,
        raw: '{greet(Alice,Bob)}',
      });
    });

    it('returns an empty array for an empty template', () => {
      expect(parseTemplate('')).toEqual([]);
    });

    it('returns a single literal when there are no placeholders', () => {
      expect(parseTemplate('plain text')).toEqual([{ kind: 'literal', text: 'plain text', offset: 0 }]);
    });

    it('treats a closing brace outside a placeholder as text', () => {
      expect(parseTemplate('a } b')).toEqual([{ kind: 'literal', text: 'a } b', offset: 0 }]);
    });

    it('parses adjacent placeholders without empty literals between them', () => {
      const segments = parseTemplate('{a}{b}');
      expect(segments.map((s) => s.kind)).toEqual(['placeholder', 'placeholder']);
      expect(segments[1].offset).toBe(3);
    });

    it('keeps an opening brace inside a name as part of the name', () => {
      const [segment] = parseTemplate('{a{b}');
      expect(segment).toMatchObject({ kind: 'placeholder', name: 'a{b', raw: '{a{b}' });
    });

    it('reconstructs the source from literal text and placeholder raw text', () => {
      const source = 'a}{b(1,2)}c{d}';
      const rebuilt = parseTemplate(source)
        .map((s) => (s.kind === 'literal' ? s.text : s.raw))
        .join('');
      expect(rebuilt).toBe(source);
    });

    it('freezes the segment list and each segment', () => {
      const segments = parseTemplate('x{y(1)}');
      expect(Object.isFrozen(segments)).toBe(true);
      expect(Object.isFrozen(segments[0])).toBe(true);
      expect(Object.isFrozen(segments[1])).toBe(true);
    });
  });

  describe('arguments', () => {
    const argsOf = (source: string, trimArguments = false) => {
      const segment = parseTemplate(source, { trimArguments }).find((s) => s.kind === 'placeholder');
      return segment?.kind === 'placeholder' ? segment.args : undefined;
    };

    it('yields no arguments for empty parentheses', () => {
      expect(argsOf('{x()}')).toEqual([]);
    });

    it('yields no arguments without parentheses', () => {
      expect(argsOf('{x}')).toEqual([]);
    });

    it('keeps a trailing empty argument', () => {
      expect(argsOf('{x(a,)}')).toEqual(['a', '']);
    });

    it('preserves whitespace by default', () => {
      expect(argsOf('haha{test(a, b, c)}')).toEqual(['a', ' b', ' c']);
      expect(argsOf('{x( )}')).toEqual([' ']);
    });

    it('trims arguments when trimArguments is set', () => {
      expect(argsOf('haha{test(a, b, c)}', true)).toEqual(['a', 'b', 'c']);
    });

    it('treats an all-whitespace list as empty when trimming', () => {
      expect(argsOf('{x( )}', true)).toEqual([]);
    });

    it('preserves whitespace in names', () => {
      const [segment] = parseTemplate('{ spaced name }');
      expect(segment).toMatchObject({ name: ' spaced name ' });
    });

    it('does not resolve placeholders nested in arguments', () => {
      // The first ')' closes the list, so the inner '{b}' is plain argument text
      expect(argsOf('{a({b})}')).toEqual(['{b}']);
    });
  });

  describe('errors', () => {
    const parseErrorOf = (source: string): ParseError => {
      const error = captureError(() => parseTemplate(source));
      expect(error).toBeInstanceOf(ParseError);
      return error as ParseError;
    };

    it('rejects an empty name at the opening brace', () => {
      const error = parseErrorOf('{}');
      expect(error.code).toBe('EMPTY_NAME');
      expect(error.offset).toBe(0);
    });

    it('rejects an empty name before an argument list', () => {
      const error = parseErrorOf('ab{(x)}');
      expect(error.code).toBe('EMPTY_NAME');
      expect(error.offset).toBe(2);
    });

    it('reports an unterminated placeholder at its opening brace', () => {
      const error = parseErrorOf('Hello {name');
      expect(error.code).toBe('UNTERMINATED_PLACEHOLDER');
      expect(error.offset).toBe(6);
      expect(error.message).toBe('Placeholder is not terminated at offset 6');
    });

    it('reports a lone opening brace as unterminated', () => {
      const error = parseErrorOf('{');
      expect(error.code).toBe('UNTERMINATED_PLACEHOLDER');
      expect(error.offset).toBe(0);
    });

    it('reports an unclosed argument list as unterminated', () => {
      const error = parseErrorOf('x{f(a');
      expect(error.code).toBe('UNTERMINATED_PLACEHOLDER');
      expect(error.offset).toBe(1);
    });

    it('reports a missing closing brace after arguments as unterminated', () => {
      const error = parseErrorOf('x{f(a)');
      expect(error.code).toBe('UNTERMINATED_PLACEHOLDER');
      expect(error.offset).toBe(1);
    });

    it('rejects text between the argument list and the closing brace', () => {
      const error = parseErrorOf('{a(b)c}');
      expect(error.code).toBe('UNEXPECTED_CHARACTER');
      expect(error.offset).toBe(5);
    });

    it('rejects a closing parenthesis ending a name', () => {
      const error = parseErrorOf('{a)}');
      expect(error.code).toBe('UNEXPECTED_CHARACTER');
      expect(error.offset).toBe(2);
    });
  });
});

describe('safeParseTemplate', () => {
  it('returns segments on success', () => {
    const result = safeParseTemplate('{a}');
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toHaveLength(1);
    }
  });

  it('returns the parse error instead of throwing', () => {
    const result = safeParseTemplate('oops {');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('UNTERMINATED_PLACEHOLDER');
      expect(result.error.offset).toBe(5);
    }
  });
});
