import { describe, it, expect } from '@jest/globals';
import { LexError } from '../FilterParserError.js';
import { isOperatorKeyword, scanAll, tokenize } from '../Lexer.js';

const summarize = (text: string) => scanAll(text).map((t) => [t.kind, t.text, t.offset]);

function lexErrorOf(text: string): LexError {
  try {
    scanAll(text);
  } catch (error) {
    if (error instanceof LexError) return error;
    throw error;
  }
  throw new Error(`Expected "${text}" to fail lexing`);
}

describe('tokenize', () => {
  describe('token stream', () => {
    it('should tokenize a function call comparison with offsets', () => {
      expect(summarize('geo.distance(Home, Office) lt 0.5')).toEqual([
        ['Identifier', 'geo.distance', 0],
        ['Punctuation', '(', 12],
        ['Identifier', 'Home', 13],
        ['Punctuation', ',', 17],
        ['Identifier', 'Office', 19],
        ['Punctuation', ')', 25],
        ['Operator', 'lt', 27],
        ['NumberLiteral', '0.5', 30],
        ['EOF', '', 33],
      ]);
    });

    it('should tokenize property paths and range variables', () => {
      expect(summarize('$it/Address/City')).toEqual([
        ['Identifier', '$it', 0],
        ['Punctuation', '/', 3],
        ['Identifier', 'Address', 4],
        ['Punctuation', '/', 11],
        ['Identifier', 'City', 12],
        ['EOF', '', 16],
      ]);
    });

    it('should place EOF at the input length after trailing whitespace', () => {
      expect(summarize('  ')).toEqual([['EOF', '', 2]]);
    });

    it('should treat only lowercase keywords as operators', () => {
      expect(summarize('a and b And not')).toEqual([
        ['Identifier', 'a', 0],
        ['Operator', 'and', 2],
        ['Identifier', 'b', 6],
        ['Identifier', 'And', 8],
        ['Operator', 'not', 12],
        ['EOF', '', 15],
      ]);
    });
  });

  describe('literals', () => {
    it('should keep quotes and doubled quotes in string token text', () => {
      expect(summarize("'it''s'")).toEqual([
        ['StringLiteral', "'it''s'", 0],
        ['EOF', '', 7],
      ]);
    });

    it('should read negative numbers, decimals and type suffixes', () => {
      const texts = scanAll('-3 2.5 10L 2.5m 0.5d 1.5F').map((t) => t.text);
      expect(texts).toEqual(['-3', '2.5', '10L', '2.5m', '0.5d', '1.5F', '']);
    });

    it('should reject an unterminated string at its opening quote', () => {
      const error = lexErrorOf("Name eq 'abc");
      expect(error.message).toBe('Unterminated string literal at position 8');
      expect(error.position).toBe(8);
      expect(error.kind).toBe('LexError');
    });

    it('should reject a number running into an identifier', () => {
      const error = lexErrorOf('12abc');
      expect(error.message).toBe('Invalid number format: 12a');
      expect(error.position).toBe(0);
    });

    it('should reject the L suffix on a decimal number', () => {
      expect(lexErrorOf('1.5L').message).toBe('Invalid number format: 1.5L');
    });
  });

  it('should reject unexpected characters', () => {
    const error = lexErrorOf('a eq #');
    expect(error.message).toBe("Unexpected character '#' at position 5");
    expect(error.snippet).toBe('#');
  });

  it('should scan lazily so earlier tokens are available before a later error', () => {
    const iterator = tokenize('a eq #')[Symbol.iterator]();

    expect(iterator.next().value).toEqual({ kind: 'Identifier', text: 'a', offset: 0 });
    expect(iterator.next().value).toEqual({ kind: 'Operator', text: 'eq', offset: 2 });
    expect(() => iterator.next()).toThrow(LexError);
  });

  it('should restart from the beginning on each iteration', () => {
    const tokens = tokenize('a eq 1');
    expect([...tokens]).toEqual([...tokens]);
    expect([...tokens]).toHaveLength(4);
  });

  it('should freeze tokens', () => {
    const [first] = scanAll('a');
    expect(Object.isFrozen(first)).toBe(true);
  });
});

describe('isOperatorKeyword', () => {
  it('should recognise every comparison and logical keyword', () => {
    for (const keyword of ['lt', 'le', 'gt', 'ge', 'eq', 'ne', 'and', 'or', 'not']) {
      expect(isOperatorKeyword(keyword)).toBe(true);
    }
    expect(isOperatorKeyword('has')).toBe(false);
  });
});
