/**
 * Filter expression lexer.
 *
 * `tokenize` returns an iterable that scans lazily: tokens are produced as the
 * parser pulls them, so a lexical error further right is only reported once
 * everything before it has been consumed. Iterating again re-scans from the
 * start.
 */

import { debugLog } from '../utils/logger.js';
import { LexError } from './FilterParserError.js';

export type TokenKind =
  | 'Identifier'
  | 'NumberLiteral'
  | 'StringLiteral'
  | 'Operator'
  | 'Punctuation'
  | 'EOF';

export interface Token {
  readonly kind: TokenKind;
  /** Raw source text; for string literals this includes the quotes */
  readonly text: string;
  readonly offset: number;
}

export const OPERATOR_KEYWORDS = ['lt', 'le', 'gt', 'ge', 'eq', 'ne', 'and', 'or', 'not'] as const;

export type OperatorKeyword = (typeof OPERATOR_KEYWORDS)[number];

const KEYWORDS: ReadonlySet<string> = new Set(OPERATOR_KEYWORDS);
const PUNCTUATION = new Set(['(', ')', ',', '/']);
const NUMBER_SUFFIXES = new Set(['l', 'm', 'd', 'f']);

const isDigit = (ch: string) => ch >= '0' && ch <= '9';
const isIdentifierStart = (ch: string) => /[A-Za-z_$]/.test(ch);
const isIdentifierPart = (ch: string) => /[A-Za-z0-9_.]/.test(ch);

export function isOperatorKeyword(text: string): text is OperatorKeyword {
  return KEYWORDS.has(text);
}

function token(kind: TokenKind, text: string, offset: number): Token {
  return Object.freeze({ kind, text, offset });
}

class Scanner {
  private pos = 0;
  private readonly input: string;

  constructor(input: string) {
    this.input = input;
  }

  private peek(ahead = 0): string {
    return this.input[this.pos + ahead] || '';
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && /\s/.test(this.peek())) {
      this.pos++;
    }
  }

  /**
   * Single-quoted string; a doubled quote ('') stands for one quote.
   */
  private readString(start: number): Token {
    this.pos++; // opening '
    while (this.pos < this.input.length) {
      if (this.peek() === "'") {
        if (this.peek(1) === "'") {
          this.pos += 2;
          continue;
        }
        this.pos++; // closing '
        return token('StringLiteral', this.input.slice(start, this.pos), start);
      }
      this.pos++;
    }

    throw new LexError({
      message: `Unterminated string literal at position ${start}`,
      position: start,
      length: this.pos - start,
      snippet: this.input.slice(start),
      hint: "Close the string with a single quote (') and write '' for a quote inside it",
    });
  }

  private readNumber(start: number): Token {
    if (this.peek() === '-') this.pos++;
    while (isDigit(this.peek())) this.pos++;
    let fraction = false;
    if (this.peek() === '.' && isDigit(this.peek(1))) {
      fraction = true;
      this.pos++;
      while (isDigit(this.peek())) this.pos++;
    }

    // Optional type suffix (1L, 2.5m, 0.5d, 1.5f) unless an identifier continues.
    // L is for integers only.
    const suffix = this.peek().toLowerCase();
    if (
      NUMBER_SUFFIXES.has(suffix) &&
      !isIdentifierPart(this.peek(1)) &&
      !(suffix === 'l' && fraction)
    ) {
      this.pos++;
    }

    if (isIdentifierPart(this.peek())) {
      const end = this.pos + 1;
      throw new LexError({
        message: `Invalid number format: ${this.input.slice(start, end)}`,
        position: start,
        length: end - start,
        snippet: this.input.slice(start, end),
        hint: 'Numbers look like 12, -3, 0.5 or carry one type suffix: 12L, 2.5m, 0.5d, 1.5f',
      });
    }

    return token('NumberLiteral', this.input.slice(start, this.pos), start);
  }

  private readIdentifier(start: number): Token {
    this.pos++; // first character, which may be '$'
    while (isIdentifierPart(this.peek())) this.pos++;
    const text = this.input.slice(start, this.pos);
    return token(isOperatorKeyword(text) ? 'Operator' : 'Identifier', text, start);
  }

  next(): Token {
    this.skipWhitespace();

    const start = this.pos;
    if (start >= this.input.length) {
      return token('EOF', '', this.input.length);
    }

    const ch = this.peek();

    if (PUNCTUATION.has(ch)) {
      this.pos++;
      return token('Punctuation', ch, start);
    }

    if (ch === "'") {
      return this.readString(start);
    }

    if (isDigit(ch) || (ch === '-' && isDigit(this.peek(1)))) {
      return this.readNumber(start);
    }

    if (isIdentifierStart(ch)) {
      return this.readIdentifier(start);
    }

    throw new LexError({
      message: `Unexpected character '${ch}' at position ${start}`,
      position: start,
      length: 1,
      snippet: ch,
      hint: "Valid syntax includes identifiers, numbers, 'strings', ( ) , / and the operators lt le gt ge eq ne and or not",
    });
  }
}

export function tokenize(text: string): Iterable<Token> {
  return {
    *[Symbol.iterator]() {
      const scanner = new Scanner(text);
      while (true) {
        const t = scanner.next();
        debugLog('lexer', 'Token', t);
        yield t;
        if (t.kind === 'EOF') return;
      }
    },
  };
}

/** Materialise every token, EOF included */
export function scanAll(text: string): Token[] {
  return [...tokenize(text)];
}
