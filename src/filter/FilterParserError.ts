import { ResolutionError, describeFailure } from '../edm/ResolutionError.js';

export type FilterErrorKind =
  | 'LexError'
  | 'SyntaxError'
  | 'UnknownIdentifier'
  | 'UnknownProperty'
  | 'UnknownFunction'
  | 'TypeMismatch';

export type FilterErrorStage = 'lexer' | 'parser' | 'resolver' | 'binder';

interface FilterParserErrorOptions {
  message: string;
  kind: FilterErrorKind;
  stage: FilterErrorStage;
  position: number;
  length?: number;
  snippet?: string;
  hint?: string;
}

type KindOptions = Omit<FilterParserErrorOptions, 'kind' | 'stage'>;

/**
 * Structured error for filter parsing failures. Exactly one is thrown per
 * failed parse: the first problem met scanning left to right.
 */
export class FilterParserError extends Error {
  public readonly kind: FilterErrorKind;

  /** Stage where the error occurred */
  public readonly stage: FilterErrorStage;

  /** Offset in the filter text of the offending token */
  public readonly position: number;

  public readonly length?: number;

  /** The offending source text */
  public readonly snippet?: string;

  /** Human-readable troubleshooting hint */
  public readonly hint?: string;

  constructor(options: FilterParserErrorOptions) {
    super(options.message);
    this.name = new.target.name;
    this.kind = options.kind;
    this.stage = options.stage;
    this.position = options.position;
    this.length = options.length;
    this.snippet = options.snippet;
    this.hint = options.hint;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class LexError extends FilterParserError {
  constructor(options: KindOptions) {
    super({ ...options, kind: 'LexError', stage: 'lexer' });
  }
}

/** Grammar violation. Named so it does not shadow the global SyntaxError. */
export class FilterSyntaxError extends FilterParserError {
  /** Description of what the parser expected at `position` */
  public readonly expected: string;

  constructor(options: KindOptions & { expected: string }) {
    super({ ...options, kind: 'SyntaxError', stage: 'parser' });
    this.expected = options.expected;
  }
}

export class UnknownIdentifierError extends FilterParserError {
  public readonly identifier: string;

  constructor(options: KindOptions & { identifier: string }) {
    super({ ...options, kind: 'UnknownIdentifier', stage: 'resolver' });
    this.identifier = options.identifier;
  }
}

export class UnknownPropertyError extends FilterParserError {
  public readonly propertyName: string;
  public readonly sourceType: string;

  constructor(options: KindOptions & { propertyName: string; sourceType: string }) {
    super({ ...options, kind: 'UnknownProperty', stage: 'resolver' });
    this.propertyName = options.propertyName;
    this.sourceType = options.sourceType;
  }
}

export class UnknownFunctionError extends FilterParserError {
  public readonly functionName: string;
  public readonly argumentTypes: readonly string[];

  constructor(options: KindOptions & { functionName: string; argumentTypes: string[] }) {
    super({ ...options, kind: 'UnknownFunction', stage: 'resolver' });
    this.functionName = options.functionName;
    this.argumentTypes = options.argumentTypes;
  }
}

export class TypeMismatchError extends FilterParserError {
  /** Operator keyword or function name */
  public readonly operator: string;
  /** Conflicting operand types, in source order */
  public readonly types: readonly string[];

  constructor(options: KindOptions & { operator: string; types: string[] }) {
    super({ ...options, kind: 'TypeMismatch', stage: 'binder' });
    this.operator = options.operator;
    this.types = options.types;
  }
}

/**
 * Re-raise a resolver failure at the token that caused the lookup.
 */
export function locateResolutionError(
  error: ResolutionError,
  position: number,
  snippet: string
): FilterParserError {
  const failure = error.failure;
  const message = `${describeFailure(failure)} at position ${position}`;
  const location = { message, position, length: snippet.length, snippet };

  switch (failure.kind) {
    case 'UnknownIdentifier':
      return new UnknownIdentifierError({
        ...location,
        identifier: failure.name,
        hint: 'Only range variables bound by the enclosing query may be referenced with "$"',
      });
    case 'UnknownProperty':
      return new UnknownPropertyError({
        ...location,
        propertyName: failure.name,
        sourceType: failure.sourceType,
        hint: `Check the property name against the declaration of ${failure.sourceType}`,
      });
    case 'UnknownFunction':
      return new UnknownFunctionError({
        ...location,
        functionName: failure.name,
        argumentTypes: failure.argumentTypes,
        hint: 'Check the function name and the number and types of its arguments',
      });
  }
}
