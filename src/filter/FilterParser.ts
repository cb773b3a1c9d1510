/**
 * Filter Expression Parser and Typed Tree Builder
 *
 * Parses a boolean `$filter` expression into a typed expression tree. Every
 * identifier, property segment and function call is resolved through the
 * injected {@link ISchemaResolver} as soon as it is read, so each node is
 * built with its final type and operand types are checked on the spot.
 *
 * @remarks
 * **Grammar:**
 * ```
 * expr         := orExpr
 * orExpr       := andExpr ('or' andExpr)*
 * andExpr      := notExpr ('and' notExpr)*
 * notExpr      := ['not'] comparison
 * comparison   := primary [compOp primary]
 * primary      := literal | propertyPath | functionCall | '(' expr ')'
 * propertyPath := identifier ('/' identifier)*
 * functionCall := identifier '(' [argument (',' argument)*] ')'
 * argument     := primary
 * ```
 *
 * Comparisons do not associate: `a lt b lt c` is rejected. Function arguments
 * are operands; a boolean argument has to be parenthesised (`f((a eq 1))`).
 *
 * Parsing is all-or-nothing. The first lexical, grammatical, resolution or
 * typing problem aborts with a {@link FilterParserError} located at the
 * offending token.
 */

import { RangeVariable } from '../edm/EdmModel.js';
import { ISchemaResolver } from '../edm/ISchemaResolver.js';
import { ResolutionError } from '../edm/ResolutionError.js';
import { TypeReference, primitiveType, typeFamily } from '../edm/types.js';
import { debugLog, trackOperation } from '../utils/logger.js';
import {
  BinaryOperatorKind,
  COMPARISON_OPERATORS,
  ExpressionNode,
  FilterQueryOption,
  LiteralNode,
  PropertyAccessNode,
  RangeVariableReferenceNode,
} from './ast.js';
import {
  FilterParserError,
  FilterSyntaxError,
  LexError,
  TypeMismatchError,
  locateResolutionError,
} from './FilterParserError.js';
import { Token, tokenize } from './Lexer.js';

export interface FilterParseContext {
  resolver: ISchemaResolver;
  /** The current item of the enclosing query, e.g. `$it` bound to Customers */
  rangeVariable: RangeVariable;
}

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -9223372036854775808n;
const INT64_MAX = 9223372036854775807n;

// Families whose values can be ordered; boolean and guid only support eq/ne
const ORDERED_FAMILIES = new Set(['numeric', 'string', 'temporal']);
const EQUALITY_FAMILIES = new Set([...ORDERED_FAMILIES, 'boolean', 'guid']);

function describeToken(token: Token): string {
  return token.kind === 'EOF' ? 'end of input' : `'${token.text}'`;
}

function fitsInt64(digits: string): boolean {
  const value = BigInt(digits);
  return value >= INT64_MIN && value <= INT64_MAX;
}

function freeze<T extends ExpressionNode>(node: T): T {
  Object.freeze(node);
  return node;
}

class Parser {
  private readonly tokens: Iterator<Token>;
  private readonly context: FilterParseContext;
  private current: Token;

  constructor(input: string, context: FilterParseContext) {
    this.tokens = tokenize(input)[Symbol.iterator]();
    this.context = context;
    this.current = this.pull();
  }

  private pull(): Token {
    const result = this.tokens.next();
    if (result.done) {
      // The token stream ends right after EOF; keep returning it
      return this.current;
    }
    return result.value;
  }

  private advance(): Token {
    const token = this.current;
    if (token.kind !== 'EOF') {
      this.current = this.pull();
    }
    return token;
  }

  private atEnd(): boolean {
    return this.current.kind === 'EOF';
  }

  private isOperator(...keywords: string[]): boolean {
    return this.current.kind === 'Operator' && keywords.includes(this.current.text);
  }

  private isPunctuation(text: string): boolean {
    return this.current.kind === 'Punctuation' && this.current.text === text;
  }

  private syntaxError(expected: string, message?: string): FilterSyntaxError {
    const token = this.current;
    return new FilterSyntaxError({
      message:
        message ??
        `Expected ${expected} at position ${token.offset}, found ${describeToken(token)}`,
      position: token.offset,
      length: token.text.length,
      snippet: token.text,
      expected,
      hint: `Expected ${expected} but found ${describeToken(token)}`,
    });
  }

  private expectPunctuation(text: string, expected: string): Token {
    if (!this.isPunctuation(text)) {
      throw this.syntaxError(expected);
    }
    return this.advance();
  }

  /**
   * Run a resolver lookup, moving any failure onto `token`.
   */
  private resolve<T>(token: Token, lookup: () => T): T {
    try {
      return lookup();
    } catch (error) {
      if (error instanceof ResolutionError) {
        throw locateResolutionError(error, token.offset, token.text);
      }
      throw error;
    }
  }

  /**
   * Entry point.
   *
   * Expression := OrExpression EOF
   */
  parse(): FilterQueryOption {
    if (this.atEnd()) {
      throw this.syntaxError('a filter expression', 'Empty filter expression');
    }

    const expression = this.parseOrExpression();
    if (!this.atEnd()) {
      throw this.syntaxError("'and', 'or' or end of input");
    }
    this.requireBoolean(expression, '$filter');

    const { rangeVariable } = this.context;
    return Object.freeze({
      itemType: rangeVariable.typeReference,
      rangeVariable,
      expression,
    });
  }

  /**
   * OrExpression := AndExpression ('or' AndExpression)*
   */
  private parseOrExpression(): ExpressionNode {
    let left = this.parseAndExpression();

    // Left-associative: a or b or c becomes ((a or b) or c)
    while (this.isOperator('or')) {
      const operator = this.advance();
      const right = this.parseAndExpression();
      left = this.buildLogical('Or', operator, left, right);
    }

    return left;
  }

  /**
   * AndExpression := NotExpression ('and' NotExpression)*
   */
  private parseAndExpression(): ExpressionNode {
    let left = this.parseNotExpression();

    while (this.isOperator('and')) {
      const operator = this.advance();
      const right = this.parseNotExpression();
      left = this.buildLogical('And', operator, left, right);
    }

    return left;
  }

  /**
   * NotExpression := ['not'] Comparison
   */
  private parseNotExpression(): ExpressionNode {
    if (!this.isOperator('not')) {
      return this.parseComparison();
    }

    const operator = this.advance();
    const operand = this.parseComparison();
    this.requireBoolean(operand, 'not', operator.offset);
    return freeze({
      kind: 'UnaryOperator',
      operatorKind: 'Not',
      operand,
      typeReference: primitiveType('Edm.Boolean', operand.typeReference.nullable),
      offset: operator.offset,
    });
  }

  /**
   * Comparison := Primary [CompOp Primary]
   */
  private parseComparison(): ExpressionNode {
    const left = this.parsePrimary();
    if (!this.isOperator(...Object.keys(COMPARISON_OPERATORS))) {
      return left;
    }

    const operator = this.advance();
    const right = this.parsePrimary();
    const node = this.buildComparison(operator, left, right);

    if (this.isOperator(...Object.keys(COMPARISON_OPERATORS))) {
      throw this.syntaxError(
        "'and', 'or', ')' or end of input",
        `Comparison operators cannot be chained: unexpected ${describeToken(this.current)} at position ${this.current.offset}`
      );
    }

    return node;
  }

  /**
   * Primary := Literal | PropertyPath | FunctionCall | '(' Expression ')'
   */
  private parsePrimary(): ExpressionNode {
    const token = this.current;

    switch (token.kind) {
      case 'NumberLiteral':
        this.advance();
        return this.numberLiteral(token);

      case 'StringLiteral':
        this.advance();
        return this.literal(token, token.text.slice(1, -1).replace(/''/g, "'"), 'Edm.String');

      case 'Identifier': {
        if (token.text === 'true' || token.text === 'false') {
          this.advance();
          return this.literal(token, token.text === 'true', 'Edm.Boolean');
        }
        this.advance();
        return this.isPunctuation('(')
          ? this.parseFunctionCall(token)
          : this.parsePropertyPath(token);
      }

      case 'Punctuation': {
        if (token.text === '(') {
          this.advance();
          const expression = this.parseOrExpression();
          this.expectPunctuation(')', "')'");
          return expression;
        }
        break;
      }

      default:
        break;
    }

    throw this.syntaxError("a literal, property path, function call or '('");
  }

  /**
   * FunctionCall := Identifier '(' [Primary (',' Primary)*] ')'
   *
   * Arguments are typed first, then the overload is chosen from their types.
   */
  private parseFunctionCall(name: Token): ExpressionNode {
    this.advance(); // consume (

    const args: ExpressionNode[] = [];
    if (this.isPunctuation(')')) {
      this.advance();
    } else {
      while (true) {
        args.push(this.parsePrimary());
        if (this.isPunctuation(',')) {
          this.advance();
          continue;
        }
        this.expectPunctuation(')', "',' or ')'");
        break;
      }
    }

    const { returnType, signature } = this.resolve(name, () =>
      this.context.resolver.resolveFunction(
        name.text,
        args.map((arg) => arg.typeReference)
      )
    );
    debugLog('parser', 'Function call bound', { name: name.text, returnType: returnType.name });

    return freeze({
      kind: 'FunctionCall',
      name: name.text,
      args: Object.freeze(args),
      signature,
      typeReference: returnType,
      offset: name.offset,
    });
  }

  /**
   * PropertyPath := Identifier ('/' Identifier)*
   *
   * A leading `$name` is a range variable; anything else is a property of the
   * bound range variable. Each segment resolves against the previous type.
   * The bound variable's own name always yields the context instance.
   */
  private parsePropertyPath(first: Token): ExpressionNode {
    let node: ExpressionNode;
    if (first.text.startsWith('$')) {
      const resolved = this.resolve(first, () =>
        this.context.resolver.resolveRangeVariable(first.text)
      );
      const bound = this.context.rangeVariable;
      node = this.rangeVariableReference(
        resolved.name === bound.name ? bound : resolved,
        first.offset
      );
    } else {
      node = this.propertyAccess(
        this.rangeVariableReference(this.context.rangeVariable, first.offset),
        first
      );
    }

    while (this.isPunctuation('/')) {
      this.advance();
      if (this.current.kind !== 'Identifier') {
        throw this.syntaxError("a property name after '/'");
      }
      node = this.propertyAccess(node, this.advance());
    }

    return node;
  }

  private rangeVariableReference(variable: RangeVariable, offset: number): RangeVariableReferenceNode {
    return freeze({
      kind: 'RangeVariableReference',
      variable,
      typeReference: variable.typeReference,
      offset,
    });
  }

  private propertyAccess(source: ExpressionNode, name: Token): PropertyAccessNode {
    const typeReference = this.resolve(name, () =>
      this.context.resolver.resolveProperty(source.typeReference, name.text)
    );
    return freeze({
      kind: 'PropertyAccess',
      source,
      propertyName: name.text,
      typeReference,
      offset: name.offset,
    });
  }

  private literal(token: Token, value: string | number | boolean, typeName: string): LiteralNode {
    return freeze({
      kind: 'Literal',
      raw: token.text,
      value,
      typeReference: primitiveType(typeName, false),
      offset: token.offset,
    });
  }

  /**
   * Integers are Edm.Int32, then Edm.Int64, then Edm.Decimal as they grow;
   * decimals are Edm.Double;
   * a suffix (L, M, D, F) picks the type explicitly.
   */
  private numberLiteral(token: Token): LiteralNode {
    const suffix = /[lmdf]$/i.test(token.text) ? token.text.slice(-1).toLowerCase() : '';
    const digits = suffix ? token.text.slice(0, -1) : token.text;
    const isInteger = !digits.includes('.');

    switch (suffix) {
      case 'l':
        if (!fitsInt64(digits)) {
          throw new LexError({
            message: `Int64 literal out of range at position ${token.offset}: ${token.text}`,
            position: token.offset,
            length: token.text.length,
            snippet: token.text,
            hint: 'Drop the L suffix to read the value as Edm.Decimal',
          });
        }
        return this.literal(token, digits, 'Edm.Int64');
      case 'm':
        return this.literal(token, digits, 'Edm.Decimal');
      case 'd':
        return this.literal(token, parseFloat(digits), 'Edm.Double');
      case 'f':
        return this.literal(token, parseFloat(digits), 'Edm.Single');
      default:
        break;
    }

    if (!isInteger) {
      return this.literal(token, parseFloat(digits), 'Edm.Double');
    }
    const value = Number(digits);
    if (value >= INT32_MIN && value <= INT32_MAX) {
      return this.literal(token, value, 'Edm.Int32');
    }
    return fitsInt64(digits)
      ? this.literal(token, digits, 'Edm.Int64')
      : this.literal(token, digits, 'Edm.Decimal');
  }

  private buildComparison(operator: Token, left: ExpressionNode, right: ExpressionNode): ExpressionNode {
    const operatorKind = COMPARISON_OPERATORS[operator.text];
    if (!operatorKind) {
      throw new Error(`Unsupported comparison operator: ${operator.text}`);
    }

    const leftType = left.typeReference;
    const rightType = right.typeReference;
    const family = typeFamily(leftType.name);
    const allowed = operatorKind === 'Equal' || operatorKind === 'NotEqual' ? EQUALITY_FAMILIES : ORDERED_FAMILIES;
    const compatible =
      family === typeFamily(rightType.name) &&
      allowed.has(family) &&
      // Temporal values only compare within one type (no Date vs Duration)
      (family !== 'temporal' || leftType.name === rightType.name);

    if (!compatible) {
      throw this.typeMismatch(operator.text, operator.offset, [leftType, rightType]);
    }

    return this.binary(operatorKind, left, right);
  }

  private buildLogical(
    operatorKind: 'And' | 'Or',
    operator: Token,
    left: ExpressionNode,
    right: ExpressionNode
  ): ExpressionNode {
    if (left.typeReference.name !== 'Edm.Boolean' || right.typeReference.name !== 'Edm.Boolean') {
      throw this.typeMismatch(operator.text, operator.offset, [left.typeReference, right.typeReference]);
    }
    return this.binary(operatorKind, left, right);
  }

  private binary(operatorKind: BinaryOperatorKind, left: ExpressionNode, right: ExpressionNode): ExpressionNode {
    return freeze({
      kind: 'BinaryOperator',
      operatorKind,
      left,
      right,
      typeReference: primitiveType(
        'Edm.Boolean',
        left.typeReference.nullable || right.typeReference.nullable
      ),
      offset: left.offset,
    });
  }

  private requireBoolean(node: ExpressionNode, operator: string, position = node.offset): void {
    if (node.typeReference.name === 'Edm.Boolean') return;
    throw new TypeMismatchError({
      message:
        operator === '$filter'
          ? `A filter expression must be Edm.Boolean, found '${node.typeReference.name}' at position ${position}`
          : `Operator '${operator}' requires an Edm.Boolean operand, found '${node.typeReference.name}' at position ${position}`,
      position,
      operator,
      types: [node.typeReference.name],
      hint: 'Compare the value with an operator such as eq, or call a function that returns Edm.Boolean',
    });
  }

  private typeMismatch(operator: string, position: number, types: TypeReference[]): TypeMismatchError {
    const names = types.map((t) => t.name);
    return new TypeMismatchError({
      message: `Operator '${operator}' cannot be applied to operands of type '${names[0]}' and '${names[1]}' at position ${position}`,
      position,
      length: operator.length,
      snippet: operator,
      operator,
      types: names,
      hint: 'Both operands must belong to the same comparable family (numeric, string, date/time; boolean and guid for eq/ne only)',
    });
  }
}

/**
 * Parse a filter expression into a typed FilterQueryOption.
 *
 * @param text - Filter expression, e.g. `geo.distance(Home, Office) lt 0.5`
 * @param context - Resolver and the range variable the filter is bound to
 * @throws FilterParserError (one of its kinds) describing the first failure
 *
 * @example
 * ```typescript
 * const option = parseFilter("Name eq 'Bob'", { resolver, rangeVariable });
 * option.expression.kind; // 'BinaryOperator'
 * ```
 */
export function parseFilter(text: string, context: FilterParseContext): FilterQueryOption {
  const done = trackOperation<string>('parser', 'parseFilter', {
    length: text.length,
    rangeVariable: context.rangeVariable.name,
  });

  try {
    const option = new Parser(text, context).parse();
    done(option.expression.kind);
    return option;
  } catch (error) {
    if (error instanceof FilterParserError) {
      debugLog('parser', 'Filter rejected', { kind: error.kind, position: error.position });
      throw error;
    }

    throw new Error(
      `Failed to parse filter expression: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}
