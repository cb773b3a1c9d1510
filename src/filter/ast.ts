/**
 * Typed expression tree produced by the filter parser.
 *
 * The node set is closed: consumers switch on `kind` and the compiler checks
 * that every variant is handled. Every node carries its resolved type and the
 * offset of the token that started it.
 */

import { FunctionSignature, RangeVariable } from '../edm/EdmModel.js';
import { TypeReference } from '../edm/types.js';

export type ComparisonOperatorKind =
  | 'Equal'
  | 'NotEqual'
  | 'GreaterThan'
  | 'GreaterThanOrEqual'
  | 'LessThan'
  | 'LessThanOrEqual';

export type LogicalOperatorKind = 'And' | 'Or';

export type BinaryOperatorKind = ComparisonOperatorKind | LogicalOperatorKind;

interface NodeBase {
  readonly typeReference: TypeReference;
  readonly offset: number;
}

export interface RangeVariableReferenceNode extends NodeBase {
  readonly kind: 'RangeVariableReference';
  /** Shared with every other reference in the same query scope */
  readonly variable: RangeVariable;
}

export interface PropertyAccessNode extends NodeBase {
  readonly kind: 'PropertyAccess';
  readonly source: ExpressionNode;
  readonly propertyName: string;
}

export interface FunctionCallNode extends NodeBase {
  readonly kind: 'FunctionCall';
  readonly name: string;
  readonly args: readonly ExpressionNode[];
  readonly signature?: FunctionSignature;
}

export interface BinaryOperatorNode extends NodeBase {
  readonly kind: 'BinaryOperator';
  readonly operatorKind: BinaryOperatorKind;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryOperatorNode extends NodeBase {
  readonly kind: 'UnaryOperator';
  readonly operatorKind: 'Not';
  readonly operand: ExpressionNode;
}

export interface LiteralNode extends NodeBase {
  readonly kind: 'Literal';
  /** Source text of the literal */
  readonly raw: string;
  /**
   * Decoded value. Int64 and Decimal literals keep their digits as a string
   * so no precision is lost.
   */
  readonly value: string | number | boolean;
}

export type ExpressionNode =
  | RangeVariableReferenceNode
  | PropertyAccessNode
  | FunctionCallNode
  | BinaryOperatorNode
  | UnaryOperatorNode
  | LiteralNode;

export interface FilterQueryOption {
  readonly itemType: TypeReference;
  readonly rangeVariable: RangeVariable;
  /** Edm.Boolean-typed root */
  readonly expression: ExpressionNode;
}

export const COMPARISON_OPERATORS: Readonly<Record<string, ComparisonOperatorKind>> = {
  eq: 'Equal',
  ne: 'NotEqual',
  gt: 'GreaterThan',
  ge: 'GreaterThanOrEqual',
  lt: 'LessThan',
  le: 'LessThanOrEqual',
};
