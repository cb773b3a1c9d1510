import { RangeVariable, formatSignature } from '../edm/EdmModel.js';
import { formatTypeReference } from '../edm/types.js';
import { ExpressionNode, FilterQueryOption, LiteralNode } from './ast.js';

/**
 * Accumulates tab-indented lines. A child block introduced by a `Key = `
 * label is written at the label's own depth.
 */
class TreeWriter {
  private readonly lines: string[] = [];

  line(depth: number, text: string): void {
    this.lines.push(`${'\t'.repeat(depth)}${text}`);
  }

  attribute(depth: number, key: string, value: string): void {
    this.line(depth, `${key} = ${value}`);
  }

  toString(): string {
    return this.lines.join('\n');
  }
}

function formatValue(node: LiteralNode): string {
  if (typeof node.value === 'boolean') {
    return node.value ? 'True' : 'False';
  }
  return String(node.value);
}

function writeRangeVariable(out: TreeWriter, variable: RangeVariable, depth: number): void {
  out.line(depth, 'EntityRangeVariable');
  out.attribute(depth + 1, 'Name', variable.name);
  out.attribute(depth + 1, 'NavigationSource', variable.navigationSource);
  out.attribute(depth + 1, 'TypeReference', formatTypeReference(variable.typeReference));
}

function writeNode(out: TreeWriter, node: ExpressionNode, depth: number): void {
  const inner = depth + 1;
  const type = formatTypeReference(node.typeReference);

  switch (node.kind) {
    case 'RangeVariableReference':
      out.line(depth, 'EntityRangeVariableReferenceNode');
      out.attribute(inner, 'Name', node.variable.name);
      out.attribute(inner, 'NavigationSource', node.variable.navigationSource);
      out.attribute(inner, 'TypeReference', type);
      out.attribute(inner, 'Range Variable', node.variable.name);
      return;

    case 'PropertyAccess':
      out.line(depth, 'SingleValuePropertyAccessNode');
      out.attribute(inner, 'Property', node.propertyName);
      out.attribute(inner, 'TypeReference', type);
      out.attribute(inner, 'Source', '');
      writeNode(out, node.source, inner);
      return;

    case 'FunctionCall':
      out.line(depth, 'SingleValueFunctionCallNode');
      out.attribute(inner, 'Name', node.name);
      out.attribute(inner, 'Return Type', type);
      out.attribute(
        inner,
        'Function',
        node.signature && !node.signature.builtIn ? formatSignature(node.signature) : ''
      );
      out.attribute(inner, 'Arguments', '');
      for (const arg of node.args) {
        writeNode(out, arg, inner);
      }
      return;

    case 'BinaryOperator':
      out.line(depth, 'BinaryOperatorNode');
      out.attribute(inner, 'TypeReference', type);
      out.attribute(inner, 'OperatorKind', node.operatorKind);
      out.attribute(inner, 'Left', '');
      writeNode(out, node.left, inner);
      out.attribute(inner, 'Right', '');
      writeNode(out, node.right, inner);
      return;

    case 'UnaryOperator':
      out.line(depth, 'UnaryOperatorNode');
      out.attribute(inner, 'TypeReference', type);
      out.attribute(inner, 'OperatorKind', node.operatorKind);
      out.attribute(inner, 'Operand', '');
      writeNode(out, node.operand, inner);
      return;

    case 'Literal':
      out.line(depth, 'ConstantNode');
      out.attribute(inner, 'TypeReference', type);
      out.attribute(inner, 'Value', formatValue(node));
      return;

    default: {
      const unreachable: never = node;
      throw new Error(`Unhandled node: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Render a parsed filter as an indented text tree. Output is deterministic
 * and has no trailing newline.
 */
export function render(option: FilterQueryOption): string {
  const out = new TreeWriter();
  out.line(0, 'FilterQueryOption');
  out.attribute(1, 'ItemType', formatTypeReference(option.itemType));
  out.attribute(1, 'Parameter', '');
  writeRangeVariable(out, option.rangeVariable, 1);
  out.attribute(1, 'Expression', '');
  writeNode(out, option.expression, 1);
  return out.toString();
}
