import { TypeReference } from './types.js';

export type StructuredKind = 'entity' | 'complex';

export interface StructuredType {
  /** Namespace-qualified name, e.g. `Sample.Customer` */
  readonly fullName: string;
  readonly kind: StructuredKind;
  readonly baseType?: string;
  readonly properties: ReadonlyMap<string, TypeReference>;
}

export interface FunctionSignature {
  readonly name: string;
  readonly parameters: readonly TypeReference[];
  readonly returnType: TypeReference;
  /** Canonical functions have no model declaration behind them */
  readonly builtIn: boolean;
}

export interface EdmModel {
  readonly namespace: string;
  readonly types: ReadonlyMap<string, StructuredType>;
  /** Entity set name -> entity type full name */
  readonly entitySets: ReadonlyMap<string, string>;
  readonly functions: readonly FunctionSignature[];
}

/**
 * The implicit "current item" of a query scope. One instance is created per
 * scope and every reference node in that scope points at it.
 */
export interface RangeVariable {
  readonly name: string;
  readonly navigationSource: string;
  readonly typeReference: TypeReference;
}

export function findProperty(
  model: EdmModel,
  typeName: string,
  propertyName: string
): TypeReference | undefined {
  let current = model.types.get(typeName);
  const visited = new Set<string>();
  while (current && !visited.has(current.fullName)) {
    visited.add(current.fullName);
    const property = current.properties.get(propertyName);
    if (property) return property;
    current = current.baseType ? model.types.get(current.baseType) : undefined;
  }
  return undefined;
}

export function createRangeVariable(
  model: EdmModel,
  entitySet: string,
  name = '$it'
): RangeVariable {
  const typeName = model.entitySets.get(entitySet);
  if (!typeName) {
    throw new Error(
      `Unknown entity set "${entitySet}". Known sets: ${[...model.entitySets.keys()].join(', ') || '(none)'}`
    );
  }
  return Object.freeze({
    name,
    navigationSource: entitySet,
    typeReference: { name: typeName, nullable: false },
  });
}

/** `Sample.Score(Edm.Int32,Edm.String)` */
export function formatSignature(signature: FunctionSignature): string {
  return `${signature.name}(${signature.parameters.map((p) => p.name).join(',')})`;
}
