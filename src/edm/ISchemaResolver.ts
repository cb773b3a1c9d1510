import { FunctionSignature, RangeVariable } from './EdmModel.js';
import { TypeReference } from './types.js';

export interface ResolvedFunction {
  returnType: TypeReference;
  signature: FunctionSignature;
}

/**
 * Schema lookups consumed by the filter parser.
 *
 * Implementations must be synchronous and side-effect free. Each method throws
 * a {@link ResolutionError} when the lookup fails.
 */
export interface ISchemaResolver {
  /** Range variable bound under `name` in the current scope */
  resolveRangeVariable(name: string): RangeVariable;

  /** Declared type of `propertyName` on `sourceType` */
  resolveProperty(sourceType: TypeReference, propertyName: string): TypeReference;

  /**
   * Overload matching `argumentTypes`: an exact match wins, otherwise the
   * first overload (declaration order) whose parameters accept the arguments.
   */
  resolveFunction(name: string, argumentTypes: readonly TypeReference[]): ResolvedFunction;
}
