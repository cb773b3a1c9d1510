import { logger } from '../utils/logger.js';
import { BUILT_IN_FUNCTIONS } from './builtInFunctions.js';
import { EdmModel, FunctionSignature, RangeVariable, findProperty } from './EdmModel.js';
import { ISchemaResolver, ResolvedFunction } from './ISchemaResolver.js';
import { ResolutionError } from './ResolutionError.js';
import { TypeReference, isAssignable, withNullability } from './types.js';

/**
 * Schema resolver backed by a loaded EDM model.
 *
 * Model functions are searched before the canonical built-ins, so a model may
 * shadow a built-in overload with an identical parameter list.
 */
export class ModelSchemaResolver implements ISchemaResolver {
  private readonly model: EdmModel;
  private readonly scope: ReadonlyMap<string, RangeVariable>;
  private readonly functions: readonly FunctionSignature[];

  constructor(model: EdmModel, rangeVariables: readonly RangeVariable[]) {
    this.model = model;
    this.scope = new Map(rangeVariables.map((variable) => [variable.name, variable]));
    this.functions = [...model.functions, ...BUILT_IN_FUNCTIONS];
  }

  resolveRangeVariable(name: string): RangeVariable {
    const variable = this.scope.get(name);
    if (!variable) {
      throw new ResolutionError({ kind: 'UnknownIdentifier', name });
    }
    return variable;
  }

  resolveProperty(sourceType: TypeReference, propertyName: string): TypeReference {
    const property = findProperty(this.model, sourceType.name, propertyName);
    if (!property) {
      throw new ResolutionError({
        kind: 'UnknownProperty',
        name: propertyName,
        sourceType: sourceType.name,
      });
    }
    logger.debug('resolver', 'Resolved property', {
      sourceType: sourceType.name,
      property: propertyName,
      type: property.name,
    });
    return property;
  }

  resolveFunction(name: string, argumentTypes: readonly TypeReference[]): ResolvedFunction {
    const candidates = this.functions.filter(
      (signature) => signature.name === name && signature.parameters.length === argumentTypes.length
    );

    const exact = candidates.find((signature) =>
      signature.parameters.every((parameter, i) => parameter.name === argumentTypes[i]?.name)
    );
    const signature =
      exact ??
      candidates.find((candidate) =>
        candidate.parameters.every((parameter, i) => {
          const argument = argumentTypes[i];
          return argument !== undefined && isAssignable(argument.name, parameter.name);
        })
      );

    if (!signature) {
      throw new ResolutionError({
        kind: 'UnknownFunction',
        name,
        argumentTypes: argumentTypes.map((t) => t.name),
      });
    }

    const nullable = signature.returnType.nullable || argumentTypes.some((t) => t.nullable);
    logger.debug('resolver', 'Resolved function overload', {
      name,
      exact: exact !== undefined,
      parameters: signature.parameters.map((p) => p.name),
    });
    return { returnType: withNullability(signature.returnType, nullable), signature };
  }
}
