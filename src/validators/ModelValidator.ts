import { isPrimitiveTypeName } from '../edm/types.js';

export interface PropertyDocument {
  type: string;
  nullable?: boolean;
  srid?: number;
  maxLength?: number;
  precision?: number;
  scale?: number;
}

export interface StructuredTypeDocument {
  name: string;
  baseType?: string | null;
  properties: Record<string, PropertyDocument>;
}

export interface FunctionDocument {
  name: string;
  parameters: PropertyDocument[];
  returnType: PropertyDocument;
}

export interface ModelDocument {
  namespace: string;
  entityTypes: StructuredTypeDocument[];
  complexTypes: StructuredTypeDocument[];
  entitySets: Record<string, string>;
  functions: FunctionDocument[];
}

const FACETS = ['srid', 'maxLength', 'precision', 'scale'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Validates a JSON model document before it is turned into an EdmModel.
 * Catches dangling type references early so resolution never meets them.
 */
export class ModelValidator {
  /**
   * Validate a parsed JSON value and return it as a typed document.
   *
   * @throws ModelValidationError on the first violated constraint
   */
  static validate(document: unknown): ModelDocument {
    if (!isRecord(document)) {
      throw new ModelValidationError('Model document must be a JSON object');
    }
    if (!isNonEmptyString(document.namespace)) {
      throw new ModelValidationError('Model "namespace" must be a non-empty string');
    }
    const namespace = document.namespace;

    const entityTypes = this.validateTypes(document.entityTypes, 'entityTypes');
    const complexTypes = this.validateTypes(document.complexTypes, 'complexTypes');

    const qualify = (name: string) => `${namespace}.${name}`;
    const entityNames = new Set(entityTypes.map((t) => qualify(t.name)));
    const structuredNames = new Set([...entityNames, ...complexTypes.map((t) => qualify(t.name))]);
    if (structuredNames.size !== entityTypes.length + complexTypes.length) {
      throw new ModelValidationError('Model declares the same type name more than once');
    }

    const knownType = (name: string) => isPrimitiveTypeName(name) || structuredNames.has(name);

    for (const type of [...entityTypes, ...complexTypes]) {
      if (type.baseType != null && !structuredNames.has(type.baseType)) {
        throw new ModelValidationError(
          `Type "${type.name}" has unknown base type "${type.baseType}"`
        );
      }
      for (const [propertyName, property] of Object.entries(type.properties)) {
        if (!knownType(property.type)) {
          throw new ModelValidationError(
            `Property "${type.name}.${propertyName}" has unknown type "${property.type}"`
          );
        }
      }
    }

    const entitySets = this.validateEntitySets(document.entitySets, entityNames);
    const functions = this.validateFunctions(document.functions, knownType);

    return { namespace, entityTypes, complexTypes, entitySets, functions };
  }

  private static validateTypes(value: unknown, field: string): StructuredTypeDocument[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      throw new ModelValidationError(`Model "${field}" must be an array`);
    }

    return value.map((entry: unknown, index: number) => {
      if (!isRecord(entry) || !isNonEmptyString(entry.name)) {
        throw new ModelValidationError(`${field}[${index}] must be an object with a "name"`);
      }
      let baseType: string | null = null;
      if (entry.baseType !== undefined && entry.baseType !== null) {
        if (!isNonEmptyString(entry.baseType)) {
          throw new ModelValidationError(`${field}[${index}].baseType must be a type name`);
        }
        baseType = entry.baseType;
      }
      const rawProperties = entry.properties ?? {};
      if (!isRecord(rawProperties)) {
        throw new ModelValidationError(`${field}[${index}].properties must be an object`);
      }

      const properties: Record<string, PropertyDocument> = {};
      for (const [name, property] of Object.entries(rawProperties)) {
        properties[name] = this.validateProperty(property, `${entry.name}.${name}`);
      }
      return { name: entry.name, baseType, properties };
    });
  }

  private static validateProperty(value: unknown, label: string): PropertyDocument {
    if (!isRecord(value) || !isNonEmptyString(value.type)) {
      throw new ModelValidationError(`"${label}" must be an object with a "type"`);
    }
    const property: PropertyDocument = { type: value.type };
    if (typeof value.nullable === 'boolean') {
      property.nullable = value.nullable;
    } else if (value.nullable !== undefined) {
      throw new ModelValidationError(`"${label}".nullable must be a boolean`);
    }
    for (const facet of FACETS) {
      const facetValue = value[facet];
      if (facetValue === undefined) continue;
      if (typeof facetValue !== 'number' || !Number.isInteger(facetValue) || facetValue < 0) {
        throw new ModelValidationError(`"${label}".${facet} must be a non-negative integer`);
      }
      property[facet] = facetValue;
    }
    return property;
  }

  private static validateEntitySets(
    value: unknown,
    entityNames: ReadonlySet<string>
  ): Record<string, string> {
    if (value === undefined) return {};
    if (!isRecord(value)) {
      throw new ModelValidationError('Model "entitySets" must be an object');
    }

    const entitySets: Record<string, string> = {};
    for (const [name, typeName] of Object.entries(value)) {
      if (typeof typeName !== 'string' || !entityNames.has(typeName)) {
        throw new ModelValidationError(
          `Entity set "${name}" must reference a declared entity type, got "${String(typeName)}"`
        );
      }
      entitySets[name] = typeName;
    }
    return entitySets;
  }

  private static validateFunctions(
    value: unknown,
    knownType: (name: string) => boolean
  ): FunctionDocument[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      throw new ModelValidationError('Model "functions" must be an array');
    }

    return value.map((entry: unknown, index: number) => {
      if (!isRecord(entry) || !isNonEmptyString(entry.name)) {
        throw new ModelValidationError(`functions[${index}] must be an object with a "name"`);
      }
      const name = entry.name;
      const rawParameters = entry.parameters ?? [];
      if (!Array.isArray(rawParameters)) {
        throw new ModelValidationError(`Function "${name}" parameters must be an array`);
      }

      const parameters = rawParameters.map((p: unknown, i: number) =>
        this.validateProperty(p, `${name} parameter ${i}`)
      );
      const returnType = this.validateProperty(entry.returnType, `${name} return type`);
      for (const type of [...parameters, returnType]) {
        if (!knownType(type.type)) {
          throw new ModelValidationError(`Function "${name}" uses unknown type "${type.type}"`);
        }
      }
      return { name, parameters, returnType };
    });
  }
}

export class ModelValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelValidationError';
  }
}
