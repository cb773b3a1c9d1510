import { readFileSync, statSync, Stats } from 'fs';
import { resolve } from 'path';
import { logger } from '../utils/logger.js';
import { ModelDocument, ModelValidator, PropertyDocument } from '../validators/ModelValidator.js';
import { EdmModel, FunctionSignature, StructuredType } from './EdmModel.js';
import { TypeReference, primitiveType } from './types.js';

function toTypeReference(property: PropertyDocument): TypeReference {
  const { type, nullable, ...facets } = property;
  return primitiveType(type, nullable ?? true, facets);
}

/**
 * Turn a validated model document into the lookup structures used by
 * ModelSchemaResolver.
 */
export function buildModel(document: ModelDocument): EdmModel {
  const types = new Map<string, StructuredType>();
  const qualify = (name: string) => `${document.namespace}.${name}`;

  const addTypes = (kind: StructuredType['kind'], entries: ModelDocument['entityTypes']) => {
    for (const entry of entries) {
      const properties = new Map<string, TypeReference>();
      for (const [name, property] of Object.entries(entry.properties)) {
        properties.set(name, toTypeReference(property));
      }
      const fullName = qualify(entry.name);
      types.set(fullName, {
        fullName,
        kind,
        baseType: entry.baseType ?? undefined,
        properties,
      });
    }
  };
  addTypes('entity', document.entityTypes);
  addTypes('complex', document.complexTypes);

  const functions: FunctionSignature[] = document.functions.map((fn) => ({
    name: fn.name,
    parameters: fn.parameters.map(toTypeReference),
    returnType: toTypeReference(fn.returnType),
    builtIn: false,
  }));

  return {
    namespace: document.namespace,
    types,
    entitySets: new Map(Object.entries(document.entitySets)),
    functions,
  };
}

/**
 * ModelFileLoader
 * Reads a JSON model document from disk, validates it and builds an EdmModel.
 */
export class ModelFileLoader {
  private maxFileSize: number;

  constructor(maxFileSize: number = 1024 * 1024) {
    this.maxFileSize = maxFileSize;
  }

  private getFileInfo(path: string): { absolutePath: string; stats: Stats } {
    const absolutePath = resolve(path);

    let stats: Stats;
    try {
      stats = statSync(absolutePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new Error(`Model file not found: ${path}`);
      }
      throw new Error(`Cannot access model file "${path}": ${(error as Error).message}`);
    }

    if (!stats.isFile()) {
      throw new Error(`Path "${path}" is not a file`);
    }

    return { absolutePath, stats };
  }

  /**
   * Load and validate a model file
   * @param path Absolute path, or relative to the working directory
   */
  load(path: string): EdmModel {
    const { absolutePath, stats } = this.getFileInfo(path);

    if (stats.size > this.maxFileSize) {
      throw new Error(
        `Model file "${path}" is too large (${Math.round(stats.size / 1024)}KB). Maximum size is ${Math.round(this.maxFileSize / 1024)}KB.`
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(absolutePath, 'utf-8'));
    } catch (error) {
      throw new Error(`Failed to read model file "${path}": ${(error as Error).message}`);
    }

    const model = buildModel(ModelValidator.validate(parsed));
    if (model.entitySets.size === 0) {
      logger.warn('Model declares no entity sets; no filter can be bound to it', { path });
    }
    logger.debug('model', 'Loaded model', {
      path: absolutePath,
      namespace: model.namespace,
      types: model.types.size,
      entitySets: model.entitySets.size,
      functions: model.functions.length,
    });
    return model;
  }
}
