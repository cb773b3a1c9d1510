import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ModelValidationError } from '../../validators/ModelValidator.js';
import { ModelFileLoader, buildModel } from '../ModelFileLoader.js';

const SAMPLE = {
  namespace: 'Shop',
  entityTypes: [
    {
      name: 'Order',
      properties: {
        Total: { type: 'Edm.Decimal', precision: 10, scale: 2 },
        Placed: { type: 'Edm.DateTimeOffset', nullable: false },
      },
    },
  ],
  entitySets: { Orders: 'Shop.Order' },
  functions: [
    { name: 'Shop.Tax', parameters: [{ type: 'Edm.Decimal' }], returnType: { type: 'Edm.Decimal' } },
  ],
};

describe('ModelFileLoader', () => {
  let testRootDir: string;

  beforeEach(() => {
    testRootDir = join(tmpdir(), `test-model-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testRootDir, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(testRootDir)) {
      rmSync(testRootDir, { recursive: true, force: true });
    }
  });

  const writeModel = (name: string, content: string) => {
    const path = join(testRootDir, name);
    writeFileSync(path, content);
    return path;
  };

  it('should load and build a model from JSON', () => {
    const model = new ModelFileLoader().load(writeModel('shop.json', JSON.stringify(SAMPLE)));

    expect(model.namespace).toBe('Shop');
    expect(model.entitySets.get('Orders')).toBe('Shop.Order');

    const order = model.types.get('Shop.Order');
    expect(order?.kind).toBe('entity');
    expect(order?.properties.get('Total')).toEqual({
      name: 'Edm.Decimal',
      nullable: true,
      facets: { precision: 10, scale: 2 },
    });
    expect(order?.properties.get('Placed')).toEqual({ name: 'Edm.DateTimeOffset', nullable: false });

    expect(model.functions).toEqual([
      {
        name: 'Shop.Tax',
        parameters: [{ name: 'Edm.Decimal', nullable: true }],
        returnType: { name: 'Edm.Decimal', nullable: true },
        builtIn: false,
      },
    ]);
  });

  it('should report a missing file', () => {
    const path = join(testRootDir, 'missing.json');
    expect(() => new ModelFileLoader().load(path)).toThrow(`Model file not found: ${path}`);
  });

  it('should reject a directory', () => {
    expect(() => new ModelFileLoader().load(testRootDir)).toThrow(/is not a file/);
  });

  it('should enforce the size limit', () => {
    const path = writeModel('big.json', JSON.stringify(SAMPLE));
    expect(() => new ModelFileLoader(16).load(path)).toThrow(/too large/);
  });

  it('should report malformed JSON', () => {
    const path = writeModel('broken.json', '{ "namespace": ');
    expect(() => new ModelFileLoader().load(path)).toThrow(`Failed to read model file "${path}"`);
  });

  it('should surface validation failures', () => {
    const path = writeModel('invalid.json', JSON.stringify({ namespace: '' }));
    expect(() => new ModelFileLoader().load(path)).toThrow(ModelValidationError);
  });
});

describe('buildModel', () => {
  it('should qualify complex types and keep base types', () => {
    const model = buildModel({
      namespace: 'NS',
      entityTypes: [
        { name: 'Base', baseType: null, properties: {} },
        { name: 'Derived', baseType: 'NS.Base', properties: {} },
      ],
      complexTypes: [{ name: 'Point', properties: {} }],
      entitySets: {},
      functions: [],
    });

    expect(model.types.get('NS.Derived')?.baseType).toBe('NS.Base');
    expect(model.types.get('NS.Base')?.baseType).toBeUndefined();
    expect(model.types.get('NS.Point')?.kind).toBe('complex');
  });
});
