import { describe, it, expect } from '@jest/globals';
import { ModelValidationError, ModelValidator } from '../ModelValidator.js';

const customer = (properties: Record<string, unknown> = {}) => ({
  name: 'Customer',
  properties: { Name: { type: 'Edm.String' }, ...properties },
});

describe('ModelValidator', () => {
  describe('valid documents', () => {
    it('should default missing sections to empty', () => {
      expect(ModelValidator.validate({ namespace: 'NS' })).toEqual({
        namespace: 'NS',
        entityTypes: [],
        complexTypes: [],
        entitySets: {},
        functions: [],
      });
    });

    it('should keep only declared fields and facets', () => {
      const document = ModelValidator.validate({
        namespace: 'NS',
        entityTypes: [customer({ Home: { type: 'Edm.GeographyPoint', srid: 4326, nullable: false } })],
        complexTypes: [{ name: 'Address', properties: { City: { type: 'Edm.String' } } }],
        entitySets: { Customers: 'NS.Customer' },
      });

      expect(document.entityTypes).toEqual([
        {
          name: 'Customer',
          baseType: null,
          properties: {
            Name: { type: 'Edm.String' },
            Home: { type: 'Edm.GeographyPoint', nullable: false, srid: 4326 },
          },
        },
      ]);
      expect(document.complexTypes[0]?.name).toBe('Address');
    });

    it('should accept structured property types and base types from the model', () => {
      expect(() =>
        ModelValidator.validate({
          namespace: 'NS',
          entityTypes: [customer({ Address: { type: 'NS.Address' } }), { name: 'Vip', baseType: 'NS.Customer' }],
          complexTypes: [{ name: 'Address' }],
        })
      ).not.toThrow();
    });
  });

  describe('invalid documents', () => {
    it.each([
      ['a non-object document', [], 'Model document must be a JSON object'],
      ['a missing namespace', {}, 'Model "namespace" must be a non-empty string'],
      [
        'entityTypes that is not an array',
        { namespace: 'NS', entityTypes: {} },
        'Model "entityTypes" must be an array',
      ],
      [
        'a type without a name',
        { namespace: 'NS', complexTypes: [{}] },
        'complexTypes[0] must be an object with a "name"',
      ],
      [
        'duplicate type names',
        { namespace: 'NS', entityTypes: [customer()], complexTypes: [{ name: 'Customer' }] },
        'Model declares the same type name more than once',
      ],
      [
        'an unknown base type',
        { namespace: 'NS', entityTypes: [{ name: 'Vip', baseType: 'NS.Customer' }] },
        'Type "Vip" has unknown base type "NS.Customer"',
      ],
      [
        'an unknown property type',
        { namespace: 'NS', entityTypes: [customer({ Age: { type: 'Edm.Integer' } })] },
        'Property "Customer.Age" has unknown type "Edm.Integer"',
      ],
      [
        'a non-boolean nullable flag',
        { namespace: 'NS', entityTypes: [customer({ Age: { type: 'Edm.Int32', nullable: 'yes' } })] },
        '"Customer.Age".nullable must be a boolean',
      ],
      [
        'a negative facet',
        { namespace: 'NS', entityTypes: [customer({ Code: { type: 'Edm.String', maxLength: -1 } })] },
        '"Customer.Code".maxLength must be a non-negative integer',
      ],
      [
        'an entity set pointing at a complex type',
        { namespace: 'NS', complexTypes: [{ name: 'Address' }], entitySets: { Addresses: 'NS.Address' } },
        'Entity set "Addresses" must reference a declared entity type, got "NS.Address"',
      ],
      [
        'a function with an unknown return type',
        {
          namespace: 'NS',
          functions: [{ name: 'NS.Fn', parameters: [], returnType: { type: 'NS.Missing' } }],
        },
        'Function "NS.Fn" uses unknown type "NS.Missing"',
      ],
    ])('should reject %s', (_label, document, message) => {
      expect(() => ModelValidator.validate(document)).toThrow(new ModelValidationError(message));
    });
  });
});
