import { describe, it, expect } from '@jest/globals';
import {
  formatTypeReference,
  isAssignable,
  primitiveType,
  typeFamily,
  typeReferencesEqual,
  withNullability,
} from '../types.js';

describe('typeFamily', () => {
  it.each([
    ['Edm.Int32', 'numeric'],
    ['Edm.Decimal', 'numeric'],
    ['Edm.String', 'string'],
    ['Edm.Boolean', 'boolean'],
    ['Edm.Duration', 'temporal'],
    ['Edm.Guid', 'guid'],
    ['Edm.Binary', 'binary'],
    ['Edm.GeographyPoint', 'geography'],
    ['Edm.GeometryPolygon', 'geometry'],
    ['NS.Customer', 'structured'],
  ])('should place %s in the %s family', (name, family) => {
    expect(typeFamily(name)).toBe(family);
  });
});

describe('isAssignable', () => {
  it('should promote integers to wider numeric types', () => {
    expect(isAssignable('Edm.Int32', 'Edm.Int64')).toBe(true);
    expect(isAssignable('Edm.Int32', 'Edm.Double')).toBe(true);
    expect(isAssignable('Edm.Int64', 'Edm.Decimal')).toBe(true);
  });

  it('should not narrow or cross families', () => {
    expect(isAssignable('Edm.Double', 'Edm.Int32')).toBe(false);
    expect(isAssignable('Edm.Single', 'Edm.Decimal')).toBe(false);
    expect(isAssignable('Edm.Int32', 'Edm.String')).toBe(false);
    expect(isAssignable('Edm.GeographyPoint', 'Edm.GeometryPoint')).toBe(false);
  });

  it('should accept any geography subtype for Edm.Geography', () => {
    expect(isAssignable('Edm.GeographyPolygon', 'Edm.Geography')).toBe(true);
  });
});

describe('type references', () => {
  it('should omit empty facets', () => {
    expect(primitiveType('Edm.String', false, {})).toEqual({ name: 'Edm.String', nullable: false });
  });

  it('should compare name, nullability and facets', () => {
    const point = primitiveType('Edm.GeographyPoint', true, { srid: 4326 });
    expect(typeReferencesEqual(point, primitiveType('Edm.GeographyPoint', true, { srid: 4326 }))).toBe(true);
    expect(typeReferencesEqual(point, primitiveType('Edm.GeographyPoint', true))).toBe(false);
    expect(typeReferencesEqual(point, withNullability(point, false))).toBe(false);
  });

  it('should return the same reference when nullability already matches', () => {
    const type = primitiveType('Edm.Int32');
    expect(withNullability(type, true)).toBe(type);
  });

  it('should format facets in a fixed order', () => {
    expect(
      formatTypeReference(primitiveType('Edm.Decimal', false, { scale: 2, precision: 10 }))
    ).toBe('[Edm.Decimal Nullable=False Precision=10 Scale=2]');
    expect(formatTypeReference(primitiveType('Edm.GeographyPoint', true, { srid: 4326 }))).toBe(
      '[Edm.GeographyPoint Nullable=True SRID=4326]'
    );
  });
});
