/**
 * EDM type references and type families.
 *
 * A TypeReference is a plain value: two references describe the same type when
 * their name, nullability and facets are equal (see {@link typeReferencesEqual}).
 */

export interface TypeFacets {
  srid?: number;
  maxLength?: number;
  precision?: number;
  scale?: number;
}

export interface TypeReference {
  readonly name: string;
  readonly nullable: boolean;
  readonly facets?: Readonly<TypeFacets>;
}

export type TypeFamily =
  | 'numeric'
  | 'string'
  | 'boolean'
  | 'temporal'
  | 'guid'
  | 'geography'
  | 'geometry'
  | 'binary'
  | 'structured';

// Promotion order inside the numeric family: a type may be passed where any
// type to its right is expected (Decimal is only reachable from integers).
const NUMERIC_PROMOTION: Record<string, string[]> = {
  'Edm.Byte': ['Edm.Int16', 'Edm.Int32', 'Edm.Int64', 'Edm.Single', 'Edm.Double', 'Edm.Decimal'],
  'Edm.SByte': ['Edm.Int16', 'Edm.Int32', 'Edm.Int64', 'Edm.Single', 'Edm.Double', 'Edm.Decimal'],
  'Edm.Int16': ['Edm.Int32', 'Edm.Int64', 'Edm.Single', 'Edm.Double', 'Edm.Decimal'],
  'Edm.Int32': ['Edm.Int64', 'Edm.Single', 'Edm.Double', 'Edm.Decimal'],
  'Edm.Int64': ['Edm.Single', 'Edm.Double', 'Edm.Decimal'],
  'Edm.Single': ['Edm.Double'],
  'Edm.Double': [],
  'Edm.Decimal': [],
};

const TEMPORAL_TYPES = new Set([
  'Edm.DateTimeOffset',
  'Edm.Date',
  'Edm.TimeOfDay',
  'Edm.Duration',
]);

export const PRIMITIVE_TYPE_NAMES: readonly string[] = [
  ...Object.keys(NUMERIC_PROMOTION),
  'Edm.String',
  'Edm.Boolean',
  ...TEMPORAL_TYPES,
  'Edm.Guid',
  'Edm.Binary',
  'Edm.Geography',
  'Edm.GeographyPoint',
  'Edm.GeographyLineString',
  'Edm.GeographyPolygon',
  'Edm.Geometry',
  'Edm.GeometryPoint',
  'Edm.GeometryLineString',
  'Edm.GeometryPolygon',
];

const PRIMITIVES = new Set(PRIMITIVE_TYPE_NAMES);

export function isPrimitiveTypeName(name: string): boolean {
  return PRIMITIVES.has(name);
}

/**
 * Family of a type name. Any name that is not an Edm primitive is treated as a
 * structured (entity or complex) type.
 */
export function typeFamily(name: string): TypeFamily {
  if (name in NUMERIC_PROMOTION) return 'numeric';
  if (name === 'Edm.String') return 'string';
  if (name === 'Edm.Boolean') return 'boolean';
  if (TEMPORAL_TYPES.has(name)) return 'temporal';
  if (name === 'Edm.Guid') return 'guid';
  if (name === 'Edm.Binary') return 'binary';
  if (name.startsWith('Edm.Geography')) return 'geography';
  if (name.startsWith('Edm.Geometry')) return 'geometry';
  return 'structured';
}

export function primitiveType(
  name: string,
  nullable = true,
  facets?: TypeFacets
): TypeReference {
  return facets && Object.keys(facets).length > 0 ? { name, nullable, facets } : { name, nullable };
}

export function withNullability(type: TypeReference, nullable: boolean): TypeReference {
  return type.nullable === nullable ? type : { ...type, nullable };
}

export function typeReferencesEqual(a: TypeReference, b: TypeReference): boolean {
  if (a.name !== b.name || a.nullable !== b.nullable) return false;
  const fa = a.facets ?? {};
  const fb = b.facets ?? {};
  return (
    fa.srid === fb.srid &&
    fa.maxLength === fb.maxLength &&
    fa.precision === fb.precision &&
    fa.scale === fb.scale
  );
}

/**
 * Whether a value of type `from` may be passed where `to` is expected.
 * Never crosses families.
 */
export function isAssignable(from: string, to: string): boolean {
  if (from === to) return true;
  const promotions = NUMERIC_PROMOTION[from];
  if (promotions) return promotions.includes(to);
  if (to === 'Edm.Geography') return typeFamily(from) === 'geography';
  if (to === 'Edm.Geometry') return typeFamily(from) === 'geometry';
  return false;
}

/** `[Edm.GeographyPoint Nullable=True SRID=4326]` */
export function formatTypeReference(type: TypeReference): string {
  const parts = [type.name, `Nullable=${type.nullable ? 'True' : 'False'}`];
  const facets = type.facets;
  if (facets) {
    if (facets.srid !== undefined) parts.push(`SRID=${facets.srid}`);
    if (facets.maxLength !== undefined) parts.push(`MaxLength=${facets.maxLength}`);
    if (facets.precision !== undefined) parts.push(`Precision=${facets.precision}`);
    if (facets.scale !== undefined) parts.push(`Scale=${facets.scale}`);
  }
  return `[${parts.join(' ')}]`;
}
