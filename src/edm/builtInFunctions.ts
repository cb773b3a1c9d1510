import { FunctionSignature } from './EdmModel.js';
import { primitiveType } from './types.js';

function builtIn(name: string, parameters: string[], returnType: string): FunctionSignature {
  return {
    name,
    parameters: parameters.map((p) => primitiveType(p)),
    returnType: primitiveType(returnType),
    builtIn: true,
  };
}

/**
 * Canonical filter functions, in overload declaration order.
 */
export const BUILT_IN_FUNCTIONS: readonly FunctionSignature[] = [
  builtIn('geo.distance', ['Edm.GeographyPoint', 'Edm.GeographyPoint'], 'Edm.Double'),
  builtIn('geo.distance', ['Edm.GeometryPoint', 'Edm.GeometryPoint'], 'Edm.Double'),
  builtIn('geo.length', ['Edm.GeographyLineString'], 'Edm.Double'),
  builtIn('geo.length', ['Edm.GeometryLineString'], 'Edm.Double'),
  builtIn('geo.intersects', ['Edm.GeographyPoint', 'Edm.GeographyPolygon'], 'Edm.Boolean'),
  builtIn('geo.intersects', ['Edm.GeometryPoint', 'Edm.GeometryPolygon'], 'Edm.Boolean'),
  builtIn('contains', ['Edm.String', 'Edm.String'], 'Edm.Boolean'),
  builtIn('startswith', ['Edm.String', 'Edm.String'], 'Edm.Boolean'),
  builtIn('endswith', ['Edm.String', 'Edm.String'], 'Edm.Boolean'),
  builtIn('length', ['Edm.String'], 'Edm.Int32'),
  builtIn('indexof', ['Edm.String', 'Edm.String'], 'Edm.Int32'),
  builtIn('substring', ['Edm.String', 'Edm.Int32'], 'Edm.String'),
  builtIn('substring', ['Edm.String', 'Edm.Int32', 'Edm.Int32'], 'Edm.String'),
  builtIn('tolower', ['Edm.String'], 'Edm.String'),
  builtIn('toupper', ['Edm.String'], 'Edm.String'),
  builtIn('trim', ['Edm.String'], 'Edm.String'),
  builtIn('concat', ['Edm.String', 'Edm.String'], 'Edm.String'),
  ...['year', 'month', 'day', 'hour', 'minute', 'second'].map((name) =>
    builtIn(name, ['Edm.DateTimeOffset'], 'Edm.Int32')
  ),
  ...['round', 'floor', 'ceiling'].flatMap((name) => [
    builtIn(name, ['Edm.Double'], 'Edm.Double'),
    builtIn(name, ['Edm.Decimal'], 'Edm.Decimal'),
  ]),
];
