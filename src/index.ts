import { EdmModel, createRangeVariable } from './edm/EdmModel.js';
import { ModelSchemaResolver } from './edm/ModelSchemaResolver.js';
import { FilterParseContext, parseFilter } from './filter/FilterParser.js';
import { render } from './filter/FilterPrinter.js';

export * from './edm/types.js';
export * from './edm/EdmModel.js';
export * from './edm/ISchemaResolver.js';
export * from './edm/ResolutionError.js';
export { BUILT_IN_FUNCTIONS } from './edm/builtInFunctions.js';
export { ModelSchemaResolver } from './edm/ModelSchemaResolver.js';
export { ModelFileLoader, buildModel } from './edm/ModelFileLoader.js';
export * from './validators/ModelValidator.js';
export * from './filter/ast.js';
export * from './filter/FilterParserError.js';
export type { Token, TokenKind } from './filter/Lexer.js';
export { OPERATOR_KEYWORDS, isOperatorKeyword, tokenize, scanAll } from './filter/Lexer.js';
export type { FilterParseContext } from './filter/FilterParser.js';
export { parseFilter } from './filter/FilterParser.js';
export { render } from './filter/FilterPrinter.js';
export * from './uri/UriUtils.js';
export type { FilterRequest } from './uri/FilterRequestReader.js';
export { readFilterRequest } from './uri/FilterRequestReader.js';
export type { FilterConfig } from './config/filter.js';
export { loadFilterConfig } from './config/filter.js';

/**
 * Bind `rangeVariableName` to an entity set of `model` and build a resolver
 * whose scope holds just that variable.
 */
export function createFilterContext(
  model: EdmModel,
  entitySet: string,
  rangeVariableName = '$it'
): FilterParseContext {
  const rangeVariable = createRangeVariable(model, entitySet, rangeVariableName);
  return {
    resolver: new ModelSchemaResolver(model, [rangeVariable]),
    rangeVariable,
  };
}

/** Parse `text` and return its rendered tree */
export function parseAndRender(text: string, context: FilterParseContext): string {
  return render(parseFilter(text, context));
}
