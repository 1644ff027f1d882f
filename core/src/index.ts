export * from './config/types.js';
export * from './config/resolve.js';

export * from './definitions/types.js';
export * from './definitions/schema.js';
export * from './definitions/registry.js';

export * from './expressions/types.js';
export * from './expressions/builders.js';
export * from './expressions/format.js';
export * from './expressions/dates.js';
export * from './expressions/parser.js';

export * from './logger.js';

export * from './search/errors.js';
export * from './search/types.js';
export * from './search/continuationToken.js';
export * from './search/searchParams.js';
export * from './search/searchOptionsFactory.js';

export * from './sql/tableExpression.js';
export * from './sql/planBuilder.js';
export * from './sql/includeRewriter.js';

export * from './engine/createSearchEngine.js';
