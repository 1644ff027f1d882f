import { resolveSearchConfig } from '../config/resolve.js';
import type { SearchConfig } from '../config/types.js';
import { SearchParameterDefinitionManager } from '../definitions/registry.js';
import type { SearchParameterDirectory } from '../definitions/types.js';
import { SearchParameterExpressionParser, type ExpressionParser } from '../expressions/parser.js';
import { defaultLogger, type Logger } from '../logger.js';
import { SearchOptionsFactory } from '../search/searchOptionsFactory.js';
import type { SearchOptions, SearchRequest } from '../search/types.js';
import { rewriteIncludes } from '../sql/includeRewriter.js';
import { buildSqlRootExpression } from '../sql/planBuilder.js';
import type { QueryGenerator, SqlRootExpression } from '../sql/tableExpression.js';

export type SearchEngineOptions = {
  config?: Partial<SearchConfig>;
  /** Takes precedence over `definitionsPath`. */
  definitions?: SearchParameterDirectory;
  definitionsPath?: string;
  expressionParser?: ExpressionParser;
  includeGenerator?: QueryGenerator;
  logger?: Logger;
};

export type SearchPlan = {
  options: SearchOptions;
  plan: SqlRootExpression;
};

export type SearchEngine = {
  readonly config: Readonly<SearchConfig>;
  readonly definitions: SearchParameterDirectory;
  readonly searchOptionsFactory: SearchOptionsFactory;
  /** Compiles a request and returns its search options with the linearized plan. */
  plan(request: SearchRequest): SearchPlan;
};

export function createSearchEngine(opts: SearchEngineOptions = {}): SearchEngine {
  const config = resolveSearchConfig(opts.config);
  const definitions = opts.definitions ?? SearchParameterDefinitionManager.fromFile(opts.definitionsPath);
  const expressionParser = opts.expressionParser ?? new SearchParameterExpressionParser({ definitions });
  const logger = opts.logger ?? defaultLogger();
  const searchOptionsFactory = new SearchOptionsFactory({ expressionParser, definitions, config, logger });

  return {
    config,
    definitions,
    searchOptionsFactory,
    plan(request: SearchRequest): SearchPlan {
      const options = searchOptionsFactory.create(request);
      const unordered = buildSqlRootExpression(
        options,
        opts.includeGenerator ? { includeGenerator: opts.includeGenerator } : {},
      );
      return { options, plan: rewriteIncludes(unordered) };
    },
  };
}
