import { and } from '../expressions/builders.js';
import type { Expression, IncludeExpression } from '../expressions/types.js';
import type { SearchOptions } from '../search/types.js';
import {
  includeTableExpression,
  sqlRootExpression,
  tableExpression,
  type QueryGenerator,
  type SqlRootExpression,
  type TableExpression,
} from './tableExpression.js';

export type BuildPlanOptions = {
  includeGenerator?: QueryGenerator;
};

function topLevelConjuncts(expression: Expression | undefined): readonly Expression[] {
  if (!expression) return [];
  if (expression.kind === 'multiary' && expression.operator === 'and') return expression.expressions;
  return [expression];
}

/**
 * Assembles the unordered plan for a compiled search: one `all` entry filtering
 * on every non-include predicate, one `include` entry per include in submission
 * order, and a trailing `top` unless only the count was requested.
 */
export function buildSqlRootExpression(
  options: Pick<SearchOptions, 'expression' | 'countOnly'>,
  opts: BuildPlanOptions = {},
): SqlRootExpression {
  const filters: Expression[] = [];
  const includes: IncludeExpression[] = [];

  for (const e of topLevelConjuncts(options.expression)) {
    if (e.kind === 'include') includes.push(e);
    else filters.push(e);
  }

  const [first, ...rest] = filters;
  const tableExpressions: TableExpression[] = [
    tableExpression('all', first ? { denormalizedPredicate: and(first, ...rest) } : {}),
    ...includes.map((inc) => includeTableExpression(inc, opts.includeGenerator)),
  ];
  if (!options.countOnly) tableExpressions.push(tableExpression('top'));

  return sqlRootExpression(tableExpressions);
}
