import type { Expression, IncludeExpression } from '../expressions/types.js';

export const TABLE_EXPRESSION_KINDS = [
  'normal',
  'concatenation',
  'all',
  'top',
  'chain',
  'include',
  'includeLimit',
  'includeUnionAll',
  'sort',
] as const;
export type TableExpressionKind = (typeof TABLE_EXPRESSION_KINDS)[number];

/**
 * Opaque handle naming the generator that renders a table expression. Plan
 * rewrites copy it and never look inside.
 */
export type QueryGenerator = { readonly name: string };

export const INCLUDE_QUERY_GENERATOR: QueryGenerator = Object.freeze({ name: 'include' });

export type IncludeTableExpression = {
  readonly kind: 'include';
  readonly queryGenerator: QueryGenerator;
  readonly normalizedPredicate: IncludeExpression;
  readonly denormalizedPredicate?: Expression;
};

export type GenericTableExpression = {
  readonly kind: Exclude<TableExpressionKind, 'include'>;
  readonly queryGenerator?: QueryGenerator;
  readonly normalizedPredicate?: Expression;
  readonly denormalizedPredicate?: Expression;
};

export type TableExpression = IncludeTableExpression | GenericTableExpression;

export type SqlRootExpression = {
  readonly tableExpressions: readonly TableExpression[];
  readonly resourceExpressions: readonly Expression[];
};

export function tableExpression(
  kind: GenericTableExpression['kind'],
  predicates: { queryGenerator?: QueryGenerator; normalizedPredicate?: Expression; denormalizedPredicate?: Expression } = {},
): GenericTableExpression {
  const t: GenericTableExpression = { kind, ...predicates };
  return Object.freeze(t);
}

export function includeTableExpression(
  include: IncludeExpression,
  queryGenerator: QueryGenerator = INCLUDE_QUERY_GENERATOR,
): IncludeTableExpression {
  const t: IncludeTableExpression = { kind: 'include', queryGenerator, normalizedPredicate: include };
  return Object.freeze(t);
}

export function sqlRootExpression(
  tableExpressions: readonly TableExpression[],
  resourceExpressions: readonly Expression[] = [],
): SqlRootExpression {
  const root: SqlRootExpression = {
    tableExpressions: Object.freeze([...tableExpressions]),
    resourceExpressions: Object.freeze([...resourceExpressions]),
  };
  return Object.freeze(root);
}

export function isIncludeTableExpression(t: TableExpression): t is IncludeTableExpression {
  return t.kind === 'include';
}
