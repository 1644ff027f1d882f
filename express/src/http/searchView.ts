import {
  formatExpression,
  type SearchOptions,
  type SortOrder,
  type SqlRootExpression,
  type TableExpressionKind,
} from '@fhirquery/core';

export type SearchOptionsView = {
  continuationToken: string | null;
  maxItemCount: number;
  includeCount: number;
  countOnly: boolean;
  includeTotal: SearchOptions['includeTotal'];
  expression: string | null;
  sort: { parameter: string; order: SortOrder }[];
  unsupportedSearchParams: [string, string][];
  unsupportedSortingParams: { parameterName: string; reason: string }[];
};

export type PlanEntryView = {
  kind: TableExpressionKind;
  predicate?: string;
};

export function toSearchOptionsView(options: SearchOptions): SearchOptionsView {
  return {
    continuationToken: options.continuationToken ?? null,
    maxItemCount: options.maxItemCount,
    includeCount: options.includeCount,
    countOnly: options.countOnly,
    includeTotal: options.includeTotal,
    expression: options.expression ? formatExpression(options.expression) : null,
    sort: options.sort.map((s) => ({ parameter: s.parameter.name, order: s.order })),
    unsupportedSearchParams: options.unsupportedSearchParams.map(([k, v]) => [k, v]),
    unsupportedSortingParams: options.unsupportedSortingParams.map((s) => ({
      parameterName: s.parameterName,
      reason: s.reason,
    })),
  };
}

export function toPlanView(plan: SqlRootExpression): PlanEntryView[] {
  return plan.tableExpressions.map((t) => {
    const predicate = t.normalizedPredicate ?? t.denormalizedPredicate;
    return predicate ? { kind: t.kind, predicate: formatExpression(predicate) } : { kind: t.kind };
  });
}
