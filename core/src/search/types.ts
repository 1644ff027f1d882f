import type { SearchParameterInfo } from '../definitions/types.js';
import type { Expression } from '../expressions/types.js';

export const TOTAL_TYPES = ['none', 'estimate', 'accurate'] as const;
export type TotalType = (typeof TOTAL_TYPES)[number];
export type SupportedTotalType = Exclude<TotalType, 'estimate'>;

export const SUMMARY_TYPES = ['true', 'text', 'data', 'count', 'false'] as const;
export type SummaryType = (typeof SUMMARY_TYPES)[number];

export type SortOrder = 'ascending' | 'descending';

/** A raw `(key, value)` query pair, in submission order. */
export type QueryParameter = readonly [key: string, value: string];

export type SortRequest = { parameterName: string; order: SortOrder };

export type SortEntry = {
  readonly parameter: SearchParameterInfo;
  readonly order: SortOrder;
};

export type UnsupportedSorting = {
  readonly parameterName: string;
  readonly reason: string;
};

export type SearchRequest = {
  resourceType?: string;
  compartmentType?: string;
  compartmentId?: string;
  queryParameters?: readonly QueryParameter[];
};

export type SearchOptions = {
  readonly continuationToken?: string;
  readonly maxItemCount: number;
  readonly includeCount: number;
  readonly countOnly: boolean;
  readonly includeTotal: SupportedTotalType;
  readonly expression?: Expression;
  readonly sort: readonly SortEntry[];
  readonly unsupportedSearchParams: readonly QueryParameter[];
  readonly unsupportedSortingParams: readonly UnsupportedSorting[];
};

export const KnownQueryParameterNames = {
  continuationToken: 'ct',
  format: '_format',
  total: '_total',
  count: '_count',
  summary: '_summary',
  sort: '_sort',
  include: '_include',
  revInclude: '_revinclude',
} as const;

export const COMPARTMENT_TYPES = ['Device', 'Encounter', 'Patient', 'Practitioner', 'RelatedPerson'] as const;
export type CompartmentType = (typeof COMPARTMENT_TYPES)[number];

export function isCompartmentType(v: string): v is CompartmentType {
  return COMPARTMENT_TYPES.some((t) => t === v);
}
