import type { TotalType } from '../search/types.js';

export type SearchConfig = {
  /** Page size used when the request carries no `_count`. */
  defaultItemCountPerSearch: number;
  maxItemCountPerSearch: number;
  defaultIncludeCountPerSearch: number;
  /** Total policy applied when neither `_total` nor a continuation token is present. */
  includeTotalInBundle: TotalType;
};
