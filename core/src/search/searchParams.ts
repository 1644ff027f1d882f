import { KnownQueryParameterNames, SUMMARY_TYPES, type QueryParameter, type SortRequest, type SummaryType } from './types.js';

function isSummaryType(v: string): v is SummaryType {
  return SUMMARY_TYPES.some((t) => t === v);
}

export function parseSort(value: string): SortRequest[] {
  const parts = value
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);

  const out: SortRequest[] = [];
  for (const p of parts) {
    const order = p.startsWith('-') ? 'descending' : 'ascending';
    const parameterName = p.replace(/^[+-]/, '').trim();
    if (!parameterName) throw new Error(`Invalid _sort value: '${value}'`);
    out.push({ parameterName, order });
  }
  return out;
}

/**
 * Accumulates the query pairs that are not handled structurally by the
 * compiler. Only syntactic checks happen here; failures are plain `Error`s
 * that the compiler reports as bad requests.
 */
export class SearchParams {
  count?: number;
  summary?: SummaryType;
  readonly sort: SortRequest[] = [];
  readonly include: string[] = [];
  readonly revInclude: string[] = [];
  readonly parameters: QueryParameter[] = [];

  add(key: string, value: string): this {
    switch (key) {
      case KnownQueryParameterNames.count: {
        const s = value.trim();
        if (!/^\d+$/.test(s)) throw new Error(`Invalid _count: '${value}' is not a non-negative integer`);
        const n = Number.parseInt(s, 10);
        if (!Number.isSafeInteger(n)) throw new Error(`Invalid _count: '${value}' is out of range`);
        this.count = n;
        break;
      }
      case KnownQueryParameterNames.summary: {
        const s = value.trim().toLowerCase();
        if (!isSummaryType(s)) {
          throw new Error(`Invalid _summary: '${value}'. Supported values are ${SUMMARY_TYPES.join(', ')}`);
        }
        this.summary = s;
        break;
      }
      case KnownQueryParameterNames.sort:
        this.sort.push(...parseSort(value));
        break;
      case KnownQueryParameterNames.include:
        this.include.push(value);
        break;
      case KnownQueryParameterNames.revInclude:
        this.revInclude.push(value);
        break;
      default:
        this.parameters.push([key, value]);
    }
    return this;
  }
}
