import { SearchConfigError } from '../search/errors.js';
import { TOTAL_TYPES, type TotalType } from '../search/types.js';
import type { SearchConfig } from './types.js';

export const DEFAULT_SEARCH_CONFIG: Readonly<SearchConfig> = Object.freeze({
  defaultItemCountPerSearch: 10,
  maxItemCountPerSearch: 1000,
  defaultIncludeCountPerSearch: 10,
  includeTotalInBundle: 'none',
});

function isTotalType(v: string): v is TotalType {
  return TOTAL_TYPES.some((t) => t === v);
}

function assertPositiveInt(field: keyof SearchConfig, v: unknown): number {
  if (typeof v !== 'number' || !Number.isInteger(v) || v < 1) {
    throw new SearchConfigError(`Invalid search config: ${field} must be a positive integer`, { field, value: v });
  }
  return v;
}

export function resolveSearchConfig(partial: Partial<SearchConfig> = {}): Readonly<SearchConfig> {
  const merged = { ...DEFAULT_SEARCH_CONFIG, ...partial };

  const defaultItemCountPerSearch = assertPositiveInt('defaultItemCountPerSearch', merged.defaultItemCountPerSearch);
  const maxItemCountPerSearch = assertPositiveInt('maxItemCountPerSearch', merged.maxItemCountPerSearch);
  const defaultIncludeCountPerSearch = assertPositiveInt(
    'defaultIncludeCountPerSearch',
    merged.defaultIncludeCountPerSearch,
  );

  if (defaultItemCountPerSearch > maxItemCountPerSearch) {
    throw new SearchConfigError('Invalid search config: defaultItemCountPerSearch exceeds maxItemCountPerSearch', {
      defaultItemCountPerSearch,
      maxItemCountPerSearch,
    });
  }

  const total = String(merged.includeTotalInBundle).trim().toLowerCase();
  if (!isTotalType(total)) {
    throw new SearchConfigError(`Invalid search config: includeTotalInBundle "${merged.includeTotalInBundle}"`, {
      field: 'includeTotalInBundle',
    });
  }

  return Object.freeze({
    defaultItemCountPerSearch,
    maxItemCountPerSearch,
    defaultIncludeCountPerSearch,
    includeTotalInBundle: total,
  });
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;
  const s = raw.trim();
  if (!/^\d+$/.test(s)) throw new SearchConfigError(`Invalid ${name}: expected an integer`, { name, value: raw });
  return Number.parseInt(s, 10);
}

export function searchConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Readonly<SearchConfig> {
  const partial: Partial<SearchConfig> = {};

  const defaultItemCount = envInt(env, 'SEARCH_DEFAULT_ITEM_COUNT');
  if (defaultItemCount !== undefined) partial.defaultItemCountPerSearch = defaultItemCount;
  const maxItemCount = envInt(env, 'SEARCH_MAX_ITEM_COUNT');
  if (maxItemCount !== undefined) partial.maxItemCountPerSearch = maxItemCount;
  const includeCount = envInt(env, 'SEARCH_DEFAULT_INCLUDE_COUNT');
  if (includeCount !== undefined) partial.defaultIncludeCountPerSearch = includeCount;

  const total = env.SEARCH_DEFAULT_TOTAL?.trim().toLowerCase();
  if (total) {
    if (!isTotalType(total)) throw new SearchConfigError(`Invalid SEARCH_DEFAULT_TOTAL: ${total}`, { value: total });
    partial.includeTotalInBundle = total;
  }

  return resolveSearchConfig(partial);
}
