import type { SearchConfig } from '../config/types.js';
import { ROOT_RESOURCE_TYPE, type SearchParameterDirectory, type SearchParameterInfo } from '../definitions/types.js';
import {
  and,
  compartmentSearch,
  revIncludeTargetTypeNotSpecifiedMessage,
  searchParameter,
  stringEquals,
} from '../expressions/builders.js';
import type { ExpressionParser } from '../expressions/parser.js';
import type { Expression, IncludeExpression } from '../expressions/types.js';
import { defaultLogger, type Logger } from '../logger.js';
import { decodeContinuationToken } from './continuationToken.js';
import {
  BadRequestError,
  InvalidSearchOperationError,
  ResourceNotSupportedError,
  SearchOperationNotSupportedError,
  SearchParameterNotSupportedError,
} from './errors.js';
import { SearchParams } from './searchParams.js';
import {
  isCompartmentType,
  KnownQueryParameterNames,
  TOTAL_TYPES,
  type QueryParameter,
  type SearchOptions,
  type SearchRequest,
  type SortEntry,
  type SupportedTotalType,
  type TotalType,
  type UnsupportedSorting,
} from './types.js';

export const SUPPORTED_TOTAL_TYPES = "'accurate', 'none'";

const INCLUDE_ITERATE_MODIFIERS = ['_include:iterate', '_include:recurse'];
const REV_INCLUDE_ITERATE_MODIFIERS = ['_revinclude:iterate', '_revinclude:recurse'];

function hasText(s: string | undefined): s is string {
  return s != null && s.trim() !== '';
}

function parseTotalType(value: string): TotalType | undefined {
  const v = value.trim().toLowerCase();
  return TOTAL_TYPES.find((t) => t === v);
}

function validateTotalType(totalType: TotalType): SupportedTotalType {
  if (totalType === 'estimate') {
    throw new SearchOperationNotSupportedError(
      `The '_total' parameter value '${totalType}' is not supported. The supported values are: ${SUPPORTED_TOTAL_TYPES}.`,
      { value: totalType },
    );
  }
  return totalType;
}

function isIterateKey(key: string, modifiers: readonly string[]): boolean {
  const k = key.toLowerCase();
  return modifiers.some((m) => m === k);
}

function sortNotSupportedReason(name: string): string {
  return `The search parameter '${name}' is not supported for sorting.`;
}

export type SearchOptionsFactoryDeps = {
  expressionParser: ExpressionParser;
  definitions: SearchParameterDirectory;
  config: Readonly<SearchConfig>;
  logger?: Logger;
};

/**
 * Compiles raw query pairs into `SearchOptions`.
 *
 * Structural and client errors abort compilation. Parameters the parser does
 * not recognise and sort keys that cannot be sorted on are collected in the
 * `unsupported*` lists instead.
 */
export class SearchOptionsFactory {
  private readonly resourceTypeSearchParameter: SearchParameterInfo;

  constructor(private readonly deps: SearchOptionsFactoryDeps) {
    this.resourceTypeSearchParameter = deps.definitions.getSearchParameter(ROOT_RESOURCE_TYPE, '_type');
  }

  private get logger(): Logger {
    return this.deps.logger ?? defaultLogger();
  }

  create(request: SearchRequest): SearchOptions {
    const { config, definitions, expressionParser } = this.deps;
    const { resourceType, compartmentType, compartmentId } = request;

    let continuationToken: string | undefined;
    let includeTotal: SupportedTotalType | undefined;
    let setDefaultTotal = true;

    const searchParams = new SearchParams();
    const unsupportedSearchParams: QueryParameter[] = [];

    for (const query of request.queryParameters ?? []) {
      const [key, value] = query;

      if (key === KnownQueryParameterNames.continuationToken) {
        // Upstream mapping keeps a single ct; a second one is a defect.
        if (continuationToken !== undefined) {
          throw new InvalidSearchOperationError(
            `More than one '${KnownQueryParameterNames.continuationToken}' query parameter is not allowed.`,
          );
        }
        continuationToken = decodeContinuationToken(value);
        setDefaultTotal = false;
      } else if (key === KnownQueryParameterNames.format) {
        // Reserved for a content-negotiation override.
      } else if (!hasText(key) || !hasText(value)) {
        unsupportedSearchParams.push(query);
      } else if (key.toLowerCase() === KnownQueryParameterNames.total) {
        const totalType = parseTotalType(value);
        if (!totalType) {
          throw new BadRequestError(
            `The '_total' parameter value '${value}' is invalid. The supported values are: ${SUPPORTED_TOTAL_TYPES}.`,
            { value },
          );
        }
        includeTotal = validateTotalType(totalType);
        setDefaultTotal = false;
      } else {
        try {
          searchParams.add(key, value);
        } catch (e) {
          throw new BadRequestError(e instanceof Error ? e.message : String(e), { key, value });
        }
      }
    }

    if (setDefaultTotal) includeTotal = validateTotalType(config.includeTotalInBundle);

    let maxItemCount = config.defaultItemCountPerSearch;
    if (searchParams.count !== undefined) {
      if (searchParams.count > config.maxItemCountPerSearch) {
        throw new BadRequestError(
          `The count must be less than or equal to ${config.maxItemCountPerSearch}. The specified count was ${searchParams.count}.`,
          { max: config.maxItemCountPerSearch, count: searchParams.count },
        );
      }
      maxItemCount = searchParams.count;
    }

    // Without a resource type the common parameters apply.
    let parsedResourceType = ROOT_RESOURCE_TYPE;
    if (hasText(resourceType)) {
      if (!definitions.isKnownResourceType(resourceType)) throw new ResourceNotSupportedError(resourceType);
      parsedResourceType = resourceType;
    }

    const searchExpressions: Expression[] = [];

    if (parsedResourceType !== ROOT_RESOURCE_TYPE) {
      searchExpressions.push(
        searchParameter(this.resourceTypeSearchParameter, stringEquals('tokenCode', parsedResourceType, false)),
      );
    }

    for (const query of searchParams.parameters) {
      const [key, value] = query;
      if (isIterateKey(key, INCLUDE_ITERATE_MODIFIERS) || isIterateKey(key, REV_INCLUDE_ITERATE_MODIFIERS)) continue;
      try {
        searchExpressions.push(expressionParser.parse(parsedResourceType, key, value));
      } catch (e) {
        if (!(e instanceof SearchParameterNotSupportedError)) throw e;
        unsupportedSearchParams.push(query);
      }
    }

    for (const value of searchParams.include) {
      searchExpressions.push(expressionParser.parseInclude(parsedResourceType, value, false, false));
    }
    for (const value of searchParams.revInclude) {
      searchExpressions.push(expressionParser.parseInclude(parsedResourceType, value, true, false));
    }

    // The accumulator has no notion of :iterate/:recurse, so those pairs stay in
    // the generic list and are located by key.
    searchExpressions.push(...this.parseIncludeIterateExpressions(searchParams.parameters, false));
    searchExpressions.push(...this.parseIncludeIterateExpressions(searchParams.parameters, true));

    if (hasText(compartmentType)) {
      if (!isCompartmentType(compartmentType)) {
        throw new InvalidSearchOperationError(`Compartment type '${compartmentType}' is invalid.`, { compartmentType });
      }
      if (!hasText(compartmentId)) {
        throw new InvalidSearchOperationError('Compartment id is null or empty.', { compartmentType });
      }
      searchExpressions.push(compartmentSearch(compartmentType, compartmentId));
    }

    const [first, ...rest] = searchExpressions;
    const expression = first ? and(first, ...rest) : undefined;

    const { sort, unsupportedSortingParams } = this.resolveSort(parsedResourceType, searchParams);

    if (unsupportedSearchParams.length || unsupportedSortingParams.length) {
      this.logger.info('[search] unsupported parameters ignored', {
        resourceType: parsedResourceType,
        searchParams: unsupportedSearchParams.map(([k]) => k),
        sortParams: unsupportedSortingParams.map((s) => s.parameterName),
      });
    }

    const options: SearchOptions = {
      ...(continuationToken !== undefined ? { continuationToken } : {}),
      maxItemCount,
      includeCount: config.defaultIncludeCountPerSearch,
      countOnly: searchParams.summary === 'count',
      includeTotal: includeTotal ?? 'none',
      ...(expression ? { expression } : {}),
      sort: Object.freeze(sort),
      unsupportedSearchParams: Object.freeze(unsupportedSearchParams),
      unsupportedSortingParams: Object.freeze(unsupportedSortingParams),
    };
    return Object.freeze(options);
  }

  private parseIncludeIterateExpressions(parameters: readonly QueryParameter[], reversed: boolean): IncludeExpression[] {
    const modifiers = reversed ? REV_INCLUDE_ITERATE_MODIFIERS : INCLUDE_ITERATE_MODIFIERS;
    const out: IncludeExpression[] = [];

    for (const [key, value] of parameters) {
      if (!isIterateKey(key, modifiers)) continue;

      let includeResourceType = ROOT_RESOURCE_TYPE;
      const prefix = value.split(':')[0] ?? '';
      if (hasText(prefix)) {
        if (!this.deps.definitions.isKnownResourceType(prefix)) throw new ResourceNotSupportedError(prefix);
        includeResourceType = prefix;
      }

      const expression = this.deps.expressionParser.parseInclude(includeResourceType, value, reversed, true);

      // The default parser already rejects this through `includeExpression`; a custom
      // ExpressionParser may build include expressions without that check.
      if (
        expression.reversed &&
        expression.iterate &&
        !expression.targetResourceType &&
        (expression.referenceSearchParameter?.targetResourceTypes.length ?? 0) > 1
      ) {
        throw new BadRequestError(revIncludeTargetTypeNotSpecifiedMessage(value), { value });
      }

      out.push(expression);
    }

    return out;
  }

  private resolveSort(
    resourceType: string,
    searchParams: SearchParams,
  ): { sort: SortEntry[]; unsupportedSortingParams: UnsupportedSorting[] } {
    const sort: SortEntry[] = [];
    const unsupportedSortingParams: UnsupportedSorting[] = [];

    for (const { parameterName, order } of searchParams.sort) {
      const parameter = this.deps.definitions.tryGetSearchParameter(resourceType, parameterName);
      if (parameter?.sortable) {
        sort.push(Object.freeze({ parameter, order }));
      } else {
        unsupportedSortingParams.push(
          Object.freeze({ parameterName, reason: sortNotSupportedReason(parameterName) }),
        );
      }
    }

    return { sort, unsupportedSortingParams };
  }
}
