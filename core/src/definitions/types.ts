export const SEARCH_PARAM_TYPES = [
  'string',
  'token',
  'reference',
  'number',
  'date',
  'uri',
  'quantity',
  'composite',
  'special',
] as const;
export type SearchParamType = (typeof SEARCH_PARAM_TYPES)[number];

export type SearchParameterInfo = {
  readonly name: string;
  readonly url?: string;
  readonly type: SearchParamType;
  readonly baseResourceTypes: readonly string[];
  /** Reference parameters only; empty for every other type. */
  readonly targetResourceTypes: readonly string[];
  readonly sortable: boolean;
};

export type SearchParameterDefinition = {
  name: string;
  url?: string;
  type: SearchParamType;
  base: string[];
  target?: string[];
  sortable?: boolean;
};

export type SearchParameterDefinitionsFile = {
  $schema?: string;
  resourceTypes: string[];
  searchParameters: SearchParameterDefinition[];
};

/** Types whose parameters apply to every resource type. */
export const COMMON_BASE_TYPES = ['Resource', 'DomainResource'] as const;

/** Resource type used when a search names none; it only sees common parameters. */
export const ROOT_RESOURCE_TYPE = 'DomainResource';

export interface SearchParameterDirectory {
  getSearchParameter(resourceType: string, name: string): SearchParameterInfo;
  tryGetSearchParameter(resourceType: string, name: string): SearchParameterInfo | undefined;
  getSearchParameters(resourceType: string): SearchParameterInfo[];
  isKnownResourceType(resourceType: string): boolean;
}
