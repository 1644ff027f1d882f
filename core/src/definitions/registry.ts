import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

import { Ajv2020 } from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';

import { SearchDefinitionsError, SearchParameterNotSupportedError } from '../search/errors.js';
import { SEARCH_PARAMETER_DEFINITIONS_SCHEMA } from './schema.js';
import {
  COMMON_BASE_TYPES,
  ROOT_RESOURCE_TYPE,
  type SearchParameterDefinition,
  type SearchParameterDefinitionsFile,
  type SearchParameterDirectory,
  type SearchParameterInfo,
} from './types.js';

export const BUNDLED_DEFINITIONS_PATH = fileURLToPath(new URL('./data/search-parameters.json', import.meta.url));

function readJsonFile(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, 'utf8');
    return JSON.parse(raw);
  } catch (e) {
    throw new SearchDefinitionsError(`Failed to read JSON: ${filePath}`, [], { filePath, cause: e });
  }
}

export function validateDefinitionsOrThrow(input: unknown): SearchParameterDefinitionsFile {
  const ajv = new Ajv2020({ allErrors: true });
  addFormats.default(ajv);
  const validate = ajv.compile<SearchParameterDefinitionsFile>(SEARCH_PARAMETER_DEFINITIONS_SCHEMA);
  if (!validate(input)) throw new SearchDefinitionsError('Invalid search parameter definitions', validate.errors ?? []);
  return input;
}

function isCommonBase(type: string): boolean {
  return COMMON_BASE_TYPES.some((t) => t === type);
}

function toInfo(def: SearchParameterDefinition): SearchParameterInfo {
  const info: SearchParameterInfo = {
    name: def.name,
    type: def.type,
    baseResourceTypes: Object.freeze([...def.base]),
    targetResourceTypes: Object.freeze(def.type === 'reference' ? [...(def.target ?? [])] : []),
    sortable: def.sortable === true,
    ...(def.url ? { url: def.url } : {}),
  };
  return Object.freeze(info);
}

/**
 * In-memory search parameter directory built from a definitions file.
 *
 * Parameters declared on `Resource` or `DomainResource` are visible from every
 * resource type; a type-specific definition shadows a common one of the same name.
 */
export class SearchParameterDefinitionManager implements SearchParameterDirectory {
  private readonly resourceTypes: ReadonlySet<string>;
  private readonly common = new Map<string, SearchParameterInfo>();
  private readonly byType = new Map<string, Map<string, SearchParameterInfo>>();

  private constructor(file: SearchParameterDefinitionsFile) {
    this.resourceTypes = new Set(file.resourceTypes);

    for (const def of file.searchParameters) {
      const info = toInfo(def);
      for (const base of def.base) {
        if (isCommonBase(base)) {
          this.common.set(def.name, info);
          continue;
        }
        if (!this.resourceTypes.has(base)) {
          throw new SearchDefinitionsError(`Search parameter ${def.name} declares unknown base type ${base}`, [], {
            name: def.name,
            base,
          });
        }
        const params = this.byType.get(base) ?? new Map<string, SearchParameterInfo>();
        params.set(def.name, info);
        this.byType.set(base, params);
      }
    }
  }

  static fromDefinitions(input: unknown): SearchParameterDefinitionManager {
    return new SearchParameterDefinitionManager(validateDefinitionsOrThrow(input));
  }

  static fromFile(filePath: string = BUNDLED_DEFINITIONS_PATH): SearchParameterDefinitionManager {
    return SearchParameterDefinitionManager.fromDefinitions(readJsonFile(filePath));
  }

  isKnownResourceType(resourceType: string): boolean {
    return this.resourceTypes.has(resourceType);
  }

  tryGetSearchParameter(resourceType: string, name: string): SearchParameterInfo | undefined {
    if (resourceType !== ROOT_RESOURCE_TYPE) {
      const specific = this.byType.get(resourceType)?.get(name);
      if (specific) return specific;
    }
    return this.common.get(name);
  }

  getSearchParameter(resourceType: string, name: string): SearchParameterInfo {
    const info = this.tryGetSearchParameter(resourceType, name);
    if (!info) {
      throw new SearchParameterNotSupportedError(
        `The search parameter '${name}' is not supported for resource type '${resourceType}'.`,
        { resourceType, name },
      );
    }
    return info;
  }

  getSearchParameters(resourceType: string): SearchParameterInfo[] {
    const out = new Map(this.common);
    if (resourceType !== ROOT_RESOURCE_TYPE) {
      for (const [name, info] of this.byType.get(resourceType) ?? []) out.set(name, info);
    }
    return [...out.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}
