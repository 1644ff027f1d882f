import { ROOT_RESOURCE_TYPE, type SearchParameterDirectory, type SearchParameterInfo } from '../definitions/types.js';
import {
  BadRequestError,
  InvalidSearchOperationError,
  ResourceNotSupportedError,
  SearchParameterNotSupportedError,
} from '../search/errors.js';
import {
  and,
  binary,
  includeExpression,
  missingField,
  missingSearchParameter,
  or,
  searchParameter,
  stringExpression,
  stringEquals,
} from './builders.js';
import { parseDateTimeRange } from './dates.js';
import type { BinaryOperator, Expression, IncludeExpression } from './types.js';

export interface ExpressionParser {
  /** Parses one `(key, value)` query pair into a predicate scoped to `resourceType`. */
  parse(resourceType: string, key: string, value: string): Expression;
  parseInclude(resourceType: string, includeValue: string, reversed: boolean, iterate: boolean): IncludeExpression;
}

type Comparator = 'eq' | 'ne' | 'gt' | 'lt' | 'ge' | 'le';

const COMPARATORS: readonly Comparator[] = ['eq', 'ne', 'gt', 'lt', 'ge', 'le'];

const NUMBER_OPERATORS: Record<Comparator, BinaryOperator> = {
  eq: 'equal',
  ne: 'notEqual',
  gt: 'greaterThan',
  lt: 'lessThan',
  ge: 'greaterThanOrEqual',
  le: 'lessThanOrEqual',
};

function splitComparator(value: string): { comparator: Comparator; rest: string } {
  const prefix = value.slice(0, 2);
  const comparator = COMPARATORS.find((c) => c === prefix);
  if (comparator && value.length > 2) {
    return { comparator, rest: value.slice(2) };
  }
  return { comparator: 'eq', rest: value };
}

/** Splits on unescaped commas; `\,` stays a literal comma. */
export function splitSearchValues(value: string): string[] {
  const out: string[] = [];
  let cur = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    if (ch === '\\' && value.charAt(i + 1) === ',') {
      cur += ',';
      i++;
      continue;
    }
    if (ch === ',') {
      out.push(cur);
      cur = '';
      continue;
    }
    cur += ch;
  }
  out.push(cur);
  return out;
}

function splitKey(key: string): { name: string; modifier?: string } {
  const idx = key.indexOf(':');
  if (idx < 0) return { name: key };
  return { name: key.slice(0, idx), modifier: key.slice(idx + 1) };
}

function unsupportedModifier(param: SearchParameterInfo, modifier: string): never {
  throw new InvalidSearchOperationError(
    `The modifier '${modifier}' is not supported for search parameter '${param.name}'.`,
    { parameter: param.name, modifier },
  );
}

/**
 * Default single-parameter parser. Resolves parameter metadata through the
 * directory and builds the leaf predicates for each parameter type.
 */
export class SearchParameterExpressionParser implements ExpressionParser {
  constructor(private readonly deps: { definitions: SearchParameterDirectory }) {}

  parse(resourceType: string, key: string, value: string): Expression {
    const { name, modifier } = splitKey(key);
    const param = this.deps.definitions.getSearchParameter(resourceType, name);

    if (modifier === 'missing') {
      const v = value.trim().toLowerCase();
      if (v !== 'true' && v !== 'false') {
        throw new BadRequestError(`The ':missing' modifier requires 'true' or 'false', got '${value}'.`, {
          parameter: name,
        });
      }
      return missingSearchParameter(param, v === 'true');
    }

    const values = splitSearchValues(value);
    const parsed = values.map((v) => this.parseValue(param, modifier, v));
    const [first, ...rest] = parsed;
    if (!first) throw new BadRequestError(`The search parameter '${name}' has no value.`);
    return searchParameter(param, or(first, ...rest));
  }

  parseInclude(resourceType: string, includeValue: string, reversed: boolean, iterate: boolean): IncludeExpression {
    const idx = includeValue.indexOf(':');
    if (idx < 0) {
      throw new InvalidSearchOperationError(
        `The ${reversed ? '_revinclude' : '_include'} value '${includeValue}' must specify a resource type and a search parameter.`,
      );
    }
    if (resourceType === ROOT_RESOURCE_TYPE) {
      throw new InvalidSearchOperationError('_include and _revinclude cannot be applied to a search across all resource types.');
    }

    const sourceResourceType = includeValue.slice(0, idx);
    const remainder = includeValue.slice(idx + 1);
    if (!this.deps.definitions.isKnownResourceType(sourceResourceType)) {
      throw new ResourceNotSupportedError(sourceResourceType);
    }

    if (remainder === '*') {
      return includeExpression({
        resourceType,
        sourceResourceType,
        referencedTypes: reversed ? [sourceResourceType] : this.wildcardTargets(sourceResourceType),
        wildCard: true,
        reversed,
        iterate,
      });
    }

    const targetIdx = remainder.indexOf(':');
    const paramName = targetIdx < 0 ? remainder : remainder.slice(0, targetIdx);
    const targetResourceType = targetIdx < 0 ? undefined : remainder.slice(targetIdx + 1);

    const param = this.deps.definitions.getSearchParameter(sourceResourceType, paramName);
    if (param.type !== 'reference') {
      throw new BadRequestError(`The search parameter '${paramName}' is not a reference and cannot be included.`, {
        parameter: paramName,
      });
    }
    if (targetResourceType !== undefined && !param.targetResourceTypes.includes(targetResourceType)) {
      throw new BadRequestError(
        `The target type '${targetResourceType}' is not valid for search parameter '${sourceResourceType}:${paramName}'.`,
        { parameter: paramName, targetResourceType },
      );
    }

    return includeExpression({
      resourceType,
      sourceResourceType,
      referenceSearchParameter: param,
      ...(targetResourceType ? { targetResourceType } : {}),
      reversed,
      iterate,
    });
  }

  private wildcardTargets(sourceResourceType: string): string[] {
    const out = new Set<string>();
    for (const p of this.deps.definitions.getSearchParameters(sourceResourceType)) {
      if (p.type !== 'reference') continue;
      for (const t of p.targetResourceTypes) out.add(t);
    }
    return [...out].sort((a, b) => a.localeCompare(b));
  }

  private parseValue(param: SearchParameterInfo, modifier: string | undefined, value: string): Expression {
    if (value === '') throw new BadRequestError(`The search parameter '${param.name}' has an empty value.`);

    switch (param.type) {
      case 'string':
        return this.parseString(param, modifier, value);
      case 'token':
        if (modifier !== undefined) unsupportedModifier(param, modifier);
        return this.parseToken(value);
      case 'reference':
        return this.parseReference(param, modifier, value);
      case 'number':
        if (modifier !== undefined) unsupportedModifier(param, modifier);
        return this.parseNumber(param, value);
      case 'date':
        if (modifier !== undefined) unsupportedModifier(param, modifier);
        return this.parseDate(param, value);
      case 'uri':
        if (modifier === 'below') return stringExpression('startsWith', 'uri', value, false);
        if (modifier !== undefined) unsupportedModifier(param, modifier);
        return stringEquals('uri', value, false);
      case 'quantity':
      case 'composite':
      case 'special':
        throw new SearchParameterNotSupportedError(
          `Search parameters of type '${param.type}' are not supported ('${param.name}').`,
          { parameter: param.name, type: param.type },
        );
    }
  }

  private parseString(param: SearchParameterInfo, modifier: string | undefined, value: string): Expression {
    if (modifier === undefined) return stringExpression('startsWith', 'string', value, true);
    if (modifier === 'exact') return stringEquals('string', value, false);
    if (modifier === 'contains') return stringExpression('contains', 'string', value, true);
    return unsupportedModifier(param, modifier);
  }

  private parseToken(value: string): Expression {
    const idx = value.indexOf('|');
    if (idx < 0) return stringEquals('tokenCode', value, false);

    const system = value.slice(0, idx);
    const code = value.slice(idx + 1);
    if (!system && !code) throw new BadRequestError(`The token value '${value}' is invalid.`);
    if (!system) return and(missingField('tokenSystem'), stringEquals('tokenCode', code, false));
    if (!code) return stringEquals('tokenSystem', system, false);
    return and(stringEquals('tokenSystem', system, false), stringEquals('tokenCode', code, false));
  }

  private parseReference(param: SearchParameterInfo, modifier: string | undefined, value: string): Expression {
    let type = modifier;
    let id = value;

    const slash = value.lastIndexOf('/');
    if (slash > 0) {
      const prefix = value.slice(0, slash);
      const candidate = prefix.slice(prefix.lastIndexOf('/') + 1);
      if (this.deps.definitions.isKnownResourceType(candidate)) {
        if (type !== undefined && type !== candidate) {
          throw new BadRequestError(`The reference '${value}' does not match the type modifier '${type}'.`);
        }
        type = candidate;
        id = value.slice(slash + 1);
      }
    }

    if (!id) throw new BadRequestError(`The reference '${value}' is missing a resource id.`);

    if (type === undefined) return stringEquals('referenceResourceId', id, false);
    if (!param.targetResourceTypes.includes(type)) {
      throw new BadRequestError(`The type '${type}' is not a valid target of search parameter '${param.name}'.`, {
        parameter: param.name,
        type,
      });
    }
    return and(stringEquals('referenceResourceType', type, false), stringEquals('referenceResourceId', id, false));
  }

  private parseNumber(param: SearchParameterInfo, value: string): Expression {
    const { comparator, rest } = splitComparator(value);
    if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(rest)) {
      throw new BadRequestError(`The value '${value}' of search parameter '${param.name}' is not a valid number.`);
    }
    return binary(NUMBER_OPERATORS[comparator], 'number', Number(rest));
  }

  private parseDate(param: SearchParameterInfo, value: string): Expression {
    const { comparator, rest } = splitComparator(value);
    const range = parseDateTimeRange(rest);
    if (!range) {
      throw new BadRequestError(`The value '${value}' of search parameter '${param.name}' is not a valid date.`);
    }

    switch (comparator) {
      case 'eq':
        return and(
          binary('greaterThanOrEqual', 'dateTimeStart', range.start),
          binary('lessThanOrEqual', 'dateTimeEnd', range.end),
        );
      case 'ne':
        return or(binary('lessThan', 'dateTimeStart', range.start), binary('greaterThan', 'dateTimeEnd', range.end));
      case 'gt':
        return binary('greaterThan', 'dateTimeEnd', range.end);
      case 'ge':
        return binary('greaterThanOrEqual', 'dateTimeEnd', range.start);
      case 'lt':
        return binary('lessThan', 'dateTimeStart', range.start);
      case 'le':
        return binary('lessThanOrEqual', 'dateTimeStart', range.end);
    }
  }
}
