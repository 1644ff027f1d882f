import type { SearchParameterInfo } from '../definitions/types.js';
import { BadRequestError } from '../search/errors.js';
import type {
  BinaryExpression,
  BinaryOperator,
  CompartmentSearchExpression,
  Expression,
  FieldName,
  IncludeExpression,
  MissingFieldExpression,
  MissingSearchParameterExpression,
  MultiaryExpression,
  MultiaryOperator,
  NonEmptyArray,
  SearchParameterExpression,
  StringExpression,
  StringOperator,
} from './types.js';

export function searchParameter(parameter: SearchParameterInfo, expression: Expression): SearchParameterExpression {
  const e: SearchParameterExpression = { kind: 'searchParameter', parameter, expression };
  return Object.freeze(e);
}

export function stringExpression(
  operator: StringOperator,
  fieldName: FieldName,
  value: string,
  ignoreCase: boolean,
  componentIndex?: number,
): StringExpression {
  const e: StringExpression = {
    kind: 'string',
    operator,
    fieldName,
    value,
    ignoreCase,
    ...(componentIndex !== undefined ? { componentIndex } : {}),
  };
  return Object.freeze(e);
}

export function stringEquals(fieldName: FieldName, value: string, ignoreCase: boolean, componentIndex?: number) {
  return stringExpression('equals', fieldName, value, ignoreCase, componentIndex);
}

export function binary(
  operator: BinaryOperator,
  fieldName: FieldName,
  value: number | string,
  componentIndex?: number,
): BinaryExpression {
  const e: BinaryExpression = {
    kind: 'binary',
    operator,
    fieldName,
    value,
    ...(componentIndex !== undefined ? { componentIndex } : {}),
  };
  return Object.freeze(e);
}

export function missingField(fieldName: FieldName): MissingFieldExpression {
  const e: MissingFieldExpression = { kind: 'missingField', fieldName };
  return Object.freeze(e);
}

export function missingSearchParameter(
  parameter: SearchParameterInfo,
  isMissing: boolean,
): MissingSearchParameterExpression {
  const e: MissingSearchParameterExpression = { kind: 'missingSearchParameter', parameter, isMissing };
  return Object.freeze(e);
}

function multiary(operator: MultiaryOperator, expressions: NonEmptyArray<Expression>): Expression {
  if (expressions.length === 1) return expressions[0];
  const e: MultiaryExpression = { kind: 'multiary', operator, expressions };
  return Object.freeze(e);
}

/** Conjunction of the given expressions; a single expression is returned as is. */
export function and(...expressions: NonEmptyArray<Expression>): Expression {
  return multiary('and', expressions);
}

/** Disjunction of the given expressions; a single expression is returned as is. */
export function or(...expressions: NonEmptyArray<Expression>): Expression {
  return multiary('or', expressions);
}

export function compartmentSearch(compartmentType: string, compartmentId: string): CompartmentSearchExpression {
  const e: CompartmentSearchExpression = { kind: 'compartmentSearch', compartmentType, compartmentId };
  return Object.freeze(e);
}

export type IncludeExpressionInit = {
  resourceType: string;
  sourceResourceType: string;
  referenceSearchParameter?: SearchParameterInfo;
  targetResourceType?: string;
  referencedTypes?: readonly string[];
  wildCard?: boolean;
  reversed?: boolean;
  iterate?: boolean;
};

export function revIncludeTargetTypeNotSpecifiedMessage(value: string): string {
  return `The target type must be specified for the reversed iterate include '${value}' since its reference parameter has more than one target type.`;
}

export function includeExpression(init: IncludeExpressionInit): IncludeExpression {
  const reversed = init.reversed === true;
  const iterate = init.iterate === true;
  const wildCard = init.wildCard === true;
  const param = init.referenceSearchParameter;

  if (reversed && iterate && !init.targetResourceType && (param?.targetResourceTypes.length ?? 0) > 1) {
    throw new BadRequestError(revIncludeTargetTypeNotSpecifiedMessage(`${init.sourceResourceType}:${param?.name ?? '*'}`));
  }

  const referencedTypes = init.referencedTypes ?? param?.targetResourceTypes ?? [];

  const e: IncludeExpression = {
    kind: 'include',
    resourceType: init.resourceType,
    sourceResourceType: init.sourceResourceType,
    ...(param ? { referenceSearchParameter: param } : {}),
    ...(init.targetResourceType ? { targetResourceType: init.targetResourceType } : {}),
    referencedTypes: Object.freeze([...referencedTypes]),
    wildCard,
    reversed,
    iterate,
  };
  return Object.freeze(e);
}

/** Resource types an include step adds to the result set. */
export function producedResourceTypes(include: IncludeExpression): readonly string[] {
  if (include.reversed) return [include.sourceResourceType];
  if (include.targetResourceType) return [include.targetResourceType];
  return include.referencedTypes;
}

/** Resource types an iterate step reads from earlier steps; empty for non-iterate includes. */
export function requiredResourceTypes(include: IncludeExpression): readonly string[] {
  if (!include.iterate) return [];
  if (!include.reversed) return [include.sourceResourceType];
  if (include.targetResourceType) return [include.targetResourceType];
  return include.referencedTypes;
}

export function isIncludeExpression(e: Expression | undefined): e is IncludeExpression {
  return e?.kind === 'include';
}
