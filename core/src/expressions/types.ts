import type { SearchParameterInfo } from '../definitions/types.js';

export type FieldName =
  | 'tokenCode'
  | 'tokenSystem'
  | 'string'
  | 'number'
  | 'dateTimeStart'
  | 'dateTimeEnd'
  | 'referenceResourceType'
  | 'referenceResourceId'
  | 'uri';

export type StringOperator = 'equals' | 'startsWith' | 'contains' | 'endsWith';

export type BinaryOperator =
  | 'equal'
  | 'notEqual'
  | 'greaterThan'
  | 'greaterThanOrEqual'
  | 'lessThan'
  | 'lessThanOrEqual';

export type MultiaryOperator = 'and' | 'or';

export type NonEmptyArray<T> = readonly [T, ...T[]];

export type SearchParameterExpression = {
  readonly kind: 'searchParameter';
  readonly parameter: SearchParameterInfo;
  readonly expression: Expression;
};

export type StringExpression = {
  readonly kind: 'string';
  readonly operator: StringOperator;
  readonly fieldName: FieldName;
  readonly componentIndex?: number;
  readonly value: string;
  readonly ignoreCase: boolean;
};

export type BinaryExpression = {
  readonly kind: 'binary';
  readonly operator: BinaryOperator;
  readonly fieldName: FieldName;
  readonly componentIndex?: number;
  readonly value: number | string;
};

export type MissingFieldExpression = {
  readonly kind: 'missingField';
  readonly fieldName: FieldName;
};

export type MissingSearchParameterExpression = {
  readonly kind: 'missingSearchParameter';
  readonly parameter: SearchParameterInfo;
  readonly isMissing: boolean;
};

export type MultiaryExpression = {
  readonly kind: 'multiary';
  readonly operator: MultiaryOperator;
  readonly expressions: NonEmptyArray<Expression>;
};

export type CompartmentSearchExpression = {
  readonly kind: 'compartmentSearch';
  readonly compartmentType: string;
  readonly compartmentId: string;
};

export type IncludeExpression = {
  readonly kind: 'include';
  /** Resource type the search runs against. */
  readonly resourceType: string;
  /** Resource type that owns the reference. */
  readonly sourceResourceType: string;
  /** Absent for wildcard includes. */
  readonly referenceSearchParameter?: SearchParameterInfo;
  readonly targetResourceType?: string;
  /** Types this include may pull in through its reference. */
  readonly referencedTypes: readonly string[];
  readonly wildCard: boolean;
  readonly reversed: boolean;
  readonly iterate: boolean;
};

export type Expression =
  | SearchParameterExpression
  | StringExpression
  | BinaryExpression
  | MissingFieldExpression
  | MissingSearchParameterExpression
  | MultiaryExpression
  | CompartmentSearchExpression
  | IncludeExpression;

export type ExpressionKind = Expression['kind'];
