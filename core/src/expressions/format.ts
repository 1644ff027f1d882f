import type { Expression, FieldName, IncludeExpression } from './types.js';

const FIELD_LABELS: Record<FieldName, string> = {
  tokenCode: 'TokenCode',
  tokenSystem: 'TokenSystem',
  string: 'String',
  number: 'Number',
  dateTimeStart: 'DateTimeStart',
  dateTimeEnd: 'DateTimeEnd',
  referenceResourceType: 'ReferenceResourceType',
  referenceResourceId: 'ReferenceResourceId',
  uri: 'Uri',
};

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function field(fieldName: FieldName, componentIndex: number | undefined): string {
  const label = FIELD_LABELS[fieldName];
  return componentIndex === undefined ? label : `[${componentIndex}].${label}`;
}

function quote(value: string): string {
  return `'${value.replace(/'/g, "\\'")}'`;
}

function formatInclude(e: IncludeExpression): string {
  const name = e.reversed ? 'RevInclude' : 'Include';
  const parts = [`${name}${e.iterate ? ':iterate' : ''}`, e.sourceResourceType];
  parts.push(e.wildCard ? '*' : (e.referenceSearchParameter?.name ?? '?'));
  if (e.targetResourceType) parts.push(e.targetResourceType);
  return `(${parts.join(' ')})`;
}

/** Renders an expression tree as a parenthesised, deterministic string. */
export function formatExpression(e: Expression): string {
  switch (e.kind) {
    case 'searchParameter':
      return `(Param ${e.parameter.name} ${formatExpression(e.expression)})`;
    case 'string':
      return `(String${capitalize(e.operator)}${e.ignoreCase ? 'IgnoreCase' : ''} ${field(e.fieldName, e.componentIndex)} ${quote(e.value)})`;
    case 'binary': {
      const value = typeof e.value === 'number' ? String(e.value) : quote(e.value);
      return `(${capitalize(e.operator)} ${field(e.fieldName, e.componentIndex)} ${value})`;
    }
    case 'missingField':
      return `(MissingField ${FIELD_LABELS[e.fieldName]})`;
    case 'missingSearchParameter':
      return `(${e.isMissing ? 'Missing' : 'NotMissing'}Param ${e.parameter.name})`;
    case 'multiary':
      return `(${capitalize(e.operator)} ${e.expressions.map(formatExpression).join(' ')})`;
    case 'compartmentSearch':
      return `(Compartment ${e.compartmentType} ${quote(e.compartmentId)})`;
    case 'include':
      return formatInclude(e);
  }
}
