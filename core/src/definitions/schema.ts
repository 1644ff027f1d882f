import { SEARCH_PARAM_TYPES } from './types.js';

// Search parameter definitions schema (draft 2020-12).
export const SEARCH_PARAMETER_DEFINITIONS_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    resourceTypes: {
      type: 'array',
      items: { type: 'string', pattern: '^[A-Z][A-Za-z0-9]*$' },
      uniqueItems: true,
    },
    searchParameters: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string', pattern: '^_?[A-Za-z][A-Za-z0-9-]*$' },
          url: { type: 'string', format: 'uri' },
          type: { type: 'string', enum: [...SEARCH_PARAM_TYPES] },
          base: { type: 'array', items: { type: 'string' }, minItems: 1 },
          target: { type: 'array', items: { type: 'string' } },
          sortable: { type: 'boolean' },
        },
        required: ['name', 'type', 'base'],
        additionalProperties: false,
      },
    },
  },
  required: ['resourceTypes', 'searchParameters'],
  additionalProperties: false,
} as const satisfies Record<string, unknown>;
