import test from 'node:test';
import assert from 'node:assert/strict';

import { resolveSearchConfig } from '../../src/config/resolve.js';
import type { SearchConfig } from '../../src/config/types.js';
import { SearchParameterDefinitionManager } from '../../src/definitions/registry.js';
import { formatExpression } from '../../src/expressions/format.js';
import { SearchParameterExpressionParser, type ExpressionParser } from '../../src/expressions/parser.js';
import type { IncludeExpression } from '../../src/expressions/types.js';
import { silentLogger, type Logger } from '../../src/logger.js';
import { encodeContinuationToken } from '../../src/search/continuationToken.js';
import {
  BadRequestError,
  InvalidSearchOperationError,
  ResourceNotSupportedError,
  SearchOperationNotSupportedError,
} from '../../src/search/errors.js';
import { SearchOptionsFactory } from '../../src/search/searchOptionsFactory.js';
import type { QueryParameter, SearchOptions } from '../../src/search/types.js';

const definitions = SearchParameterDefinitionManager.fromFile();
const expressionParser = new SearchParameterExpressionParser({ definitions });

function createFactory(config: Partial<SearchConfig> = {}, logger: Logger = silentLogger()) {
  return new SearchOptionsFactory({ expressionParser, definitions, config: resolveSearchConfig(config), logger });
}

const factory = createFactory();

function rendered(options: SearchOptions): string | undefined {
  return options.expression ? formatExpression(options.expression) : undefined;
}

test('create: an empty request yields defaults and no expression', () => {
  const options = factory.create({});
  assert.equal(options.expression, undefined);
  assert.equal(options.continuationToken, undefined);
  assert.equal(options.maxItemCount, 10);
  assert.equal(options.includeCount, 10);
  assert.equal(options.countOnly, false);
  assert.equal(options.includeTotal, 'none');
  assert.deepEqual(options.sort, []);
  assert.deepEqual(options.unsupportedSearchParams, []);
  assert.deepEqual(options.unsupportedSortingParams, []);
  assert.ok(Object.isFrozen(options));
});

test('create: a single parameter is not wrapped in And', () => {
  const options = factory.create({ queryParameters: [['_id', 'abc']] });
  assert.deepEqual(options.expression, expressionParser.parse('DomainResource', '_id', 'abc'));
  assert.equal(rendered(options), "(Param _id (StringEquals TokenCode 'abc'))");
});

test('create: a resource type alone yields only the type constraint', () => {
  const options = factory.create({ resourceType: 'Patient' });
  assert.equal(rendered(options), "(Param _type (StringEquals TokenCode 'Patient'))");
});

test('create: combined expression follows accumulation order', () => {
  const options = factory.create({
    resourceType: 'MedicationRequest',
    compartmentType: 'Patient',
    compartmentId: 'p1',
    queryParameters: [
      ['_revinclude:iterate', 'MedicationDispense:prescription'],
      ['_include:iterate', 'MedicationRequest:patient'],
      ['_revinclude', 'MedicationDispense:prescription'],
      ['_include', 'MedicationRequest:patient'],
      ['status', 'active'],
      ['bogus', 'x'],
      ['intent', 'order'],
    ],
  });

  assert.equal(
    rendered(options),
    '(And' +
      " (Param _type (StringEquals TokenCode 'MedicationRequest'))" +
      " (Param status (StringEquals TokenCode 'active'))" +
      " (Param intent (StringEquals TokenCode 'order'))" +
      ' (Include MedicationRequest patient)' +
      ' (RevInclude MedicationDispense prescription)' +
      ' (Include:iterate MedicationRequest patient)' +
      ' (RevInclude:iterate MedicationDispense prescription)' +
      " (Compartment Patient 'p1'))",
  );
  assert.deepEqual(options.unsupportedSearchParams, [['bogus', 'x']]);
});

test('create: iterate keys are matched case-insensitively, including :recurse', () => {
  const options = factory.create({
    resourceType: 'Organization',
    queryParameters: [
      ['_Include:Iterate', 'Organization:partof'],
      ['_include:recurse', 'Patient:organization'],
    ],
  });
  assert.equal(
    rendered(options),
    "(And (Param _type (StringEquals TokenCode 'Organization')) (Include:iterate Organization partof) (Include:iterate Patient organization))",
  );
  assert.deepEqual(options.unsupportedSearchParams, []);
});

test('create: continuation token is decoded and suppresses the default total', () => {
  const accurate = createFactory({ includeTotalInBundle: 'accurate' });
  assert.equal(accurate.create({}).includeTotal, 'accurate');

  const options = accurate.create({ queryParameters: [['ct', encodeContinuationToken('page-2')]] });
  assert.equal(options.continuationToken, 'page-2');
  assert.equal(options.includeTotal, 'none');
});

test('create: a second continuation token is an invalid operation', () => {
  assert.throws(
    () =>
      factory.create({
        queryParameters: [
          ['ct', 'cGFnZS0y'],
          ['ct', 'cGFnZS0z'],
        ],
      }),
    (e: unknown) =>
      e instanceof InvalidSearchOperationError && e.message === "More than one 'ct' query parameter is not allowed.",
  );
});

test('create: a malformed continuation token is a bad request', () => {
  assert.throws(
    () => factory.create({ queryParameters: [['ct', 'not base64!']] }),
    (e: unknown) => e instanceof BadRequestError && e.message === 'The continuation token is invalid.',
  );
});

test('create: _format is accepted and ignored', () => {
  const options = factory.create({ queryParameters: [['_format', 'json']] });
  assert.equal(options.expression, undefined);
  assert.deepEqual(options.unsupportedSearchParams, []);
});

test('create: empty keys and values go to the unsupported list', () => {
  const options = factory.create({
    resourceType: 'Patient',
    queryParameters: [
      ['', 'x'],
      ['name', ' '],
    ],
  });
  assert.deepEqual(options.unsupportedSearchParams, [
    ['', 'x'],
    ['name', ' '],
  ]);
  assert.equal(rendered(options), "(Param _type (StringEquals TokenCode 'Patient'))");
});

test('create: parameters of unsupported types are demoted, not fatal', () => {
  const query: QueryParameter[] = [
    ['value-quantity', '5'],
    ['code', 'abc'],
  ];
  const options = factory.create({ resourceType: 'Observation', queryParameters: query });
  assert.deepEqual(options.unsupportedSearchParams, [['value-quantity', '5']]);
  assert.equal(
    rendered(options),
    "(And (Param _type (StringEquals TokenCode 'Observation')) (Param code (StringEquals TokenCode 'abc')))",
  );
});

test('create: _total values', () => {
  assert.equal(factory.create({ queryParameters: [['_total', 'accurate']] }).includeTotal, 'accurate');
  assert.equal(factory.create({ queryParameters: [['_TOTAL', 'ACCURATE']] }).includeTotal, 'accurate');
  assert.equal(
    createFactory({ includeTotalInBundle: 'accurate' }).create({ queryParameters: [['_total', 'none']] }).includeTotal,
    'none',
  );
});

test('create: _total=estimate is not supported, in any case', () => {
  for (const value of ['estimate', 'Estimate', 'ESTIMATE']) {
    assert.throws(
      () => factory.create({ queryParameters: [['_total', value]] }),
      (e: unknown) =>
        e instanceof SearchOperationNotSupportedError &&
        e.message ===
          "The '_total' parameter value 'estimate' is not supported. The supported values are: 'accurate', 'none'.",
    );
  }
});

test('create: an estimate default policy is rejected too', () => {
  assert.throws(() => createFactory({ includeTotalInBundle: 'estimate' }).create({}), SearchOperationNotSupportedError);
});

test('create: an unknown _total value is a bad request', () => {
  assert.throws(
    () => factory.create({ queryParameters: [['_total', 'bogus']] }),
    (e: unknown) =>
      e instanceof BadRequestError &&
      e.message === "The '_total' parameter value 'bogus' is invalid. The supported values are: 'accurate', 'none'.",
  );
});

test('create: _count is bounded by the configured maximum', () => {
  assert.equal(factory.create({ queryParameters: [['_count', '50']] }).maxItemCount, 50);
  assert.throws(
    () => factory.create({ queryParameters: [['_count', '1001']] }),
    (e: unknown) =>
      e instanceof BadRequestError &&
      e.message === 'The count must be less than or equal to 1000. The specified count was 1001.',
  );
  assert.throws(
    () => createFactory({ maxItemCountPerSearch: 20 }).create({ queryParameters: [['_count', '21']] }),
    (e: unknown) =>
      e instanceof BadRequestError && e.message === 'The count must be less than or equal to 20. The specified count was 21.',
  );
});

test('create: a malformed _count is a bad request', () => {
  assert.throws(
    () => factory.create({ queryParameters: [['_count', 'abc']] }),
    (e: unknown) => e instanceof BadRequestError && e.message === "Invalid _count: 'abc' is not a non-negative integer",
  );
});

test('create: _summary=count sets countOnly', () => {
  assert.equal(factory.create({ queryParameters: [['_summary', 'count']] }).countOnly, true);
  assert.equal(factory.create({ queryParameters: [['_summary', 'data']] }).countOnly, false);
});

test('create: an unknown resource type is not supported', () => {
  assert.throws(
    () => factory.create({ resourceType: 'Spaceship' }),
    (e: unknown) =>
      e instanceof ResourceNotSupportedError && e.message === 'The requested "Spaceship" resource type is not supported.',
  );
});

test('create: compartment type and id are validated', () => {
  assert.throws(
    () => factory.create({ resourceType: 'Observation', compartmentType: 'Bogus', compartmentId: '1' }),
    (e: unknown) => e instanceof InvalidSearchOperationError && e.message === "Compartment type 'Bogus' is invalid.",
  );
  assert.throws(
    () => factory.create({ resourceType: 'Observation', compartmentType: 'Patient', compartmentId: ' ' }),
    (e: unknown) => e instanceof InvalidSearchOperationError && e.message === 'Compartment id is null or empty.',
  );
});

test('create: sort keeps sortable keys and reports the rest', () => {
  const options = factory.create({ resourceType: 'Patient', queryParameters: [['_sort', 'family,-name,shoe-size']] });

  assert.deepEqual(
    options.sort.map((s) => [s.parameter.name, s.order]),
    [['family', 'ascending']],
  );
  assert.deepEqual(options.unsupportedSortingParams, [
    { parameterName: 'name', reason: "The search parameter 'name' is not supported for sorting." },
    { parameterName: 'shoe-size', reason: "The search parameter 'shoe-size' is not supported for sorting." },
  ]);
});

test('create: common sortable parameters apply without a resource type', () => {
  const options = factory.create({ queryParameters: [['_sort', '-_lastUpdated']] });
  assert.deepEqual(
    options.sort.map((s) => [s.parameter.name, s.order]),
    [['_lastUpdated', 'descending']],
  );
  assert.deepEqual(options.unsupportedSortingParams, []);
});

test('create: iterate include with an unknown prefix type is not supported', () => {
  assert.throws(
    () => factory.create({ resourceType: 'Patient', queryParameters: [['_include:iterate', 'Spaceship:pilot']] }),
    ResourceNotSupportedError,
  );
});

test('create: reversed iterate include over a multi-target reference needs a target type', () => {
  assert.throws(
    () => factory.create({ resourceType: 'Patient', queryParameters: [['_revinclude:iterate', 'MedicationRequest:subject']] }),
    (e: unknown) =>
      e instanceof BadRequestError &&
      e.message ===
        "The target type must be specified for the reversed iterate include 'MedicationRequest:subject' since its reference parameter has more than one target type.",
  );

  const options = factory.create({
    resourceType: 'Patient',
    queryParameters: [['_revinclude:iterate', 'MedicationRequest:subject:Patient']],
  });
  assert.equal(
    rendered(options),
    "(And (Param _type (StringEquals TokenCode 'Patient')) (RevInclude:iterate MedicationRequest subject Patient))",
  );
});

test('create: include values on an unknown resource type are not supported', () => {
  const cases: QueryParameter[] = [
    ['_include', 'Foo:*'],
    ['_revinclude', 'Foo:*'],
    ['_include', 'Foo:subject'],
  ];
  for (const query of cases) {
    assert.throws(
      () => factory.create({ resourceType: 'Patient', queryParameters: [query] }),
      (e: unknown) =>
        e instanceof ResourceNotSupportedError && e.message === 'The requested "Foo" resource type is not supported.',
      query.join('='),
    );
  }
});

test('create: reversed iterate includes from a custom parser are checked for a target type', () => {
  const subject = definitions.getSearchParameter('MedicationRequest', 'subject');
  const lenientParser: ExpressionParser = {
    parse: (resourceType, key, value) => expressionParser.parse(resourceType, key, value),
    parseInclude: (resourceType, includeValue, reversed, iterate): IncludeExpression => ({
      kind: 'include',
      resourceType,
      sourceResourceType: includeValue.split(':')[0] ?? '',
      referenceSearchParameter: subject,
      referencedTypes: subject.targetResourceTypes,
      wildCard: false,
      reversed,
      iterate,
    }),
  };
  const lenient = new SearchOptionsFactory({
    expressionParser: lenientParser,
    definitions,
    config: resolveSearchConfig(),
    logger: silentLogger(),
  });

  assert.throws(
    () => lenient.create({ resourceType: 'Patient', queryParameters: [['_revinclude:iterate', 'MedicationRequest:subject']] }),
    (e: unknown) =>
      e instanceof BadRequestError &&
      e.message ===
        "The target type must be specified for the reversed iterate include 'MedicationRequest:subject' since its reference parameter has more than one target type.",
  );
});

test('create: include failures propagate', () => {
  assert.throws(
    () => factory.create({ resourceType: 'Patient', queryParameters: [['_include', 'Patient:name']] }),
    BadRequestError,
  );
  assert.throws(() => factory.create({ queryParameters: [['_include', 'Patient:organization']] }), InvalidSearchOperationError);
});

test('create: demoted parameters are logged', () => {
  const calls: unknown[][] = [];
  const logger: Logger = { info: (...args) => calls.push(args), warn: () => {}, error: () => {} };

  createFactory({}, logger).create({
    resourceType: 'Patient',
    queryParameters: [
      ['bogus', '1'],
      ['_sort', 'name'],
    ],
  });

  assert.deepEqual(calls, [
    [
      '[search] unsupported parameters ignored',
      { resourceType: 'Patient', searchParams: ['bogus'], sortParams: ['name'] },
    ],
  ]);
});
