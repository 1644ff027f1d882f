import test from 'node:test';
import assert from 'node:assert/strict';

import { createSearchEngine } from '../../src/engine/createSearchEngine.js';
import { SearchConfigError } from '../../src/search/errors.js';
import { silentLogger } from '../../src/logger.js';

test('createSearchEngine: compiles and linearizes with the bundled definitions', () => {
  const engine = createSearchEngine({ config: { maxItemCountPerSearch: 100 }, logger: silentLogger() });
  assert.equal(engine.config.maxItemCountPerSearch, 100);
  assert.equal(engine.definitions.isKnownResourceType('Patient'), true);

  const { options, plan } = engine.plan({
    resourceType: 'Patient',
    queryParameters: [
      ['_include', 'Patient:organization'],
      ['_count', '25'],
    ],
  });
  assert.equal(options.maxItemCount, 25);
  assert.deepEqual(
    plan.tableExpressions.map((t) => t.kind),
    ['all', 'top', 'include', 'includeLimit', 'includeUnionAll'],
  );
});

test('createSearchEngine: the include generator reaches the plan', () => {
  const includeGenerator = { name: 'custom-include' };
  const engine = createSearchEngine({ includeGenerator, logger: silentLogger() });
  const { plan } = engine.plan({ resourceType: 'Patient', queryParameters: [['_include', 'Patient:organization']] });
  assert.equal(plan.tableExpressions[2]?.queryGenerator, includeGenerator);
});

test('createSearchEngine: invalid configuration fails at construction', () => {
  assert.throws(() => createSearchEngine({ config: { defaultItemCountPerSearch: 0 } }), SearchConfigError);
});
