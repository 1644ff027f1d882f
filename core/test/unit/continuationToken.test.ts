import test from 'node:test';
import assert from 'node:assert/strict';

import {
  decodeContinuationToken,
  encodeContinuationToken,
  INVALID_CONTINUATION_TOKEN_MESSAGE,
} from '../../src/search/continuationToken.js';
import { BadRequestError } from '../../src/search/errors.js';

test('decodeContinuationToken: decodes base64 to UTF-8 text', () => {
  assert.equal(decodeContinuationToken('cGFnZS0y'), 'page-2');
  assert.equal(decodeContinuationToken(encodeContinuationToken('{"id":42}')), '{"id":42}');
});

test('decodeContinuationToken: ignores whitespace inside the value', () => {
  assert.equal(decodeContinuationToken(' cGFn\nZS0y '), 'page-2');
});

test('decodeContinuationToken: an empty value decodes to an empty token', () => {
  assert.equal(decodeContinuationToken(''), '');
});

test('decodeContinuationToken: rejects malformed base64', () => {
  for (const raw of ['abc', 'not-base64!', 'cGFnZS0y=']) {
    assert.throws(
      () => decodeContinuationToken(raw),
      (e: unknown) => e instanceof BadRequestError && e.message === INVALID_CONTINUATION_TOKEN_MESSAGE,
    );
  }
});
