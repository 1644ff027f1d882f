import type { Request } from 'express';
import type { QueryParameter } from '@fhirquery/core';

/**
 * Raw query pairs in request order. `req.query` folds repeated keys into
 * arrays, so the search string is read again from the original URL.
 */
export function queryPairs(req: Pick<Request, 'originalUrl'>): QueryParameter[] {
  const url = new URL(req.originalUrl, 'http://localhost');
  return [...url.searchParams.entries()];
}
