import express from 'express';
import type { NextFunction, Response, Router } from 'express';

import {
  buildSqlRootExpression,
  rewriteIncludes,
  type QueryGenerator,
  type SearchOptionsFactory,
  type SearchRequest,
} from '@fhirquery/core';

import { queryPairs } from '../http/queryPairs.js';
import { toPlanView, toSearchOptionsView } from '../http/searchView.js';

export type SearchRouterDeps = {
  factory: SearchOptionsFactory;
  includeGenerator?: QueryGenerator;
};

export function createSearchRouter(deps: SearchRouterDeps): Router {
  const router = express.Router();

  const explain = (request: SearchRequest, res: Response, next: NextFunction) => {
    try {
      const options = deps.factory.create(request);
      const plan = rewriteIncludes(
        buildSqlRootExpression(options, deps.includeGenerator ? { includeGenerator: deps.includeGenerator } : {}),
      );
      return res.ok({ searchOptions: toSearchOptionsView(options), plan: toPlanView(plan) });
    } catch (e) {
      return next(e);
    }
  };

  router.get('/', (req, res, next) => explain({ queryParameters: queryPairs(req) }, res, next));

  router.get('/:resourceType', (req, res, next) =>
    explain({ resourceType: req.params.resourceType, queryParameters: queryPairs(req) }, res, next),
  );

  router.get(
    '/:compartmentType/:compartmentId/:resourceType',
    (req, res, next) =>
      explain(
        {
          resourceType: req.params.resourceType,
          compartmentType: req.params.compartmentType,
          compartmentId: req.params.compartmentId,
          queryParameters: queryPairs(req),
        },
        res,
        next,
      ),
  );

  return router;
}
