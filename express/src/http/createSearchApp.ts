import express, { type Express } from 'express';
import { defaultLogger, type Logger, type QueryGenerator, type SearchOptionsFactory } from '@fhirquery/core';

import { searchErrorHandler } from '../middleware/errorHandler.js';
import { responseEnvelope } from '../middleware/responseEnvelope.js';
import { createSearchRouter } from '../routers/search.js';

export type SearchAppOptions = {
  factory: SearchOptionsFactory;
  basePath?: string;
  logger?: Logger;
  includeGenerator?: QueryGenerator;
};

export function createSearchApp(opts: SearchAppOptions): Express {
  const app = express();
  const basePath = opts.basePath ?? '';
  const logger = opts.logger ?? defaultLogger();

  app.use(responseEnvelope);

  app.get(`${basePath}/health`, (_req, res) => res.ok({ ok: true }));
  app.use(
    basePath || '/',
    createSearchRouter({
      factory: opts.factory,
      ...(opts.includeGenerator ? { includeGenerator: opts.includeGenerator } : {}),
    }),
  );

  app.use((_req, res) => res.fail({ code: 404, message: 'Not found', errors: { root: 'not_found' } }));
  app.use(searchErrorHandler(logger));

  return app;
}
