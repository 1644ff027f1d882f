export * from './http/createSearchApp.js';
export * from './http/queryPairs.js';
export * from './http/searchView.js';
export * from './middleware/errorHandler.js';
export * from './middleware/responseEnvelope.js';
export * from './routers/search.js';
