export class SearchError extends Error {
  readonly code: string;
  readonly httpStatus: number;
  readonly details?: unknown;

  constructor(message: string, opts: { code: string; httpStatus: number; details?: unknown }) {
    super(message);
    this.name = 'SearchError';
    this.code = opts.code;
    this.httpStatus = opts.httpStatus;
    this.details = opts.details;
  }
}

export class BadRequestError extends SearchError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'bad_request', httpStatus: 400, details });
    this.name = 'BadRequestError';
  }
}

export class ResourceNotSupportedError extends SearchError {
  readonly resourceType: string;

  constructor(resourceType: string) {
    super(`The requested "${resourceType}" resource type is not supported.`, {
      code: 'resource_not_supported',
      httpStatus: 400,
      details: { resourceType },
    });
    this.name = 'ResourceNotSupportedError';
    this.resourceType = resourceType;
  }
}

export class InvalidSearchOperationError extends SearchError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'invalid_search_operation', httpStatus: 400, details });
    this.name = 'InvalidSearchOperationError';
  }
}

export class SearchOperationNotSupportedError extends SearchError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'search_operation_not_supported', httpStatus: 400, details });
    this.name = 'SearchOperationNotSupportedError';
  }
}

// Recoverable: the compiler demotes the offending pair to the unsupported list.
export class SearchParameterNotSupportedError extends SearchError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'search_parameter_not_supported', httpStatus: 400, details });
    this.name = 'SearchParameterNotSupportedError';
  }
}

export class SearchDefinitionsError extends SearchError {
  readonly ajvErrors: unknown[];

  constructor(message: string, ajvErrors: unknown[] = [], details?: unknown) {
    super(message, { code: 'search_definitions_invalid', httpStatus: 500, details });
    this.name = 'SearchDefinitionsError';
    this.ajvErrors = ajvErrors;
  }
}

export class SearchConfigError extends SearchError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'search_config_invalid', httpStatus: 500, details });
    this.name = 'SearchConfigError';
  }
}

export function isSearchError(e: unknown): e is SearchError {
  return e instanceof SearchError;
}
