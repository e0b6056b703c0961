export interface SapiErrorOptions {
  status?: number;
  errorCode?: number;
  extras?: Record<string, unknown>;
  cause?: unknown;
}

export class SapiError extends Error {
  readonly status?: number;
  readonly errorCode?: number;
  readonly extras?: Record<string, unknown>;

  constructor(message: string, options: SapiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.status = options.status;
    this.errorCode = options.errorCode;
    this.extras = options.extras;
  }
}

// Raised before anything is sent.
export class RequestValidationError extends SapiError {}

export class SapiRequestError extends SapiError {}

export class RequestTimeoutError extends SapiRequestError {}

export class ResourceBadRequestError extends SapiRequestError {}

export class ResourceAuthenticationError extends SapiRequestError {}

export class ResourceAccessForbiddenError extends SapiRequestError {}

export class ResourceNotFoundError extends SapiRequestError {}

export class ResponseDecodingError extends SapiError {}
