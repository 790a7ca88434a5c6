export interface FreshserviceErrorOptions {
  status?: number;
  url?: string;
  cause?: unknown;
}

/**
 * A request to the Freshservice API that could not be completed.
 */
export class FreshserviceError extends Error {
  readonly status?: number;
  readonly url?: string;

  constructor(message: string, options: FreshserviceErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "FreshserviceError";
    this.status = options.status;
    this.url = options.url;
  }
}

/** Still rate limited (429) once every retry was spent. */
export class RateLimitError extends FreshserviceError {
  constructor(message: string, options: FreshserviceErrorOptions = {}) {
    super(message, { ...options, status: 429 });
    this.name = "RateLimitError";
  }
}

export class NotFoundError extends FreshserviceError {
  constructor(message: string, options: FreshserviceErrorOptions = {}) {
    super(message, { ...options, status: 404 });
    this.name = "NotFoundError";
  }
}
