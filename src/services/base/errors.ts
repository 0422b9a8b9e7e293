export class AuditError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'AuditError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AuditError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

export interface PageFetchDetails {
  resource: string;
  url: string;
  attempts: number;
  status?: number;
}

export class PageFetchError extends AuditError {
  public readonly resource: string;
  public readonly url: string;
  public readonly attempts: number;
  public readonly status?: number;

  constructor(message: string, details: PageFetchDetails, cause?: Error, code: string = 'PAGE_FETCH_FAILED') {
    super(message, code, cause);
    this.name = 'PageFetchError';
    this.resource = details.resource;
    this.url = details.url;
    this.attempts = details.attempts;
    this.status = details.status;
  }
}

export class RateLimitError extends PageFetchError {
  constructor(message: string, details: PageFetchDetails, cause?: Error) {
    super(message, details, cause, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

export class MalformedPayloadError extends AuditError {
  constructor(message: string, cause?: Error) {
    super(message, 'MALFORMED_PAYLOAD', cause);
    this.name = 'MalformedPayloadError';
  }
}

export class DirectoryFetchError extends AuditError {
  constructor(message: string, cause?: Error) {
    super(message, 'DIRECTORY_FETCH_FAILED', cause);
    this.name = 'DirectoryFetchError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
