export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Non-success answer from a remote endpoint. `statusCode` is 0 when the request
 * never produced an HTTP response (timeout, DNS failure, reset connection).
 */
export class RemoteApiError extends Error {
  readonly endpoint: string;
  readonly statusCode: number;
  readonly body: string;

  constructor(endpoint: string, statusCode: number, body: string) {
    super(`[remote api] ${endpoint} · HTTP ${statusCode}`);
    this.name = 'RemoteApiError';
    this.endpoint = endpoint;
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}
