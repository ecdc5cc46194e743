/** Failure categories a chat endpoint call can end in. */
export type EndpointErrorKind = 'timeout' | 'connection' | 'protocol' | 'malformed';

/**
 * Signal a failure that may clear up on its own (deadline exceeded, refused or reset
 * connection). The only category that is retried.
 */
export class TransientNetworkError extends Error {
  readonly kind: 'timeout' | 'connection';

  constructor(kind: 'timeout' | 'connection', message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'TransientNetworkError';
    this.kind = kind;
  }
}

/**
 * Signal that the endpoint answered with a non-2xx status.
 *
 * @param status - HTTP status returned by the endpoint.
 * @param bodyPreview - First characters of the error body, for logs.
 */
export class ProtocolError extends Error {
  readonly kind = 'protocol' as const;

  constructor(
    readonly status: number,
    readonly bodyPreview: string,
  ) {
    super(`Endpoint responded with HTTP ${status}${bodyPreview ? `: ${bodyPreview}` : ''}`);
    this.name = 'ProtocolError';
  }
}

/** Signal that a 2xx body was not JSON or carried no generated text. */
export class MalformedResponseError extends Error {
  readonly kind = 'malformed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export type EndpointError = TransientNetworkError | ProtocolError | MalformedResponseError;

export function isTransientNetworkError(error: unknown): error is TransientNetworkError {
  return error instanceof TransientNetworkError;
}

export function isEndpointError(error: unknown): error is EndpointError {
  return (
    error instanceof TransientNetworkError ||
    error instanceof ProtocolError ||
    error instanceof MalformedResponseError
  );
}
