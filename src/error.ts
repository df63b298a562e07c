/**
 * Kinds of failure the HTTP transport can report
 *
 * Construction errors (rejecting `build()`):
 * - ClientBuilderError: the client strategy failed or cannot be used
 * - ReactorError: the standalone event loop could not be set up
 *
 * Per-call errors (rejecting `send()`):
 * - HttpError: server did not answer 200 OK
 * - NetworkError: the request or the response stream failed
 * - NotListening: the dispatch side no longer accepts requests
 * - DiedWithoutResponse: the dispatch side accepted a request but never answered it
 * - Aborted: the caller gave up on the call
 */
export type HttpTransportErrorKind =
  | 'ClientBuilderError'
  | 'ReactorError'
  | 'InvalidUri'
  | 'HttpError'
  | 'NetworkError'
  | 'NotListening'
  | 'DiedWithoutResponse'
  | 'Aborted';

/**
 * Plain representation of an error, safe to post between threads
 */
export interface SerializedHttpTransportError {
  kind: HttpTransportErrorKind;
  message: string;
  status?: number;
  cause?: string;
}

const KINDS: readonly HttpTransportErrorKind[] = [
  'ClientBuilderError',
  'ReactorError',
  'InvalidUri',
  'HttpError',
  'NetworkError',
  'NotListening',
  'DiedWithoutResponse',
  'Aborted',
];

/**
 * HTTP transport error
 * Extends Error with the failure kind, the HTTP status (for HttpError) and the cause
 */
export class HttpTransportError extends Error {
  readonly kind: HttpTransportErrorKind;
  readonly status?: number;

  constructor(
    kind: HttpTransportErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.kind = kind;
    this.status = options.status;
    this.name = 'HttpTransportError';

    // Maintain proper stack trace for debugging
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpTransportError);
    }
  }

  static isKind(value: unknown): value is HttpTransportErrorKind {
    return KINDS.some((kind) => kind === value);
  }

  static clientBuilder(cause: unknown): HttpTransportError {
    return new HttpTransportError(
      'ClientBuilderError',
      `Failed to create the HTTP client: ${describeCause(cause)}`,
      { cause }
    );
  }

  static reactor(message: string, cause?: unknown): HttpTransportError {
    return new HttpTransportError('ReactorError', `Error with the event loop: ${message}`, {
      cause,
    });
  }

  static invalidUri(uri: string, cause?: unknown): HttpTransportError {
    return new HttpTransportError('InvalidUri', `Invalid URI: ${uri}`, { cause });
  }

  static http(status: number): HttpTransportError {
    return new HttpTransportError('HttpError', `Http error. Status code ${status}`, { status });
  }

  static network(cause: unknown): HttpTransportError {
    return new HttpTransportError('NetworkError', `Network error: ${describeCause(cause)}`, {
      cause,
    });
  }

  static notListening(): HttpTransportError {
    return new HttpTransportError('NotListening', 'Not listening for requests');
  }

  static diedWithoutResponse(): HttpTransportError {
    return new HttpTransportError('DiedWithoutResponse', 'Died without returning response');
  }

  static aborted(reason?: unknown): HttpTransportError {
    return new HttpTransportError('Aborted', 'Request aborted', { cause: reason });
  }

  /**
   * Rebuild an error posted from another thread
   */
  static fromJSON(data: SerializedHttpTransportError): HttpTransportError {
    return new HttpTransportError(data.kind, data.message, {
      status: data.status,
      cause: data.cause,
    });
  }

  /**
   * Convert to a structured-cloneable object
   */
  toJSON(): SerializedHttpTransportError {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.status !== undefined && { status: this.status }),
      ...(this.cause !== undefined && { cause: describeCause(this.cause) }),
    };
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
