/**
 * Error taxonomy for the query client.
 *
 * Every failure surfaced to callers is a {@link QueryClientError} subclass with a
 * stable `code`, so callers can branch without string matching.
 */

export type ErrorCode =
  | "INVALID_ARGUMENT"
  | "CONNECTION_ERROR"
  | "QUERY_ERROR"
  | "DECODE_ERROR"
  | "TYPE_MISMATCH";

export abstract class QueryClientError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** A request was rejected locally, before anything went over the wire. */
export class InvalidArgumentError extends QueryClientError {
  readonly code = "INVALID_ARGUMENT" as const;
}

/** Network, TLS, timeout or cancellation failure in the transport. */
export class ConnectionError extends QueryClientError {
  readonly code = "CONNECTION_ERROR" as const;
}

/** The server answered with a gRPC status other than OK. */
export class QueryError extends QueryClientError {
  readonly code = "QUERY_ERROR" as const;

  constructor(
    message: string,
    readonly grpcStatus: number,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** A reply could not be decoded, or is missing a structurally required part. */
export class DecodeError extends QueryClientError {
  readonly code = "DECODE_ERROR" as const;

  constructor(
    message: string,
    readonly path: string = "",
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** A decoded object does not fit the shape the caller asked to receive. */
export class TypeMismatchError extends QueryClientError {
  readonly code = "TYPE_MISMATCH" as const;

  constructor(
    message: string,
    readonly field: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}
