/**
 * Server error model — base and concrete error types.
 * Transport-independent. Nothing here touches sockets.
 */

/** Optional metadata attached to server errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all server errors. Preserves prototype chain for instanceof. */
export class ServerError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A configuration value or other input failed validation. */
export class ValidationError extends ServerError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** A contract between two components was broken by the caller. */
export class InvariantViolation extends ServerError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** The request head could not be parsed. The connection is abandoned. */
export class ProtocolError extends ServerError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** The peer closed the connection before a complete request arrived. */
export class ConnectionClosedError extends ServerError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Opening, binding or listening on the endpoint failed. */
export class ListenError extends ServerError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}
