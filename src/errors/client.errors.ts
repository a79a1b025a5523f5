/**
 * Base class for every error the client hands back to callers or publishes
 * on the `error` lifecycle event. `code` is machine-readable; server errors
 * carry the server's own code verbatim.
 */
export class ClientError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

/** A request's deadline elapsed with no response. */
export class RequestTimeoutError extends ClientError {
  constructor(message: string) {
    super('TIMEOUT', message);
    this.name = 'RequestTimeoutError';
  }
}

/** No usable connection, or the connection was lost while the request was outstanding. */
export class DisconnectedError extends ClientError {
  constructor(message = 'Not connected') {
    super('DISCONNECTED', message);
    this.name = 'DisconnectedError';
  }
}

/** A response frame reporting failure. */
export class ServerError extends ClientError {
  constructor(code: string, message: string, details?: unknown) {
    super(code, message, details);
    this.name = 'ServerError';
  }
}

export class ProtocolError extends ClientError {
  constructor(message: string, raw?: string) {
    super('PROTOCOL_ERROR', message, raw === undefined ? undefined : { raw });
    this.name = 'ProtocolError';
  }
}

/** Login attempt rejected by the server (or impossible to perform). */
export class AuthError extends ClientError {
  constructor(message: string, details?: unknown) {
    super('AUTH_FAILED', message, details);
    this.name = 'AuthError';
  }
}

/** Call refused locally because the session was revoked and no fresh login succeeded yet. */
export class AuthorizationError extends ClientError {
  constructor(message: string) {
    super('UNAUTHORIZED', message);
    this.name = 'AuthorizationError';
  }
}

export class ConnectError extends ClientError {
  constructor(message: string, details?: unknown) {
    super('CONNECT_FAILED', message, details);
    this.name = 'ConnectError';
  }
}

export class ReconnectAttemptError extends ClientError {
  constructor(
    readonly attempt: number,
    cause: unknown,
  ) {
    super('RECONNECT_FAILED', `Reconnect attempt ${attempt} failed: ${describeError(cause)}`, {
      cause: toError(cause),
    });
    this.name = 'ReconnectAttemptError';
  }
}

export class ConfigError extends ClientError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
