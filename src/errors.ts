/**
 * Base class for every error raised by this package.
 */
export class WebsupportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WebsupportError';
  }
}

/**
 * Missing or invalid provider configuration. Never worth retrying.
 */
export class ConfigError extends WebsupportError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The request never produced a response: network failure or timeout.
 */
export class TransportError extends WebsupportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The caller aborted the request through its `AbortSignal`.
 */
export class CancelledError extends TransportError {
  constructor(options?: { cause?: unknown }) {
    super('Websupport: request was cancelled', options);
    this.name = 'CancelledError';
  }
}

/**
 * The API answered with a status other than the one the operation expects.
 */
export class RemoteError extends WebsupportError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(message);
    this.name = 'RemoteError';
  }
}

/**
 * The API answered with a body that is not the expected JSON shape.
 */
export class DecodeError extends WebsupportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
