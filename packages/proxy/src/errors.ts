export class ProxyConfigError extends Error {
  cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ProxyConfigError";
    this.cause = cause;
  }
}

/** The backend sent an event the proxy could not read. */
export class BackendStreamError extends Error {
  cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "BackendStreamError";
    this.cause = cause;
  }
}
