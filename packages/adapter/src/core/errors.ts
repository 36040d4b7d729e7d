/**
 * Error classes for the adapter. Translation problems inside a request are
 * diagnostics, not errors; these cover what must stop the caller.
 */

export class AdapterSettingsError extends Error {
  cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "AdapterSettingsError";
    this.cause = cause;
  }
}

export class RequestValidationError extends Error {
  cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "RequestValidationError";
    this.cause = cause;
  }
}
