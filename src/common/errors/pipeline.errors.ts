import { ErrorCode, type FetchErrorKind } from "../types/error-handling";
import type { DataType, DateKey } from "../types/core";

export interface FetchErrorContext {
  dataType: DataType;
  date: DateKey;
  status?: number;
  cause?: unknown;
}

/**
 * Base class for every failure of a single (data type, date) read.
 * The `kind` tag is what the retry policy looks at.
 */
export abstract class FetchError extends Error {
  abstract readonly kind: FetchErrorKind;
  readonly dataType: DataType;
  readonly date: DateKey;
  readonly status?: number;

  constructor(
    message: string,
    readonly code: ErrorCode,
    context: FetchErrorContext
  ) {
    super(message, { cause: context.cause });
    this.name = new.target.name;
    this.dataType = context.dataType;
    this.date = context.date;
    this.status = context.status;
  }
}

/** Network failure, timeout, throttling or a server-side error. Retried. */
export class NetworkError extends FetchError {
  readonly kind = "transient";
}

/** The source refused the request (bad request, not found, forbidden). Not retried. */
export class SourceError extends FetchError {
  readonly kind = "fatal";
}

/** The response body did not have the expected shape. Not retried. */
export class ParseError extends FetchError {
  readonly kind = "malformed";
}

/**
 * Invalid run parameters. The only failure that stops a whole run.
 */
export class ConfigurationError extends Error {
  readonly code = ErrorCode.CONFIGURATION_ERROR;

  constructor(readonly errors: string[]) {
    super(`Invalid configuration: ${errors.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

export function isTransientFetchError(error: unknown): boolean {
  return isFetchError(error) && error.kind === "transient";
}
