/**
 * Error hierarchy for schema initialization, parsing and value access.
 */

import { ErrorCode } from "./codes.js";

export interface ArgErrorOptions {
  cause?: Error;
  code?: ErrorCode;
  /** Name of the Command, Option or Value the failure belongs to. */
  argument?: string;
  /** The raw token being processed when the failure happened. */
  token?: string;
}

export class ArgError extends Error {
  public readonly argument?: string;
  public readonly token?: string;

  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: ArgErrorOptions,
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = "ArgError";
    this.argument = options?.argument;
    this.token = options?.token;
  }
}

/**
 * Thrown while a schema is initialized: duplicate sibling names, options
 * without any name, arity bounds outside the slot capacity.
 */
export class SchemaError extends ArgError {
  constructor(message: string, options?: ArgErrorOptions) {
    super(message, options?.code ?? ErrorCode.SCHEMA_ERROR, options);
    this.name = "SchemaError";
  }
}

export class ConfigError extends ArgError {
  constructor(message: string, options?: ArgErrorOptions) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/**
 * A token could not be coerced to the target type.
 */
export class ParseError extends ArgError {
  constructor(message: string, options?: ArgErrorOptions) {
    super(message, options?.code ?? ErrorCode.CANNOT_PARSE_ARG_TO_VALUE, options);
    this.name = "ParseError";
  }
}

export class ValidationError extends ArgError {
  constructor(message: string, options?: ArgErrorOptions) {
    super(message, options?.code ?? ErrorCode.INVALID_VALUE, options);
    this.name = "ValidationError";
  }
}

/**
 * Wrong number of arguments: a mandatory Value or sub-Command was not
 * supplied, a positional token found no free Value, or an Option is
 * missing its argument.
 */
export class ArityError extends ArgError {
  constructor(message: string, code: ErrorCode, options?: ArgErrorOptions) {
    super(message, code, options);
    this.name = "ArityError";
  }
}

export class ClassificationError extends ArgError {
  constructor(message: string, code: ErrorCode, options?: ArgErrorOptions) {
    super(message, code, options);
    this.name = "ClassificationError";
  }
}

/**
 * Reading a Value that holds nothing, or reading it as the wrong kind.
 */
export class ValueAccessError extends ArgError {
  constructor(message: string, code: ErrorCode, options?: ArgErrorOptions) {
    super(message, code, options);
    this.name = "ValueAccessError";
  }
}
