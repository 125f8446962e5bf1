/**
 * Error hierarchy for flag parsing and command dispatch.
 *
 * ConfigError and its subclasses are thrown while flags, structs and commands
 * are being registered. ParseError is returned by FlagSet.parse. Neither
 * crosses the App.exec boundary: the router turns them into a Status.
 */

import { ErrorCode } from "./codes.js";
import type { ErrorCodeValue } from "./codes.js";

export class FlagrouteError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeValue,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FlagrouteError";
  }
}

export class ConfigError extends FlagrouteError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: ErrorCodeValue },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/**
 * A flag or positional entry could not be registered
 * (duplicate name, malformed name, negative index).
 */
export class FlagDefinitionError extends ConfigError {
  constructor(
    public readonly flagName: string,
    message: string,
    code: ErrorCodeValue = ErrorCode.FLAG_REDEFINED,
  ) {
    super(message, { code });
    this.name = "FlagDefinitionError";
  }
}

export class StructBindingError extends ConfigError {
  public readonly field: string | undefined;

  constructor(
    message: string,
    options?: { cause?: unknown; code?: ErrorCodeValue; field?: string },
  ) {
    super(message, { cause: options?.cause, code: options?.code ?? ErrorCode.BAD_FIELD_SPEC });
    this.name = "StructBindingError";
    this.field = options?.field;
  }
}

export class CommandTreeError extends ConfigError {
  constructor(
    public readonly commandPath: string,
    message: string,
    code: ErrorCodeValue,
  ) {
    super(message, { code });
    this.name = "CommandTreeError";
  }
}

export class ParseError extends FlagrouteError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: ErrorCodeValue },
  ) {
    super(message, options?.code ?? ErrorCode.PARSE_ERROR, options);
    this.name = "ParseError";
  }
}

/** Thrown by Value.set when the text does not parse as the value's type. */
export class ValueSyntaxError extends FlagrouteError {
  constructor(
    public readonly input: string,
    message: string,
    code: ErrorCodeValue = ErrorCode.VALUE_SYNTAX,
  ) {
    super(message, code);
    this.name = "ValueSyntaxError";
  }
}

export class ValidationError extends FlagrouteError {
  constructor(
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCode.VALIDATION_ERROR, options);
    this.name = "ValidationError";
  }
}

/** True when err is the help request produced for an undefined -h / -help flag. */
export function isHelpRequested(err: unknown): boolean {
  return err instanceof ParseError && err.code === ErrorCode.HELP_REQUESTED;
}
