/**
 * Error codes carried by FlagrouteError and its subclasses.
 */
export const ErrorCode = {
  // Configuration-time faults
  CONFIG_ERROR: "CONFIG_ERROR",
  FLAG_REDEFINED: "FLAG_REDEFINED",
  INVALID_FLAG_NAME: "INVALID_FLAG_NAME",
  INVALID_POSITIONAL_INDEX: "INVALID_POSITIONAL_INDEX",
  NOT_A_STRUCT: "NOT_A_STRUCT",
  BAD_FIELD_SPEC: "BAD_FIELD_SPEC",
  NESTED_FIELD: "NESTED_FIELD",
  FIELD_KIND_MISMATCH: "FIELD_KIND_MISMATCH",
  ACTION_ALREADY_SET: "ACTION_ALREADY_SET",
  SUBCOMMANDS_PRESENT: "SUBCOMMANDS_PRESENT",
  DUPLICATE_COMMAND: "DUPLICATE_COMMAND",
  EMPTY_COMMAND_NAME: "EMPTY_COMMAND_NAME",
  INVALID_HANDLER: "INVALID_HANDLER",

  // Parse failures
  PARSE_ERROR: "PARSE_ERROR",
  BAD_FLAG_SYNTAX: "BAD_FLAG_SYNTAX",
  UNDEFINED_FLAG: "UNDEFINED_FLAG",
  MISSING_FLAG_VALUE: "MISSING_FLAG_VALUE",
  INVALID_FLAG_VALUE: "INVALID_FLAG_VALUE",
  INVALID_POSITIONAL_VALUE: "INVALID_POSITIONAL_VALUE",
  MISSING_POSITIONAL_VALUE: "MISSING_POSITIONAL_VALUE",
  HELP_REQUESTED: "HELP_REQUESTED",

  // Value adapters
  VALUE_SYNTAX: "VALUE_SYNTAX",
  VALUE_RANGE: "VALUE_RANGE",

  VALIDATION_ERROR: "VALIDATION_ERROR",
  STATUS_ERROR: "STATUS_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
