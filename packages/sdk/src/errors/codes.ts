/**
 * Stable error codes carried by every ArgError.
 */

export const ErrorCode = {
  // Schema (initialization time)
  SCHEMA_ERROR: "SCHEMA_ERROR",
  DUPLICATE_NAME: "DUPLICATE_NAME",
  MISSING_OPTION_NAME: "MISSING_OPTION_NAME",
  CAPACITY_EXCEEDED: "CAPACITY_EXCEEDED",
  UNKNOWN_VALUE_KIND: "UNKNOWN_VALUE_KIND",

  // Configuration
  CONFIG_ERROR: "CONFIG_ERROR",

  // Coercion
  CANNOT_PARSE_ARG_TO_VALUE: "CANNOT_PARSE_ARG_TO_VALUE",
  INVALID_NUMBER: "INVALID_NUMBER",
  NUMBER_OUT_OF_RANGE: "NUMBER_OUT_OF_RANGE",

  // Validation
  INVALID_VALUE: "INVALID_VALUE",

  // Arity
  EXPECTED_MORE_VALUES: "EXPECTED_MORE_VALUES",
  MISSING_SUB_COMMAND: "MISSING_SUB_COMMAND",
  TOO_MANY_VALUES: "TOO_MANY_VALUES",
  EMPTY_OPTION_ARGUMENT: "EMPTY_OPTION_ARGUMENT",

  // Classification
  UNEXPECTED_ARGUMENT: "UNEXPECTED_ARGUMENT",
  UNKNOWN_OPTION: "UNKNOWN_OPTION",

  // Access
  VALUE_NOT_SET: "VALUE_NOT_SET",
  REQUESTED_TYPE_MISMATCH: "REQUESTED_TYPE_MISMATCH",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];
