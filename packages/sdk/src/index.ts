// Types
export type {
  SetBehavior,
  ValueKindMap,
  BuiltinKind,
  IntegerKind,
  FloatKind,
  ParseFn,
  ValueDecl,
  ValueSchema,
  OptionSchema,
  CommandSchema,
} from "./types/schema.js";

export type { OutputSink } from "./types/sink.js";

// Errors
export {
  ArgError,
  SchemaError,
  ConfigError,
  ParseError,
  ValidationError,
  ArityError,
  ClassificationError,
  ValueAccessError,
} from "./errors/base.js";
export type { ArgErrorOptions } from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
