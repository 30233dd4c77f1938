// Values
export { TypedValue } from "./values/typed-value.js";
export type { ValueDefaults } from "./values/typed-value.js";
export type { ValueVariant } from "./values/variant.js";
export { value } from "./values/value.js";
export { ValueKindRegistry, createValueKindRegistry } from "./values/registry.js";
export type { KindBinding, CustomKindDefinition } from "./values/registry.js";
export { BUILTIN_KINDS, parseBool, parseInteger, parseFloatToken, isBuiltinKind } from "./values/kinds.js";
export type { KindDefinition } from "./values/kinds.js";
export {
  parseFns,
  validFns,
  altBool,
  asBase,
  asEnum,
  trimWhitespace,
  toUpper,
  toLower,
  inRange,
  ordinalNum,
  validFilepath,
} from "./values/fns.js";
export type { BoolNoMatch } from "./values/fns.js";

// Options & Commands
export { Option } from "./option.js";
export type { OptionInit } from "./option.js";
export { Command, HELP_NAMES } from "./command.js";
export type { CommandInit } from "./command.js";

// Initialization
export { resolveParserConfig } from "./config.js";
export { initCommand } from "./init.js";
export type { InitOptions } from "./init.js";

// Parsing
export { parseArgs, tryParseArgs } from "./parser/parse.js";
export type { ParseResult } from "./parser/parse.js";

// Help
export {
  fillTemplate,
  formatUsage,
  formatHelp,
  formatOptionUsage,
  formatOptionHelp,
  formatValueUsage,
  formatValueHelp,
  writeUsage,
  writeHelp,
  writeOptionUsage,
  writeOptionHelp,
  writeValueUsage,
  writeValueHelp,
  checkUsageHelp,
} from "./help/format.js";

// Conversion
export { toRecord } from "./convert/to-record.js";
export type { ParsedRecord, ToRecordOptions } from "./convert/to-record.js";
