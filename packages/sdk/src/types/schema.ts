/**
 * Schema declaration types.
 *
 * A schema is plain data: it describes Commands, Options and Values but
 * holds no parsed state. `initCommand()` turns a schema into a runtime
 * Command tree; the same schema can be initialized any number of times.
 */

/**
 * Policy for repeated assignment to a Value.
 *
 * - first: keep the first argument
 * - last:  keep the last argument
 * - multi: keep every argument up to `maxArgs`
 */
export type SetBehavior = "first" | "last" | "multi";

/** Element types of the built-in value kinds. */
export interface ValueKindMap {
  bool: boolean;
  string: string;
  i8: number;
  i16: number;
  i32: number;
  i64: bigint;
  u8: number;
  u16: number;
  u32: number;
  u64: bigint;
  f32: number;
  f64: number;
}

export type BuiltinKind = keyof ValueKindMap;

export type IntegerKind = "i8" | "i16" | "i32" | "i64" | "u8" | "u16" | "u32" | "u64";

export type FloatKind = "f32" | "f64";

/** Converts a raw token into a typed element. */
export type ParseFn<T> = (token: string) => T;

/**
 * Declaration of a single Value.
 *
 * Unset fields inherit the parser config (`globalSetBehavior`,
 * `globalArgDelims`) at initialization.
 */
export interface ValueDecl<T> {
  name: string;
  description?: string;
  group?: string;
  /** Overrides the type name shown in usage/help output. */
  typeAlias?: string;
  setBehavior?: SetBehavior;
  /** 1..maxChildren. Defaults to 1. */
  maxArgs?: number;
  /** Characters that split one token into several arguments (multi only). */
  argDelims?: string;
  defaultValue?: T;
  /** Used before any type-level parser; errors become CANNOT_PARSE_ARG_TO_VALUE. */
  parseFn?(token: string): T;
  validFn?(value: T): boolean;
}

export interface ValueSchema<T> {
  /** A built-in kind or a kind registered on the ValueKindRegistry. */
  readonly kind: string;
  readonly decl: ValueDecl<T>;
}

export interface OptionSchema {
  name: string;
  /** Single character, matched after the short prefix (e.g. `-v`). */
  shortName?: string;
  /** Matched after the long prefix (e.g. `--verbose`). */
  longName?: string;
  description?: string;
  group?: string;
  /** Wrapped value. Defaults to a boolean value named after the option. */
  value?: ValueSchema<unknown>;
}

export interface CommandSchema {
  name: string;
  description?: string;
  /** Line written before this command's help output. */
  helpPrefix?: string;
  subCommands?: ReadonlyArray<CommandSchema>;
  options?: ReadonlyArray<OptionSchema>;
  values?: ReadonlyArray<ValueSchema<unknown>>;
  subCmdsMandatory?: boolean;
  valsMandatory?: boolean;
}
