/**
 * Declaration helpers for Values.
 *
 * ```ts
 * const port = value.u16({ name: "port", defaultValue: 8080 });
 * const files = value.string({ name: "files", setBehavior: "multi", maxArgs: 5 });
 * ```
 */

import type { BuiltinKind, ValueDecl, ValueKindMap, ValueSchema } from "@argweave/sdk";

type Decl<K extends BuiltinKind> = ValueDecl<ValueKindMap[K]>;

function ofType<K extends BuiltinKind>(kind: K, decl: Decl<K>): ValueSchema<ValueKindMap[K]> {
  return { kind, decl };
}

/** Declare a Value of a kind registered on a ValueKindRegistry. */
function custom<T>(kind: string, decl: ValueDecl<T>): ValueSchema<T> {
  return { kind, decl };
}

export const value = {
  ofType,
  custom,
  bool: (decl: Decl<"bool">) => ofType("bool", decl),
  string: (decl: Decl<"string">) => ofType("string", decl),
  i8: (decl: Decl<"i8">) => ofType("i8", decl),
  i16: (decl: Decl<"i16">) => ofType("i16", decl),
  i32: (decl: Decl<"i32">) => ofType("i32", decl),
  i64: (decl: Decl<"i64">) => ofType("i64", decl),
  u8: (decl: Decl<"u8">) => ofType("u8", decl),
  u16: (decl: Decl<"u16">) => ofType("u16", decl),
  u32: (decl: Decl<"u32">) => ofType("u32", decl),
  u64: (decl: Decl<"u64">) => ofType("u64", decl),
  f32: (decl: Decl<"f32">) => ofType("f32", decl),
  f64: (decl: Decl<"f64">) => ofType("f64", decl),
};
