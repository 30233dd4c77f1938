/**
 * Built-in value kinds and their text coercion.
 */

import type { BuiltinKind, FloatKind, IntegerKind, ValueKindMap } from "@argweave/sdk";
import { ErrorCode, ParseError } from "@argweave/sdk";

/**
 * How a kind turns tokens into elements.
 *
 * `implicitDefault` is what `get()` falls back to when a value of this kind
 * was never set and declares no default (only `bool` has one).
 */
export interface KindDefinition<T> {
  readonly kind: string;
  readonly typeName: string;
  parse(token: string): T;
  /** Runtime check used by `getAs()`. */
  is(value: unknown): value is T;
  readonly implicitDefault?: T;
  /** Multi values of this kind are never split on delimiters. */
  readonly splittable: boolean;
}

const TRUE_WORDS: ReadonlySet<string> = new Set(["true", "t", "yes", "y", "1"]);

export function parseBool(token: string): boolean {
  return TRUE_WORDS.has(token.toLowerCase());
}

interface IntegerRange {
  readonly signed: boolean;
  readonly min: bigint;
  readonly max: bigint;
}

function rangeOf(bits: number, signed: boolean): IntegerRange {
  const span = 1n << BigInt(bits);
  return signed
    ? { signed, min: -(span >> 1n), max: (span >> 1n) - 1n }
    : { signed, min: 0n, max: span - 1n };
}

const INTEGER_RANGES: Record<IntegerKind, IntegerRange> = {
  i8: rangeOf(8, true),
  i16: rangeOf(16, true),
  i32: rangeOf(32, true),
  i64: rangeOf(64, true),
  u8: rangeOf(8, false),
  u16: rangeOf(16, false),
  u32: rangeOf(32, false),
  u64: rangeOf(64, false),
};

const RADIX_DIGITS: Record<number, RegExp> = {
  2: /^[01]+(?:_[01]+)*$/,
  8: /^[0-7]+(?:_[0-7]+)*$/,
  10: /^[0-9]+(?:_[0-9]+)*$/,
  16: /^[0-9a-f]+(?:_[0-9a-f]+)*$/i,
};

const RADIX_PREFIX: Record<string, number> = { "0x": 16, "0o": 8, "0b": 2 };

const BIGINT_PREFIX: Record<number, string> = { 2: "0b", 8: "0o", 10: "", 16: "0x" };

/**
 * Parse integer text. With `radix` 0 the radix comes from an optional
 * `0x` / `0o` / `0b` prefix (decimal without one). Underscores may separate
 * digits. The result is range-checked against `kind`.
 */
export function parseInteger(token: string, kind: IntegerKind, radix: 0 | 2 | 8 | 10 | 16 = 0): bigint {
  const range = INTEGER_RANGES[kind];
  let text = token;
  let negative = false;
  if (text.startsWith("-") || text.startsWith("+")) {
    negative = text.startsWith("-");
    text = text.slice(1);
  }

  let base: number = radix;
  if (radix === 0) {
    base = RADIX_PREFIX[text.slice(0, 2).toLowerCase()] ?? 10;
    if (base !== 10) text = text.slice(2);
  }

  const digits = RADIX_DIGITS[base];
  if (!digits || !digits.test(text)) {
    throw new ParseError(`"${token}" is not a valid ${kind} integer`, {
      code: ErrorCode.INVALID_NUMBER,
      token,
    });
  }
  if (negative && !range.signed) {
    throw new ParseError(`"${token}" is negative but ${kind} is unsigned`, {
      code: ErrorCode.INVALID_NUMBER,
      token,
    });
  }

  const magnitude = BigInt(`${BIGINT_PREFIX[base]}${text.replaceAll("_", "")}`);
  const result = negative ? -magnitude : magnitude;
  if (result < range.min || result > range.max) {
    throw new ParseError(`"${token}" is out of range for ${kind} (${range.min}..${range.max})`, {
      code: ErrorCode.NUMBER_OUT_OF_RANGE,
      token,
    });
  }
  return result;
}

const FLOAT_TEXT = /^[+-]?(?:[0-9]+(?:_[0-9]+)*(?:\.(?:[0-9]+(?:_[0-9]+)*)?)?|\.[0-9]+(?:_[0-9]+)*)(?:e[+-]?[0-9]+)?$/i;
const FLOAT_SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Parse decimal or exponent float text, plus `inf`, `infinity` and `nan`.
 * `f32` results are rounded to single precision.
 */
export function parseFloatToken(token: string, kind: FloatKind): number {
  let result: number;
  const special = FLOAT_SPECIAL.exec(token);
  if (special) {
    const [, sign, word] = special;
    result = word.toLowerCase() === "nan" ? Number.NaN : sign === "-" ? -Infinity : Infinity;
  } else if (FLOAT_TEXT.test(token)) {
    result = Number(token.replaceAll("_", ""));
  } else {
    throw new ParseError(`"${token}" is not a valid ${kind} number`, {
      code: ErrorCode.INVALID_NUMBER,
      token,
    });
  }
  return kind === "f32" ? Math.fround(result) : result;
}

function isNumber(value: unknown): value is number {
  return typeof value === "number";
}

function isBigInt(value: unknown): value is bigint {
  return typeof value === "bigint";
}

function smallInteger(kind: Exclude<IntegerKind, "i64" | "u64">): KindDefinition<number> {
  return {
    kind,
    typeName: kind,
    parse: (token) => Number(parseInteger(token, kind)),
    is: isNumber,
    splittable: true,
  };
}

function wideInteger(kind: "i64" | "u64"): KindDefinition<bigint> {
  return {
    kind,
    typeName: kind,
    parse: (token) => parseInteger(token, kind),
    is: isBigInt,
    splittable: true,
  };
}

function float(kind: FloatKind): KindDefinition<number> {
  return {
    kind,
    typeName: kind,
    parse: (token) => parseFloatToken(token, kind),
    is: isNumber,
    splittable: true,
  };
}

export const BUILTIN_KINDS: { readonly [K in BuiltinKind]: KindDefinition<ValueKindMap[K]> } = {
  bool: {
    kind: "bool",
    typeName: "bool",
    parse: parseBool,
    is: (value): value is boolean => typeof value === "boolean",
    implicitDefault: false,
    splittable: true,
  },
  string: {
    kind: "string",
    typeName: "string",
    parse: (token) => token,
    is: (value): value is string => typeof value === "string",
    splittable: false,
  },
  i8: smallInteger("i8"),
  i16: smallInteger("i16"),
  i32: smallInteger("i32"),
  i64: wideInteger("i64"),
  u8: smallInteger("u8"),
  u16: smallInteger("u16"),
  u32: smallInteger("u32"),
  u64: wideInteger("u64"),
  f32: float("f32"),
  f64: float("f64"),
};

export function isBuiltinKind(kind: string): kind is BuiltinKind {
  return Object.prototype.hasOwnProperty.call(BUILTIN_KINDS, kind);
}
