/**
 * Ready-made `parseFn` and `validFn` builders for common needs.
 */

import { accessSync, constants } from "node:fs";
import type { IntegerKind, ParseFn, ValueKindMap } from "@argweave/sdk";
import { ParseError } from "@argweave/sdk";
import { createLogger } from "@argweave/shared";
import { BUILTIN_KINDS, parseInteger } from "./kinds.js";
import type { KindDefinition } from "./kinds.js";

const logger = createLogger("ValueFns");

/** What `altBool` returns for a word found in neither list. */
export type BoolNoMatch = "true" | "false" | "error";

/**
 * Boolean parser with custom true and false words (case-sensitive).
 */
export function altBool(
  trueWords: readonly string[],
  falseWords: readonly string[],
  noMatch: BoolNoMatch = "false",
): ParseFn<boolean> {
  return (token) => {
    if (trueWords.includes(token)) return true;
    if (falseWords.includes(token)) return false;
    if (noMatch === "error") {
      throw new ParseError(`Unrecognized boolean word "${token}"`, { token });
    }
    return noMatch === "true";
  };
}

/**
 * Integer parser for a fixed radix. Base 0 reads the radix from a
 * `0x`/`0o`/`0b` prefix, as the built-in coercion does.
 */
export function asBase<K extends IntegerKind>(kind: K, base: 0 | 2 | 8 | 10 | 16): ParseFn<ValueKindMap[K]> {
  const definition: KindDefinition<ValueKindMap[K]> = BUILTIN_KINDS[kind];
  return (token) => {
    const wide = parseInteger(token, kind, base);
    const parsed = kind === "i64" || kind === "u64" ? wide : Number(wide);
    if (!definition.is(parsed)) {
      throw new ParseError(`"${token}" did not parse to a ${kind}`, { token });
    }
    return parsed;
  };
}

/**
 * Accepts one of `choices` (surrounding whitespace ignored) and returns it.
 */
export function asEnum<const C extends readonly string[]>(choices: C): ParseFn<C[number]> {
  return (token) => {
    const trimmed = token.trim();
    const match = choices.find((choice) => choice === trimmed);
    if (match === undefined) {
      throw new ParseError(`"${trimmed}" is not one of: ${choices.join(", ")}`, { token });
    }
    return match;
  };
}

export const trimWhitespace: ParseFn<string> = (token) => token.trim();

export const toUpper: ParseFn<string> = (token) => token.toUpperCase();

export const toLower: ParseFn<string> = (token) => token.toLowerCase();

/** Range check for numeric Values. */
export function inRange(start: number, end: number, inclusive?: boolean): (value: number) => boolean;
export function inRange(start: bigint, end: bigint, inclusive?: boolean): (value: bigint) => boolean;
export function inRange(
  start: number | bigint,
  end: number | bigint,
  inclusive = true,
): (value: number | bigint) => boolean {
  return inclusive
    ? (value) => value >= start && value <= end
    : (value) => value > start && value < end;
}

const ORDINALS: ReadonlySet<string> = new Set([
  "first",
  "second",
  "third",
  "fourth",
  "fifth",
  "sixth",
  "seventh",
  "eighth",
  "ninth",
  "tenth",
]);

/** "first" through "tenth", any case. */
export function ordinalNum(value: string): boolean {
  return ORDINALS.has(value.toLowerCase());
}

/** The path names a readable file or directory. */
export function validFilepath(value: string): boolean {
  try {
    accessSync(value, constants.R_OK);
    return true;
  } catch (err) {
    logger.debug(`Path is not readable: ${value}`, { error: err instanceof Error ? err.message : String(err) });
    return false;
  }
}

export const parseFns = { altBool, asBase, asEnum, trimWhitespace, toUpper, toLower };

export const validFns = { inRange, ordinalNum, validFilepath };
