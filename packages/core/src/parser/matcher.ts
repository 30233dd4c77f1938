/**
 * Token classification helpers: option prefixes, long-name matching and
 * numeric detection.
 */

import type { ParserConfig } from "@argweave/shared";
import type { Option } from "../option.js";

const NUMERIC = /^[+-]?(?:0[xob][0-9a-f_]+|[0-9][0-9_]*(?:\.[0-9_]*)?(?:e[+-]?[0-9]+)?|\.[0-9]+(?:e[+-]?[0-9]+)?|inf(?:inity)?|nan)$/i;

/** Signed decimal, float or prefixed integer text such as `-5`, `-1.5e3`, `-0x1f`, `-inf`. */
export function looksNumeric(token: string): boolean {
  return NUMERIC.test(token);
}

/** Body of a long-option token, without its prefix. */
export function longOptionBody(config: ParserConfig, token: string): string | undefined {
  const { longPrefix } = config;
  if (longPrefix === null || !token.startsWith(longPrefix) || token.length <= longPrefix.length) {
    return undefined;
  }
  return token.slice(longPrefix.length);
}

/** Body of a short-option token, without its prefix. Long-option tokens are not short ones. */
export function shortOptionBody(config: ParserConfig, token: string): string | undefined {
  const { shortPrefix } = config;
  if (shortPrefix === null || !token.startsWith(shortPrefix) || token.length <= shortPrefix.length) {
    return undefined;
  }
  if (longOptionBody(config, token) !== undefined) return undefined;
  return token.slice(shortPrefix.length);
}

/**
 * Whether a token would be read as an option. Numeric text never is, so
 * negative numbers can be passed as option arguments and positionals.
 */
export function looksLikeOption(config: ParserConfig, token: string): boolean {
  if (looksNumeric(token)) return false;
  return longOptionBody(config, token) !== undefined || shortOptionBody(config, token) !== undefined;
}

export interface SplitBody {
  name: string;
  /** Text after the first separator, if there was one. */
  inline?: string;
}

/** Split `name=value` on the first char of `optValSeps` found in the body. */
export function splitInline(config: ParserConfig, body: string): SplitBody {
  for (let i = 0; i < body.length; i++) {
    if (config.optValSeps.includes(body[i])) {
      return { name: body.slice(0, i), inline: body.slice(i + 1) };
    }
  }
  return { name: body };
}

/**
 * The Option a long name refers to: an exact match, else (when allowed) the
 * first Option in declaration order whose long name starts with `name`.
 */
export function matchLongOption(
  options: readonly Option[],
  name: string,
  allowAbbreviated: boolean,
): Option | undefined {
  const exact = options.find((opt) => opt.longName === name);
  if (exact || !allowAbbreviated || name === "") return exact;
  return options.find((opt) => opt.longName?.startsWith(name));
}

export function matchShortOption(options: readonly Option[], char: string): Option | undefined {
  return options.find((opt) => opt.shortName === char);
}
