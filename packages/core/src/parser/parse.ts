/**
 * The parsing state machine.
 *
 * Tokens are consumed in a single forward pass. Each token is classified
 * inside the current Command context, in this order:
 *
 *   1. option token (long options first, then short options and chains)
 *   2. sub-command name, which switches the context for the remaining tokens
 *   3. positional, given to the first Value that is not maxed
 *
 * When the tokens run out, mandatory sub-commands and Values are enforced
 * from the deepest context up. There is no rollback: a failed parse leaves
 * the tree as far as it got.
 */

import { ArgError, ArityError, ClassificationError, ErrorCode } from "@argweave/sdk";
import { createLogger, generateId } from "@argweave/shared";
import type { Logger } from "@argweave/shared";
import type { Command } from "../command.js";
import type { Option } from "../option.js";
import {
  longOptionBody,
  looksLikeOption,
  looksNumeric,
  matchLongOption,
  matchShortOption,
  shortOptionBody,
  splitInline,
} from "./matcher.js";
import { TokenCursor } from "./tokens.js";

const logger = createLogger("Parser");

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; error: ArgError };

/**
 * Parse `tokens` into an initialized Command tree, in place.
 *
 * @returns the same Command
 * @throws ArgError subclasses for every parse failure
 */
export function parseArgs(command: Command, tokens: Iterable<string>): Command {
  const log = logger.child("pass");
  log.setContext({ command: command.name, parseId: generateId() });
  const stop = log.time("parse");
  // per-token tracing only when debug output is on
  const trace = log.isEnabled("debug") ? log : undefined;

  const cursor = new TokenCursor(tokens);
  const contexts: Command[] = [command];
  let current = command;

  for (let token = cursor.next(); token !== undefined; token = cursor.next()) {
    if (parseOptionToken(current, token, cursor, trace)) continue;

    const sub = current.getSubCommand(token);
    if (sub) {
      current.activeSubCommand = sub;
      current = sub;
      contexts.push(sub);
      trace?.debug(`Switched to sub-command '${sub.name}'`, { token });
      continue;
    }

    setPositional(current, token, trace);
  }

  enforceMandatory(contexts, trace);
  stop();
  log.debug("Tokens consumed", { tokens: cursor.consumed });
  return command;
}

/** `parseArgs` with failures returned instead of thrown. Non-argument errors still throw. */
export function tryParseArgs(command: Command, tokens: Iterable<string>): ParseResult {
  try {
    return { ok: true, command: parseArgs(command, tokens) };
  } catch (err) {
    if (err instanceof ArgError) return { ok: false, error: err };
    throw err;
  }
}

function unknownOption(command: Command, token: string, name: string): ClassificationError {
  return new ClassificationError(`Unknown option '${name}' in "${token}" for command '${command.name}'`, ErrorCode.UNKNOWN_OPTION, {
    token,
    argument: name,
  });
}

/**
 * Handle `token` if it is an option token.
 *
 * @returns false when the token is not an option token (numeric text included)
 */
function parseOptionToken(command: Command, token: string, cursor: TokenCursor, trace?: Logger): boolean {
  const { config } = command;

  const longBody = longOptionBody(config, token);
  if (longBody !== undefined) {
    const { name, inline } = splitInline(config, longBody);
    const opt = matchLongOption(command.options, name, config.allowAbbreviatedLongOpts);
    if (!opt) {
      if (looksNumeric(token)) return false;
      throw unknownOption(command, token, name);
    }
    trace?.debug(`Long option '${opt.name}'`, { token });
    applyOption(command, opt, inline, token, cursor);
    return true;
  }

  const shortBody = shortOptionBody(config, token);
  if (shortBody === undefined) return false;

  for (let i = 0; i < shortBody.length; i++) {
    const char = shortBody[i];
    const opt = matchShortOption(command.options, char);
    if (!opt) {
      if (i === 0 && looksNumeric(token)) return false;
      throw unknownOption(command, token, char);
    }
    trace?.debug(`Short option '${opt.name}'`, { token });

    const rest = shortBody.slice(i + 1);
    if (rest !== "" && config.optValSeps.includes(rest[0])) {
      applyOption(command, opt, rest.slice(1), token, cursor);
      return true;
    }
    if (opt.isBool) {
      applyOption(command, opt, undefined, token, cursor);
      continue;
    }
    if (rest !== "") {
      if (!config.allowOptValNoSpace) {
        throw new ArityError(
          `Option '${opt.name}' takes an argument and must end "${token}"`,
          ErrorCode.EMPTY_OPTION_ARGUMENT,
          { token, argument: opt.name },
        );
      }
      applyOption(command, opt, rest, token, cursor);
      return true;
    }
    applyOption(command, opt, undefined, token, cursor);
    return true;
  }
  return true;
}

/**
 * Set an Option from its inline text, or as a flag, or from the next token.
 */
function applyOption(
  command: Command,
  opt: Option,
  inline: string | undefined,
  token: string,
  cursor: TokenCursor,
): void {
  if (inline !== undefined) {
    opt.set(inline);
    return;
  }
  if (opt.isBool) {
    opt.set("true");
    return;
  }

  const next = cursor.peek();
  if (next === undefined || looksLikeOption(command.config, next)) {
    throw new ArityError(`Option '${opt.name}' expects an argument after "${token}"`, ErrorCode.EMPTY_OPTION_ARGUMENT, {
      token,
      argument: opt.name,
    });
  }
  cursor.next();
  opt.set(next);
}

function setPositional(command: Command, token: string, trace?: Logger): void {
  if (command.values.length === 0) {
    const expected = command.realSubCommands.map((sub) => sub.name);
    const hint = expected.length > 0 ? `; expected one of: ${expected.join(", ")}` : "";
    throw new ClassificationError(
      `Unexpected argument "${token}" for command '${command.name}'${hint}`,
      ErrorCode.UNEXPECTED_ARGUMENT,
      { token, argument: command.name },
    );
  }

  const target = command.values.find((val) => !val.isMaxed);
  if (!target) {
    throw new ArityError(`Too many values for command '${command.name}': "${token}"`, ErrorCode.TOO_MANY_VALUES, {
      token,
      argument: command.name,
    });
  }
  trace?.debug(`Value '${target.name}'`, { token });
  target.set(token);
}

/**
 * Check mandatory sub-commands and Values, deepest context first. Once a
 * context asked for help or usage, it and every context above it are
 * exempt.
 */
function enforceMandatory(contexts: readonly Command[], trace?: Logger): void {
  let helpRequested = false;
  for (const command of [...contexts].reverse()) {
    helpRequested ||= command.helpRequested;
    if (helpRequested) {
      trace?.debug(`Mandatory checks skipped for '${command.name}'`);
      continue;
    }

    if (command.subCmdsMandatory && command.realSubCommands.length > 0 && !command.activeSubCommand) {
      const expected = command.realSubCommands.map((sub) => sub.name).join(", ");
      throw new ArityError(
        `Command '${command.name}' requires a sub-command: ${expected}`,
        ErrorCode.MISSING_SUB_COMMAND,
        { argument: command.name },
      );
    }

    if (command.valsMandatory) {
      const missing = command.values.find((val) => !val.isSet && !val.hasDefault);
      if (missing) {
        throw new ArityError(
          `Command '${command.name}' expects more values: '${missing.name}' is not set`,
          ErrorCode.EXPECTED_MORE_VALUES,
          { argument: missing.name },
        );
      }
    }
  }
}
