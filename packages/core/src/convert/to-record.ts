/**
 * Projection of a parsed Command tree into plain data.
 */

import { HELP_NAMES } from "../command.js";
import type { Command } from "../command.js";
import type { ValueVariant } from "../values/variant.js";

export interface ParsedRecord {
  [name: string]: unknown;
}

export interface ToRecordOptions {
  /** Map unset arguments without defaults to undefined instead of throwing. Defaults to true. */
  allowUnset?: boolean;
}

function readable(value: ValueVariant): boolean {
  return value.isSet || value.hasDefault || value.kind === "bool";
}

function read(value: ValueVariant, allowUnset: boolean): unknown {
  if (allowUnset && !readable(value)) return undefined;
  if (value.setBehavior !== "multi") return value.get();
  // getAll() has no implicit false for an unset bool
  if (value.kind === "bool" && !value.isSet && !value.hasDefault) return [value.get()];
  return value.getAll();
}

/**
 * Option and Value names map to their value (an array for multi Values),
 * the active sub-Command nests under its own name. Help options and
 * sub-commands are left out.
 *
 * @throws ValueAccessError(VALUE_NOT_SET) for unset arguments when `allowUnset` is false
 */
export function toRecord(cmd: Command, options: ToRecordOptions = {}): ParsedRecord {
  const allowUnset = options.allowUnset ?? true;
  const record: ParsedRecord = {};

  for (const opt of cmd.options) {
    if (cmd.config.addHelpOpts && HELP_NAMES.includes(opt.name)) continue;
    record[opt.name] = read(opt.value, allowUnset);
  }
  for (const val of cmd.values) {
    record[val.name] = read(val, allowUnset);
  }

  const sub = cmd.activeSubCommand;
  if (sub && !sub.isHelpCommand) {
    record[sub.name] = toRecord(sub, options);
  }
  return record;
}
