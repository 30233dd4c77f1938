/**
 * Runtime Command tree produced by `initCommand()`.
 *
 * A Command owns its sub-Commands, Options and Values outright. Parsing
 * mutates the tree in place: Values fill up and `activeSubCommand` records
 * which sub-Command the remaining tokens were handed to.
 */

import type { ParserConfig } from "@argweave/shared";
import type { Option } from "./option.js";
import type { ValueVariant } from "./values/variant.js";

/** Names of the pseudo sub-Commands and Options added for help output. */
export const HELP_NAMES: readonly string[] = ["usage", "help"];

export interface CommandInit {
  name: string;
  description?: string;
  helpPrefix: string;
  subCommands?: Command[];
  options?: Option[];
  values?: ValueVariant[];
  subCmdsMandatory: boolean;
  valsMandatory: boolean;
  config: ParserConfig;
}

export class Command {
  readonly name: string;
  readonly description: string;
  readonly helpPrefix: string;
  readonly subCommands: readonly Command[];
  readonly options: readonly Option[];
  readonly values: readonly ValueVariant[];
  readonly subCmdsMandatory: boolean;
  readonly valsMandatory: boolean;
  /** Resolved parser configuration, shared by the whole tree. */
  readonly config: ParserConfig;
  /** Set during parsing when a sub-Command name is matched. */
  activeSubCommand?: Command;

  constructor(init: CommandInit) {
    this.name = init.name;
    this.description = init.description ?? "";
    this.helpPrefix = init.helpPrefix;
    this.subCommands = init.subCommands ?? [];
    this.options = init.options ?? [];
    this.values = init.values ?? [];
    this.subCmdsMandatory = init.subCmdsMandatory;
    this.valsMandatory = init.valsMandatory;
    this.config = init.config;
  }

  /** True for the `usage` and `help` pseudo sub-Commands. */
  get isHelpCommand(): boolean {
    return HELP_NAMES.includes(this.name);
  }

  /** Sub-Commands other than the help pseudo sub-Commands. */
  get realSubCommands(): Command[] {
    return this.subCommands.filter((cmd) => !cmd.isHelpCommand);
  }

  getSubCommand(name: string): Command | undefined {
    return this.subCommands.find((cmd) => cmd.name === name);
  }

  /** Whether the active sub-Command is called `name`. */
  checkSubCommand(name: string): boolean {
    return this.activeSubCommand?.name === name;
  }

  /** The active sub-Command, if it is called `name`. */
  matchSubCommand(name: string): Command | undefined {
    return this.checkSubCommand(name) ? this.activeSubCommand : undefined;
  }

  getOption(name: string): Option | undefined {
    return this.options.find((opt) => opt.name === name);
  }

  getValue(name: string): ValueVariant | undefined {
    return this.values.find((val) => val.name === name);
  }

  getOptions(): Map<string, Option> {
    return new Map(this.options.map((opt) => [opt.name, opt]));
  }

  getValues(): Map<string, ValueVariant> {
    return new Map(this.values.map((val) => [val.name, val]));
  }

  /**
   * Whether `name` is the active sub-Command, or a boolean Option or Value
   * that currently reads true.
   */
  checkFlag(name: string): boolean {
    if (this.checkSubCommand(name)) return true;
    const opt = this.getOption(name);
    if (opt && isTrue(opt.value)) return true;
    const val = this.getValue(name);
    return val !== undefined && isTrue(val);
  }

  /** Whether `usage` or `help` was requested on this Command. */
  get helpRequested(): boolean {
    return HELP_NAMES.some((name) => this.checkFlag(name));
  }
}

function isTrue(value: ValueVariant): boolean {
  return value.kind === "bool" && value.get() === true;
}
