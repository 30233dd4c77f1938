/**
 * Turns a CommandSchema into a runtime Command tree.
 */

import type { CommandSchema, OptionSchema } from "@argweave/sdk";
import { ErrorCode, SchemaError } from "@argweave/sdk";
import { createLogger } from "@argweave/shared";
import type { ParserConfig, ParserConfigInput } from "@argweave/shared";
import { Command, HELP_NAMES } from "./command.js";
import { resolveParserConfig } from "./config.js";
import { Option } from "./option.js";
import { createValueKindRegistry } from "./values/registry.js";
import type { ValueKindRegistry } from "./values/registry.js";
import { TypedValue } from "./values/typed-value.js";
import type { ValueDefaults } from "./values/typed-value.js";
import type { ValueVariant } from "./values/variant.js";

const logger = createLogger("Init");

export interface InitOptions {
  config?: ParserConfigInput;
  /** Kinds available to the schema. Defaults to a registry with only the built-in kinds. */
  registry?: ValueKindRegistry;
}

interface BuildContext {
  config: ParserConfig;
  registry: ValueKindRegistry;
  defaults: ValueDefaults;
}

const HELP_SHORT_NAMES: readonly string[] = ["u", "h"];

/**
 * Validate `schema` and build a fresh Command tree from it.
 *
 * The schema itself is never modified, so it can be initialized again for
 * every parse.
 *
 * @throws ConfigError if the config is rejected
 * @throws SchemaError on duplicate or reserved names, unnamed options,
 *   out-of-range `maxArgs` and unknown value kinds
 */
export function initCommand(schema: CommandSchema, options: InitOptions = {}): Command {
  const config = resolveParserConfig(options.config);
  const ctx: BuildContext = {
    config,
    registry: options.registry ?? createValueKindRegistry(),
    defaults: {
      setBehavior: config.globalSetBehavior,
      argDelims: config.globalArgDelims,
      maxChildren: config.maxChildren,
    },
  };
  return buildCommand(schema, ctx);
}

function buildCommand(schema: CommandSchema, ctx: BuildContext): Command {
  const { config } = ctx;
  if (config.validateSchema) validateCommand(schema, config);

  const subCommands = (schema.subCommands ?? []).map((sub) => buildCommand(sub, ctx));
  const options = (schema.options ?? []).map((opt) => buildOption(opt, ctx));
  const values: ValueVariant[] = (schema.values ?? []).map(
    (val) => new TypedValue(val.decl, ctx.registry.resolve(val.kind), ctx.defaults),
  );

  if (config.addHelpCmds && !HELP_NAMES.includes(schema.name)) {
    subCommands.push(...HELP_NAMES.map((name) => helpCommand(name, schema.name, config)));
    logger.debug("Added help sub-commands", { command: schema.name });
  }
  if (config.addHelpOpts) {
    options.push(...HELP_NAMES.map((name) => helpOption(name, schema.name, ctx)));
    logger.debug("Added help options", { command: schema.name });
  }

  return new Command({
    name: schema.name,
    description: schema.description,
    helpPrefix: schema.helpPrefix ?? config.help.globalHelpPrefix,
    subCommands,
    options,
    values,
    subCmdsMandatory: schema.subCmdsMandatory ?? config.subCmdsMandatory,
    valsMandatory: schema.valsMandatory ?? config.valsMandatory,
    config,
  });
}

function buildOption(schema: OptionSchema, ctx: BuildContext): Option {
  const value = schema.value
    ? new TypedValue(schema.value.decl, ctx.registry.resolve(schema.value.kind), ctx.defaults)
    : new TypedValue({ name: schema.name }, ctx.registry.bindBuiltin("bool"), ctx.defaults);
  return new Option({
    name: schema.name,
    shortName: schema.shortName,
    longName: schema.longName,
    description: schema.description,
    group: schema.group,
    value,
  });
}

function helpDescription(kind: string, parent: string): string {
  return `Show the '${parent}' ${kind} display.`;
}

function helpCommand(name: string, parent: string, config: ParserConfig): Command {
  return new Command({
    name,
    description: helpDescription(name, parent),
    helpPrefix: parent,
    subCmdsMandatory: false,
    valsMandatory: false,
    config,
  });
}

function helpOption(name: string, parent: string, ctx: BuildContext): Option {
  return new Option({
    name,
    shortName: name.charAt(0),
    longName: name,
    description: helpDescription(name, parent),
    value: new TypedValue({ name: `${name}_flag` }, ctx.registry.bindBuiltin("bool"), ctx.defaults),
  });
}

function duplicate(what: string, name: string, command: string): SchemaError {
  return new SchemaError(`${what} '${name}' is declared more than once in command '${command}'`, {
    code: ErrorCode.DUPLICATE_NAME,
    argument: name,
  });
}

function reserved(what: string, name: string, command: string): SchemaError {
  return new SchemaError(`${what} '${name}' in command '${command}' is reserved for help output`, {
    code: ErrorCode.DUPLICATE_NAME,
    argument: name,
  });
}

/** Collects names and rejects the second occurrence of any of them. */
function uniqueNames(what: string, command: string, reservedNames: readonly string[]): (name: string) => void {
  const seen = new Set<string>();
  return (name) => {
    if (reservedNames.includes(name)) throw reserved(what, name, command);
    if (seen.has(name)) throw duplicate(what, name, command);
    seen.add(name);
  };
}

function validateCommand(schema: CommandSchema, config: ParserConfig): void {
  const command = schema.name;
  const helpCmds = config.addHelpCmds && !HELP_NAMES.includes(command);

  const addSubCommand = uniqueNames("Sub-command", command, helpCmds ? HELP_NAMES : []);
  for (const sub of schema.subCommands ?? []) addSubCommand(sub.name);

  const helpOpts = config.addHelpOpts;
  const addOption = uniqueNames("Option", command, helpOpts ? HELP_NAMES : []);
  const addShort = uniqueNames("Option short name", command, helpOpts ? HELP_SHORT_NAMES : []);
  const addLong = uniqueNames("Option long name", command, helpOpts ? HELP_NAMES : []);
  for (const opt of schema.options ?? []) {
    addOption(opt.name);
    if (opt.shortName === undefined && opt.longName === undefined) {
      throw new SchemaError(`Option '${opt.name}' in command '${command}' needs a short or a long name`, {
        code: ErrorCode.MISSING_OPTION_NAME,
        argument: opt.name,
      });
    }
    if (opt.shortName !== undefined) {
      if (opt.shortName.length !== 1) {
        throw new SchemaError(`Option '${opt.name}' short name "${opt.shortName}" must be a single character`, {
          argument: opt.name,
        });
      }
      addShort(opt.shortName);
    }
    if (opt.longName !== undefined) {
      if (opt.longName === "") {
        throw new SchemaError(`Option '${opt.name}' long name must not be empty`, { argument: opt.name });
      }
      addLong(opt.longName);
    }
  }

  const addValue = uniqueNames("Value", command, []);
  for (const val of schema.values ?? []) addValue(val.decl.name);
}
