/**
 * Usage and help rendering.
 *
 * The `format*` functions build the text; the `write*` functions send it
 * to an OutputSink (`process.stdout` is one). Templates come from the
 * `help` section of the tree's parser config and use `{placeholder}`
 * fields.
 */

import type { OutputSink } from "@argweave/sdk";
import type { ParserConfig } from "@argweave/shared";
import type { Command } from "../command.js";
import type { Option } from "../option.js";
import type { ValueVariant } from "../values/variant.js";

/** Replace `{key}` fields in `template`. Unknown fields are left as they are. */
export function fillTemplate(template: string, fields: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(fields, key) ? fields[key] : match,
  );
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function formatOptionUsage(opt: Option, config: ParserConfig): string {
  const { shortPrefix, longPrefix } = config;
  return fillTemplate(config.help.optUsageFmt, {
    short: shortPrefix !== null && opt.shortName !== undefined ? `${shortPrefix}${opt.shortName}` : "",
    long: longPrefix !== null && opt.longName !== undefined ? `${longPrefix}${opt.longName}` : "",
    valueName: opt.value.name,
    valueType: opt.value.typeName,
  });
}

/**
 * Option help. Without `optHelpFmt` this is the capitalized name, then
 * usage and description on their own lines, three indents deep.
 */
export function formatOptionHelp(opt: Option, config: ParserConfig): string {
  const name = capitalize(opt.name);
  if (config.help.optHelpFmt !== null) {
    return fillTemplate(config.help.optHelpFmt, { name, description: opt.description });
  }
  const deep = config.help.indent.repeat(3);
  return `${name}:\n${deep}${formatOptionUsage(opt, config)}\n${deep}${opt.description}`;
}

export function formatValueUsage(val: ValueVariant, config: ParserConfig): string {
  return fillTemplate(config.help.valsUsageFmt, { name: val.name, type: val.typeName });
}

export function formatValueHelp(val: ValueVariant, config: ParserConfig): string {
  return fillTemplate(config.help.valsHelpFmt, {
    name: val.name,
    type: val.typeName,
    description: val.description,
  });
}

/**
 * `USAGE: <name> <options> | <values> | <sub-commands>` followed by a
 * blank line. Empty groups are left out.
 */
export function formatUsage(cmd: Command): string {
  const { config } = cmd;
  let out = `USAGE: ${cmd.name} `;
  if (cmd.options.length > 0) {
    for (const opt of cmd.options) out += `${formatOptionUsage(opt, config)} `;
    out += "| ";
  }
  if (cmd.values.length > 0) {
    for (const val of cmd.values) out += `${formatValueUsage(val, config)} `;
    out += "| ";
  }
  for (const sub of cmd.subCommands) {
    out += `${fillTemplate(config.help.subCmdsUsageFmt, { name: sub.name })} `;
  }
  return `${out}\n\n`;
}

export function formatHelp(cmd: Command): string {
  const { config } = cmd;
  const { indent } = config.help;
  const entry = indent.repeat(2);

  let out = `${cmd.helpPrefix}\n`;
  out += formatUsage(cmd);
  out += `HELP:\n${indent}COMMAND: ${cmd.name}\n\n${indent}DESCRIPTION: ${cmd.description}\n\n`;

  if (cmd.subCommands.length > 0) {
    out += `${indent}SUB COMMANDS:\n`;
    for (const sub of cmd.subCommands) {
      out += `${entry}${fillTemplate(config.help.subCmdsHelpFmt, { name: sub.name, description: sub.description })}\n`;
    }
  }
  out += "\n";

  if (cmd.options.length > 0) {
    out += `${indent}OPTIONS:\n`;
    for (const opt of cmd.options) out += `${entry}${formatOptionHelp(opt, config)}\n`;
  }
  out += "\n";

  if (cmd.values.length > 0) {
    out += `${indent}VALUES:\n`;
    for (const val of cmd.values) out += `${entry}${formatValueHelp(val, config)}\n`;
  }
  out += "\n";
  return out;
}

export function writeUsage(cmd: Command, sink: OutputSink): void {
  sink.write(formatUsage(cmd));
}

export function writeHelp(cmd: Command, sink: OutputSink): void {
  sink.write(formatHelp(cmd));
}

export function writeOptionUsage(opt: Option, config: ParserConfig, sink: OutputSink): void {
  sink.write(formatOptionUsage(opt, config));
}

export function writeOptionHelp(opt: Option, config: ParserConfig, sink: OutputSink): void {
  sink.write(formatOptionHelp(opt, config));
}

export function writeValueUsage(val: ValueVariant, config: ParserConfig, sink: OutputSink): void {
  sink.write(formatValueUsage(val, config));
}

export function writeValueHelp(val: ValueVariant, config: ParserConfig, sink: OutputSink): void {
  sink.write(formatValueHelp(val, config));
}

/**
 * Render usage or help for `cmd` if either was requested on it, usage
 * taking precedence.
 *
 * @returns whether anything was written
 */
export function checkUsageHelp(cmd: Command, sink: OutputSink): boolean {
  if (cmd.checkFlag("usage")) {
    writeUsage(cmd, sink);
    return true;
  }
  if (cmd.checkFlag("help")) {
    writeHelp(cmd, sink);
    return true;
  }
  return false;
}
