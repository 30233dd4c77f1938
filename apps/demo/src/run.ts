/**
 * Demo entry: parse argv against the demo schema, then print either the
 * requested usage/help or the parsed arguments as JSON.
 */

import type { OutputSink } from "@argweave/sdk";
import { createLogger } from "@argweave/shared";
import { checkUsageHelp, initCommand, toRecord, tryParseArgs } from "@argweave/core";
import type { Command } from "@argweave/core";
import { demoConfig, demoSchema } from "./schema.js";

const logger = createLogger("Demo");

export interface DemoIO {
  out: OutputSink;
  err: OutputSink;
}

/** bigint has no JSON form; unset arguments show as null instead of vanishing. */
function jsonValue(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  return value === undefined ? null : value;
}

/** The command chain the parse walked through, root first, help pseudo commands excluded. */
function activeChain(root: Command): Command[] {
  const chain = [root];
  for (let cmd = root.activeSubCommand; cmd && !cmd.isHelpCommand; cmd = cmd.activeSubCommand) {
    chain.push(cmd);
  }
  return chain;
}

/**
 * @returns the process exit code
 */
export function run(argv: readonly string[], io: DemoIO): number {
  const root = initCommand(demoSchema, { config: demoConfig });
  const result = tryParseArgs(root, argv);

  if (!result.ok) {
    const { error } = result;
    logger.debug("Parse failed", { code: error.code, argument: error.argument, token: error.token });
    io.err.write(`${error.code}: ${error.message}\n`);
    io.err.write(`Run '${root.name} help' for usage.\n`);
    return 1;
  }

  for (const cmd of activeChain(result.command)) {
    if (checkUsageHelp(cmd, io.out)) return 0;
  }

  io.out.write(`${JSON.stringify(toRecord(result.command), jsonValue, 2)}\n`);
  return 0;
}
