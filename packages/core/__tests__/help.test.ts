import { describe, it, expect } from "vitest";
import type { CommandSchema } from "@argweave/sdk";
import {
  checkUsageHelp,
  fillTemplate,
  formatHelp,
  formatOptionHelp,
  formatOptionUsage,
  formatUsage,
  formatValueHelp,
  formatValueUsage,
  initCommand,
  parseArgs,
  value,
  writeHelp,
  writeOptionHelp,
  writeOptionUsage,
  writeUsage,
  writeValueHelp,
  writeValueUsage,
} from "../src/index.js";
import { createSink } from "./helpers.js";

const schema: CommandSchema = {
  name: "app",
  description: "Demo app",
  subCommands: [{ name: "build", description: "Build it" }],
  options: [{ name: "verbose", shortName: "v", longName: "verbose", description: "Talk more" }],
  values: [value.string({ name: "file", description: "Input file" })],
};

const plain = { addHelpCmds: false, addHelpOpts: false };

describe("fillTemplate", () => {
  it("replaces known fields and keeps unknown ones", () => {
    expect(fillTemplate("{name} ({type}) {other}", { name: "n", type: "u8" })).toBe("n (u8) {other}");
  });
});

describe("usage", () => {
  it("lists options, values and sub-commands", () => {
    const cmd = initCommand(schema, { config: plain });
    expect(formatUsage(cmd)).toBe(`USAGE: app [-v,--verbose "verbose (bool)"] | "file (string)" | 'build' \n\n`);
  });

  it("includes the help pseudo arguments", () => {
    const cmd = initCommand(schema);
    expect(formatUsage(cmd)).toBe(
      "USAGE: app " +
        `[-v,--verbose "verbose (bool)"] [-u,--usage "usage_flag (bool)"] [-h,--help "help_flag (bool)"] | ` +
        `"file (string)" | ` +
        "'build' 'usage' 'help' \n\n",
    );
  });

  it("leaves out empty groups", () => {
    const cmd = initCommand({ name: "bare" }, { config: plain });
    expect(formatUsage(cmd)).toBe("USAGE: bare \n\n");
  });

  it("renders single arguments", () => {
    const cmd = initCommand(schema, { config: plain });
    const [opt] = cmd.options;
    const [val] = cmd.values;
    expect(formatOptionUsage(opt, cmd.config)).toBe(`[-v,--verbose "verbose (bool)"]`);
    expect(formatValueUsage(val, cmd.config)).toBe(`"file (string)"`);
  });

  it("leaves out names whose prefix is disabled", () => {
    const cmd = initCommand(schema, { config: { ...plain, shortPrefix: null } });
    expect(formatOptionUsage(cmd.options[0], cmd.config)).toBe(`[,--verbose "verbose (bool)"]`);
  });

  it("shows type aliases", () => {
    const cmd = initCommand(
      { name: "srv", values: [value.u16({ name: "port", typeAlias: "port-number" })] },
      { config: plain },
    );
    expect(formatValueUsage(cmd.values[0], cmd.config)).toBe(`"port (port-number)"`);
  });
});

describe("help", () => {
  it("renders every section", () => {
    const cmd = initCommand(schema, { config: plain });
    expect(formatHelp(cmd)).toBe(
      "\n" +
        `USAGE: app [-v,--verbose "verbose (bool)"] | "file (string)" | 'build' \n\n` +
        "HELP:\n    COMMAND: app\n\n    DESCRIPTION: Demo app\n\n" +
        "    SUB COMMANDS:\n        build: Build it\n\n" +
        "    OPTIONS:\n" +
        "        Verbose:\n" +
        `            [-v,--verbose "verbose (bool)"]\n` +
        "            Talk more\n\n" +
        "    VALUES:\n        file (string): Input file\n\n",
    );
  });

  it("starts with the help prefix", () => {
    const cmd = initCommand({ ...schema, helpPrefix: "app 1.0" }, { config: plain });
    expect(formatHelp(cmd).startsWith("app 1.0\nUSAGE: app ")).toBe(true);
  });

  it("keeps section spacing for an empty command", () => {
    const cmd = initCommand({ name: "bare" }, { config: plain });
    expect(formatHelp(cmd)).toBe("\nUSAGE: bare \n\nHELP:\n    COMMAND: bare\n\n    DESCRIPTION: \n\n\n\n\n");
  });

  it("uses the configured templates", () => {
    const cmd = initCommand(schema, {
      config: {
        ...plain,
        help: { indent: "  ", optHelpFmt: "{name} - {description}", valsHelpFmt: "<{name}> {description}" },
      },
    });
    expect(formatOptionHelp(cmd.options[0], cmd.config)).toBe("Verbose - Talk more");
    expect(formatValueHelp(cmd.values[0], cmd.config)).toBe("<file> Input file");
    expect(formatHelp(cmd)).toContain("\n  OPTIONS:\n    Verbose - Talk more\n");
  });
});

describe("write functions", () => {
  it("send the formatted text to the sink", () => {
    const cmd = initCommand(schema, { config: plain });
    const [opt] = cmd.options;
    const [val] = cmd.values;
    const cases: Array<[(sink: ReturnType<typeof createSink>) => void, string]> = [
      [(sink) => writeUsage(cmd, sink), formatUsage(cmd)],
      [(sink) => writeHelp(cmd, sink), formatHelp(cmd)],
      [(sink) => writeOptionUsage(opt, cmd.config, sink), formatOptionUsage(opt, cmd.config)],
      [(sink) => writeOptionHelp(opt, cmd.config, sink), formatOptionHelp(opt, cmd.config)],
      [(sink) => writeValueUsage(val, cmd.config, sink), formatValueUsage(val, cmd.config)],
      [(sink) => writeValueHelp(val, cmd.config, sink), formatValueHelp(val, cmd.config)],
    ];
    for (const [write, expected] of cases) {
      const sink = createSink();
      write(sink);
      expect(sink.text()).toBe(expected);
    }
  });
});

describe("checkUsageHelp", () => {
  it("writes usage for --usage", () => {
    const cmd = parseArgs(initCommand(schema), ["--usage"]);
    const sink = createSink();
    expect(checkUsageHelp(cmd, sink)).toBe(true);
    expect(sink.text()).toBe(formatUsage(cmd));
  });

  it("writes help for the help sub-command", () => {
    const cmd = parseArgs(initCommand(schema), ["help"]);
    const sink = createSink();
    expect(checkUsageHelp(cmd, sink)).toBe(true);
    expect(sink.text()).toBe(formatHelp(cmd));
  });

  it("prefers usage when both are requested", () => {
    const cmd = parseArgs(initCommand(schema), ["-h", "-u"]);
    const sink = createSink();
    expect(checkUsageHelp(cmd, sink)).toBe(true);
    expect(sink.text()).toBe(formatUsage(cmd));
  });

  it("writes nothing otherwise", () => {
    const cmd = parseArgs(initCommand(schema), ["in.txt", "build"]);
    const sink = createSink();
    expect(checkUsageHelp(cmd, sink)).toBe(false);
    expect(sink.text()).toBe("");
  });
});
