import { describe, it, expect } from "vitest";
import type { CommandSchema } from "@argweave/sdk";
import { SchemaError } from "@argweave/sdk";
import type { ParserConfigInput } from "@argweave/shared";
import { initCommand } from "./init.js";
import { parseArgs } from "./parser/parse.js";
import { createValueKindRegistry } from "./values/registry.js";
import { value } from "./values/value.js";
import { thrown } from "../__tests__/helpers.js";

const schema: CommandSchema = {
  name: "app",
  description: "Demo app",
  subCommands: [{ name: "build", description: "Build it" }],
  options: [{ name: "verbose", shortName: "v", longName: "verbose" }],
  values: [value.string({ name: "file" })],
};

describe("initCommand", () => {
  it("builds the runtime tree with help pseudo arguments appended", () => {
    const cmd = initCommand(schema);
    expect(cmd.subCommands.map((sub) => sub.name)).toEqual(["build", "usage", "help"]);
    expect(cmd.options.map((opt) => opt.name)).toEqual(["verbose", "usage", "help"]);
    expect(cmd.values.map((val) => val.name)).toEqual(["file"]);
    expect(cmd.realSubCommands.map((sub) => sub.name)).toEqual(["build"]);
  });

  it("describes the help pseudo arguments after their command", () => {
    const cmd = initCommand(schema);
    const usage = cmd.getSubCommand("usage");
    expect(usage?.description).toBe("Show the 'app' usage display.");
    expect(usage?.helpPrefix).toBe("app");

    const help = cmd.getOption("help");
    expect(help?.shortName).toBe("h");
    expect(help?.longName).toBe("help");
    expect(help?.value.name).toBe("help_flag");
    expect(help?.value.kind).toBe("bool");
    expect(help?.description).toBe("Show the 'app' help display.");
  });

  it("adds help pseudo arguments to every level, but no help commands under help commands", () => {
    const cmd = initCommand({ name: "app", subCommands: [{ name: "help" }] }, { config: { addHelpCmds: false } });
    expect(cmd.getSubCommand("help")?.options.map((opt) => opt.name)).toEqual(["usage", "help"]);

    const nested = initCommand({ name: "usage" });
    expect(nested.subCommands).toHaveLength(0);
  });

  it("can leave the help pseudo arguments out", () => {
    const cmd = initCommand(schema, { config: { addHelpCmds: false, addHelpOpts: false } });
    expect(cmd.subCommands.map((sub) => sub.name)).toEqual(["build"]);
    expect(cmd.options.map((opt) => opt.name)).toEqual(["verbose"]);
  });

  it("gives options without a value a bool value named after them", () => {
    const opt = initCommand(schema).getOption("verbose");
    expect(opt?.value.kind).toBe("bool");
    expect(opt?.value.name).toBe("verbose");
    expect(opt?.isBool).toBe(true);
  });

  it("inherits tree defaults unless a command or value overrides them", () => {
    const cmd = initCommand(
      {
        name: "app",
        subCommands: [{ name: "run", valsMandatory: true }],
        values: [value.u8({ name: "a" }), value.u8({ name: "b", setBehavior: "last" })],
      },
      { config: { globalSetBehavior: "first", valsMandatory: false, globalArgDelims: ":" } },
    );
    expect(cmd.valsMandatory).toBe(false);
    expect(cmd.getSubCommand("run")?.valsMandatory).toBe(true);
    expect(cmd.getValue("a")?.setBehavior).toBe("first");
    expect(cmd.getValue("a")?.argDelims).toBe(":");
    expect(cmd.getValue("b")?.setBehavior).toBe("last");
  });

  it("uses the global help prefix unless the command has one", () => {
    const cmd = initCommand(
      { name: "app", helpPrefix: "App v1", subCommands: [{ name: "run" }] },
      { config: { help: { globalHelpPrefix: "tool" } } },
    );
    expect(cmd.helpPrefix).toBe("App v1");
    expect(cmd.getSubCommand("run")?.helpPrefix).toBe("tool");
  });

  it("initializes a schema into independent trees", () => {
    const first = initCommand(schema);
    const second = initCommand(schema);
    parseArgs(first, ["in.txt", "build"]);
    expect(first.checkSubCommand("build")).toBe(true);
    expect(second.activeSubCommand).toBeUndefined();
    expect(schema.options).toHaveLength(1);
    expect(schema.subCommands).toHaveLength(1);
  });

  it("resolves custom kinds through the registry", () => {
    const registry = createValueKindRegistry();
    registry.register("csv", { typeName: "list", parse: (token) => token.split(","), splittable: false });
    const cmd = initCommand({ name: "app", values: [value.custom("csv", { name: "cols" })] }, { registry });
    expect(cmd.getValue("cols")?.typeName).toBe("list");
  });

  describe("validation", () => {
    function codeFor(bad: CommandSchema, config: ParserConfigInput = {}): string {
      return thrown(() => initCommand(bad, { config })).code;
    }

    it("rejects duplicate sibling names", () => {
      expect(codeFor({ name: "app", subCommands: [{ name: "a" }, { name: "a" }] })).toBe("DUPLICATE_NAME");
      expect(
        codeFor({ name: "app", options: [{ name: "x", shortName: "x" }, { name: "x", shortName: "y" }] }),
      ).toBe("DUPLICATE_NAME");
      expect(
        codeFor({ name: "app", options: [{ name: "x", shortName: "x" }, { name: "y", shortName: "x" }] }),
      ).toBe("DUPLICATE_NAME");
      expect(
        codeFor({ name: "app", options: [{ name: "x", longName: "same" }, { name: "y", longName: "same" }] }),
      ).toBe("DUPLICATE_NAME");
      expect(
        codeFor({ name: "app", values: [value.u8({ name: "v" }), value.string({ name: "v" })] }),
      ).toBe("DUPLICATE_NAME");
    });

    it("checks nested commands too", () => {
      const bad: CommandSchema = {
        name: "app",
        subCommands: [{ name: "run", values: [value.u8({ name: "v" }), value.u8({ name: "v" })] }],
      };
      expect(codeFor(bad)).toBe("DUPLICATE_NAME");
    });

    it("reserves the help names while help arguments are added", () => {
      const err = thrown(() => initCommand({ name: "app", subCommands: [{ name: "help" }] }));
      expect(err).toBeInstanceOf(SchemaError);
      expect(err.argument).toBe("help");
      expect(codeFor({ name: "app", options: [{ name: "hard", shortName: "h" }] })).toBe("DUPLICATE_NAME");
      expect(codeFor({ name: "app", options: [{ name: "x", longName: "usage" }] })).toBe("DUPLICATE_NAME");

      expect(() =>
        initCommand({ name: "app", options: [{ name: "hard", shortName: "h" }] }, { config: { addHelpOpts: false } }),
      ).not.toThrow();
    });

    it("requires a short or long name on every option", () => {
      expect(codeFor({ name: "app", options: [{ name: "lost" }] })).toBe("MISSING_OPTION_NAME");
    });

    it("requires single-character short names", () => {
      expect(codeFor({ name: "app", options: [{ name: "x", shortName: "xy" }] })).toBe("SCHEMA_ERROR");
    });

    it("can be switched off", () => {
      const cmd = initCommand(
        { name: "app", values: [value.u8({ name: "v" }), value.u8({ name: "v" })] },
        { config: { validateSchema: false } },
      );
      expect(cmd.values).toHaveLength(2);
    });

    it("bounds maxArgs by maxChildren", () => {
      const wide: CommandSchema = { name: "app", values: [value.u8({ name: "v", maxArgs: 12 })] };
      expect(codeFor(wide)).toBe("CAPACITY_EXCEEDED");
      expect(initCommand(wide, { config: { maxChildren: 12 } }).getValue("v")?.maxArgs).toBe(12);
    });

    it("rejects unknown value kinds", () => {
      expect(codeFor({ name: "app", values: [value.custom("uuid", { name: "id" })] })).toBe("UNKNOWN_VALUE_KIND");
    });

    it("rejects an invalid config before the schema", () => {
      expect(codeFor(schema, { maxChildren: 0 })).toBe("CONFIG_ERROR");
    });
  });
});
