import { describe, it, expect } from "vitest";
import { ConfigError } from "@argweave/sdk";
import { resolveParserConfig } from "./config.js";
import { thrown } from "../__tests__/helpers.js";

describe("resolveParserConfig", () => {
  it("returns the defaults for no input", () => {
    const config = resolveParserConfig();
    expect(config.shortPrefix).toBe("-");
    expect(config.longPrefix).toBe("--");
    expect(config.maxChildren).toBe(10);
  });

  it("merges partial input with defaults", () => {
    const config = resolveParserConfig({ optValSeps: "=:", help: { indent: "  " } });
    expect(config.optValSeps).toBe("=:");
    expect(config.help.indent).toBe("  ");
    expect(config.help.subCmdsHelpFmt).toBe("{name}: {description}");
  });

  it("throws ConfigError with the rejected fields", () => {
    const err = thrown(() => resolveParserConfig({ shortPrefix: null, longPrefix: null }));
    expect(err).toBeInstanceOf(ConfigError);
    expect(err.code).toBe("CONFIG_ERROR");
    expect(err.message).toBe(
      "Invalid parser configuration: shortPrefix: Either a short or a long prefix must be set",
    );
    expect(err.cause).toBeInstanceOf(Error);
  });
});
