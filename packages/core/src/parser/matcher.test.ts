import { describe, it, expect } from "vitest";
import { resolveParserConfig } from "../config.js";
import { initCommand } from "../init.js";
import {
  longOptionBody,
  looksLikeOption,
  looksNumeric,
  matchLongOption,
  shortOptionBody,
  splitInline,
} from "./matcher.js";

const config = resolveParserConfig();

describe("looksNumeric", () => {
  it("accepts signed numbers", () => {
    for (const token of ["-5", "+5", "-1.5", "-.5", "-1e3", "-0x1f", "42"]) {
      expect(looksNumeric(token)).toBe(true);
    }
  });

  it("accepts the special float words", () => {
    for (const token of ["-inf", "+Infinity", "-nan", "NaN"]) {
      expect(looksNumeric(token)).toBe(true);
    }
  });

  it("rejects options and words", () => {
    for (const token of ["-v", "--5", "-", "-e5", "five", "-info", "--inf"]) {
      expect(looksNumeric(token)).toBe(false);
    }
  });
});

describe("option token bodies", () => {
  it("strips the long prefix", () => {
    expect(longOptionBody(config, "--verbose")).toBe("verbose");
    expect(longOptionBody(config, "--")).toBeUndefined();
    expect(longOptionBody(config, "-v")).toBeUndefined();
  });

  it("strips the short prefix but never from long options", () => {
    expect(shortOptionBody(config, "-abc")).toBe("abc");
    expect(shortOptionBody(config, "--abc")).toBeUndefined();
    expect(shortOptionBody(config, "-")).toBeUndefined();
  });

  it("follows disabled and custom prefixes", () => {
    const slashes = resolveParserConfig({ shortPrefix: "/", longPrefix: null });
    expect(shortOptionBody(slashes, "/v")).toBe("v");
    expect(shortOptionBody(slashes, "-v")).toBeUndefined();
    expect(longOptionBody(slashes, "--verbose")).toBeUndefined();
  });

  it("does not treat numbers as options", () => {
    expect(looksLikeOption(config, "-5")).toBe(false);
    expect(looksLikeOption(config, "-v")).toBe(true);
    expect(looksLikeOption(config, "--x")).toBe(true);
    expect(looksLikeOption(config, "plain")).toBe(false);
  });
});

describe("splitInline", () => {
  it("splits on the first separator", () => {
    expect(splitInline(config, "name=a=b")).toEqual({ name: "name", inline: "a=b" });
    expect(splitInline(config, "name")).toEqual({ name: "name" });
    expect(splitInline(config, "name=")).toEqual({ name: "name", inline: "" });
  });

  it("accepts every configured separator", () => {
    const multi = resolveParserConfig({ optValSeps: "=:" });
    expect(splitInline(multi, "port:80")).toEqual({ name: "port", inline: "80" });
  });
});

describe("matchLongOption", () => {
  const { options } = initCommand({
    name: "app",
    options: [
      { name: "verbose", longName: "verbose" },
      { name: "version", longName: "version" },
      { name: "ver", longName: "ver" },
    ],
  });

  it("prefers an exact match", () => {
    expect(matchLongOption(options, "ver", true)?.name).toBe("ver");
    expect(matchLongOption(options, "version", true)?.name).toBe("version");
  });

  it("takes the first declared option for an abbreviation", () => {
    expect(matchLongOption(options, "ve", true)?.name).toBe("verbose");
    expect(matchLongOption(options, "verb", true)?.name).toBe("verbose");
    expect(matchLongOption(options, "vers", true)?.name).toBe("version");
  });

  it("can refuse abbreviations", () => {
    expect(matchLongOption(options, "verb", false)).toBeUndefined();
  });
});
