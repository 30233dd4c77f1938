/**
 * Command tree of the demo CLI.
 */

import type { CommandSchema } from "@argweave/sdk";
import type { ParserConfigInput } from "@argweave/shared";
import { parseFns, parseInteger, validFns, value } from "@argweave/core";

export const demoConfig: ParserConfigInput = {
  subCmdsMandatory: false,
  valsMandatory: false,
  help: { globalHelpPrefix: "weave-demo" },
};

export const ROLES = ["admin", "member", "guest"] as const;

const nestedCmd: CommandSchema = {
  name: "nested",
  description: "A nested sub-command.",
  options: [
    {
      name: "count",
      shortName: "c",
      longName: "count",
      description: "A nested integer option.",
      value: value.u8({ name: "count_val", description: "A nested integer value.", defaultValue: 203 }),
    },
    {
      name: "note",
      shortName: "n",
      longName: "note",
      description: "A nested string option.",
      value: value.string({ name: "note_val", description: "A nested string value.", defaultValue: "none" }),
    },
  ],
  values: [value.f32({ name: "ratio", description: "A nested float value.", defaultValue: 0 })],
};

const addUserCmd: CommandSchema = {
  name: "add-user",
  description: "Add a user.",
  options: [
    {
      name: "first-name",
      longName: "first-name",
      description: "First name.",
      value: value.string({ name: "first", parseFn: parseFns.trimWhitespace }),
    },
    {
      name: "last-name",
      longName: "last-name",
      description: "Last name.",
      value: value.string({ name: "last", parseFn: parseFns.trimWhitespace }),
    },
    {
      name: "age",
      shortName: "a",
      longName: "age",
      description: "Age in years.",
      value: value.u8({ name: "years", validFn: validFns.inRange(1, 150) }),
    },
    {
      name: "id",
      shortName: "i",
      longName: "id",
      description: "Hexadecimal user id.",
      value: value.u32({ name: "hex_id", parseFn: parseFns.asBase("u32", 16) }),
    },
    {
      name: "role",
      shortName: "r",
      longName: "role",
      description: `One of: ${ROLES.join(", ")}.`,
      value: value.string({ name: "role_val", defaultValue: "member", parseFn: parseFns.asEnum(ROLES) }),
    },
  ],
};

export const demoSchema: CommandSchema = {
  name: "weave-demo",
  description: "A demo of the argweave argument parser.",
  subCommands: [nestedCmd, addUserCmd],
  options: [
    {
      name: "tag",
      shortName: "t",
      longName: "tag",
      description: "A tag. (Can be given up to 4 times.)",
      value: value.string({ name: "tag_val", setBehavior: "multi", maxArgs: 4, defaultValue: "untagged" }),
    },
    {
      name: "level",
      shortName: "l",
      longName: "level",
      description: "A level below 666. (Can be given up to 10 times.)",
      value: value.i16({ name: "level_val", setBehavior: "multi", maxArgs: 10, validFn: (level) => level < 666 }),
    },
    {
      name: "file",
      shortName: "f",
      longName: "file",
      description: "A readable file path.",
      value: value.string({ name: "path", validFn: validFns.validFilepath }),
    },
    {
      name: "place",
      shortName: "p",
      longName: "place",
      description: "An ordinal from first to tenth.",
      value: value.string({ name: "ordinal", validFn: validFns.ordinalNum }),
    },
    {
      name: "quiet",
      shortName: "q",
      longName: "quiet",
      description: "A boolean option.",
    },
    {
      name: "verbosity",
      shortName: "v",
      longName: "verbosity",
      description: "Verbosity from 0 (error) to 3 (debug).",
      value: value.u8({ name: "verbosity_level", defaultValue: 3, validFn: validFns.inRange(0, 3) }),
    },
  ],
  values: [
    value.string({ name: "label", description: "A label for the run.", parseFn: parseFns.trimWhitespace }),
    value.bool({
      name: "confirm",
      description: "A boolean value that also takes 'sure' and 'nope'.",
      parseFn: parseFns.altBool(["sure", "true"], ["nope", "false"], "error"),
    }),
    value.u64({
      name: "sizes",
      description: "Sizes in hundreds, between 123456 and 9999999999 once scaled.",
      setBehavior: "multi",
      maxArgs: 3,
      defaultValue: 654321n,
      parseFn: (token) => parseInteger(token, "u64") * 100n,
      validFn: validFns.inRange(123456n, 9999999999n),
    }),
  ],
};
