/**
 * Zod schema for the parser configuration.
 *
 * Every field has a default, so `ParserConfigSchema.parse({})` yields the
 * stock configuration: `-` short prefix, `--` long prefix, `=` separator,
 * abbreviated long options and no-space values allowed, `last` set
 * behavior, `,;` delimiters and ten slots per value.
 */

import { z } from "zod";

export const SetBehaviorSchema = z.enum(["first", "last", "multi"]);

export const HelpFormatSchema = z.object({
  /** Indent unit used by help output. */
  indent: z.string().default("    "),
  /** Help prefix for commands that do not declare one. */
  globalHelpPrefix: z.string().default(""),
  /** Placeholders: {name} {description} */
  subCmdsHelpFmt: z.string().default("{name}: {description}"),
  /** Placeholders: {name} {type} {description} */
  valsHelpFmt: z.string().default("{name} ({type}): {description}"),
  /** Placeholders: {name} */
  subCmdsUsageFmt: z.string().default("'{name}'"),
  /** Placeholders: {name} {type} */
  valsUsageFmt: z.string().default("\"{name} ({type})\""),
  /** Placeholders: {short} {long} {valueName} {valueType} */
  optUsageFmt: z.string().default("[{short},{long} \"{valueName} ({valueType})\"]"),
  /** Placeholders: {name} {description}. Null uses the multi-line layout. */
  optHelpFmt: z.string().nullable().default(null),
});

export const ParserConfigSchema = z
  .object({
    shortPrefix: z.string().length(1, "Short prefix must be a single character").nullable().default("-"),
    longPrefix: z.string().min(1, "Long prefix must not be empty").nullable().default("--"),
    optValSeps: z.string().default("="),
    allowOptValNoSpace: z.boolean().default(true),
    allowAbbreviatedLongOpts: z.boolean().default(true),
    globalSetBehavior: SetBehaviorSchema.default("last"),
    globalArgDelims: z.string().default(",;"),
    maxChildren: z.number().int().min(1).max(127).default(10),
    subCmdsMandatory: z.boolean().default(true),
    valsMandatory: z.boolean().default(true),
    addHelpCmds: z.boolean().default(true),
    addHelpOpts: z.boolean().default(true),
    validateSchema: z.boolean().default(true),
    help: HelpFormatSchema.default({}),
  })
  .refine((config) => config.shortPrefix !== null || config.longPrefix !== null, {
    message: "Either a short or a long prefix must be set",
    path: ["shortPrefix"],
  })
  .refine(
    (config) =>
      config.shortPrefix === null ||
      config.longPrefix === null ||
      config.longPrefix !== config.shortPrefix,
    {
      message: "Short and long prefixes must differ",
      path: ["longPrefix"],
    },
  );

export type ParserConfigInput = z.input<typeof ParserConfigSchema>;
export type ParserConfig = z.infer<typeof ParserConfigSchema>;
export type HelpFormat = z.infer<typeof HelpFormatSchema>;
