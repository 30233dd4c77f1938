import { ConfigError } from "@argweave/sdk";
import { ParserConfigSchema, formatZodError } from "@argweave/shared";
import type { ParserConfig, ParserConfigInput } from "@argweave/shared";

/**
 * Validate a parser configuration and fill in its defaults.
 *
 * @throws ConfigError listing every rejected field
 */
export function resolveParserConfig(input: ParserConfigInput = {}): ParserConfig {
  const result = ParserConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid parser configuration: ${formatZodError(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}
