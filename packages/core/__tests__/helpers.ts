import { ArgError } from "@argweave/sdk";

/** Run `fn` and return the ArgError it throws. Anything else fails the test. */
export function thrown(fn: () => unknown): ArgError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ArgError) return err;
    throw err;
  }
  throw new Error("Expected an ArgError to be thrown");
}

/** Collects everything written to it. */
export function createSink(): { write(chunk: string): void; text(): string } {
  const chunks: string[] = [];
  return {
    write(chunk: string): void {
      chunks.push(chunk);
    },
    text: () => chunks.join(""),
  };
}
