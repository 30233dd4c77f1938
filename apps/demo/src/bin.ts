#!/usr/bin/env node

/**
 * weave-demo entry point.
 *
 *   weave-demo [options] [label] [confirm] [sizes...]
 *   weave-demo nested [-c <count>] [-n <note>] [ratio]
 *   weave-demo add-user --first-name <name> --age <years> ...
 *   weave-demo help | usage
 */

import { run } from "./run.js";

function main(): Promise<number> {
  return Promise.resolve().then(() => run(process.argv.slice(2), { out: process.stdout, err: process.stderr }));
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
