#!/usr/bin/env -S node --import tsx
/**
 * binembed CLI - embed files into C++ sources
 */

import { runCli } from "./cli.js";

// Run CLI with arguments (skip node and script name)
const args = process.argv.slice(2);

runCli(args)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
