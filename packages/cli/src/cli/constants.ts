/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

export const VERSION =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  ok: 0,
  config: 1,
  unknownCommand: 2,
  usage: 3,
  input: 4,
  generation: 5,
  inspect: 6,
} as const;
