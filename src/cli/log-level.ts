// src/cli/log-level.ts

import type { LogLevel } from "../util/logger";

/**
 * Log level requested by CLI flags, or undefined to keep the default.
 * --quiet still lets errors through to stderr.
 */
export function cliLogLevel(opts: { quiet?: boolean; debug?: boolean }): LogLevel | undefined {
  if (opts.quiet) return "error";
  if (opts.debug) return "debug";
  return undefined;
}
