/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" references are left untouched
    return input;
  }

  return path.join(homedir(), match[2] ?? "");
}

/**
 * Resolve the storage root override
 * Priority: --root option > PATHTABLE_ROOT env var > none (the config decides)
 */
export function resolveRoot(cliRoot?: string): string | undefined {
  const root = cliRoot ?? process.env.PATHTABLE_ROOT;
  return root ? path.resolve(expandTilde(root)) : undefined;
}

/**
 * Resolve the --config option; without it the SDK looks at PATHTABLE_CONFIG
 * and then the working directory
 */
export function resolveConfigPath(cliConfig?: string): string | undefined {
  return cliConfig ? path.resolve(expandTilde(cliConfig)) : undefined;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(flag?: boolean): boolean {
  return flag === true || process.env.PATHTABLE_CLI_DEBUG === "1";
}
