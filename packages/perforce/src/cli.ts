/**
 * Command-line parsing.
 */

import { Command } from "commander";

import type { Result } from "@p4mcp/core";

import { type CliOptions, type Environment, type P4ServerConfig, resolveConfig } from "./config.js";

export const SERVER_NAME = "p4-mcp";
export const SERVER_VERSION = "0.1.0";

export function createProgram(): Command {
  return new Command()
    .name(SERVER_NAME)
    .description("Perforce tools over line-delimited JSON on stdin/stdout")
    .version(SERVER_VERSION)
    .option("--mock", "use canned output instead of running p4 (env: P4_MOCK_MODE)")
    .option("-d, --debug", "log debug output to stderr")
    .option("--p4 <path>", "p4 binary to run (env: P4_BIN)")
    .option("--timeout <ms>", "kill p4 after this many milliseconds (env: P4_TIMEOUT_MS)")
    .option("--strict", "reject malformed tool arguments instead of defaulting them (env: P4_STRICT_ARGS)")
    .option("--cwd <dir>", "working directory for p4")
    .allowExcessArguments(false);
}

/**
 * Parse argv (as in process.argv) into a server configuration.
 * --help and --version print and exit inside commander.
 */
export function parseCli(argv: string[], env: Environment, program: Command = createProgram()): Result<P4ServerConfig, string> {
  program.parse(argv);
  return resolveConfig(program.opts<CliOptions>(), env);
}
