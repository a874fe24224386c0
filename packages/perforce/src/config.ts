/**
 * Server configuration, resolved once at startup from CLI options and the
 * environment.
 */

import * as z from "zod/v4";

import { type ArgumentPolicy, type Result, err, ok } from "@p4mcp/core";

import { DEFAULT_TIMEOUT_MS } from "./infrastructure/runner/P4Executor.js";

export interface P4ServerConfig {
  /** Use the offline backend instead of spawning p4 */
  readonly mock: boolean;
  readonly debug: boolean;
  readonly binary: string;
  readonly timeoutMs: number;
  readonly argumentPolicy: ArgumentPolicy;
  /** Working directory for p4. Undefined means inherited */
  readonly cwd?: string;
}

/**
 * Options as parsed by the CLI. Every field is optional; the environment and
 * defaults fill the rest.
 */
export interface CliOptions {
  mock?: boolean;
  debug?: boolean;
  p4?: string;
  timeout?: string;
  strict?: boolean;
  cwd?: string;
}

export type Environment = Record<string, string | undefined>;

const TimeoutSchema = z.coerce.number().int().positive();

/**
 * An environment flag is on when set to anything but "", "0" or "false".
 */
export function isFlagSet(value: string | undefined): boolean {
  if (value === undefined) return false;
  const normalized = value.trim().toLowerCase();
  return normalized !== "" && normalized !== "0" && normalized !== "false";
}

export function resolveConfig(options: CliOptions, env: Environment): Result<P4ServerConfig, string> {
  const rawTimeout = options.timeout ?? env.P4_TIMEOUT_MS;
  let timeoutMs = DEFAULT_TIMEOUT_MS;
  if (rawTimeout !== undefined && rawTimeout.trim() !== "") {
    const parsed = TimeoutSchema.safeParse(rawTimeout);
    if (!parsed.success) {
      return err(`Invalid timeout: ${rawTimeout} (expected a positive number of milliseconds)`);
    }
    timeoutMs = parsed.data;
  }

  const binary = options.p4 ?? env.P4_BIN;

  return ok({
    mock: options.mock === true || isFlagSet(env.P4_MOCK_MODE),
    debug: options.debug === true,
    binary: binary !== undefined && binary.trim() !== "" ? binary : "p4",
    timeoutMs,
    argumentPolicy: options.strict === true || isFlagSet(env.P4_STRICT_ARGS) ? "strict" : "lenient",
    ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
  });
}
