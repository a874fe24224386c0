/**
 * p4 command executor.
 * Spawns the p4 binary with an argument vector, no shell, with a timeout.
 */

import { spawn } from "node:child_process";

import { type Logger, type Result, err, ok, silentLogger, tryCatch } from "@p4mcp/core";

import { describeInvocation, toInvocation } from "../../core/commands.js";
import { type ExecutionError, type P4Command, spawnFailed, timedOut, toolFailed } from "../../core/model.js";
import type { P4Backend } from "../../core/ports/index.js";

export const DEFAULT_TIMEOUT_MS = 30000;

export interface P4ExecutorOptions {
  /** Path or name of the p4 binary. Default: p4 */
  binary?: string;
  /** Default: 30000 */
  timeoutMs?: number;
  /** Working directory for the child. Default: inherited */
  cwd?: string;
  logger?: Logger;
}

export class P4Executor implements P4Backend {
  readonly name = "p4";

  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly cwd: string | undefined;
  private readonly logger: Logger;

  constructor(options: P4ExecutorOptions = {}) {
    this.binary = options.binary ?? "p4";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.cwd = options.cwd;
    this.logger = options.logger ?? silentLogger;
  }

  execute(command: P4Command): Promise<Result<string, ExecutionError>> {
    const invocation = toInvocation(command);
    this.logger.debug(`Executing ${describeInvocation(invocation)}`);
    return this.exec(invocation.args);
  }

  /**
   * Run p4 with the given arguments and return stdout.
   */
  exec(args: string[]): Promise<Result<string, ExecutionError>> {
    const timeoutMs = this.timeoutMs;

    return new Promise((resolve) => {
      // spawn throws outright on invalid arguments (e.g. a NUL byte)
      const spawned = tryCatch(() =>
        spawn(this.binary, args, {
          cwd: this.cwd,
          stdio: ["ignore", "pipe", "pipe"],
        })
      );
      if (!spawned.ok) {
        resolve(err(spawnFailed(spawned.error.message)));
        return;
      }
      const proc = spawned.value;

      let stdout = "";
      let stderr = "";
      let resolved = false;

      const timeout = setTimeout(() => {
        if (!resolved) {
          resolved = true;
          proc.kill("SIGTERM");
          this.logger.warn(`p4 ${args[0] ?? ""} timed out after ${timeoutMs}ms`);
          resolve(err(timedOut(timeoutMs)));
        }
      }, timeoutMs);

      proc.stdout.setEncoding("utf8");
      proc.stderr.setEncoding("utf8");

      proc.stdout.on("data", (data: string) => {
        stdout += data;
      });

      proc.stderr.on("data", (data: string) => {
        stderr += data;
      });

      proc.on("close", (code) => {
        if (resolved) return;
        resolved = true;
        clearTimeout(timeout);
        if (code === 0) {
          resolve(ok(stdout));
        } else {
          resolve(err(toolFailed(code, stderr)));
        }
      });

      proc.on("error", (error) => {
        if (resolved) return;
        resolved = true;
        clearTimeout(timeout);
        resolve(err(spawnFailed(error.message)));
      });
    });
  }
}
