/**
 * Core domain types for the perforce package.
 */

/**
 * One p4 operation with its parameters.
 */
export type P4Command =
  | { kind: "status"; path?: string }
  | { kind: "sync"; path: string; force: boolean }
  | { kind: "edit"; files: string[] }
  | { kind: "add"; files: string[] }
  | { kind: "submit"; description: string; files?: string[] }
  | { kind: "revert"; files: string[] }
  | { kind: "opened"; changelist?: string }
  | { kind: "changes"; max: number; path?: string }
  | { kind: "info" };

/**
 * A program and its argument vector. Arguments are passed to the process as
 * they are, never joined or quoted.
 */
export interface Invocation {
  program: string;
  args: string[];
}

/**
 * Why a real p4 run produced no output.
 */
export type ExecutionError =
  | {
      kind: "tool_failed";
      /** null when the process was ended by a signal */
      exitCode: number | null;
      stderr: string;
      message: string;
    }
  | { kind: "spawn_failed"; message: string }
  | { kind: "timed_out"; timeoutMs: number; message: string };

export function toolFailed(exitCode: number | null, stderr: string): ExecutionError {
  const trimmed = stderr.trim();
  return {
    kind: "tool_failed",
    exitCode,
    stderr: trimmed,
    message: trimmed ? `p4 command failed: ${trimmed}` : `p4 exited with code ${exitCode}`,
  };
}

export function spawnFailed(cause: string): ExecutionError {
  return { kind: "spawn_failed", message: `Failed to spawn p4: ${cause}` };
}

export function timedOut(timeoutMs: number): ExecutionError {
  return { kind: "timed_out", timeoutMs, message: `p4 command timed out after ${timeoutMs}ms` };
}
