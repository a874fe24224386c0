/**
 * Invocation builder: maps a command to the p4 argument vector.
 */

import type { Invocation, P4Command } from "./model.js";

export const P4_PROGRAM = "p4";

export function toInvocation(command: P4Command): Invocation {
  return { program: P4_PROGRAM, args: toArgs(command) };
}

function toArgs(command: P4Command): string[] {
  switch (command.kind) {
    case "status":
      return command.path !== undefined ? ["opened", command.path] : ["opened"];
    case "sync":
      return ["sync", ...(command.force ? ["-f"] : []), command.path];
    case "edit":
    case "add":
    case "revert":
      return [command.kind, ...command.files];
    case "submit":
      return ["submit", "-d", command.description, ...(command.files ?? [])];
    case "opened":
      return command.changelist !== undefined ? ["opened", "-c", command.changelist] : ["opened"];
    case "changes":
      return ["changes", "-m", String(command.max), ...(command.path !== undefined ? [command.path] : [])];
    case "info":
      return ["info"];
  }
}

/**
 * Render an invocation for log lines. Not suitable for a shell.
 */
export function describeInvocation(invocation: Invocation): string {
  const args = invocation.args.map((arg) => (arg === "" || /[\s"]/.test(arg) ? JSON.stringify(arg) : arg));
  return [invocation.program, ...args].join(" ");
}
