/**
 * Offline backend: canned p4-like output that echoes the command's
 * parameters. Deterministic, never spawns and never fails.
 */

import { type Result, ok } from "@p4mcp/core";

import type { ExecutionError, P4Command } from "../../core/model.js";
import type { P4Backend } from "../../core/ports/index.js";

const OPENED_FILES = [
  "//depot/main/file1.txt#1 - edit default change (text)",
  "//depot/main/file2.cpp#2 - add default change (text)",
];

const MAX_MOCK_CHANGES = 5;

const INFO_LINES = [
  "Mock P4 Info:",
  "User name: mockuser",
  "Client name: mock-client",
  "Client host: mock-host",
  "Client root: /workspace/mock-client",
  "Current directory: /workspace/mock-client/main",
  "Peer address: 127.0.0.1:1666",
  "Server address: perforce.example.com:1666",
  "Server root: /opt/perforce/depot",
  "Server version: P4D/LINUX26X86_64/2023.1/2553040 (2023/06/15)",
  "ServerID: mock-server",
  "Case Handling: sensitive",
];

function fileReport(title: string, heading: string, files: string[], outcome: string): string {
  return [`Mock P4 ${title}:`, `${heading}:`, files.join(", "), `... ${files.length} file(s) ${outcome}`].join("\n");
}

export function renderMockOutput(command: P4Command): string {
  switch (command.kind) {
    case "status":
      return [`Mock P4 Status for ${command.path ?? "current directory"}:`, ...OPENED_FILES, "... (mock data)"].join(
        "\n"
      );

    case "sync":
      return [
        `Mock P4 Sync${command.force ? " (forced)" : ""} of ${command.path}:`,
        "//depot/main/file1.txt#1 - updating /local/workspace/file1.txt",
        "//depot/main/file2.cpp#2 - updating /local/workspace/file2.cpp",
        "... synced 15 files",
      ].join("\n");

    case "edit":
      return fileReport("Edit", "Files opened for edit", command.files, "opened for edit");

    case "add":
      return fileReport("Add", "Files opened for add", command.files, "opened for add");

    case "revert":
      return fileReport("Revert", "Files reverted", command.files, "reverted");

    case "submit": {
      const files = command.files ? `Specific files: ${command.files.join(", ")}` : "All opened files";
      return [
        "Mock P4 Submit:",
        `Change description: ${command.description}`,
        `Files: ${files}`,
        "Change 12345 submitted successfully",
      ].join("\n");
    }

    case "opened": {
      const scope = command.changelist !== undefined ? ` in changelist ${command.changelist}` : "";
      return [`Mock P4 Opened${scope}:`, ...OPENED_FILES, "//depot/main/file3.h#1 - edit change 12346 (text)"].join(
        "\n"
      );
    }

    case "changes": {
      const scope = command.path !== undefined ? ` for path ${command.path}` : "";
      const count = Math.min(command.max, MAX_MOCK_CHANGES);
      const lines = Array.from(
        { length: count },
        (_, i) => `Change ${12350 - i} on 2024/01/${15 - i} by user@workspace 'Sample change description ${i + 1}'`
      );
      return [`Mock P4 Changes (max: ${command.max})${scope}:`, ...lines].join("\n");
    }

    case "info":
      return INFO_LINES.join("\n");
  }
}

export class MockBackend implements P4Backend {
  readonly name = "mock";

  async execute(command: P4Command): Promise<Result<string, ExecutionError>> {
    return ok(renderMockOutput(command));
  }
}
