/**
 * Typed accessors over a tools/call argument bag.
 *
 * Under the lenient policy a missing or wrongly typed value falls back to the
 * caller's default and never fails. Under the strict policy the same
 * conditions are collected as issues and {@link ArgumentReader.finish}
 * returns them as a failure.
 */

import type { ToolArguments } from "./protocol.js";
import { type Result, err, ok } from "./result.js";

export type ArgumentPolicy = "lenient" | "strict";

export interface ValidationFailure {
  issues: string[];
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number" && Number.isInteger(value)) return "integer";
  return typeof value;
}

export class ArgumentReader {
  private readonly issues: string[] = [];

  constructor(
    private readonly args: ToolArguments,
    readonly policy: ArgumentPolicy = "lenient"
  ) {}

  optionalString(key: string): string | undefined {
    return this.read(key, "string", (value) => (typeof value === "string" ? value : undefined));
  }

  /** Missing under the lenient policy reads as "". */
  requiredString(key: string): string {
    return this.require(key, this.optionalString(key), "");
  }

  optionalBoolean(key: string): boolean | undefined {
    return this.read(key, "boolean", (value) => (typeof value === "boolean" ? value : undefined));
  }

  /** Accepts integers >= min. */
  optionalInteger(key: string, min = 0): number | undefined {
    return this.read(key, `integer >= ${min}`, (value) =>
      typeof value === "number" && Number.isInteger(value) && value >= min ? value : undefined
    );
  }

  /**
   * Read an array of strings. Non-string entries are dropped (lenient) or
   * reported one by one (strict).
   */
  optionalStringArray(key: string): string[] | undefined {
    const value = this.args[key];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value)) {
      this.reject(key, "array of strings", value);
      return undefined;
    }

    const strings: string[] = [];
    value.forEach((entry: unknown, index) => {
      if (typeof entry === "string") {
        strings.push(entry);
      } else {
        this.reject(`${key}[${index}]`, "string", entry);
      }
    });
    return strings;
  }

  /** Missing under the lenient policy reads as []. */
  requiredStringArray(key: string): string[] {
    return this.require(key, this.optionalStringArray(key), []);
  }

  /**
   * Wrap the decoded value, or the issues collected under the strict policy.
   */
  finish<T>(value: T): Result<T, ValidationFailure> {
    if (this.issues.length > 0) {
      return err({ issues: [...this.issues] });
    }
    return ok(value);
  }

  private read<T>(key: string, expected: string, pick: (value: unknown) => T | undefined): T | undefined {
    const value = this.args[key];
    if (value === undefined || value === null) return undefined;
    const picked = pick(value);
    if (picked === undefined) {
      this.reject(key, expected, value);
    }
    return picked;
  }

  private require<T>(key: string, value: T | undefined, fallback: T): T {
    if (value !== undefined) return value;
    // A present but mistyped value was already reported by reject()
    const raw = this.args[key];
    if (this.policy === "strict" && (raw === undefined || raw === null)) {
      this.issues.push(`${key}: required`);
    }
    return fallback;
  }

  private reject(key: string, expected: string, value: unknown): void {
    if (this.policy === "strict") {
      this.issues.push(`${key}: expected ${expected}, got ${describeType(value)}`);
    }
  }
}
