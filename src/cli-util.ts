// src/cli-util.ts
import { InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import path from "node:path";
import { OperatorCommandError } from "./archive.js";
import { TreeRootError } from "./scan.js";

export { EXIT_FATAL, EXIT_OK, EXIT_UNSYNCED } from "./constants.js";

// repeatable option whose values are taken verbatim (rsync args may contain commas)
export function collectRepeated(value: string, previous: string[] = []): string[] {
  return previous.concat([value]);
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return n;
}

export function isExpectedFailure(err: unknown): err is Error {
  return err instanceof TreeRootError || err instanceof OperatorCommandError;
}

export function packageVersion(): string {
  try {
    const raw = readFileSync(path.join(__dirname, "..", "package.json"), "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
  } catch (err) {
    if (process.env.NODE_DEBUG) console.error("cannot read package.json", err);
  }
  return "0.0.0";
}
