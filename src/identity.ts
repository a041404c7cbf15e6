// src/identity.ts
import { randomUUID } from "node:crypto";
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { MARKER_FILENAME, MAX_IDENTITY_LENGTH } from "./constants.js";

export type Identity =
  | { kind: "identified"; id: string }
  | { kind: "unidentified" };

export const UNIDENTIFIED: Identity = { kind: "unidentified" };

export function identified(id: string): Identity {
  return { kind: "identified", id };
}

export function identityId(identity: Identity): string | undefined {
  return identity.kind === "identified" ? identity.id : undefined;
}

export type MarkerParse =
  | { status: "absent" }
  | { status: "valid"; id: string }
  | { status: "invalid"; reason: string };

export type MarkerRead = MarkerParse | { status: "unreadable"; error: string };

// control characters, including DEL
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

export function markerPath(dir: string): string {
  return path.join(dir, MARKER_FILENAME);
}

export function isValidIdentity(id: string): boolean {
  return (
    id.length > 0 &&
    id.length <= MAX_IDENTITY_LENGTH &&
    id.trim() === id &&
    !CONTROL_CHARS.test(id)
  );
}

/**
 * The id is the first line of the marker with surrounding whitespace
 * removed. Blank trailing lines are fine; any further content is not.
 */
export function parseMarker(raw: string): MarkerParse {
  const lines = raw.split(/\r?\n/);
  const nonBlank = lines.map((line) => line.trim()).filter(Boolean);
  if (!nonBlank.length) {
    return { status: "absent" };
  }
  const first = lines[0].trim();
  if (!first) {
    return { status: "invalid", reason: "first line is blank" };
  }
  if (nonBlank.length > 1) {
    return {
      status: "invalid",
      reason: `expected a single line, found ${nonBlank.length}`,
    };
  }
  if (first.length > MAX_IDENTITY_LENGTH) {
    return {
      status: "invalid",
      reason: `identifier longer than ${MAX_IDENTITY_LENGTH} characters`,
    };
  }
  if (!isValidIdentity(first)) {
    return { status: "invalid", reason: "identifier has control characters" };
  }
  return { status: "valid", id: first };
}

export function formatMarker(id: string): string {
  return `${id}\n`;
}

export async function readMarker(dir: string): Promise<MarkerRead> {
  let raw: string;
  try {
    raw = await readFile(markerPath(dir), "utf8");
  } catch (err) {
    const code = errorCode(err);
    // a directory named like the marker is treated like a missing marker
    if (code === "ENOENT" || code === "ENOTDIR" || code === "EISDIR") {
      return { status: "absent" };
    }
    return {
      status: "unreadable",
      error: err instanceof Error ? err.message : String(err),
    };
  }
  return parseMarker(raw);
}

export async function writeMarker(dir: string, id: string): Promise<void> {
  if (!isValidIdentity(id)) {
    throw new Error(`refusing to write invalid identifier ${JSON.stringify(id)}`);
  }
  await writeFile(markerPath(dir), formatMarker(id), "utf8");
}

export function generateIdentity(): string {
  return randomUUID();
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
