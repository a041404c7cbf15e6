// src/scan.ts
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { type Identity, UNIDENTIFIED, identified, readMarker } from "./identity.js";
import { createSubdirFilter } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";

export type SubdirEntry = {
  name: string;
  identity: Identity;
  path: string;
};

export type MarkerWarning = {
  path: string;
  reason: string;
};

export type TreeScan = {
  root: string;
  entries: SubdirEntry[];
  // names of children that are never paired but still take up the slot
  // (anything that is not a plain directory, or is excluded)
  occupied: string[];
  warnings: MarkerWarning[];
};

export type ScanOptions = {
  exclude?: readonly string[];
  logger?: Logger;
};

export class TreeRootError extends Error {
  constructor(
    message: string,
    public readonly root: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = "TreeRootError";
  }
}

async function assertDirectory(root: string): Promise<void> {
  try {
    const st = await stat(root);
    if (!st.isDirectory()) {
      throw new TreeRootError(`${root} is not a directory`, root, "ENOTDIR");
    }
  } catch (err) {
    if (err instanceof TreeRootError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new TreeRootError(`cannot read ${root}: ${message}`, root);
  }
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * List the immediate subdirectories of `root` with whatever identity their
 * marker carries. Symlinks are not followed. Nothing is written.
 */
export async function scanTree(
  root: string,
  opts: ScanOptions = {},
): Promise<TreeScan> {
  const logger = opts.logger ?? new NullLogger();
  const abs = path.resolve(root);
  await assertDirectory(abs);

  let dirents;
  try {
    dirents = await readdir(abs, { withFileTypes: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new TreeRootError(`cannot list ${abs}: ${message}`, abs);
  }

  const filter = createSubdirFilter(opts.exclude);
  const names: string[] = [];
  const occupied: string[] = [];
  for (const d of dirents) {
    if (!d.isDirectory()) {
      occupied.push(d.name);
    } else if (filter.excludes(d.name)) {
      logger.debug("excluded", { root: abs, name: d.name });
      occupied.push(d.name);
    } else {
      names.push(d.name);
    }
  }
  names.sort(compareNames);
  occupied.sort(compareNames);

  const entries: SubdirEntry[] = [];
  const warnings: MarkerWarning[] = [];
  for (const name of names) {
    const dir = path.join(abs, name);
    const marker = await readMarker(dir);
    let identity = UNIDENTIFIED;
    switch (marker.status) {
      case "valid":
        identity = identified(marker.id);
        break;
      case "invalid":
        warnings.push({ path: dir, reason: marker.reason });
        logger.warn(`ignoring invalid identity marker in '${dir}'`, {
          reason: marker.reason,
        });
        break;
      case "unreadable":
        logger.warn(`cannot read identity marker in '${dir}'`, {
          error: marker.error,
        });
        break;
      case "absent":
        break;
    }
    entries.push({ name, identity, path: dir });
  }
  logger.debug("scanned", {
    root: abs,
    subdirs: entries.length,
    marked: entries.filter((e) => e.identity.kind === "identified").length,
  });
  return { root: abs, entries, occupied, warnings };
}
