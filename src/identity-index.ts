// src/identity-index.ts
import type { SubdirEntry } from "./scan.js";

export type TreeSide = "working" | "archive";

export type DuplicateIdentity = {
  tree: TreeSide;
  id: string;
  paths: string[];
};

export type IdentityIndex = {
  tree: TreeSide;
  entries: SubdirEntry[];
  byId: Map<string, SubdirEntry>;
  byName: Map<string, SubdirEntry>;
  // ids carried by more than one entry; those entries are in neither map
  quarantinedIds: Set<string>;
  quarantinedNames: Set<string>;
  // names taken by something that is not a pairable directory
  occupiedNames: Set<string>;
  duplicates: DuplicateIdentity[];
};

export function buildIdentityIndex(
  entries: readonly SubdirEntry[],
  tree: TreeSide,
  occupied: readonly string[] = [],
): IdentityIndex {
  const groups = new Map<string, SubdirEntry[]>();
  for (const entry of entries) {
    if (entry.identity.kind !== "identified") continue;
    const group = groups.get(entry.identity.id);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.identity.id, [entry]);
    }
  }

  const duplicates: DuplicateIdentity[] = [];
  const quarantinedIds = new Set<string>();
  for (const [id, group] of groups) {
    if (group.length < 2) continue;
    quarantinedIds.add(id);
    duplicates.push({ tree, id, paths: group.map((e) => e.path) });
  }

  const byId = new Map<string, SubdirEntry>();
  const byName = new Map<string, SubdirEntry>();
  const quarantinedNames = new Set<string>();
  for (const entry of entries) {
    if (entry.identity.kind === "identified") {
      if (quarantinedIds.has(entry.identity.id)) {
        quarantinedNames.add(entry.name);
        continue;
      }
      byId.set(entry.identity.id, entry);
    }
    byName.set(entry.name, entry);
  }

  return {
    tree,
    entries: [...entries],
    byId,
    byName,
    quarantinedIds,
    quarantinedNames,
    occupiedNames: new Set(occupied),
    duplicates,
  };
}

export function lookupById(
  index: IdentityIndex,
  id: string,
): SubdirEntry | undefined {
  return index.byId.get(id);
}

export function lookupByName(
  index: IdentityIndex,
  name: string,
): SubdirEntry | undefined {
  return index.byName.get(name);
}

export function isQuarantined(index: IdentityIndex, entry: SubdirEntry): boolean {
  return (
    entry.identity.kind === "identified" &&
    index.quarantinedIds.has(entry.identity.id)
  );
}

export function hasName(index: IdentityIndex, name: string): boolean {
  return (
    index.byName.has(name) ||
    index.quarantinedNames.has(name) ||
    index.occupiedNames.has(name)
  );
}
