// src/reconcile.ts
import {
  hasName,
  isQuarantined,
  lookupById,
  lookupByName,
  type IdentityIndex,
} from "./identity-index.js";
import type { SubdirEntry } from "./scan.js";

export type ActingAction = "SYNC" | "SYNC_AND_ASSIGN" | "CREATE_AND_ASSIGN";

export const ANOMALY_CATEGORIES = [
  "AMBIGUOUS",
  "UNSYNCED_NEW",
  "UNSYNCED_MISSING",
  "DUPLICATE_IDENTITY",
] as const;

export type AnomalyCategory = (typeof ANOMALY_CATEGORIES)[number];

export type PairingAction = ActingAction | AnomalyCategory;

export type SyncPairing = {
  action: "SYNC";
  working: SubdirEntry;
  archive: SubdirEntry;
  // set when the archive copy has to be renamed to the working name first
  renameFrom?: string;
};

export type SyncAndAssignPairing = {
  action: "SYNC_AND_ASSIGN";
  working: SubdirEntry;
  archive: SubdirEntry;
};

export type CreateAndAssignPairing = {
  action: "CREATE_AND_ASSIGN";
  working: SubdirEntry;
};

export type SkippedPairing = {
  action: AnomalyCategory;
  working: SubdirEntry;
  archive?: SubdirEntry;
  reason: string;
};

export type ActingPairing =
  | SyncPairing
  | SyncAndAssignPairing
  | CreateAndAssignPairing;

export type Pairing = ActingPairing | SkippedPairing;

export type Anomaly = {
  category: AnomalyCategory;
  paths: string[];
  message: string;
};

export type ReconcilePolicy = {
  autoSyncNew: boolean;
};

export type ReconcilePlan = {
  pairings: Pairing[];
  anomalies: Anomaly[];
  // archive entries no pairing refers to; they are never touched
  untouchedArchive: SubdirEntry[];
};

export function isActing(pairing: Pairing): pairing is ActingPairing {
  return (
    pairing.action === "SYNC" ||
    pairing.action === "SYNC_AND_ASSIGN" ||
    pairing.action === "CREATE_AND_ASSIGN"
  );
}

function skip(
  action: AnomalyCategory,
  working: SubdirEntry,
  reason: string,
  archive?: SubdirEntry,
): SkippedPairing {
  return archive
    ? { action, working, archive, reason }
    : { action, working, reason };
}

/**
 * Decide what happens to a single working entry. Identity matching is
 * always tried first; names are only consulted for unmarked entries or to
 * detect that the slot an entry would need is already taken.
 */
export function pairEntry(
  w: SubdirEntry,
  W: IdentityIndex,
  A: IdentityIndex,
  policy: ReconcilePolicy,
): Pairing {
  if (isQuarantined(W, w)) {
    return skip(
      "DUPLICATE_IDENTITY",
      w,
      "identity is shared with another working directory",
    );
  }

  if (w.identity.kind === "identified") {
    const id = w.identity.id;
    if (A.quarantinedIds.has(id)) {
      return skip(
        "DUPLICATE_IDENTITY",
        w,
        "identity is carried by more than one archive directory",
      );
    }
    const a = lookupById(A, id);
    if (a) {
      if (a.name === w.name) {
        return { action: "SYNC", working: w, archive: a };
      }
      if (hasName(A, w.name)) {
        return skip(
          "AMBIGUOUS",
          w,
          `renamed from '${a.name}' but the archive already has '${w.name}'`,
          a,
        );
      }
      return { action: "SYNC", working: w, archive: a, renameFrom: a.name };
    }
    const sameName = lookupByName(A, w.name);
    if (sameName) {
      return skip(
        "AMBIGUOUS",
        w,
        "marked, but the archive directory of the same name has a different identity",
        sameName,
      );
    }
    if (A.occupiedNames.has(w.name)) {
      return skip(
        "AMBIGUOUS",
        w,
        "marked, but the archive has a non-directory of the same name",
      );
    }
    if (A.quarantinedNames.has(w.name)) {
      return skip(
        "AMBIGUOUS",
        w,
        "marked, but the archive directory of the same name has a duplicated identity",
      );
    }
    return skip(
      "UNSYNCED_MISSING",
      w,
      "marked, but no archive directory carries its identity",
    );
  }

  const a = lookupByName(A, w.name);
  if (a) {
    if (a.identity.kind === "unidentified") {
      return { action: "SYNC_AND_ASSIGN", working: w, archive: a };
    }
    return skip(
      "AMBIGUOUS",
      w,
      "unmarked, but the archive directory of the same name is marked",
      a,
    );
  }
  if (A.quarantinedNames.has(w.name)) {
    return skip(
      "AMBIGUOUS",
      w,
      "unmarked, but the archive directory of the same name has a duplicated identity",
    );
  }
  if (A.occupiedNames.has(w.name)) {
    return skip(
      "AMBIGUOUS",
      w,
      "unmarked, but the archive has a non-directory of the same name",
    );
  }
  if (policy.autoSyncNew) {
    return { action: "CREATE_AND_ASSIGN", working: w };
  }
  return skip("UNSYNCED_NEW", w, "new, not in the archive yet");
}

function anomalyFor(pairing: SkippedPairing): Anomaly {
  const paths = [pairing.working.path];
  if (pairing.archive) paths.push(pairing.archive.path);
  return { category: pairing.action, paths, message: pairing.reason };
}

function duplicateAnomalies(index: IdentityIndex): Anomaly[] {
  return index.duplicates.map((dup): Anomaly => ({
    category: "DUPLICATE_IDENTITY",
    paths: dup.paths,
    message: `${dup.paths.length} ${dup.tree} directories share identity '${dup.id}'`,
  }));
}

export function planReconciliation(
  W: IdentityIndex,
  A: IdentityIndex,
  policy: ReconcilePolicy,
): ReconcilePlan {
  const pairings = W.entries.map((w) => pairEntry(w, W, A, policy));

  // one anomaly per duplicated id covers every pairing it blocked
  const anomalies = [...duplicateAnomalies(W), ...duplicateAnomalies(A)];
  for (const pairing of pairings) {
    if (isActing(pairing) || pairing.action === "DUPLICATE_IDENTITY") continue;
    anomalies.push(anomalyFor(pairing));
  }

  const referenced = new Set<string>();
  for (const pairing of pairings) {
    if ("archive" in pairing && pairing.archive) {
      referenced.add(pairing.archive.path);
    }
  }
  const untouchedArchive = A.entries.filter((a) => !referenced.has(a.path));

  return { pairings, anomalies, untouchedArchive };
}

export function describePairing(pairing: Pairing): string {
  switch (pairing.action) {
    case "SYNC":
      return pairing.renameFrom === undefined
        ? "re-syncing"
        : `has been renamed from '${pairing.renameFrom}', archive to be updated`;
    case "SYNC_AND_ASSIGN":
      return "first sync of existing archive directory, assigning identity";
    case "CREATE_AND_ASSIGN":
      return "NEW, creating archive copy";
    default:
      return `SKIPPING (${pairing.action}): ${pairing.reason}`;
  }
}
