// src/executor.ts
import { lstat, rename as fsRename } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_CONCURRENCY, DRY_RUN_PREFIX } from "./constants.js";
import { detectFileRenames } from "./file-renames.js";
import {
  errorCode,
  generateIdentity as randomIdentity,
  markerPath,
  writeMarker as writeMarkerFile,
} from "./identity.js";
import { NullLogger, type Logger } from "./logger.js";
import { isActing, type ActingPairing, type ReconcilePlan } from "./reconcile.js";
import { rsyncMirror } from "./rsync.js";

/**
 * Everything the reconciler's plan needs done to the filesystem. The plan
 * itself never touches a tree; tests swap in a recording implementation.
 */
export interface ActionExecutor {
  mirror(sourcePath: string, destPath: string): Promise<void>;
  // returns the path the directory ends up at
  rename(dirPath: string, newName: string): Promise<string>;
  writeMarker(dirPath: string, id: string): Promise<void>;
  // rejects when anything, even a dangling symlink, is at `destPath`
  assertAbsent(destPath: string): Promise<void>;
  generateIdentity(): string;
  // runs before each mirror into an existing archive directory
  prepare?(sourcePath: string, destPath: string): Promise<void>;
}

export type MirrorFn = (
  source: string,
  dest: string,
  opts: { dryRun: boolean; logger: Logger },
) => Promise<void>;

export type FsExecutorOptions = {
  dryRun?: boolean;
  detectRenames?: boolean;
  rsyncArgs?: readonly string[];
  verbose?: boolean;
  logger?: Logger;
  mirror?: MirrorFn;
  generateIdentity?: () => string;
};

export async function pathExists(p: string): Promise<boolean> {
  try {
    await lstat(p);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

export class FsActionExecutor implements ActionExecutor {
  private readonly dryRun: boolean;
  private readonly detectRenames: boolean;
  private readonly logger: Logger;
  private readonly mirrorFn: MirrorFn;
  private readonly newIdentity: () => string;

  constructor(opts: FsExecutorOptions = {}) {
    this.dryRun = !!opts.dryRun;
    this.detectRenames = !!opts.detectRenames;
    this.logger = opts.logger ?? new NullLogger();
    this.newIdentity = opts.generateIdentity ?? randomIdentity;
    const rsyncArgs = opts.rsyncArgs ?? [];
    const verbose = !!opts.verbose;
    this.mirrorFn =
      opts.mirror ??
      ((source, dest, { dryRun, logger }) =>
        rsyncMirror(source, dest, {
          dryRun,
          logger,
          verbose,
          extraArgs: rsyncArgs,
        }));
  }

  private get prefix(): string {
    return this.dryRun ? DRY_RUN_PREFIX : "";
  }

  async mirror(sourcePath: string, destPath: string): Promise<void> {
    await this.mirrorFn(sourcePath, destPath, {
      dryRun: this.dryRun,
      logger: this.logger,
    });
  }

  async rename(dirPath: string, newName: string): Promise<string> {
    const target = path.join(path.dirname(dirPath), newName);
    this.logger.info(`${this.prefix}Renaming '${dirPath}' to '${newName}'`);
    if (await pathExists(target)) {
      throw new Error(`cannot rename '${dirPath}': '${target}' already exists`);
    }
    if (this.dryRun) {
      // nothing moved, so a dry-run mirror compares against the old name
      return dirPath;
    }
    await fsRename(dirPath, target);
    return target;
  }

  async writeMarker(dirPath: string, id: string): Promise<void> {
    this.logger.debug(`${this.prefix}Marking ${markerPath(dirPath)}`);
    if (this.dryRun) return;
    await writeMarkerFile(dirPath, id);
  }

  async assertAbsent(destPath: string): Promise<void> {
    if (await pathExists(destPath)) {
      throw new Error(`cannot create '${destPath}': it already exists`);
    }
  }

  generateIdentity(): string {
    return this.newIdentity();
  }

  async prepare(sourcePath: string, destPath: string): Promise<void> {
    if (!this.detectRenames) return;
    const renames = await detectFileRenames(sourcePath, destPath, {
      dryRun: this.dryRun,
      logger: this.logger,
    });
    if (renames.length) {
      this.logger.info(
        `${this.prefix}Renamed ${renames.length} file(s) in '${destPath}'`,
      );
    }
  }
}

export type AppliedPairing = {
  pairing: ActingPairing;
  archivePath: string;
  assignedId?: string;
};

export type ExecutionFailure = {
  pairing: ActingPairing;
  error: Error;
};

export type ExecutionResult = {
  applied: AppliedPairing[];
  failures: ExecutionFailure[];
};

export type ExecuteOptions = {
  archiveRoot: string;
  concurrency?: number;
  logger?: Logger;
};

async function parallelMapLimit<T>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>,
): Promise<void> {
  if (items.length === 0) return;
  const k = Math.max(1, Math.min(concurrency, items.length));
  let i = 0;
  const workers = Array.from({ length: k }, async () => {
    while (true) {
      const idx = i++;
      if (idx >= items.length) break;
      await fn(items[idx], idx);
    }
  });
  await Promise.all(workers);
}

/**
 * Carry out one acting pairing. Markers are written only after the mirror
 * succeeded, working copy first. A failed mirror leaves both sides unmarked
 * and the next run plans the same pairing again. If the archive marker
 * cannot be written after the working one was, the next run reports the
 * pair as AMBIGUOUS until `--mark` gives both copies one identity.
 */
export async function applyPairing(
  pairing: ActingPairing,
  executor: ActionExecutor,
  archiveRoot: string,
): Promise<AppliedPairing> {
  const { working } = pairing;
  switch (pairing.action) {
    case "SYNC": {
      let archivePath = pairing.archive.path;
      if (pairing.renameFrom !== undefined) {
        archivePath = await executor.rename(archivePath, working.name);
      }
      await executor.prepare?.(working.path, archivePath);
      await executor.mirror(working.path, archivePath);
      return { pairing, archivePath };
    }
    case "SYNC_AND_ASSIGN": {
      const archivePath = pairing.archive.path;
      await executor.prepare?.(working.path, archivePath);
      await executor.mirror(working.path, archivePath);
      const id = executor.generateIdentity();
      await executor.writeMarker(working.path, id);
      await executor.writeMarker(archivePath, id);
      return { pairing, archivePath, assignedId: id };
    }
    case "CREATE_AND_ASSIGN": {
      const archivePath = path.join(archiveRoot, working.name);
      await executor.assertAbsent(archivePath);
      await executor.mirror(working.path, archivePath);
      const id = executor.generateIdentity();
      await executor.writeMarker(working.path, id);
      await executor.writeMarker(archivePath, id);
      return { pairing, archivePath, assignedId: id };
    }
  }
}

export async function executePlan(
  plan: ReconcilePlan,
  executor: ActionExecutor,
  opts: ExecuteOptions,
): Promise<ExecutionResult> {
  const logger = opts.logger ?? new NullLogger();
  const acting = plan.pairings.filter(isActing);
  const applied: (AppliedPairing | undefined)[] = new Array(acting.length);
  const failures: (ExecutionFailure | undefined)[] = new Array(acting.length);

  await parallelMapLimit(
    acting,
    opts.concurrency ?? DEFAULT_CONCURRENCY,
    async (pairing, idx) => {
      try {
        applied[idx] = await applyPairing(pairing, executor, opts.archiveRoot);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        logger.error(`'${pairing.working.name}' : ${pairing.action} failed`, {
          error: error.message,
        });
        failures[idx] = { pairing, error };
      }
    },
  );

  // keep plan order regardless of completion order
  return {
    applied: applied.filter((a): a is AppliedPairing => a !== undefined),
    failures: failures.filter((f): f is ExecutionFailure => f !== undefined),
  };
}
