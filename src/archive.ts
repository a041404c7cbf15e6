// src/archive.ts
import { lstat } from "node:fs/promises";
import path from "node:path";
import { DRY_RUN_PREFIX, EXIT_OK, EXIT_UNSYNCED } from "./constants.js";
import {
  FsActionExecutor,
  executePlan,
  pathExists,
  type ActionExecutor,
  type ExecutionResult,
  type MirrorFn,
} from "./executor.js";
import { errorCode, identityId } from "./identity.js";
import { buildIdentityIndex, hasName, type IdentityIndex } from "./identity-index.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import {
  describePairing,
  planReconciliation,
  type ReconcilePlan,
} from "./reconcile.js";
import { ConsoleReporter, type Reporter, type RunSummary } from "./report.js";
import { scanTree, type MarkerWarning } from "./scan.js";

export type ArchiveOptions = {
  workRoot: string;
  archiveRoot: string;
  autoSyncNew?: boolean;
  reportUnsynced?: boolean;
  dryRun?: boolean;
  detectRenames?: boolean;
  exclude?: readonly string[];
  rsyncArgs?: readonly string[];
  concurrency?: number;
  verbose?: boolean;
  logger?: Logger;
  reporter?: Reporter;
  executor?: ActionExecutor;
  // used by the default executor instead of rsync
  mirror?: MirrorFn;
};

export type ArchiveRun = RunSummary & {
  execution: ExecutionResult;
  exitCode: number;
};

export class OperatorCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OperatorCommandError";
  }
}

function defaultExecutor(opts: ArchiveOptions, logger: Logger): ActionExecutor {
  return new FsActionExecutor({
    dryRun: opts.dryRun,
    detectRenames: opts.detectRenames,
    rsyncArgs: opts.rsyncArgs,
    verbose: opts.verbose,
    mirror: opts.mirror,
    logger: logger.child("exec"),
  });
}

export type IndexedTrees = {
  W: IdentityIndex;
  A: IdentityIndex;
  markerWarnings: MarkerWarning[];
};

export async function indexTrees(
  opts: Pick<ArchiveOptions, "workRoot" | "archiveRoot" | "exclude">,
  logger: Logger,
): Promise<IndexedTrees> {
  const scanLogger = logger.child("scan");
  const work = await scanTree(opts.workRoot, {
    exclude: opts.exclude,
    logger: scanLogger,
  });
  const archive = await scanTree(opts.archiveRoot, {
    exclude: opts.exclude,
    logger: scanLogger,
  });
  for (const entry of archive.entries) {
    const id = identityId(entry.identity);
    if (id !== undefined) {
      logger.debug(`Known archive directory: ${entry.path}`, { id });
    }
  }
  const W = buildIdentityIndex(work.entries, "working", work.occupied);
  const A = buildIdentityIndex(archive.entries, "archive", archive.occupied);
  for (const dup of [...W.duplicates, ...A.duplicates]) {
    logger.warn(`duplicate identity in ${dup.tree} tree`, {
      id: dup.id,
      paths: dup.paths,
    });
  }
  return { W, A, markerWarnings: [...work.warnings, ...archive.warnings] };
}

export async function planArchive(
  opts: ArchiveOptions,
): Promise<ReconcilePlan> {
  const logger = opts.logger ?? new ConsoleLogger();
  const { W, A } = await indexTrees(opts, logger);
  return planReconciliation(W, A, { autoSyncNew: !!opts.autoSyncNew });
}

/**
 * One scan, plan, execute and report pass. Throws TreeRootError when either
 * root cannot be read; everything else ends up in the returned summary.
 */
export async function runArchive(opts: ArchiveOptions): Promise<ArchiveRun> {
  const logger = opts.logger ?? new ConsoleLogger();
  const workRoot = path.resolve(opts.workRoot);
  const archiveRoot = path.resolve(opts.archiveRoot);
  const dryRun = !!opts.dryRun;

  logger.info(`Archiving from '${workRoot}' to '${archiveRoot}'`);
  const { W, A, markerWarnings } = await indexTrees(
    { workRoot, archiveRoot, exclude: opts.exclude },
    logger,
  );
  const plan = planReconciliation(W, A, { autoSyncNew: !!opts.autoSyncNew });

  for (const pairing of plan.pairings) {
    logger.info(`'${pairing.working.name}' : ${describePairing(pairing)}`);
  }
  for (const entry of plan.untouchedArchive) {
    logger.debug(`archive only, left untouched: ${entry.path}`);
  }

  const executor = opts.executor ?? defaultExecutor(opts, logger);
  const execution = await executePlan(plan, executor, {
    archiveRoot,
    concurrency: opts.concurrency,
    logger: logger.child("exec"),
  });

  const summary: RunSummary = {
    workRoot,
    archiveRoot,
    plan,
    failures: execution.failures,
    markerWarnings,
    dryRun,
  };

  let exitCode = execution.failures.length ? EXIT_UNSYNCED : EXIT_OK;
  if (opts.reportUnsynced) {
    const reporter = opts.reporter ?? new ConsoleReporter();
    reporter.report(summary);
    if (plan.anomalies.length) exitCode = EXIT_UNSYNCED;
  } else if (plan.anomalies.length) {
    logger.info(
      `${plan.anomalies.length} director${plan.anomalies.length === 1 ? "y" : "ies"} not synchronized`,
    );
  }

  return { ...summary, execution, exitCode };
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    // a symlink to a directory is not one of ours
    return (await lstat(p)).isDirectory();
  } catch (err) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") {
      return false;
    }
    throw err;
  }
}

function checkSubdirName(name: string): void {
  if (!name || name === "." || name === ".." || name.includes(path.sep)) {
    throw new OperatorCommandError(
      `'${name}' is not the name of a subdirectory`,
    );
  }
}

/**
 * Give `<work>/<name>` and `<archive>/<name>` one fresh shared identity.
 * This is how an operator settles an AMBIGUOUS pairing: the next run
 * mirrors the working copy over the archive copy.
 */
export async function markSubdir(
  opts: Pick<ArchiveOptions, "workRoot" | "archiveRoot" | "dryRun" | "logger" | "executor">,
  name: string,
): Promise<string> {
  checkSubdirName(name);
  const logger = opts.logger ?? new ConsoleLogger();
  const workPath = path.resolve(opts.workRoot, name);
  const archivePath = path.resolve(opts.archiveRoot, name);
  for (const p of [workPath, archivePath]) {
    if (!(await isDirectory(p))) {
      throw new OperatorCommandError(`${p} is not a directory`);
    }
  }
  const executor =
    opts.executor ??
    new FsActionExecutor({ dryRun: opts.dryRun, logger: logger.child("exec") });
  const id = executor.generateIdentity();
  await executor.writeMarker(workPath, id);
  await executor.writeMarker(archivePath, id);
  logger.info(
    `${opts.dryRun ? DRY_RUN_PREFIX : ""}Marked '${name}' in both trees`,
    { id },
  );
  return id;
}

/**
 * Recreate the archive copy of a marked working directory whose
 * counterpart has disappeared (UNSYNCED_MISSING), keeping its identity.
 */
export async function restoreSubdir(
  opts: ArchiveOptions,
  name: string,
): Promise<string> {
  checkSubdirName(name);
  const logger = opts.logger ?? new ConsoleLogger();
  const workRoot = path.resolve(opts.workRoot);
  const archiveRoot = path.resolve(opts.archiveRoot);
  const { W, A } = await indexTrees(
    { workRoot, archiveRoot, exclude: opts.exclude },
    logger,
  );
  const working = W.byName.get(name);
  if (!working) {
    throw new OperatorCommandError(
      `${path.join(workRoot, name)} is not a tracked working directory`,
    );
  }
  const id = identityId(working.identity);
  if (id === undefined) {
    throw new OperatorCommandError(
      `${working.path} is not marked; run without --restore to sync it`,
    );
  }
  const current = A.byId.get(id);
  if (current || A.quarantinedIds.has(id)) {
    throw new OperatorCommandError(
      `archive still has a directory with identity '${id}'`,
    );
  }
  const archivePath = path.join(archiveRoot, name);
  if (hasName(A, name) || (await pathExists(archivePath))) {
    throw new OperatorCommandError(`${archivePath} already exists`);
  }

  const executor = opts.executor ?? defaultExecutor(opts, logger);
  logger.info(`'${name}' : RESTORING to archive`);
  await executor.mirror(working.path, archivePath);
  await executor.writeMarker(archivePath, id);
  return archivePath;
}
