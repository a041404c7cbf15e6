// src/file-renames.ts
import { lstat, readdir, rename, stat } from "node:fs/promises";
import path from "node:path";
import { DRY_RUN_PREFIX, MARKER_FILENAME } from "./constants.js";
import { errorCode } from "./identity.js";
import { NullLogger, type Logger } from "./logger.js";

export type FileRename = {
  from: string;
  to: string;
};

type RenameOptions = {
  dryRun?: boolean;
  logger?: Logger;
};

async function listChildren(dir: string, logger: Logger) {
  try {
    const dirents = await readdir(dir, { withFileTypes: true });
    return {
      dirs: new Set(dirents.filter((d) => d.isDirectory()).map((d) => d.name)),
      files: new Set(
        dirents
          .filter((d) => d.isFile() && d.name !== MARKER_FILENAME)
          .map((d) => d.name),
      ),
    };
  } catch (err) {
    logger.debug("rename detection skipped directory", {
      dir,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

/**
 * Find files that were renamed on the working side and rename the archive's
 * copy in place, so the mirror that follows does not have to copy and delete
 * them. Files are matched by size only and the mirror corrects the content
 * afterwards. A rename is only made onto a free name; any file that cannot
 * be checked or moved is left for the mirror and logged at debug level.
 */
export async function detectFileRenames(
  workPath: string,
  archivePath: string,
  opts: RenameOptions = {},
): Promise<FileRename[]> {
  const logger = opts.logger ?? new NullLogger();
  const renames: FileRename[] = [];
  await walkPair(workPath, archivePath, renames, !!opts.dryRun, logger);
  return renames;
}

async function walkPair(
  workPath: string,
  archivePath: string,
  renames: FileRename[],
  dryRun: boolean,
  logger: Logger,
): Promise<void> {
  const work = await listChildren(workPath, logger);
  const arch = await listChildren(archivePath, logger);
  if (!work || !arch) return;

  for (const sub of work.dirs) {
    if (arch.dirs.has(sub)) {
      await walkPair(
        path.join(workPath, sub),
        path.join(archivePath, sub),
        renames,
        dryRun,
        logger,
      );
    }
  }

  // a directory in the archive under a working file's name is not a free slot
  const workOnly = [...work.files]
    .filter((f) => !arch.files.has(f) && !arch.dirs.has(f))
    .sort();
  const archOnly = [...arch.files].filter((f) => !work.files.has(f)).sort();
  if (!workOnly.length || !archOnly.length) return;

  const archBySize = new Map<number, string>();
  for (const name of archOnly) {
    const size = await fileSize(path.join(archivePath, name), logger);
    if (size !== undefined) archBySize.set(size, name);
  }

  for (const name of workOnly) {
    const size = await fileSize(path.join(workPath, name), logger);
    if (size === undefined) continue;
    const match = archBySize.get(size);
    if (match === undefined) continue;
    archBySize.delete(size);
    const from = path.join(archivePath, match);
    const to = path.join(archivePath, name);
    logger.debug(`${dryRun ? DRY_RUN_PREFIX : ""}Renaming '${from}' to '${name}'`);
    if (!dryRun) {
      try {
        if (await isTaken(to)) {
          logger.debug("rename target appeared, skipped", { to });
          continue;
        }
        await rename(from, to);
      } catch (err) {
        logger.debug("rename failed, left for the mirror", {
          from,
          to,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }
    }
    renames.push({ from, to });
  }
}

async function fileSize(
  file: string,
  logger: Logger,
): Promise<number | undefined> {
  try {
    return (await stat(file)).size;
  } catch (err) {
    logger.debug("cannot stat file for rename detection", {
      file,
      error: err instanceof Error ? err.message : String(err),
    });
    return undefined;
  }
}

async function isTaken(p: string): Promise<boolean> {
  try {
    await lstat(p);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}
