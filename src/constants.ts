export const CLI_NAME = "archive-workdir";

// name of the identity marker file kept inside every tracked subdirectory
export const MARKER_FILENAME = ".awid";

export const MAX_IDENTITY_LENGTH = 512;

export const RSYNC_BIN = process.env.ARCHIVE_WORKDIR_RSYNC ?? "rsync";

export const RSYNC_FLAGS = ["-a", "--delete"];

export const DEFAULT_CONCURRENCY = Math.max(
  1,
  Number(process.env.ARCHIVE_WORKDIR_CONCURRENCY ?? 1) || 1,
);

export const DRY_RUN_PREFIX = "Dry run: ";

export const EXIT_OK = 0;
// a pairing failed, or anomalies remain under --report-unsynced
export const EXIT_UNSYNCED = 1;
export const EXIT_FATAL = 2;
