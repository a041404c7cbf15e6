#!/usr/bin/env node
// src/cli.ts
import { Command, CommanderError, Option } from "commander";
import {
  markSubdir,
  planArchive,
  restoreSubdir,
  runArchive,
  type ArchiveOptions,
} from "./archive.js";
import {
  EXIT_FATAL,
  EXIT_OK,
  collectRepeated,
  isExpectedFailure,
  packageVersion,
  parsePositiveInt,
} from "./cli-util.js";
import { CLI_NAME, DEFAULT_CONCURRENCY } from "./constants.js";
import { collectExcludeOption } from "./ignore.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import type { MirrorFn } from "./executor.js";
import { renderPlanTable, type Reporter } from "./report.js";

export type CliOptions = {
  dryRun: boolean;
  reportUnsynced: boolean;
  reportSkipped: boolean;
  autoSyncNew: boolean;
  mark?: string;
  restore?: string;
  rename: boolean;
  exclude: string[];
  rsyncArg: string[];
  concurrency: number;
  plan: boolean;
  verbose: boolean;
  logLevel: string;
};

// seams for tests and embedding; the command line never sets these
export type CliDeps = {
  logger?: Logger;
  reporter?: Reporter;
  mirror?: MirrorFn;
  stdout?: { write(chunk: string): unknown };
};

export function buildProgram(): Command {
  return new Command()
    .name(CLI_NAME)
    .description(
      "Copy the subdirectories of a working directory to an archive directory, following renames",
    )
    .version(packageVersion())
    .argument("<work-dir>", "working tree; owns its subdirectories")
    .argument("<archive-dir>", "archive tree; a superset of the working tree")
    .option("-d, --dry-run", "do not make any changes", false)
    .option(
      "-e, --report-unsynced",
      "report directories that were not synchronized to stderr and exit 1; useful under cron",
      false,
    )
    .addOption(new Option("--report-skipped").default(false).hideHelp())
    .option(
      "-n, --auto-sync-new",
      "create archive copies of working directories the archive has never seen",
      false,
    )
    .option(
      "-m, --mark <name>",
      "give an existing subdirectory of both trees a fresh shared identity and exit",
    )
    .option(
      "--restore <name>",
      "recreate the missing archive copy of a marked working directory and exit",
    )
    .option(
      "-r, --rename",
      "detect renamed files and rename the archive's copy before mirroring",
      false,
    )
    .option(
      "-x, --exclude <pattern>",
      "gitignore-style pattern of subdirectory names to leave alone (repeat or comma-separated)",
      collectExcludeOption,
      [] as string[],
    )
    .option(
      "--rsync-arg <arg>",
      'argument forwarded to rsync (repeatable); use --rsync-arg="--no-p" for dashed values',
      collectRepeated,
      [] as string[],
    )
    .option(
      "--concurrency <n>",
      "number of directories mirrored at once",
      parsePositiveInt,
      DEFAULT_CONCURRENCY,
    )
    .option("--plan", "print the reconciliation plan and exit", false)
    .option("-v, --verbose", "extra logging", false)
    .addOption(
      new Option("--log-level <level>", "log verbosity")
        .choices(LOG_LEVELS)
        .default("info"),
    );
}

export function toArchiveOptions(
  workRoot: string,
  archiveRoot: string,
  opts: CliOptions,
): ArchiveOptions {
  return {
    workRoot,
    archiveRoot,
    autoSyncNew: opts.autoSyncNew,
    reportUnsynced: opts.reportUnsynced || opts.reportSkipped,
    dryRun: opts.dryRun,
    detectRenames: opts.rename,
    exclude: opts.exclude,
    rsyncArgs: opts.rsyncArg,
    concurrency: opts.concurrency,
    verbose: opts.verbose,
  };
}

async function execute(
  workRoot: string,
  archiveRoot: string,
  opts: CliOptions,
  deps: CliDeps,
): Promise<number> {
  const level = opts.verbose ? "debug" : parseLogLevel(opts.logLevel);
  const logger = deps.logger ?? new ConsoleLogger(level);
  const archiveOpts: ArchiveOptions = {
    ...toArchiveOptions(workRoot, archiveRoot, opts),
    logger,
    reporter: deps.reporter,
    mirror: deps.mirror,
  };
  try {
    if (opts.mark !== undefined) {
      await markSubdir(archiveOpts, opts.mark);
      return EXIT_OK;
    }
    if (opts.restore !== undefined) {
      await restoreSubdir(archiveOpts, opts.restore);
      return EXIT_OK;
    }
    if (opts.plan) {
      const plan = await planArchive(archiveOpts);
      (deps.stdout ?? process.stdout).write(`${renderPlanTable(plan)}\n`);
      return EXIT_OK;
    }
    const run = await runArchive(archiveOpts);
    return run.exitCode;
  } catch (err) {
    if (isExpectedFailure(err)) {
      logger.error(err.message);
      return EXIT_FATAL;
    }
    throw err;
  }
}

/** Parse `argv` (without node and script) and run; resolves to the exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let code = EXIT_OK;
  const program = buildProgram()
    .exitOverride()
    .action(async (workDir: string, archiveDir: string, opts: CliOptions) => {
      code = await execute(workDir, archiveDir, opts, deps);
    });
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }
  return code;
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(`${CLI_NAME} fatal:`, err instanceof Error ? err.stack : err);
      process.exit(EXIT_FATAL);
    },
  );
}
