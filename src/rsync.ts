// src/rsync.ts
import { spawn } from "node:child_process";
import { RSYNC_BIN, RSYNC_FLAGS } from "./constants.js";
import { ConsoleLogger, type LogLevel, type Logger } from "./logger.js";

export class RsyncError extends Error {
  constructor(
    message: string,
    public readonly code: number | null,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "RsyncError";
  }
}

export class DiskFullError extends RsyncError {
  constructor(
    message: string,
    code: number | null,
    context?: Record<string, unknown>,
  ) {
    super(message, code, context);
    this.name = "DiskFullError";
  }
}

type RsyncLogOptions = {
  logger?: Logger;
  verbose?: boolean;
  logLevel?: LogLevel;
};

export type RsyncMirrorOptions = RsyncLogOptions & {
  dryRun?: boolean;
  // forwarded verbatim, after the fixed flags
  extraArgs?: readonly string[];
  rsyncBin?: string;
};

export type RunResult = {
  code: number | null;
  ok: boolean;
  zero: boolean;
  stderr: string;
};

function resolveLogContext(opts: RsyncLogOptions) {
  const level = opts.logLevel ?? "info";
  const logger = opts.logger ?? new ConsoleLogger(level);
  const debug = !!opts.verbose || level === "debug";
  return { logger, debug };
}

export function argsJoin(args: readonly string[]): string {
  return args.map((x) => (x.includes(" ") ? `'${x}'` : x)).join(" ");
}

export function ensureTrailingSlash(root: string): string {
  return root.endsWith("/") ? root : root + "/";
}

/**
 * `rsync -a --delete source/ dest`: dest ends up with exactly the contents
 * of source, created if it does not exist yet.
 */
export function rsyncMirrorArgs(
  source: string,
  dest: string,
  opts: RsyncMirrorOptions = {},
): string[] {
  const a = [...RSYNC_FLAGS];
  if (opts.dryRun) a.push("--dry-run");
  if (opts.verbose) {
    a.push("-v");
  } else {
    a.push("--quiet");
  }
  a.push(...(opts.extraArgs ?? []));
  a.push(ensureTrailingSlash(source), dest);
  return a;
}

function isRsyncDiskFull(code: number | null, stderr?: string): boolean {
  if (code === 28) return true;
  if (!stderr) return false;
  const lower = stderr.toLowerCase();
  return (
    lower.includes("no space") ||
    lower.includes("disk is full") ||
    lower.includes("filesystem full") ||
    lower.includes("file system full")
  );
}

export function assertRsyncOk(
  label: string,
  res: { code: number | null; ok: boolean; stderr?: string },
  context?: Record<string, unknown>,
): void {
  if (res.ok) return;
  const base =
    typeof res.code === "number"
      ? `exit code ${res.code}`
      : "unknown exit code";
  const message = `rsync ${label} failed (${base})`;
  const errorContext = { label, ...context, code: res.code };
  if (isRsyncDiskFull(res.code, res.stderr)) {
    throw new DiskFullError(message, res.code, errorContext);
  }
  throw new RsyncError(message, res.code, errorContext);
}

function truncateMiddle(input: string, max = 200): string {
  if (input.length <= max) return input;
  const half = Math.floor((max - 3) / 2);
  return `${input.slice(0, half)}...${input.slice(input.length - half)}`;
}

export async function run(
  cmd: string,
  args: string[],
  okCodes: number[] = [0],
  opts: RsyncLogOptions = {},
): Promise<RunResult> {
  const t = Date.now();
  const { logger, debug } = resolveLogContext(opts);
  logger.info(`${cmd} ${argsJoin(args)}`);

  return await new Promise<RunResult>((resolve) => {
    const child = spawn(cmd, args, {
      stdio: ["ignore", debug ? "pipe" : "ignore", "pipe"],
    });

    let stdoutBuffer = "";
    let stderrBuffer = "";

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdoutBuffer += chunk;
      const lines = stdoutBuffer.split("\n");
      stdoutBuffer = lines.pop() ?? "";
      for (const line of lines) {
        if (line) logger.debug(line);
      }
    });

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderrBuffer += chunk;
    });

    child.on("exit", (code) => {
      const zero = code === 0;
      const ok = code !== null && okCodes.includes(code);
      if (stdoutBuffer) logger.debug(stdoutBuffer);
      if (debug) {
        logger.debug("rsync exit", {
          cmd,
          code,
          ok,
          elapsedMs: Date.now() - t,
        });
      }
      if (!ok && stderrBuffer) {
        logger.warn("rsync stderr", {
          stderr: truncateMiddle(stderrBuffer, 400),
        });
      }
      resolve({ code, ok, zero, stderr: stderrBuffer });
    });

    child.on("error", (err) => {
      logger.error("rsync spawn error", { error: err.message });
      resolve({
        code: 1,
        ok: okCodes.includes(1),
        zero: false,
        stderr: err.message,
      });
    });
  });
}

export async function rsyncMirror(
  source: string,
  dest: string,
  opts: RsyncMirrorOptions = {},
): Promise<void> {
  const args = rsyncMirrorArgs(source, dest, opts);
  const res = await run(opts.rsyncBin ?? RSYNC_BIN, args, [0], opts);
  assertRsyncOk("mirror", res, { source, dest });
}
