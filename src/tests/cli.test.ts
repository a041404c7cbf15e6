// tests/cli.test.ts
import { InvalidArgumentError } from "commander";
import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { buildProgram, runCli, toArchiveOptions, type CliOptions } from "../cli.js";
import { parsePositiveInt } from "../cli-util.js";
import { readMarker } from "../identity.js";
import { MemoryLogger } from "../logger.js";
import { CollectingReporter } from "../report.js";
import { fsMirror, listDirs, mkCase, mkSubdir } from "./util.js";

function parse(args: string[]) {
  const program = buildProgram().exitOverride();
  program.parse(args, { from: "user" });
  return { program, opts: program.opts<CliOptions>() };
}

describe("option parsing", () => {
  test("defaults", () => {
    const { program, opts } = parse(["work", "archive", "--concurrency", "1"]);
    expect(program.args).toEqual(["work", "archive"]);
    expect(opts).toMatchObject({
      dryRun: false,
      reportUnsynced: false,
      autoSyncNew: false,
      rename: false,
      exclude: [],
      rsyncArg: [],
      concurrency: 1,
      plan: false,
      verbose: false,
      logLevel: "info",
    });
    expect(opts.mark).toBeUndefined();
  });

  test("short flags, repeated and comma-separated values", () => {
    const { opts } = parse([
      "-dne",
      "-x",
      "node_modules, .cache",
      "--exclude",
      "tmp*",
      "--rsync-arg=--no-p",
      "--rsync-arg=--exclude=a,b",
      "--concurrency",
      "4",
      "work",
      "archive",
    ]);
    expect(opts.dryRun).toBe(true);
    expect(opts.autoSyncNew).toBe(true);
    expect(opts.reportUnsynced).toBe(true);
    expect(opts.exclude).toEqual(["node_modules", ".cache", "tmp*"]);
    expect(opts.rsyncArg).toEqual(["--no-p", "--exclude=a,b"]);
    expect(opts.concurrency).toBe(4);
  });

  test("--report-skipped is an alias of --report-unsynced", () => {
    const { opts } = parse(["--report-skipped", "w", "a"]);
    expect(toArchiveOptions("w", "a", opts).reportUnsynced).toBe(true);
  });

  test("concurrency must be a positive integer", () => {
    expect(parsePositiveInt("3")).toBe(3);
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("1.5")).toThrow("expected a positive integer");
  });
});

describe("runCli", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(join(os.tmpdir(), "awid-cli-"));
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  function deps() {
    const chunks: string[] = [];
    return {
      logger: new MemoryLogger(),
      reporter: new CollectingReporter(),
      mirror: fsMirror,
      stdout: { write: (chunk: string) => chunks.push(chunk) },
      chunks,
    };
  }

  test("exits 1 under -e when something was left unsynchronized", async () => {
    const t = await mkCase(tmp, "report");
    await mkSubdir(t.work, "fresh", { "f.txt": "1" });
    const d = deps();
    expect(await runCli(["-e", t.work, t.archive], d)).toBe(1);
    expect(d.reporter.anomalies.map((a) => a.category)).toEqual(["UNSYNCED_NEW"]);
    expect(await listDirs(t.archive)).toEqual([]);

    expect(await runCli(["-e", "-n", t.work, t.archive], deps())).toBe(0);
    expect(await listDirs(t.archive)).toEqual(["fresh"]);
  });

  test("--plan prints the table and changes nothing", async () => {
    const t = await mkCase(tmp, "plan");
    await mkSubdir(t.work, "P");
    await mkSubdir(t.archive, "P");
    const d = deps();
    expect(await runCli(["--plan", t.work, t.archive], d)).toBe(0);
    expect(d.chunks).toHaveLength(1);
    expect(d.chunks[0]).toContain("SYNC_AND_ASSIGN");
    expect(await readMarker(join(t.archive, "P"))).toEqual({ status: "absent" });
  });

  test("--mark writes one identity to both copies", async () => {
    const t = await mkCase(tmp, "mark");
    await mkSubdir(t.work, "M");
    await mkSubdir(t.archive, "M");
    expect(await runCli(["--mark", "M", t.work, t.archive], deps())).toBe(0);
    const w = await readMarker(join(t.work, "M"));
    expect(w.status).toBe("valid");
    expect(await readMarker(join(t.archive, "M"))).toEqual(w);
  });

  test("a root that is not a directory exits 2", async () => {
    const t = await mkCase(tmp, "bad-root");
    const file = join(t.work, "not-a-dir");
    await fsp.writeFile(file, "x");
    const d = deps();
    expect(await runCli([file, t.archive], d)).toBe(2);
    expect(d.logger.messages("error")).toEqual([`${file} is not a directory`]);
  });
});
