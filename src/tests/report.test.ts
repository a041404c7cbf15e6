// tests/report.test.ts
import type { ReconcilePlan } from "../reconcile.js";
import {
  CollectingReporter,
  ConsoleReporter,
  formatAnomaly,
  renderPlanTable,
  reportLines,
  type RunSummary,
} from "../report.js";
import { entry } from "./util.js";

const plan: ReconcilePlan = {
  pairings: [
    {
      action: "SYNC",
      working: entry("/work", "renamed", "X"),
      archive: entry("/archive", "old", "X"),
      renameFrom: "old",
    },
    { action: "CREATE_AND_ASSIGN", working: entry("/work", "fresh") },
    {
      action: "UNSYNCED_NEW",
      working: entry("/work", "waiting"),
      reason: "new, not in the archive yet",
    },
  ],
  anomalies: [
    {
      category: "UNSYNCED_NEW",
      paths: ["/work/waiting"],
      message: "new, not in the archive yet",
    },
  ],
  untouchedArchive: [],
};

function summary(over: Partial<RunSummary> = {}): RunSummary {
  return {
    workRoot: "/work",
    archiveRoot: "/archive",
    plan,
    failures: [],
    markerWarnings: [],
    dryRun: false,
    ...over,
  };
}

function fakeStream() {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
}

test("formatAnomaly joins the paths", () => {
  expect(
    formatAnomaly({
      category: "AMBIGUOUS",
      paths: ["/work/b", "/archive/b"],
      message: "collision",
    }),
  ).toBe("AMBIGUOUS /work/b, /archive/b: collision");
});

test("invalid markers are reported even when every directory synced", () => {
  const out = fakeStream();
  new ConsoleReporter(out).report(
    summary({
      plan: { pairings: [], anomalies: [], untouchedArchive: [] },
      markerWarnings: [
        { path: "/archive/p", reason: "expected a single line, found 2" },
      ],
    }),
  );
  expect(out.chunks).toEqual([
    "\nUnsynchronized directories while archiving from '/work' to '/archive':\n" +
      "INVALID_MARKER /archive/p: expected a single line, found 2\n",
  ]);
});

test("report lists anomalies, then failures", () => {
  const lines = reportLines(
    summary({
      failures: [
        {
          pairing: plan.pairings[1],
          error: new Error("rsync mirror failed (exit code 23)"),
        },
      ],
    }),
  );
  expect(lines).toEqual([
    "Unsynchronized directories while archiving from '/work' to '/archive':",
    "UNSYNCED_NEW /work/waiting: new, not in the archive yet",
    "FAILED /work/fresh: rsync mirror failed (exit code 23)",
  ]);
});

describe("ConsoleReporter", () => {
  test("writes one block when there is something to report", () => {
    const out = fakeStream();
    new ConsoleReporter(out).report(summary());
    expect(out.chunks).toEqual([
      "\nUnsynchronized directories while archiving from '/work' to '/archive':\n" +
        "UNSYNCED_NEW /work/waiting: new, not in the archive yet\n",
    ]);
  });

  test("stays silent on a clean run", () => {
    const out = fakeStream();
    new ConsoleReporter(out).report(
      summary({ plan: { pairings: [], anomalies: [], untouchedArchive: [] } }),
    );
    expect(out.chunks).toEqual([]);
  });
});

test("CollectingReporter keeps every summary", () => {
  const reporter = new CollectingReporter();
  reporter.report(summary());
  reporter.report(summary());
  expect(reporter.summaries).toHaveLength(2);
  expect(reporter.anomalies.map((a) => a.category)).toEqual([
    "UNSYNCED_NEW",
    "UNSYNCED_NEW",
  ]);
});

test("plan table has one row per working directory", () => {
  const lines = renderPlanTable(plan).split("\n");
  expect(lines.some((l) => l.includes("Reconciliation plan"))).toBe(true);
  const row = (name: string) => lines.find((l) => l.includes(` ${name} `));
  expect(row("renamed")).toContain("old → renamed");
  expect(row("renamed")).toContain("SYNC");
  expect(row("fresh")).toContain("(new) fresh");
  expect(row("fresh")).toContain("CREATE_AND_ASSIGN");
  expect(row("waiting")).toContain("UNSYNCED_NEW");
});
