// src/report.ts
import { AlignmentEnum, AsciiTable3 } from "ascii-table3";
import path from "node:path";
import type { ExecutionFailure } from "./executor.js";
import type { Anomaly, ReconcilePlan } from "./reconcile.js";
import type { MarkerWarning } from "./scan.js";

export type RunSummary = {
  workRoot: string;
  archiveRoot: string;
  plan: ReconcilePlan;
  failures: ExecutionFailure[];
  // invalid markers found while scanning; those entries count as unmarked
  markerWarnings: MarkerWarning[];
  dryRun: boolean;
};

export interface Reporter {
  report(summary: RunSummary): void;
}

type Writable = { write(chunk: string): unknown };

export function formatAnomaly(anomaly: Anomaly): string {
  return `${anomaly.category} ${anomaly.paths.join(", ")}: ${anomaly.message}`;
}

export function formatFailure(failure: ExecutionFailure): string {
  return `FAILED ${failure.pairing.working.path}: ${failure.error.message}`;
}

export function formatMarkerWarning(warning: MarkerWarning): string {
  return `INVALID_MARKER ${warning.path}: ${warning.reason}`;
}

export function reportLines(summary: RunSummary): string[] {
  const lines = [
    `Unsynchronized directories while archiving from '${summary.workRoot}' to '${summary.archiveRoot}':`,
  ];
  for (const anomaly of summary.plan.anomalies) {
    lines.push(formatAnomaly(anomaly));
  }
  for (const failure of summary.failures) {
    lines.push(formatFailure(failure));
  }
  for (const warning of summary.markerWarnings) {
    lines.push(formatMarkerWarning(warning));
  }
  return lines;
}

export function needsReport(summary: RunSummary): boolean {
  return (
    summary.plan.anomalies.length > 0 ||
    summary.failures.length > 0 ||
    summary.markerWarnings.length > 0
  );
}

/** Writes the anomaly list for cron mail or an operator's terminal. */
export class ConsoleReporter implements Reporter {
  constructor(private readonly out: Writable = process.stderr) {}

  report(summary: RunSummary): void {
    if (!needsReport(summary)) return;
    this.out.write(`\n${reportLines(summary).join("\n")}\n`);
  }
}

/** Keeps every summary it receives; handy when embedding the library. */
export class CollectingReporter implements Reporter {
  readonly summaries: RunSummary[] = [];

  report(summary: RunSummary): void {
    this.summaries.push(summary);
  }

  get anomalies(): Anomaly[] {
    return this.summaries.flatMap((s) => s.plan.anomalies);
  }
}

export function renderPlanTable(plan: ReconcilePlan): string {
  const table = new AsciiTable3("Reconciliation plan")
    .setHeading("Directory", "Action", "Archive")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  for (const pairing of plan.pairings) {
    let archive = "-";
    if (pairing.action === "CREATE_AND_ASSIGN") {
      archive = `(new) ${pairing.working.name}`;
    } else if (pairing.action === "SYNC" && pairing.renameFrom !== undefined) {
      archive = `${pairing.renameFrom} → ${pairing.working.name}`;
    } else if (pairing.archive) {
      archive = path.basename(pairing.archive.path);
    }
    table.addRow(pairing.working.name, pairing.action, archive);
  }
  return table.toString();
}
