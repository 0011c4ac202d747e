import chalk from "chalk";
import ora from "ora";
import * as fs from "fs";
import { table } from "table";
import type { FinalResult, RegionSnapshot } from "../types";
import { formatRegion, parseStatusCode, type RegionRows } from "../stats/region-format";
import { OVERALL_KEY, sortedRegionIds } from "../stats/overall";
import { toWireRegion, type WireRegion } from "../shared/feed";

export const NO_RESULTS = "No results received";

function rowsToLines(rows: RegionRows): string[] {
  return [chalk.bold(rows.throughputHeading), rows.throughput, chalk.bold(rows.latencyHeading), rows.latency];
}

// Integer status codes first, in numeric order; anything else after, lexically
export function compareStatusKeys(a: string, b: string): number {
  const statusA = parseStatusCode(a);
  const statusB = parseStatusCode(b);
  if (statusA !== null && statusB !== null) return statusA - statusB;
  if (statusA !== null) return -1;
  if (statusB !== null) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function statusTable(overall: RegionSnapshot): string {
  const rows = Object.keys(overall.statuses)
    .sort(compareStatusKeys)
    .map((status) => [status, String(overall.statuses[status])]);
  return table([["HTTPStatus", "Requests"], ...rows]);
}

/**
 * Console summary for a finished run, one entry per output line
 */
export function summaryLines(result: FinalResult): string[] {
  const overall = result.overall;
  if (!overall) {
    return [chalk.bold(NO_RESULTS)];
  }

  const lines: string[] = [chalk.bold("Regional results"), ""];
  const diagnostics: string[] = [];

  for (const id of sortedRegionIds(result.regions)) {
    const rows = formatRegion(result.regions[id]);
    diagnostics.push(...rows.diagnostics);
    lines.push(`Region: ${id}`, ...rowsToLines(rows));
  }

  lines.push("", chalk.bold("Overall"), "", ...rowsToLines(formatRegion(overall)));
  lines.push("", statusTable(overall).trimEnd());

  for (const diagnostic of diagnostics) {
    lines.push(chalk.yellow(`⚠️  ${diagnostic}`));
  }
  lines.push("");
  return lines;
}

export function printSummary(result: FinalResult): void {
  for (const line of summaryLines(result)) {
    console.log(line);
  }
}

/**
 * Export document: every region keyed by id plus the cross-region total under "overall"
 */
export function buildExport(result: FinalResult): Record<string, WireRegion> | null {
  if (!result.overall) {
    return null;
  }
  const document: Record<string, WireRegion> = {};
  for (const id of sortedRegionIds(result.regions)) {
    document[id] = toWireRegion(result.regions[id]);
  }
  document[OVERALL_KEY] = toWireRegion(result.overall);
  return document;
}

/**
 * Write the JSON export. Failures are reported and swallowed; returns whether a file was written.
 */
export function saveJsonSummary(filePath: string, result: FinalResult): boolean {
  const document = buildExport(result);
  if (!document) {
    return false;
  }

  const spinner = ora(`Saving results to ${filePath}...`).start();
  try {
    const data = JSON.stringify(document, null, 2);
    fs.writeFileSync(filePath, `${data}\n`, { mode: 0o644 });
    spinner.succeed(`Results saved to ${filePath}`);
    return true;
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : "Unknown error";
    spinner.fail(`Failed to save results to ${filePath}`);
    console.error(chalk.red(errorMessage));
    return false;
  }
}
