import prettyBytes from "pretty-bytes";
import type { RegionSnapshot } from "../types";

const NANOS_PER_SECOND = 1_000_000_000;

export const THROUGHPUT_HEADING = "   TotReqs   TotBytes    AvgTime   AvgReq/s  AvgKbps/s";
export const LATENCY_HEADING = "   Slowest    Fastest   Timeouts  TotErrors";

export interface RegionRows {
  readonly throughputHeading: string;
  readonly throughput: string;
  readonly latencyHeading: string;
  readonly latency: string;
  readonly errors: number;
  // Non-empty when the snapshot is internally inconsistent
  readonly diagnostics: readonly string[];
}

/**
 * Parse a status-code key. Only plain integers count; anything else returns null.
 */
export function parseStatusCode(key: string): number | null {
  if (!/^[+-]?\d+$/.test(key)) {
    return null;
  }
  return Number.parseInt(key, 10);
}

/**
 * Requests that did not end with a status below 400.
 *
 * Unparseable status keys never land in the "< 400" bucket, so their counts end up here.
 * May be negative when the histogram reports more successes than total requests.
 */
export function totErrors(snapshot: RegionSnapshot): number {
  let okRequests = 0;
  for (const [key, value] of Object.entries(snapshot.statuses)) {
    const status = parseStatusCode(key);
    if (status !== null && status < 400) {
      okRequests += value;
    }
  }
  return snapshot.totalRequests - okRequests;
}

export function humanBytes(bytes: number): string {
  return prettyBytes(bytes);
}

// ns -> "  1.234s"-style seconds, three decimals
export function formatSeconds(nanos: number, width = 7): string {
  return `${(nanos / NANOS_PER_SECOND).toFixed(3).padStart(width)}s`;
}

function pad(value: string | number, width = 10): string {
  return String(value).padStart(width);
}

export function formatRegion(snapshot: RegionSnapshot): RegionRows {
  const errors = totErrors(snapshot);
  const diagnostics: string[] = [];

  let errorsColumn = pad(errors);
  if (errors < 0) {
    errorsColumn = pad("invalid");
    diagnostics.push(
      `Region ${snapshot.region}: status counts below 400 exceed total requests by ${-errors} (inconsistent snapshot)`,
    );
  }

  const throughput = [
    pad(snapshot.totalRequests),
    pad(humanBytes(snapshot.totalBytesRead)),
    `  ${formatSeconds(snapshot.averageTimeNs)}`,
    pad(snapshot.averageRequestsPerSecond.toFixed(2)),
    pad(snapshot.averageKBytesPerSecond.toFixed(2)),
  ].join(" ");

  const latency = `  ${formatSeconds(snapshot.slowestNs)}   ${formatSeconds(snapshot.fastestNs)} ${pad(
    snapshot.totalTimedOut,
  )} ${errorsColumn}`;

  return {
    throughputHeading: THROUGHPUT_HEADING,
    throughput,
    latencyHeading: LATENCY_HEADING,
    latency,
    errors,
    diagnostics,
  };
}
