import type { AggregateEnvelope } from "../types";
import { totalCompletedRequests } from "./overall";

/**
 * Fraction of the run completed.
 *
 * With a known request target this is the raw completed/expected ratio (it can exceed 1;
 * the dashboard clamps it). Otherwise elapsed time is measured against the time limit,
 * capped at 1.
 */
export function estimateProgress(envelope: AggregateEnvelope, elapsedSeconds: number, timelimitSeconds: number): number {
  if (envelope.totalExpectedRequests > 0) {
    return totalCompletedRequests(envelope) / envelope.totalExpectedRequests;
  }
  if (timelimitSeconds <= 0) {
    return 0;
  }
  return Math.min(Math.max(elapsedSeconds, 0) / timelimitSeconds, 1.0);
}
