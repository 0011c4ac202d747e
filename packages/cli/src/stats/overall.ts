import type { AggregateEnvelope, FinalResult, RegionSnapshot } from "../types";

export const OVERALL_KEY = "overall";

/**
 * Region ids in render order (lexicographic, independent of arrival order)
 */
export function sortedRegionIds(regions: Readonly<Record<string, RegionSnapshot>>): string[] {
  return Object.keys(regions).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function totalCompletedRequests(envelope: AggregateEnvelope): number {
  return Object.values(envelope.regions).reduce((sum, region) => sum + region.totalRequests, 0);
}

/**
 * Field-wise sum of every region's statistics; histograms are summed per status key.
 * Returns null when there are no regions.
 */
export function sumRegionResults(regions: Readonly<Record<string, RegionSnapshot>>): RegionSnapshot | null {
  const ids = sortedRegionIds(regions);
  if (ids.length === 0) {
    return null;
  }

  const statuses: Record<string, number> = {};
  const totals = ids.reduce(
    (acc, id) => {
      const data = regions[id];
      for (const [status, value] of Object.entries(data.statuses)) {
        statuses[status] = (statuses[status] ?? 0) + value;
      }
      return {
        totalRequests: acc.totalRequests + data.totalRequests,
        totalBytesRead: acc.totalBytesRead + data.totalBytesRead,
        averageTimeNs: acc.averageTimeNs + data.averageTimeNs,
        averageRequestsPerSecond: acc.averageRequestsPerSecond + data.averageRequestsPerSecond,
        averageKBytesPerSecond: acc.averageKBytesPerSecond + data.averageKBytesPerSecond,
        slowestNs: acc.slowestNs + data.slowestNs,
        fastestNs: acc.fastestNs + data.fastestNs,
        totalTimedOut: acc.totalTimedOut + data.totalTimedOut,
      };
    },
    {
      totalRequests: 0,
      totalBytesRead: 0,
      averageTimeNs: 0,
      averageRequestsPerSecond: 0,
      averageKBytesPerSecond: 0,
      slowestNs: 0,
      fastestNs: 0,
      totalTimedOut: 0,
    },
  );

  return { region: OVERALL_KEY, ...totals, statuses };
}

export function buildFinalResult(envelope: AggregateEnvelope | null): FinalResult {
  const regions = envelope ? { ...envelope.regions } : {};
  return Object.freeze({
    regions: Object.freeze(regions),
    overall: sumRegionResults(regions),
  });
}
