import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { AggregateEnvelope, RegionSnapshot, RunConfig } from "../src/types";

export function region(id: string, overrides: Partial<RegionSnapshot> = {}): RegionSnapshot {
  return {
    region: id,
    totalRequests: 100,
    totalBytesRead: 2_048_000,
    averageTimeNs: 125_000_000,
    averageRequestsPerSecond: 40.5,
    averageKBytesPerSecond: 812.25,
    slowestNs: 1_500_000_000,
    fastestNs: 20_000_000,
    totalTimedOut: 2,
    statuses: { "200": 95, "500": 5 },
    ...overrides,
  };
}

export function envelope(regions: RegionSnapshot[], totalExpectedRequests = 0): AggregateEnvelope {
  const map: Record<string, RegionSnapshot> = {};
  for (const r of regions) {
    map[r.region] = r;
  }
  return { regions: map, totalExpectedRequests };
}

export function runConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    feed: "-",
    interval: 1,
    requests: 0,
    timelimit: 3600,
    timeout: 15,
    headers: [],
    settings: "swarmwatch.json",
    ...overrides,
  };
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "swarmwatch-test-"));
}

export async function* fromList(items: AggregateEnvelope[]): AsyncGenerator<AggregateEnvelope> {
  for (const item of items) {
    yield item;
  }
}

// Never yields and never finishes
export async function* hanging(): AsyncGenerator<AggregateEnvelope> {
  await new Promise<never>(() => undefined);
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
