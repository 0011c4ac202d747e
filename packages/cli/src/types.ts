export interface RegionSnapshot {
  readonly region: string;
  readonly totalRequests: number;
  readonly totalBytesRead: number;
  readonly averageTimeNs: number;
  readonly averageRequestsPerSecond: number;
  readonly averageKBytesPerSecond: number;
  readonly slowestNs: number;
  readonly fastestNs: number;
  readonly totalTimedOut: number;
  // HTTP status code (as sent by the aggregator) -> occurrences
  readonly statuses: Readonly<Record<string, number>>;
}

export interface AggregateEnvelope {
  readonly regions: Readonly<Record<string, RegionSnapshot>>;
  // 0 when unknown; progress then falls back to the time limit
  readonly totalExpectedRequests: number;
}

export interface FinalResult {
  readonly regions: Readonly<Record<string, RegionSnapshot>>;
  readonly overall: RegionSnapshot | null;
}

export interface RunConfig {
  readonly feed: string;
  readonly interval: number;
  readonly requests: number;
  readonly timelimit: number;
  readonly timeout: number;
  readonly headers: readonly string[];
  readonly output?: string;
  readonly settings: string;
}

/**
 * Values that may come from the command line or the settings file.
 * Anything left undefined falls through to the next source.
 */
export interface RunSettings {
  readonly feed?: string;
  readonly interval?: number;
  readonly requests?: number;
  readonly timelimit?: number;
  readonly timeout?: number;
  readonly headers?: readonly string[];
  readonly output?: string;
}

export interface RunOptions extends RunSettings {
  readonly settings?: string;
}

export interface InitOptions {
  readonly settings?: string;
}
