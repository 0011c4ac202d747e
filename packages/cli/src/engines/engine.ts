import type { AggregateEnvelope, RunConfig } from "../types";

/**
 * Source of aggregate results for a run. The stream ends when the run concludes;
 * `clean` is always called once the dashboard has closed.
 */
export interface LoadTestEngine {
  readonly config: RunConfig;
  // Payloads that were dropped instead of ending the stream, one message each
  readonly rejected: readonly string[];
  start(signal: AbortSignal): AsyncIterable<AggregateEnvelope>;
  clean(): Promise<void>;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

export function isHttpFeed(feed: string): boolean {
  return /^https?:\/\//i.test(feed);
}
