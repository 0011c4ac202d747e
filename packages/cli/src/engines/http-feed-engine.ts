import axios, { type AxiosInstance } from "axios";
import type { AggregateEnvelope, RunConfig } from "../types";
import { parseHeaders } from "../config";
import { parseFeedTick, type FeedTick } from "../shared/feed";
import { sleep, type LoadTestEngine } from "./engine";

/**
 * Polls an aggregator endpoint that returns the current envelope as JSON.
 * The run ends when the aggregator reports `"finished": true`. A response that is not a valid
 * envelope is recorded in `rejected` and the next poll is awaited; transport errors end the stream.
 */
export class HttpFeedEngine implements LoadTestEngine {
  readonly rejected: string[] = [];
  private client: AxiosInstance;
  private headers: Record<string, string>;

  constructor(
    readonly config: RunConfig,
    client?: AxiosInstance,
  ) {
    this.client = client ?? axios.create();
    this.headers = { Accept: "application/json", ...parseHeaders(config.headers) };
  }

  async *start(signal: AbortSignal): AsyncGenerator<AggregateEnvelope> {
    let polls = 0;
    while (!signal.aborted) {
      if (polls > 0) {
        await sleep(this.config.interval, signal);
        if (signal.aborted) return;
      }
      polls++;

      const data = await this.poll(signal);
      if (signal.aborted) return;

      let tick: FeedTick;
      try {
        tick = parseFeedTick(data, this.config.requests, `GET ${this.config.feed}`);
      } catch (error: unknown) {
        this.rejected.push(error instanceof Error ? error.message : String(error));
        continue;
      }
      yield tick.envelope;
      if (tick.finished) return;
    }
  }

  async clean(): Promise<void> {
    // Nothing held open between polls
  }

  private async poll(signal: AbortSignal): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>(this.config.feed, {
        signal,
        timeout: this.config.timeout * 1000,
        headers: this.headers,
      });
      return response.data;
    } catch (error) {
      if (signal.aborted && axios.isCancel(error)) {
        return null;
      }
      throw this.handleFeedError(error, `Failed to poll aggregator at ${this.config.feed}`);
    }
  }

  private handleFeedError(error: unknown, defaultMessage: string): Error {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        return new Error(`${defaultMessage}: HTTP ${error.response.status}`);
      }
      return new Error(`${defaultMessage}: ${error.message}`);
    }

    if (error instanceof Error) {
      return new Error(`${defaultMessage}: ${error.message}`);
    }

    return new Error(defaultMessage);
  }
}
