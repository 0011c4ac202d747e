import * as fs from "fs";
import * as readline from "readline";
import type { Readable } from "stream";
import type { AggregateEnvelope, RunConfig } from "../types";
import { parseFeedTick, type FeedTick } from "../shared/feed";
import { sleep, type LoadTestEngine } from "./engine";

/**
 * Replays newline-delimited JSON envelopes from a file (or stdin for "-"),
 * pacing them by the configured interval. Blank lines and lines starting with "#" are skipped.
 * Lines that are not a valid envelope are recorded in `rejected` and skipped.
 */
export class ReplayEngine implements LoadTestEngine {
  readonly rejected: string[] = [];
  private lines: readline.Interface | null = null;
  private source: Readable | null = null;

  constructor(
    readonly config: RunConfig,
    private input?: Readable,
  ) {}

  private label(): string {
    return this.config.feed === "-" ? "stdin" : this.config.feed;
  }

  private open(): Readable {
    if (this.input) return this.input;
    if (this.config.feed === "-") return process.stdin;
    return fs.createReadStream(this.config.feed, { encoding: "utf-8" });
  }

  async *start(signal: AbortSignal): AsyncGenerator<AggregateEnvelope> {
    this.source = this.open();
    const lines = readline.createInterface({ input: this.source, crlfDelay: Infinity });
    this.lines = lines;

    let lineNumber = 0;
    let delivered = 0;
    try {
      for await (const line of lines) {
        lineNumber++;
        const trimmed = line.trim();
        if (trimmed.length === 0 || trimmed.startsWith("#")) continue;

        if (delivered > 0) {
          await sleep(this.config.interval, signal);
        }
        if (signal.aborted) return;

        const tick = this.parseLine(trimmed, lineNumber);
        if (!tick) continue;

        delivered++;
        yield tick.envelope;
        if (tick.finished) return;
      }
    } finally {
      lines.close();
    }
  }

  private parseLine(line: string, lineNumber: number): FeedTick | null {
    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : "Unknown error";
      this.rejected.push(`Invalid JSON on line ${lineNumber} of ${this.label()}: ${errorMessage}`);
      return null;
    }

    try {
      return parseFeedTick(data, this.config.requests, `line ${lineNumber} of ${this.label()}`);
    } catch (error: unknown) {
      this.rejected.push(error instanceof Error ? error.message : String(error));
      return null;
    }
  }

  async clean(): Promise<void> {
    this.lines?.close();
    if (this.source && this.source !== process.stdin) {
      this.source.destroy();
    }
    this.lines = null;
    this.source = null;
  }
}
