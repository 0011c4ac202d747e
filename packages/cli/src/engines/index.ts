import * as fs from "fs";
import type { RunConfig } from "../types";
import { isHttpFeed, type LoadTestEngine } from "./engine";
import { HttpFeedEngine } from "./http-feed-engine";
import { ReplayEngine } from "./replay-engine";

export type { LoadTestEngine } from "./engine";
export { HttpFeedEngine } from "./http-feed-engine";
export { ReplayEngine } from "./replay-engine";

export function createEngine(config: RunConfig): LoadTestEngine {
  if (isHttpFeed(config.feed)) {
    return new HttpFeedEngine(config);
  }
  if (config.feed !== "-" && !fs.existsSync(config.feed)) {
    throw new Error(`Feed file not found: ${config.feed}`);
  }
  return new ReplayEngine(config);
}
