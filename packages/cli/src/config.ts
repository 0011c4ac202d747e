import fs from "fs";
import path from "path";
import { z } from "zod";
import type { RunConfig, RunOptions, RunSettings } from "./types";

export const DEFAULT_SETTINGS_FILE = "swarmwatch.json";

const NO_HEADERS: readonly string[] = [];

export const DEFAULTS = Object.freeze({
  interval: 1000,
  requests: 0,
  timelimit: 3600,
  timeout: 15,
  headers: NO_HEADERS,
});

const SettingsFileSchema = z
  .object({
    feed: z.string().min(1).optional(),
    interval: z.number().int().positive().optional(),
    requests: z.number().int().nonnegative().optional(),
    timelimit: z.number().int().nonnegative().optional(),
    timeout: z.number().int().positive().optional(),
    headers: z.array(z.string()).optional(),
    output: z.string().min(1).optional(),
  })
  .strict();

export function resolveSettingsPath(settings?: string): string {
  return path.resolve(process.cwd(), settings ?? DEFAULT_SETTINGS_FILE);
}

/**
 * Load the settings file. A missing file is only an error when it was named explicitly.
 */
export function loadSettingsFile(filePath: string, required = false): RunSettings {
  if (!fs.existsSync(filePath)) {
    if (required) {
      throw new Error(`Settings file not found: ${filePath}`);
    }
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : "Unknown error";
    throw new Error(`Error parsing settings file ${filePath}: ${errorMessage}`);
  }

  const result = SettingsFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join(", ");
    throw new Error(`Invalid settings file ${filePath}: ${issues}`);
  }
  return result.data;
}

function nonEmpty(values: readonly string[] | undefined): readonly string[] | undefined {
  return values && values.length > 0 ? values : undefined;
}

/**
 * Command line beats the settings file, which beats the built-in default.
 */
export function mergeConfig(cli: RunSettings, file: RunSettings, settingsPath: string): RunConfig {
  const feed = cli.feed ?? file.feed;
  if (!feed) {
    throw new Error("No feed configured: pass --feed <file|-|url> or set \"feed\" in the settings file");
  }

  const config: RunConfig = {
    feed,
    interval: cli.interval ?? file.interval ?? DEFAULTS.interval,
    requests: cli.requests ?? file.requests ?? DEFAULTS.requests,
    timelimit: cli.timelimit ?? file.timelimit ?? DEFAULTS.timelimit,
    timeout: cli.timeout ?? file.timeout ?? DEFAULTS.timeout,
    headers: [...(nonEmpty(cli.headers) ?? nonEmpty(file.headers) ?? DEFAULTS.headers)],
    output: cli.output ?? file.output,
    settings: settingsPath,
  };

  for (const key of ["interval", "timeout"] as const) {
    if (!Number.isInteger(config[key]) || config[key] <= 0) {
      throw new Error(`Invalid ${key}: expected a positive integer, got ${config[key]}`);
    }
  }
  for (const key of ["requests", "timelimit"] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      throw new Error(`Invalid ${key}: expected a non-negative integer, got ${config[key]}`);
    }
  }
  return Object.freeze(config);
}

export function aggregateConfiguration(options: RunOptions): RunConfig {
  const settingsPath = resolveSettingsPath(options.settings);
  const file = loadSettingsFile(settingsPath, options.settings !== undefined);
  return mergeConfig(options, file, settingsPath);
}

export function saveSettings(filePath: string, settings: RunSettings): void {
  const validated = SettingsFileSchema.parse(settings);
  fs.writeFileSync(filePath, `${JSON.stringify(validated, null, 2)}\n`);
}

export function settingsExist(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * "Name: value" header flags -> header map
 */
export function parseHeaders(headers: readonly string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (const header of headers) {
    const separator = header.indexOf(":");
    const name = separator > 0 ? header.slice(0, separator).trim() : "";
    if (!name) {
      throw new Error(`Invalid header "${header}": expected "Name: value"`);
    }
    parsed[name] = header.slice(separator + 1).trim();
  }
  return parsed;
}
