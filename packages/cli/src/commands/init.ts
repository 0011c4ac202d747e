import chalk from "chalk";
import inquirer from "inquirer";
import { DEFAULTS, resolveSettingsPath, saveSettings, settingsExist } from "../config";
import type { InitOptions, RunSettings } from "../types";

export type InitAnswers = {
  feed: string;
  interval: number;
  requests: number;
  timelimit: number;
  output: string;
};

export type AskConfirm = (message: string) => Promise<boolean>;
export type AskSettings = () => Promise<InitAnswers>;

const positiveInteger = (value: number) => (Number.isInteger(value) && value > 0) || "Enter a positive whole number";
const nonNegativeInteger = (value: number) =>
  (Number.isInteger(value) && value >= 0) || "Enter zero or a positive whole number";

async function confirmOverwrite(message: string): Promise<boolean> {
  const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
    {
      type: "confirm",
      name: "overwrite",
      message,
      default: false,
    },
  ]);
  return overwrite;
}

async function askSettings(): Promise<InitAnswers> {
  return inquirer.prompt<InitAnswers>([
    {
      type: "input",
      name: "feed",
      message: "Results feed (NDJSON file, - for stdin, or aggregator URL):",
      validate: (value: string) => value.trim().length > 0 || "A feed is required",
    },
    {
      type: "number",
      name: "interval",
      message: "Milliseconds between updates:",
      default: DEFAULTS.interval,
      validate: positiveInteger,
    },
    {
      type: "number",
      name: "requests",
      message: "Expected total requests (0 to track progress by time limit):",
      default: DEFAULTS.requests,
      validate: nonNegativeInteger,
    },
    {
      type: "number",
      name: "timelimit",
      message: "Run time limit in seconds:",
      default: DEFAULTS.timelimit,
      validate: nonNegativeInteger,
    },
    {
      type: "input",
      name: "output",
      message: "JSON export path (leave empty to skip):",
    },
  ]);
}

export function answersToSettings(answers: InitAnswers): RunSettings {
  const output = answers.output.trim();
  return {
    feed: answers.feed.trim(),
    interval: answers.interval,
    requests: answers.requests,
    timelimit: answers.timelimit,
    ...(output ? { output } : {}),
  };
}

export async function initCommand(
  options: InitOptions,
  ask: { confirm: AskConfirm; settings: AskSettings } = { confirm: confirmOverwrite, settings: askSettings },
): Promise<void> {
  console.log(chalk.blue.bold("\n📡 swarmwatch - Initialization\n"));

  const settingsPath = resolveSettingsPath(options.settings);

  if (settingsExist(settingsPath)) {
    const overwrite = await ask.confirm(`Settings file ${settingsPath} already exists. Overwrite?`);
    if (!overwrite) {
      console.log(chalk.yellow("Initialization cancelled."));
      return;
    }
  }

  const answers = await ask.settings();
  saveSettings(settingsPath, answersToSettings(answers));

  console.log(chalk.green(`\n✅ Settings saved to ${settingsPath}\n`));
  console.log(chalk.gray("Start monitoring with:"));
  console.log(chalk.gray("  swarmwatch run\n"));
}
