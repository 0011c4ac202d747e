#!/usr/bin/env node

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { readFileSync } from "fs";
import { join } from "path";
import { runCommand } from "./commands/run";
import { initCommand } from "./commands/init";

// Read version from package.json
const packageJson = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
const version = packageJson.version;

yargs(hideBin(process.argv))
  .scriptName("swarmwatch")
  .usage("📡 swarmwatch - Live dashboard for distributed load-test runs")
  .version(version)
  .alias("v", "version")
  .alias("h", "help")
  .strict()
  .recommendCommands()
  .fail((msg, err) => {
    if (err) {
      console.error(chalk.red(err.message));
      process.exit(1);
    }
    console.error(chalk.red(msg));
    process.exit(1);
  })
  // Run command (default)
  .command(
    ["run", "$0"],
    "Watch a run live, then print the summary",
    (yargs) => {
      return yargs
        .option("feed", {
          alias: "f",
          type: "string",
          description: "Results feed: NDJSON file, - for stdin, or aggregator URL",
        })
        .option("interval", {
          alias: "i",
          type: "number",
          description: "Milliseconds between replayed updates / aggregator polls (default 1000)",
        })
        .option("requests", {
          alias: "n",
          type: "number",
          description: "Expected total requests when the feed does not report it (default 0)",
        })
        .option("timelimit", {
          alias: "N",
          type: "number",
          description: "Seconds the run is expected to take at most (default 3600)",
        })
        .option("timeout", {
          alias: "t",
          type: "number",
          description: "Aggregator request timeout in seconds (default 15)",
        })
        .option("header", {
          alias: "H",
          type: "string",
          array: true,
          description: 'Aggregator request header "Name: value" (repeat for more)',
        })
        .option("output", {
          alias: "o",
          type: "string",
          description: "Optional path to JSON file for result storage",
        })
        .option("settings", {
          alias: "s",
          type: "string",
          description: "Load settings from file (defaults to swarmwatch.json)",
        });
    },
    async (argv) => {
      process.exitCode = await runCommand({
        feed: argv.feed,
        interval: argv.interval,
        requests: argv.requests,
        timelimit: argv.timelimit,
        timeout: argv.timeout,
        headers: argv.header,
        output: argv.output,
        settings: argv.settings,
      });
    },
  )
  // Init command
  .command(
    "init",
    "Create a settings file interactively",
    (yargs) => {
      return yargs.option("settings", {
        alias: "s",
        type: "string",
        description: "Settings file to write (defaults to swarmwatch.json)",
      });
    },
    async (argv) => {
      await initCommand({ settings: argv.settings });
    },
  )
  .parse();
