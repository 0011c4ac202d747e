import chalk from "chalk";
import ora from "ora";
import { aggregateConfiguration } from "../config";
import { createEngine, type LoadTestEngine } from "../engines";
import { CancellationBridge, type SignalTarget } from "../monitor/cancellation";
import { runAggregationLoop, type LoopOutcome } from "../monitor/aggregation-loop";
import { printSummary, saveJsonSummary } from "../monitor/summary";
import { buildFinalResult } from "../stats/overall";
import { BlessedSurface } from "../ui/blessed-surface";
import { DashboardRenderer } from "../ui/dashboard";
import type { TerminalSurface } from "../ui/surface";
import type { AggregateEnvelope, RunConfig, RunOptions } from "../types";

export interface RunDependencies {
  readonly createSurface?: () => TerminalSurface;
  readonly createEngine?: (config: RunConfig) => LoadTestEngine;
  readonly signalTarget?: SignalTarget;
  readonly now?: () => number;
}

async function cleanEngine(engine: LoadTestEngine): Promise<void> {
  const spinner = ora("Cleaning up...").start();
  try {
    await engine.clean();
    spinner.stop();
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : "Unknown error";
    spinner.fail(`Cleanup failed: ${errorMessage}`);
  }
}

/**
 * Owns the dashboard session: the terminal surface is closed and the engine cleaned up
 * on every exit path.
 */
async function monitorRun(engine: LoadTestEngine, dependencies: RunDependencies): Promise<LoopOutcome> {
  const cancellation = new CancellationBridge();
  const stopListening = cancellation.listenForSignals(dependencies.signalTarget);

  try {
    // A terminal we cannot take over is fatal
    const surface = dependencies.createSurface ? dependencies.createSurface() : new BlessedSurface();
    const dashboard = new DashboardRenderer(surface);

    try {
      dashboard.showLaunchScreen();
      const stream = engine.start(cancellation.signal);

      surface.onInterrupt(cancellation.keypressProducer());
      dashboard.showHint();

      return await runAggregationLoop({
        stream,
        cancellation,
        dashboard,
        timelimitSeconds: engine.config.timelimit,
        now: dependencies.now,
      });
    } finally {
      surface.close();
    }
  } finally {
    await cleanEngine(engine);
    stopListening();
  }
}

// Dropped payloads are only reported once the dashboard has released the terminal
function reportRejected(engine: LoadTestEngine): void {
  for (const message of engine.rejected) {
    console.log(chalk.yellow(`⚠️  Skipped malformed update: ${message}`));
  }
}

function reportOutcome(outcome: LoopOutcome): number {
  switch (outcome.reason) {
    case "completed":
      console.log(chalk.green(`✅ Run complete (${outcome.envelopesReceived} updates received)`));
      return 0;
    case "cancelled":
      console.log(
        chalk.yellow(`🛑 Run cancelled by ${outcome.cancellation.source}${
          outcome.cancellation.detail ? ` (${outcome.cancellation.detail})` : ""
        }; results are partial`),
      );
      return 0;
    case "failed": {
      const errorMessage = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
      console.error(chalk.red(`❌ Result stream failed: ${errorMessage}`));
      return 1;
    }
  }
}

// Summary always runs, even when the dashboard could not start
function finishRun(config: RunConfig, envelope: AggregateEnvelope | null): void {
  const result = buildFinalResult(envelope);
  printSummary(result);
  if (config.output) {
    saveJsonSummary(config.output, result);
  }
}

/**
 * Run the live dashboard, then print the summary and write the optional export.
 * Resolves to the process exit code.
 */
export async function runCommand(options: RunOptions, dependencies: RunDependencies = {}): Promise<number> {
  const config = aggregateConfiguration(options);
  const engine = (dependencies.createEngine ?? createEngine)(config);

  let outcome: LoopOutcome;
  try {
    outcome = await monitorRun(engine, dependencies);
  } catch (error) {
    finishRun(config, null);
    throw error;
  }

  finishRun(config, outcome.envelope);
  reportRejected(engine);
  return reportOutcome(outcome);
}
