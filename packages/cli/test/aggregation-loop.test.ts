import { describe, expect, it } from "vitest";
import { runAggregationLoop } from "../src/monitor/aggregation-loop";
import { CancellationBridge } from "../src/monitor/cancellation";
import { CANCEL_HINT, DashboardRenderer, LAUNCH_MESSAGE } from "../src/ui/dashboard";
import { MemorySurface } from "../src/ui/memory-surface";
import type { AggregateEnvelope } from "../src/types";
import { envelope, fromList, hanging, region } from "./helpers";

function setup() {
  const surface = new MemorySurface(80, 30);
  const dashboard = new DashboardRenderer(surface);
  const cancellation = new CancellationBridge();
  return { surface, dashboard, cancellation };
}

describe("runAggregationLoop", () => {
  it("renders every envelope and keeps the last one when the stream closes", async () => {
    const { surface, dashboard, cancellation } = setup();
    dashboard.showLaunchScreen();
    const first = envelope([region("us-east-1", { totalRequests: 200 }), region("eu-west-1", { totalRequests: 200 })], 1000);
    const last = envelope([region("us-east-1", { totalRequests: 500 }), region("eu-west-1", { totalRequests: 500 })], 1000);

    const outcome = await runAggregationLoop({
      stream: fromList([first, last]),
      cancellation,
      dashboard,
      timelimitSeconds: 3600,
    });

    expect(outcome).toEqual({ reason: "completed", envelope: last, envelopesReceived: 2 });
    // launch screen + one frame per envelope
    expect(surface.frames).toHaveLength(3);
    expect(surface.frames[1].map((l) => l.trimEnd())[0]).toBe(" 40.0%");

    const frame = surface.lastFrameText();
    expect(frame[0]).toBe("100.0%");
    expect(frame[1]).toBe(`[${"#".repeat(52)}]`);
    expect(frame[3]).toBe("Region: eu-west-1");
    expect(frame[9]).toBe("Region: us-east-1");
    expect(frame).not.toContain(LAUNCH_MESSAGE);
  });

  it("orders regions lexicographically whatever the arrival order", async () => {
    const { surface, dashboard, cancellation } = setup();

    await runAggregationLoop({
      stream: fromList([envelope([region("us-west-2"), region("ap-south-1"), region("eu-central-1")])]),
      cancellation,
      dashboard,
      timelimitSeconds: 60,
    });

    const headers = surface.lastFrameText().filter((line) => line.startsWith("Region: "));
    expect(headers).toEqual(["Region: ap-south-1", "Region: eu-central-1", "Region: us-west-2"]);
  });

  it("measures progress against the time limit when the target is unknown", async () => {
    const { surface, dashboard, cancellation } = setup();
    const clock = [0, 5_000];

    await runAggregationLoop({
      stream: fromList([envelope([region("us-east-1")], 0)]),
      cancellation,
      dashboard,
      timelimitSeconds: 10,
      now: () => clock.shift() ?? 5_000,
    });

    expect(surface.lastFrameText()[0]).toBe(" 50.0%");
  });

  it("ends with no envelope when the stream closes empty", async () => {
    const { surface, dashboard, cancellation } = setup();

    const outcome = await runAggregationLoop({ stream: fromList([]), cancellation, dashboard, timelimitSeconds: 60 });

    expect(outcome).toEqual({ reason: "completed", envelope: null, envelopesReceived: 0 });
    expect(surface.frames).toHaveLength(0);
  });

  it("stops immediately when cancelled before anything arrives", async () => {
    const { dashboard, cancellation } = setup();
    let started = false;
    async function* stream(): AsyncGenerator<AggregateEnvelope> {
      started = true;
      yield envelope([region("us-east-1")]);
    }
    cancellation.cancel("signal", "SIGINT");

    const outcome = await runAggregationLoop({ stream: stream(), cancellation, dashboard, timelimitSeconds: 60 });

    expect(outcome).toEqual({
      reason: "cancelled",
      cancellation: { source: "signal", detail: "SIGINT" },
      envelope: null,
      envelopesReceived: 0,
    });
    expect(started).toBe(false);
  });

  it("stops a stream that never produces anything when cancelled", async () => {
    const { surface, dashboard, cancellation } = setup();
    surface.onInterrupt(cancellation.keypressProducer());

    const pending = runAggregationLoop({ stream: hanging(), cancellation, dashboard, timelimitSeconds: 60 });
    surface.pressInterrupt();
    const outcome = await pending;

    expect(outcome.reason).toBe("cancelled");
    expect(outcome.envelope).toBeNull();
  });

  it("keeps the last envelope seen before cancellation", async () => {
    const { dashboard, cancellation } = setup();
    const first = envelope([region("us-east-1", { totalRequests: 10 })], 100);
    async function* stream(): AsyncGenerator<AggregateEnvelope> {
      yield first;
      cancellation.cancel("keypress", "ctrl-c");
      yield envelope([region("us-east-1", { totalRequests: 20 })], 100);
    }

    const outcome = await runAggregationLoop({ stream: stream(), cancellation, dashboard, timelimitSeconds: 60 });

    expect(outcome.reason).toBe("cancelled");
    expect(outcome.envelope).toBe(first);
    expect(outcome.envelopesReceived).toBe(1);
  });

  it("reports a failing stream with the last good envelope", async () => {
    const { dashboard, cancellation } = setup();
    const first = envelope([region("us-east-1")]);
    async function* stream(): AsyncGenerator<AggregateEnvelope> {
      yield first;
      throw new Error("feed went away");
    }

    const outcome = await runAggregationLoop({ stream: stream(), cancellation, dashboard, timelimitSeconds: 60 });

    expect(outcome.reason).toBe("failed");
    expect(outcome.envelope).toBe(first);
    if (outcome.reason === "failed") {
      expect(outcome.error).toBeInstanceOf(Error);
      expect(outcome.error instanceof Error ? outcome.error.message : "").toBe("feed went away");
    }
  });

  it("keeps the cancellation hint on every frame", async () => {
    const { surface, dashboard, cancellation } = setup();

    await runAggregationLoop({
      stream: fromList([envelope([region("a")]), envelope([region("b")])]),
      cancellation,
      dashboard,
      timelimitSeconds: 60,
    });

    for (const frame of surface.frames) {
      expect(frame[29].trimEnd()).toBe(CANCEL_HINT);
    }
  });
});
