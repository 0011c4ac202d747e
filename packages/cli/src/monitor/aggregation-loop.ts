import type { AggregateEnvelope } from "../types";
import { sortedRegionIds } from "../stats/overall";
import { estimateProgress } from "../stats/progress";
import type { DashboardRenderer } from "../ui/dashboard";
import type { CancellationBridge, CancellationEvent } from "./cancellation";

export interface AggregationLoopOptions {
  readonly stream: AsyncIterable<AggregateEnvelope>;
  readonly cancellation: CancellationBridge;
  readonly dashboard: DashboardRenderer;
  readonly timelimitSeconds: number;
  // Milliseconds; injectable for tests
  readonly now?: () => number;
}

interface OutcomeBase {
  // Latest envelope received, or null if none arrived
  readonly envelope: AggregateEnvelope | null;
  readonly envelopesReceived: number;
}

export type LoopOutcome =
  | (OutcomeBase & { readonly reason: "completed" })
  | (OutcomeBase & { readonly reason: "cancelled"; readonly cancellation: CancellationEvent })
  | (OutcomeBase & { readonly reason: "failed"; readonly error: unknown });

type Step =
  | { readonly kind: "cancelled"; readonly event: CancellationEvent }
  | { readonly kind: "next"; readonly result: IteratorResult<AggregateEnvelope> }
  | { readonly kind: "failed"; readonly error: unknown };

/**
 * Wait for whichever comes first: the next envelope or cancellation.
 * A cancellation that is already pending wins without touching the stream.
 */
function nextStep(iterator: AsyncIterator<AggregateEnvelope>, cancellation: CancellationBridge): Promise<Step> {
  return new Promise<Step>((resolve) => {
    const unsubscribe = cancellation.onCancel((event) => resolve({ kind: "cancelled", event }));
    if (cancellation.isCancelled) {
      return;
    }
    iterator.next().then(
      (result) => {
        unsubscribe();
        resolve({ kind: "next", result });
      },
      (error: unknown) => {
        unsubscribe();
        resolve({ kind: "failed", error });
      },
    );
  });
}

/**
 * Consume envelopes until the stream closes or cancellation arrives, redrawing the
 * dashboard once per envelope. Each envelope replaces the previous one entirely.
 */
export async function runAggregationLoop(options: AggregationLoopOptions): Promise<LoopOutcome> {
  const { stream, cancellation, dashboard, timelimitSeconds } = options;
  const now = options.now ?? Date.now;

  const iterator = stream[Symbol.asyncIterator]();
  const startTime = now();

  let latest: AggregateEnvelope | null = null;
  let received = 0;

  for (;;) {
    const step = await nextStep(iterator, cancellation);

    if (step.kind === "cancelled") {
      return { reason: "cancelled", cancellation: step.event, envelope: latest, envelopesReceived: received };
    }
    if (step.kind === "failed") {
      return { reason: "failed", error: step.error, envelope: latest, envelopesReceived: received };
    }
    if (step.result.done) {
      return { reason: "completed", envelope: latest, envelopesReceived: received };
    }

    const envelope = step.result.value;
    if (received === 0) {
      dashboard.clearLaunchScreen();
    }
    received++;

    const ordered = sortedRegionIds(envelope.regions).map((id) => envelope.regions[id]);
    const elapsedSeconds = (now() - startTime) / 1000;
    const fraction = estimateProgress(envelope, elapsedSeconds, timelimitSeconds);
    dashboard.render(ordered, fraction);

    latest = envelope;
  }
}
