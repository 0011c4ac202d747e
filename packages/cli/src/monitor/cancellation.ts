export type CancellationSource = "signal" | "keypress";

export interface CancellationEvent {
  readonly source: CancellationSource;
  readonly detail?: string;
}

/**
 * Minimal view of `process` needed to listen for termination requests
 */
export interface SignalTarget {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Single cancellation channel fed by any number of producers. The first event wins;
 * later events are accepted and ignored.
 */
export class CancellationBridge {
  private readonly listeners = new Set<(event: CancellationEvent) => void>();
  private readonly controller = new AbortController();
  private event: CancellationEvent | null = null;

  readonly cancelled: Promise<CancellationEvent> = new Promise((resolve) => {
    this.onCancel(resolve);
  });

  /**
   * Returns true when this call was the one that cancelled the run
   */
  cancel(source: CancellationSource, detail?: string): boolean {
    if (this.event) {
      return false;
    }
    const event: CancellationEvent = { source, detail };
    this.event = event;
    this.controller.abort(event);
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener(event);
    }
    return true;
  }

  /**
   * Subscribe to the cancellation event. Fires immediately if already cancelled.
   * Returns an unsubscribe function.
   */
  onCancel(listener: (event: CancellationEvent) => void): () => void {
    if (this.event) {
      listener(this.event);
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get isCancelled(): boolean {
    return this.event !== null;
  }

  get reason(): CancellationEvent | null {
    return this.event;
  }

  // Aborted together with the bridge; engines use it to stop producing
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Route SIGINT/SIGTERM into the bridge. Listeners stay installed after the first signal
   * so repeated signals do not fall back to the default handler mid-teardown.
   * Returns a function that removes them.
   */
  listenForSignals(target: SignalTarget = process): () => void {
    const listener = (signal: NodeJS.Signals) => {
      this.cancel("signal", signal);
    };
    for (const signal of TERMINATION_SIGNALS) {
      target.on(signal, listener);
    }
    return () => {
      for (const signal of TERMINATION_SIGNALS) {
        target.off(signal, listener);
      }
    };
  }

  /**
   * Producer for the dashboard's interrupt key
   */
  keypressProducer(): () => void {
    return () => {
      this.cancel("keypress", "ctrl-c");
    };
  }
}
