// cancellation.ts - Cancellation Signal
//
// Loops poll `isCancelled` at their boundaries. `cancel()` is the only
// mutator; a token moves to cancelled once and stays there.

export type CancelListener = (reason: string) => void;

export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | undefined;
  private listeners = new Set<CancelListener>();

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  /** Set the token. Later calls are ignored. */
  cancel(reason = 'cancelled'): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) listener(reason);
  }

  /**
   * Run `listener` once on cancellation, immediately if already cancelled.
   * Returns an unsubscribe function.
   */
  onCancel(listener: CancelListener): () => void {
    if (this.cancelled) {
      listener(this.cancelReason ?? 'cancelled');
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

// =============================================================================
// Process-wide token
// =============================================================================

let processToken = new CancellationToken();

type SignalListener = (signal: NodeJS.Signals) => void;

/** Anything signals can be subscribed on; the process itself in production */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

const HANDLED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

let installed: { source: SignalSource; handler: SignalListener } | null = null;

/** The token termination signals cancel. */
export function processCancellation(): CancellationToken {
  return processToken;
}

/**
 * Route SIGINT and SIGTERM to the process token. Installing twice is a
 * no-op; the first signal cancels, later ones are ignored.
 */
export function installSignalHandlers(
  write: (text: string) => void = (t) => process.stderr.write(t),
  source: SignalSource = process,
): void {
  if (installed) return;

  const handler: SignalListener = (signal) => {
    if (processToken.isCancelled) return;
    write('\nShutting down...\n');
    processToken.cancel(signal);
  };

  for (const signal of HANDLED_SIGNALS) source.on(signal, handler);
  installed = { source, handler };
}

export function signalHandlersInstalled(): boolean {
  return installed !== null;
}

/** Test-only: fresh token, handlers removed. */
export function resetProcessCancellation(): void {
  if (installed) {
    for (const signal of HANDLED_SIGNALS) installed.source.off(signal, installed.handler);
    installed = null;
  }
  processToken = new CancellationToken();
}
