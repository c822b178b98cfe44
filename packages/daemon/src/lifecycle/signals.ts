import type { EventEmitter } from "events";

/**
 * Resolves with the first of `signals` delivered to `target`, then detaches
 * every listener it added.
 */
export function waitForShutdownSignal(
  target: EventEmitter = process,
  signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const handlers = new Map<NodeJS.Signals, () => void>();
    for (const signal of signals) {
      const handler = () => {
        for (const [name, h] of handlers) target.off(name, h);
        console.log(`\n[Lifecycle] Received ${signal}`);
        resolve(signal);
      };
      handlers.set(signal, handler);
      target.on(signal, handler);
    }
  });
}
