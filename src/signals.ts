import { EventEmitter } from 'events';

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * A follow run only ends on SIGINT/SIGTERM, so those abort it and the run
 * winds down normally. Any other run keeps Node's default signal handling.
 */
export function abortOnSignals(follow: boolean, controller: AbortController, target: EventEmitter = process): void {
  if (!follow) return;
  for (const signal of STOP_SIGNALS) {
    target.on(signal, () => controller.abort());
  }
}
