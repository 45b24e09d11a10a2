/**
 * Single-fire completion signal shared by the producer and the main flow
 */

import { logger } from "../../utils/logger.js";

export type StopReason = "exhausted" | "interrupted";

export class TerminationCoordinator {
  private readonly controller = new AbortController();
  private stopReason: StopReason | undefined;
  private waiters: Array<(reason: StopReason) => void> = [];

  /**
   * Move from running to stopped. Only the first call has any effect.
   * @returns true if this call performed the transition
   */
  stop(reason: StopReason): boolean {
    if (this.stopReason !== undefined) {
      logger.debug("Ignoring repeated stop", {
        reason,
        stoppedBy: this.stopReason,
      });
      return false;
    }
    this.stopReason = reason;
    this.controller.abort(reason);
    for (const wake of this.waiters.splice(0)) {
      wake(reason);
    }
    return true;
  }

  get stopped(): boolean {
    return this.stopReason !== undefined;
  }

  get reason(): StopReason | undefined {
    return this.stopReason;
  }

  /** Aborted on the transition; the producer checks it between records */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Resolves once, for every waiter, with the reason of the first stop */
  wait(): Promise<StopReason> {
    return new Promise<StopReason>((resolve) => {
      if (this.stopReason !== undefined) {
        resolve(this.stopReason);
      } else {
        this.waiters.push(resolve);
      }
    });
  }
}

/**
 * Minimal view of `process` needed to register signal handlers
 */
export interface SignalEmitter {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(
    event: NodeJS.Signals,
    listener: (signal: NodeJS.Signals) => void,
  ): unknown;
}

/**
 * Stop the coordinator when one of the given signals arrives. Handlers stay
 * installed until removed, so repeated signals are absorbed by the
 * idempotent stop instead of falling through to Node's default exit.
 * @returns a function removing the handlers again
 */
export function registerInterruptHandlers(
  coordinator: TerminationCoordinator,
  signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
  target: SignalEmitter = process,
): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping`);
    coordinator.stop("interrupted");
  };

  for (const signal of signals) {
    target.on(signal, onSignal);
  }

  return () => {
    for (const signal of signals) {
      target.removeListener(signal, onSignal);
    }
  };
}
