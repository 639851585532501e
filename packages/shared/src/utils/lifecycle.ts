/**
 * Process lifecycle utilities
 * @module @loadramp/shared/utils/lifecycle
 *
 * Turns termination signals into an AbortSignal that runners observe, and
 * runs registered shutdown handlers once.
 */

/** Signals a process started under nohup answers; a hangup must not cancel it */
export const DETACHED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export type ShutdownHandler = (reason?: string) => void | Promise<void>;

export interface ShutdownController {
  /** Aborted once shutdown is requested */
  readonly signal: AbortSignal;
  readonly shutdownReason: string | undefined;
  /** Request shutdown with optional reason */
  requestShutdown(reason?: string): void;
  isShutdownRequested(): boolean;
  addShutdownHandler(handler: ShutdownHandler): void;
  /** Call all registered shutdown handlers */
  invokeShutdownHandlers(reason?: string): Promise<void>;
  /**
   * Request shutdown when the process receives one of `signals`.
   * Returns a function that removes the listeners.
   */
  bindProcessSignals(signals?: readonly NodeJS.Signals[]): () => void;
}

export function createShutdownController(): ShutdownController {
  const abort = new AbortController();
  let shutdownReason: string | undefined;
  const shutdownHandlers: ShutdownHandler[] = [];

  const controller: ShutdownController = {
    get signal() {
      return abort.signal;
    },

    get shutdownReason() {
      return shutdownReason;
    },

    requestShutdown(reason?: string) {
      if (!abort.signal.aborted) {
        shutdownReason = reason;
        abort.abort(reason);
      }
    },

    isShutdownRequested() {
      return abort.signal.aborted;
    },

    addShutdownHandler(handler: ShutdownHandler) {
      shutdownHandlers.push(handler);
    },

    async invokeShutdownHandlers(reason?: string) {
      const errors: Error[] = [];
      for (const handler of shutdownHandlers) {
        try {
          await handler(reason);
        } catch (error) {
          errors.push(error instanceof Error ? error : new Error(String(error)));
        }
      }
      if (errors.length > 0) {
        throw new AggregateError(errors, `${errors.length} shutdown handler(s) failed`);
      }
    },

    bindProcessSignals(signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP']) {
      const listeners = signals.map((name) => {
        const listener = (): void => controller.requestShutdown(`received ${name}`);
        process.on(name, listener);
        return { name, listener };
      });
      return () => {
        for (const { name, listener } of listeners) {
          process.off(name, listener);
        }
      };
    },
  };

  return controller;
}
