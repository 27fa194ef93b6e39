/**
 * Graceful shutdown handling for the repo-deck CLI
 *
 * The first SIGINT/SIGTERM aborts the running pipeline through an
 * AbortSignal so its cleanup still runs; a second signal force-quits.
 */

import { logger } from './logger.js';

type CleanupCallback = () => void | Promise<void>;

export interface ShutdownOptions {
  /** Do not attach process signal handlers */
  skipHandlers?: boolean;
  /** Called after cleanup when a second signal arrives */
  forceExit?: (code: number) => void;
}

/**
 * Manages cancellation and cleanup callbacks for one CLI invocation
 */
export class ShutdownManager {
  private readonly controller = new AbortController();
  private callbacks: CleanupCallback[] = [];
  private handlers = new Map<NodeJS.Signals, () => void>();
  private readonly forceExit: (code: number) => void;

  constructor(options: ShutdownOptions = {}) {
    this.forceExit = options.forceExit ?? (code => process.exit(code));
    if (!options.skipHandlers && process.env.NODE_ENV !== 'test') {
      this.setupHandlers();
    }
  }

  /** Aborted once shutdown has been requested */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  private setupHandlers(): void {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      const handler = () => {
        this.handleSignal(signal).catch((error: unknown) => {
          logger.error(`Cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
        });
      };
      this.handlers.set(signal, handler);
      process.on(signal, handler);
    }
  }

  private async handleSignal(signal: NodeJS.Signals): Promise<void> {
    if (this.isInProgress()) {
      logger.warning('Force quitting...');
      this.forceExit(signal === 'SIGINT' ? 130 : 1);
      return;
    }

    logger.blank();
    logger.warning(`Interrupted (${signal}), cleaning up...`);
    await this.requestShutdown(signal);
  }

  /**
   * Abort the signal and run cleanup callbacks in reverse registration order.
   * Callback failures are logged and do not stop the remaining callbacks.
   */
  async requestShutdown(reason = 'shutdown'): Promise<void> {
    if (this.isInProgress()) return;
    this.controller.abort(reason);

    const pending = this.callbacks.reverse();
    this.callbacks = [];
    for (const callback of pending) {
      try {
        await callback();
      } catch (error) {
        logger.warning(`Cleanup error: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  onCleanup(callback: CleanupCallback): void {
    this.callbacks.push(callback);
  }

  removeCleanup(callback: CleanupCallback): void {
    const index = this.callbacks.indexOf(callback);
    if (index !== -1) {
      this.callbacks.splice(index, 1);
    }
  }

  /**
   * Remove all registered signal handlers
   */
  removeHandlers(): void {
    for (const [signal, handler] of this.handlers) {
      process.removeListener(signal, handler);
    }
    this.handlers.clear();
  }

  isInProgress(): boolean {
    return this.controller.signal.aborted;
  }
}
