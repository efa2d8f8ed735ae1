/**
 * Reload Handler - rediscover resources on SIGHUP
 *
 * Lets a long-running host pick up new or edited SKILL.md / AGENT.md files
 * without restarting: `kill -HUP <pid>` runs the reload callback, typically
 * each manager's `discover()`.
 */

import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('Reload', 'discovery');

/**
 * Called on each reload. The signal aborts when the handler is stopped.
 */
export type ReloadCallback = (signal: AbortSignal) => void | Promise<void>;

export class ReloadHandler {
  private running = false;
  private controller = new AbortController();
  // Reloads run one at a time, in arrival order
  private queue: Promise<void> = Promise.resolve();
  private readonly onSignal = (): void => {
    void this.handleReload();
  };

  constructor(private readonly onReload?: ReloadCallback) {}

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Aborted once the handler is stopped
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Start listening for SIGHUP. Calling it again while running does nothing.
   */
  start(): void {
    if (this.running) return;

    this.running = true;
    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }
    process.on('SIGHUP', this.onSignal);
    log.debug('Listening for SIGHUP');
  }

  /**
   * Stop listening and abort any reload in progress. Safe to call repeatedly.
   */
  stop(): void {
    if (!this.running) return;

    this.running = false;
    process.off('SIGHUP', this.onSignal);
    this.controller.abort();
    log.debug('Stopped listening for SIGHUP');
  }

  /**
   * Run a reload as if SIGHUP had arrived. Resolves once the callback settles.
   */
  simulateReload(): Promise<void> {
    return this.handleReload();
  }

  private handleReload(): Promise<void> {
    this.queue = this.queue.then(() => this.runCallback());
    return this.queue;
  }

  private async runCallback(): Promise<void> {
    if (!this.running) {
      log.debug('Reload ignored: handler not started');
      return;
    }
    if (!this.onReload) {
      log.debug('Reload ignored: no callback');
      return;
    }

    log.info('Reloading resources');
    try {
      await this.onReload(this.controller.signal);
    } catch (error) {
      log.error('Reload failed', { error: errorMessage(error) });
    }
  }
}
