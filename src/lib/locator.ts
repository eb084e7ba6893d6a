/**
 * Control group locator
 * The host framework renders asynchronously, so the container may not exist
 * yet when we look for it. Retries on a fixed interval until it shows up.
 */

import type { TimerHandle, Scheduler } from '@/lib/scheduler';

export interface LocatorOptions {
  selector: string;
  retryIntervalMs: number;
  maxRetries: number | null;
}

export class ControlGroupLocator {
  private doc: Document;
  private scheduler: Scheduler;
  private options: LocatorOptions;
  private pending: TimerHandle | null = null;
  private attempts = 0;

  constructor(doc: Document, scheduler: Scheduler, options: LocatorOptions) {
    this.doc = doc;
    this.scheduler = scheduler;
    this.options = options;
  }

  /**
   * Resolve the container now, or keep retrying until it appears.
   * Starting a new lookup abandons any retry chain already in flight.
   */
  locate(onFound: (container: HTMLElement) => void, onFailed?: (attempts: number) => void): void {
    this.cancel();
    this.attempts = 0;
    this.attempt(onFound, onFailed);
  }

  find(): HTMLElement | null {
    return this.doc.querySelector<HTMLElement>(this.options.selector);
  }

  isPending(): boolean {
    return this.pending !== null;
  }

  getAttempts(): number {
    return this.attempts;
  }

  cancel(): void {
    if (this.pending) {
      this.pending.cancel();
      this.pending = null;
    }
  }

  private attempt(onFound: (container: HTMLElement) => void, onFailed?: (attempts: number) => void): void {
    this.pending = null;
    this.attempts++;

    const container = this.find();
    if (container) {
      onFound(container);
      return;
    }

    const { maxRetries, retryIntervalMs } = this.options;
    if (maxRetries !== null && this.attempts > maxRetries) {
      onFailed?.(this.attempts);
      return;
    }

    this.pending = this.scheduler.delay(() => this.attempt(onFound, onFailed), retryIntervalMs);
  }
}
