/**
 * Reconciliation watchdog
 *
 * Host framework re-renders replace the control group wholesale and silently
 * discard our inline styling and listeners. Two independent triggers catch
 * that: a mutation observer for added nodes, and a slow poll for controls
 * whose hiding has been reset by something the observer missed.
 */

import type { TimerGroup, TimerHandle } from '@/lib/scheduler';
import { getControls } from '@/lib/optionPairing';
import { isControlHidden } from '@/lib/presentation';

export interface WatchdogOptions {
  selector: string;
  reinitDelayMs: number;
  pollIntervalMs: number;
}

export interface WatchdogCallbacks {
  /** A new container element appeared; it has no listeners yet. */
  onRerender: () => void;
  /** The container is present but a control is visible again. */
  onDrift: (container: HTMLElement) => void;
}

export class ReconciliationWatchdog {
  private doc: Document;
  private timers: TimerGroup;
  private callbacks: WatchdogCallbacks;
  private options: WatchdogOptions;
  private observer: MutationObserver | null = null;
  private poll: TimerHandle | null = null;
  private pendingReinit: TimerHandle | null = null;

  constructor(doc: Document, timers: TimerGroup, callbacks: WatchdogCallbacks, options: WatchdogOptions) {
    this.doc = doc;
    this.timers = timers;
    this.callbacks = callbacks;
    this.options = options;
  }

  start(): void {
    if (this.isRunning()) return;

    this.observer = new MutationObserver(records => this.handleMutations(records));
    this.observer.observe(this.doc.body, { childList: true, subtree: true });

    this.poll = this.timers.every(() => this.checkDrift(), this.options.pollIntervalMs);
  }

  stop(): void {
    this.observer?.disconnect();
    this.observer = null;
    this.poll?.cancel();
    this.poll = null;
    this.pendingReinit?.cancel();
    this.pendingReinit = null;
  }

  isRunning(): boolean {
    return this.observer !== null;
  }

  /**
   * Returns true when a batch of records contains the control group.
   * Several matches in one batch still schedule a single re-init.
   */
  handleMutations(records: MutationRecord[]): boolean {
    const { selector } = this.options;
    const found = records.some(record =>
      Array.from(record.addedNodes).some(node =>
        node instanceof Element && (node.matches(selector) || node.querySelector(selector) !== null)
      )
    );

    if (found && !this.pendingReinit) {
      this.pendingReinit = this.timers.delay(() => {
        this.pendingReinit = null;
        this.callbacks.onRerender();
      }, this.options.reinitDelayMs);
    }
    return found;
  }

  checkDrift(): boolean {
    const container = this.doc.querySelector<HTMLElement>(this.options.selector);
    if (!container) return false;

    const drifted = getControls(container).some(control => !isControlHidden(control));
    if (drifted) this.callbacks.onDrift(container);
    return drifted;
  }
}
