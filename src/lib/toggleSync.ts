/**
 * Toggle synchronizer
 * Keeps a framework-owned radio group's styled labels consistent with the
 * hidden controls' checked state, across host re-renders.
 *
 * Flow: locate → apply → bridge → watch. The watchdog re-enters the flow
 * whenever the host framework swaps the container out.
 */

import type { SyncConfig, SyncConfigOverrides, SyncState } from '@/types';
import { LOG_PREFIX, resolveSyncConfig } from '@/lib/config';
import { BrowserScheduler, TimerGroup, type Scheduler } from '@/lib/scheduler';
import { ControlGroupLocator } from '@/lib/locator';
import { PresentationApplier } from '@/lib/presentation';
import { InteropBroadcaster } from '@/lib/eventBroadcast';
import { InteractionBridge } from '@/lib/interactionBridge';
import { ReconciliationWatchdog } from '@/lib/watchdog';
import { getControls } from '@/lib/optionPairing';

export interface ToggleSyncDeps {
  document?: Document;
  scheduler?: Scheduler;
  broadcaster?: InteropBroadcaster;
}

type Listener<T> = (value: T) => void;

export class ToggleSync {
  readonly config: SyncConfig;

  private doc: Document;
  private timers: TimerGroup;
  private locator: ControlGroupLocator;
  private applier: PresentationApplier;
  private bridge: InteractionBridge;
  private watchdog: ReconciliationWatchdog;

  private state: SyncState = 'idle';
  private stateListeners: Set<Listener<SyncState>> = new Set();
  private selectListeners: Set<Listener<string>> = new Set();

  constructor(overrides: SyncConfigOverrides = {}, deps: ToggleSyncDeps = {}) {
    this.doc = deps.document ?? document;
    this.config = resolveSyncConfig(overrides, this.doc);
    this.timers = new TimerGroup(deps.scheduler ?? new BrowserScheduler());

    const { config } = this;

    this.locator = new ControlGroupLocator(this.doc, this.timers, {
      selector: config.containerSelector,
      retryIntervalMs: config.retryIntervalMs,
      maxRetries: config.maxRetries
    });

    this.applier = new PresentationApplier(config.palette);

    this.bridge = new InteractionBridge(
      this.timers,
      deps.broadcaster ?? new InteropBroadcaster(config.notificationEvent),
      {
        reapply: (container) => { this.applier.apply(container); },
        onSelect: (value) => this.emit(this.selectListeners, value)
      },
      {
        groupId: config.groupId,
        changeDebounceMs: config.changeDebounceMs,
        postClickReapplyMs: config.postClickReapplyMs,
        verbose: config.verbose
      }
    );

    this.watchdog = new ReconciliationWatchdog(
      this.doc,
      this.timers,
      {
        onRerender: () => {
          this.log('new control group detected, reinitializing');
          this.initialize();
        },
        onDrift: (container) => {
          this.log('periodic fix applied');
          this.applier.apply(container);
          // A re-render the observer missed arrives here with unbridged labels
          this.bridge.attach(container);
        }
      },
      {
        selector: config.containerSelector,
        reinitDelayMs: config.reinitDelayMs,
        pollIntervalMs: config.pollIntervalMs
      }
    );
  }

  start(): void {
    if (this.state !== 'idle') return;
    this.initialize();
    this.watchdog.start();
  }

  /**
   * Re-apply styling to whatever container is in the document right now.
   */
  apply(): number {
    return this.applier.apply(this.locator.find());
  }

  /**
   * Select an option through the same path a label click takes.
   */
  select(value: string): boolean {
    const container = this.locator.find();
    if (!container) return false;
    this.bridge.attach(container);
    return this.bridge.select(container, value);
  }

  /**
   * Resolve after `ms` on this instance's scheduler. Cancelled by dispose().
   */
  wait(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.timers.delay(resolve, ms);
    });
  }

  getSelectedValue(): string | null {
    const container = this.locator.find();
    if (!container) return null;
    return getControls(container).find(c => c.checked)?.value ?? null;
  }

  getContainer(): HTMLElement | null {
    return this.locator.find();
  }

  getState(): SyncState {
    return this.state;
  }

  isWatching(): boolean {
    return this.watchdog.isRunning();
  }

  onStateChange(listener: Listener<SyncState>): () => void {
    this.stateListeners.add(listener);
    return () => { this.stateListeners.delete(listener); };
  }

  onSelect(listener: Listener<string>): () => void {
    this.selectListeners.add(listener);
    return () => { this.selectListeners.delete(listener); };
  }

  dispose(): void {
    this.locator.cancel();
    this.watchdog.stop();
    this.timers.cancelAll();
    this.setState('idle');
    this.stateListeners.clear();
    this.selectListeners.clear();
  }

  private initialize(): void {
    this.setState('locating');
    this.locator.locate(
      (container) => {
        const styled = this.applier.apply(container);
        this.bridge.attach(container);
        this.setState('ready');
        this.log(`initialized, styled ${styled} options`);
      },
      (attempts) => {
        console.warn(`${LOG_PREFIX} ${this.config.containerSelector} not found after ${attempts} attempts`);
        this.setState('failed');
      }
    );
  }

  private setState(next: SyncState): void {
    if (this.state === next) return;
    this.state = next;
    this.emit(this.stateListeners, next);
  }

  private emit<T>(listeners: Set<Listener<T>>, value: T): void {
    for (const listener of listeners) {
      try {
        listener(value);
      } catch (error) {
        console.error(`${LOG_PREFIX} listener failed:`, error);
      }
    }
  }

  private log(message: string): void {
    if (this.config.verbose) console.log(`${LOG_PREFIX} ${message}`);
  }
}

// Export singleton instance
let toggleSyncInstance: ToggleSync | null = null;

export function getToggleSync(overrides?: SyncConfigOverrides): ToggleSync {
  if (!toggleSyncInstance) {
    toggleSyncInstance = new ToggleSync(overrides);
  }
  return toggleSyncInstance;
}

export function destroyToggleSync(): void {
  if (toggleSyncInstance) {
    toggleSyncInstance.dispose();
    toggleSyncInstance = null;
  }
}
