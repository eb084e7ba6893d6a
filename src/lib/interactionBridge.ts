/**
 * Interaction bridge
 * Turns clicks on the styled labels into real selections on the hidden
 * controls and forwards them to the host framework.
 */

import type { ToggleOption } from '@/types';
import type { TimerGroup } from '@/lib/scheduler';
import type { InteropBroadcaster } from '@/lib/eventBroadcast';
import { LOG_PREFIX } from '@/lib/config';
import { findOptionByValue, findOptionForLabel, getControls, getLabels } from '@/lib/optionPairing';

export interface BridgeOptions {
  groupId: string;
  changeDebounceMs: number;
  postClickReapplyMs: number;
  verbose: boolean;
}

export interface BridgeCallbacks {
  reapply: (container: HTMLElement) => void;
  onSelect: (value: string) => void;
}

export class InteractionBridge {
  private timers: TimerGroup;
  private broadcaster: InteropBroadcaster;
  private callbacks: BridgeCallbacks;
  private options: BridgeOptions;
  private bridged: WeakSet<HTMLElement> = new WeakSet();

  constructor(timers: TimerGroup, broadcaster: InteropBroadcaster, callbacks: BridgeCallbacks, options: BridgeOptions) {
    this.timers = timers;
    this.broadcaster = broadcaster;
    this.callbacks = callbacks;
    this.options = options;
  }

  /**
   * Install listeners on a container. A container is only ever bridged once;
   * a re-rendered group is a new element and gets its own listeners.
   */
  attach(container: HTMLElement): boolean {
    if (this.bridged.has(container)) return false;
    this.bridged.add(container);

    container.addEventListener('change', (e) => {
      const target = e.target;
      if (target instanceof HTMLInputElement && target.type === 'radio') {
        if (this.options.verbose) console.log(`${LOG_PREFIX} radio changed to: ${target.value}`);
        this.timers.delay(() => this.callbacks.reapply(container), this.options.changeDebounceMs);
      }
    });

    for (const label of getLabels(container)) {
      label.addEventListener('click', (e) => {
        e.preventDefault();
        const option = findOptionForLabel(container, label);
        if (option) this.commit(container, option);
      });
    }

    return true;
  }

  isAttached(container: HTMLElement): boolean {
    return this.bridged.has(container);
  }

  /**
   * Programmatic selection through the same path as a label click.
   * Returns false for an unknown value or an option that is already checked.
   */
  select(container: HTMLElement, value: string): boolean {
    const option = findOptionByValue(container, value);
    return option ? this.commit(container, option) : false;
  }

  private commit(container: HTMLElement, option: ToggleOption): boolean {
    if (option.control.checked) return false;

    for (const control of getControls(container)) control.checked = false;
    option.control.checked = true;

    if (this.options.verbose) console.log(`${LOG_PREFIX} selected: ${option.value}`);

    this.broadcaster.broadcast(option.control, container, this.options.groupId);
    this.callbacks.onSelect(option.value);
    this.timers.delay(() => this.callbacks.reapply(container), this.options.postClickReapplyMs);
    return true;
  }
}
