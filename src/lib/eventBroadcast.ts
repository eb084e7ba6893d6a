/**
 * Interoperability broadcast
 *
 * The host framework's callback wiring is a black box: it may listen on the
 * input, on the group container, or for input/click rather than change. A
 * programmatic selection therefore replays every plausible native signal,
 * followed by one semantic notification for collaborators that would rather
 * not depend on native event shapes.
 */

import type { BroadcastSignal, ToggleChangeDetail } from '@/types';

export const DEFAULT_SIGNALS: readonly BroadcastSignal[] = [
  { type: 'change', target: 'control', composed: true },
  { type: 'input', target: 'control', composed: true },
  { type: 'click', target: 'control', composed: true },
  { type: 'change', target: 'container' }
];

export function isToggleChangeEvent(event: Event): event is CustomEvent<ToggleChangeDetail> {
  if (!(event instanceof CustomEvent)) return false;
  const detail: unknown = event.detail;
  return typeof detail === 'object' && detail !== null
    && 'groupIdentifier' in detail && typeof detail.groupIdentifier === 'string'
    && 'selectedValue' in detail && typeof detail.selectedValue === 'string';
}

export interface DispatchedSignal {
  type: string;
  target: BroadcastSignal['target'];
}

export class InteropBroadcaster {
  private notificationEvent: string;
  private signals: readonly BroadcastSignal[];

  constructor(notificationEvent: string, signals: readonly BroadcastSignal[] = DEFAULT_SIGNALS) {
    this.notificationEvent = notificationEvent;
    this.signals = signals;
  }

  /**
   * Dispatch every configured signal synchronously, in order, then the
   * semantic notification on the document. Returns what was dispatched.
   */
  broadcast(control: HTMLInputElement, container: HTMLElement, groupIdentifier: string): DispatchedSignal[] {
    const doc = control.ownerDocument;
    const dispatched: DispatchedSignal[] = [];

    for (const signal of this.signals) {
      const target = signal.target === 'control' ? control
        : signal.target === 'container' ? container
        : doc;
      // Plain Event, not MouseEvent: a synthetic click must not re-run the
      // control's activation behaviour.
      target.dispatchEvent(new Event(signal.type, {
        bubbles: true,
        cancelable: true,
        composed: signal.composed ?? false
      }));
      dispatched.push({ type: signal.type, target: signal.target });
    }

    const detail: ToggleChangeDetail = { groupIdentifier, selectedValue: control.value };
    doc.dispatchEvent(new CustomEvent<ToggleChangeDetail>(this.notificationEvent, {
      detail,
      bubbles: true
    }));
    dispatched.push({ type: this.notificationEvent, target: 'document' });

    return dispatched;
  }
}
