/**
 * Shared fixtures for the toggle tests
 */

import type { Scheduler, TimerHandle } from '@/lib/scheduler';

export type Markup = 'wrapped' | 'for' | 'sibling';

export interface GroupFixture {
  id?: string;
  values?: string[];
  checked?: string | null;
  markup?: Markup;
  parent?: HTMLElement;
}

/**
 * Build a control group the way a host framework would render one
 */
export function mountGroup(fixture: GroupFixture = {}): HTMLElement {
  const id = fixture.id ?? 'manual-map-toggle';
  const values = fixture.values ?? ['no', 'yes'];
  const checked = fixture.checked === undefined ? 'no' : fixture.checked;
  const markup = fixture.markup ?? 'wrapped';

  const el = document.createElement('div');
  el.id = id;

  const input = (value: string, withId: boolean) =>
    `<input type="radio" name="${id}" value="${value}"${withId ? ` id="${id}-${value}"` : ''}${value === checked ? ' checked' : ''} />`;

  if (markup === 'wrapped') {
    el.innerHTML = values.map(v => `<label>${input(v, false)}${v}</label>`).join('');
  } else if (markup === 'for') {
    // Labels deliberately in reverse order so position alone would pair them wrongly
    el.innerHTML = values.map(v => input(v, true)).join('')
      + [...values].reverse().map(v => `<label for="${id}-${v}">${v}</label>`).join('');
  } else {
    el.innerHTML = values.map(v => input(v, false)).join('')
      + values.map(v => `<label>${v}</label>`).join('');
  }

  (fixture.parent ?? document.body).appendChild(el);
  return el;
}

export function controlOf(container: HTMLElement, value: string): HTMLInputElement {
  const control = container.querySelector<HTMLInputElement>(`input[value="${value}"]`);
  if (!control) throw new Error(`no control for ${value}`);
  return control;
}

export function labelOf(container: HTMLElement, value: string): HTMLLabelElement {
  const label = container.querySelector<HTMLLabelElement>(`label[data-toggle-value="${value}"]`);
  if (!label) throw new Error(`no label for ${value}`);
  return label;
}

/**
 * The DOM normalizes colour values on assignment; run the expected value
 * through the same path before comparing.
 */
export function normalizeColor(color: string): string {
  const sample = document.createElement('div');
  sample.style.backgroundColor = color;
  return sample.style.backgroundColor;
}

export function resetDocument(): void {
  document.body.innerHTML = '';
}

interface QueuedDelay {
  callback: () => void;
  ms: number;
  cancelled: boolean;
}

/**
 * Scheduler that only runs delays when told to; repeating timers never fire.
 */
export class ManualScheduler implements Scheduler {
  private queue: QueuedDelay[] = [];

  delay(callback: () => void, ms: number): TimerHandle {
    const entry: QueuedDelay = { callback, ms, cancelled: false };
    this.queue.push(entry);
    return { cancel: () => { entry.cancelled = true; } };
  }

  every(_callback: () => void, _ms: number): TimerHandle {
    return { cancel: () => undefined };
  }

  pendingDelays(): number[] {
    return this.queue.filter(e => !e.cancelled).map(e => e.ms);
  }

  flush(): void {
    const due = this.queue;
    this.queue = [];
    for (const entry of due) {
      if (!entry.cancelled) entry.callback();
    }
  }
}
