import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { InteractionBridge } from '@/lib/interactionBridge';
import { InteropBroadcaster } from '@/lib/eventBroadcast';
import { BrowserScheduler, TimerGroup } from '@/lib/scheduler';
import { controlOf, mountGroup, resetDocument } from './helpers';

const NOTIFICATION = 'toggle-sync:change';

function labelFor(group: HTMLElement, value: string): HTMLLabelElement {
  const label = controlOf(group, value).closest('label') ?? group.querySelector<HTMLLabelElement>(`label[for="${group.id}-${value}"]`);
  if (!label) throw new Error(`no label for ${value}`);
  return label;
}

describe('InteractionBridge', () => {
  let timers: TimerGroup;
  let reapply: Mock<(container: HTMLElement) => void>;
  let onSelect: Mock<(value: string) => void>;
  let bridge: InteractionBridge;

  beforeEach(() => {
    vi.useFakeTimers();
    resetDocument();
    timers = new TimerGroup(new BrowserScheduler());
    reapply = vi.fn<(container: HTMLElement) => void>();
    onSelect = vi.fn<(value: string) => void>();
    bridge = new InteractionBridge(
      timers,
      new InteropBroadcaster(NOTIFICATION),
      { reapply, onSelect },
      { groupId: 'manual-map-toggle', changeDebounceMs: 50, postClickReapplyMs: 50, verbose: false }
    );
  });

  afterEach(() => {
    timers.cancelAll();
    vi.useRealTimers();
  });

  it('selects the clicked option and forwards it in order', () => {
    const group = mountGroup({ checked: 'no' });
    bridge.attach(group);

    const yes = controlOf(group, 'yes');
    const log: string[] = [];
    for (const type of ['change', 'input', 'click']) {
      yes.addEventListener(type, () => log.push(`control:${type}`));
    }
    group.addEventListener('change', (e) => {
      if (e.target === group) log.push('container:change');
    });
    const onNotify = (e: Event) => log.push(`notify:${e.type}`);
    document.addEventListener(NOTIFICATION, onNotify);

    labelFor(group, 'yes').click();
    document.removeEventListener(NOTIFICATION, onNotify);

    expect(yes.checked).toBe(true);
    expect(controlOf(group, 'no').checked).toBe(false);
    expect(log).toEqual([
      'control:change',
      'control:input',
      'control:click',
      'container:change',
      `notify:${NOTIFICATION}`
    ]);
    expect(onSelect).toHaveBeenCalledTimes(1);
    expect(onSelect).toHaveBeenCalledWith('yes');
  });

  it('re-applies styling only after the short delay', () => {
    const group = mountGroup({ checked: 'no' });
    bridge.attach(group);

    labelFor(group, 'yes').click();
    expect(reapply).not.toHaveBeenCalled();

    vi.advanceTimersByTime(50);
    // one from the bubbling change event, one from the click itself
    expect(reapply).toHaveBeenCalledTimes(2);
    expect(reapply).toHaveBeenCalledWith(group);
  });

  it('treats a click on the selected option as a no-op', () => {
    const group = mountGroup({ checked: 'no' });
    bridge.attach(group);

    const no = controlOf(group, 'no');
    const events: string[] = [];
    for (const type of ['change', 'input', 'click']) {
      no.addEventListener(type, () => events.push(type));
    }

    labelFor(group, 'no').click();

    expect(events).toEqual([]);
    expect(onSelect).not.toHaveBeenCalled();
    expect(timers.size).toBe(0);
    expect(no.checked).toBe(true);
  });

  it('debounces re-application after a native change event', () => {
    const group = mountGroup({ checked: 'no' });
    bridge.attach(group);

    controlOf(group, 'yes').dispatchEvent(new Event('change', { bubbles: true }));

    vi.advanceTimersByTime(49);
    expect(reapply).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(reapply).toHaveBeenCalledTimes(1);
  });

  it('ignores change events that do not come from a radio control', () => {
    const group = mountGroup();
    bridge.attach(group);

    group.dispatchEvent(new Event('change', { bubbles: true }));
    vi.advanceTimersByTime(100);

    expect(reapply).not.toHaveBeenCalled();
  });

  it('attaches to a container only once', () => {
    const group = mountGroup({ checked: 'no' });

    expect(bridge.attach(group)).toBe(true);
    expect(bridge.attach(group)).toBe(false);
    expect(bridge.isAttached(group)).toBe(true);

    labelFor(group, 'yes').click();
    expect(onSelect).toHaveBeenCalledTimes(1);
  });

  it('resolves labels by association rather than position', () => {
    const group = mountGroup({ markup: 'for', checked: 'no' });
    bridge.attach(group);

    // In this markup the first label belongs to "yes"
    group.querySelectorAll('label')[0].click();

    expect(controlOf(group, 'yes').checked).toBe(true);
    expect(onSelect).toHaveBeenCalledWith('yes');
  });

  it('selects programmatically through the same path', () => {
    const group = mountGroup({ checked: 'no' });
    bridge.attach(group);

    expect(bridge.select(group, 'maybe')).toBe(false);
    expect(bridge.select(group, 'no')).toBe(false);
    expect(bridge.select(group, 'yes')).toBe(true);
    expect(onSelect).toHaveBeenCalledWith('yes');
  });
});
