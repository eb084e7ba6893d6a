/**
 * Developer tools for diagnosing the toggle by hand from the console.
 * Not part of the functional contract.
 */

import type { SelfTestReport, SelfTestStep, ToggleStateDump } from '@/types';
import type { ToggleSync } from '@/lib/toggleSync';
import { LOG_PREFIX } from '@/lib/config';
import { isToggleChangeEvent } from '@/lib/eventBroadcast';
import { getControls, getLabels, STATE_ATTR, VALUE_ATTR } from '@/lib/optionPairing';
import { isControlHidden } from '@/lib/presentation';

declare global {
  interface Window {
    debugToggleSync?: () => ToggleStateDump;
    forceToggleSync?: () => number;
    testToggleSync?: (stepMs?: number) => Promise<SelfTestReport>;
  }
}

export function dumpToggleState(sync: ToggleSync): ToggleStateDump {
  const container = sync.getContainer();
  const dump: ToggleStateDump = {
    state: sync.getState(),
    containerFound: container !== null,
    controls: container
      ? getControls(container).map(c => ({ value: c.value, checked: c.checked, hidden: isControlHidden(c) }))
      : [],
    labels: container
      ? getLabels(container).map(l => ({
          value: l.getAttribute(VALUE_ATTR),
          state: l.getAttribute(STATE_ATTR),
          background: l.style.backgroundColor,
          color: l.style.color
        }))
      : []
  };

  console.log(`${LOG_PREFIX} state=${dump.state} container=${dump.containerFound}`);
  console.table(dump.controls);
  console.table(dump.labels);

  return dump;
}

export function forceToggleApply(sync: ToggleSync): number {
  const styled = sync.apply();
  console.log(`${LOG_PREFIX} forced re-application, styled ${styled} options`);
  return styled;
}

/**
 * Select every option in turn and check the notification went out and the
 * styling followed. The currently checked option goes last so every step is
 * a real change, and the original selection is restored at the end. In a
 * single-option group that option is already checked; it must stay checked
 * and styled, and no notification is expected.
 */
export async function runToggleSelfTest(sync: ToggleSync, stepMs = 1000): Promise<SelfTestReport> {
  const container = sync.getContainer();
  if (!container) {
    console.warn(`${LOG_PREFIX} self-test: container not found`);
    return { passed: false, reason: 'container not found', steps: [] };
  }

  const values = getControls(container).map(c => c.value);
  if (values.length === 0) {
    console.warn(`${LOG_PREFIX} self-test: no radio inputs found`);
    return { passed: false, reason: 'no radio inputs found', steps: [] };
  }

  const current = sync.getSelectedValue();
  const pivot = current === null ? -1 : values.indexOf(current);
  const order = [...values.slice(pivot + 1), ...values.slice(0, pivot + 1)];

  const doc = container.ownerDocument;
  const steps: SelfTestStep[] = [];

  for (const [i, value] of order.entries()) {
    if (i > 0) await sync.wait(stepMs);

    let notified = false;
    const listener = (e: Event) => {
      if (isToggleChangeEvent(e) && e.detail.selectedValue === value) notified = true;
    };
    doc.addEventListener(sync.config.notificationEvent, listener);
    const changed = sync.select(value);
    doc.removeEventListener(sync.config.notificationEvent, listener);

    sync.apply();

    const group = sync.getContainer();
    const checkedLabels = group
      ? getLabels(group).filter(l => l.getAttribute(STATE_ATTR) === 'checked')
      : [];
    const checked = sync.getSelectedValue() === value;
    const labelSelected = checkedLabels.length === 1 && checkedLabels[0].getAttribute(VALUE_ATTR) === value;

    const step: SelfTestStep = {
      value,
      changed,
      notified,
      checked,
      labelSelected,
      passed: (notified || !changed) && checked && labelSelected
    };
    if (!step.passed) console.warn(`${LOG_PREFIX} self-test: option "${value}" failed`, step);
    steps.push(step);
  }

  const passed = steps.every(s => s.passed);
  return { passed, reason: passed ? null : 'one or more options failed', steps };
}

export function installDebugGlobals(sync: ToggleSync, target: Window = window): void {
  target.debugToggleSync = () => dumpToggleState(sync);
  target.forceToggleSync = () => forceToggleApply(sync);
  target.testToggleSync = (stepMs?: number) => runToggleSelfTest(sync, stepMs);
}
