/**
 * Pairs each native radio control with its presentation label.
 *
 * Pairing order: the label wrapping the control, then a label whose `for`
 * names the control's id, then whatever label sits at the same position.
 * The result is stamped onto the label as data-toggle-value so later clicks
 * resolve by value rather than by index.
 */

import type { ToggleOption } from '@/types';

export const VALUE_ATTR = 'data-toggle-value';
export const STATE_ATTR = 'data-toggle-state';

export function getControls(container: ParentNode): HTMLInputElement[] {
  return Array.from(container.querySelectorAll<HTMLInputElement>('input[type="radio"]'));
}

export function getLabels(container: ParentNode): HTMLLabelElement[] {
  return Array.from(container.querySelectorAll<HTMLLabelElement>('label'));
}

export function collectOptions(container: ParentNode): ToggleOption[] {
  const controls = getControls(container);
  const labels = getLabels(container);
  const claimed = new Set<HTMLLabelElement>();
  const paired: Array<HTMLLabelElement | null> = controls.map(() => null);

  controls.forEach((control, i) => {
    const wrapping = control.closest('label');
    if (wrapping && labels.includes(wrapping) && !claimed.has(wrapping)) {
      paired[i] = wrapping;
      claimed.add(wrapping);
    }
  });

  controls.forEach((control, i) => {
    if (paired[i] || !control.id) return;
    const byFor = labels.find(l => l.htmlFor === control.id && !claimed.has(l));
    if (byFor) {
      paired[i] = byFor;
      claimed.add(byFor);
    }
  });

  controls.forEach((_, i) => {
    if (paired[i]) return;
    const positional = labels[i];
    if (positional && !claimed.has(positional)) {
      paired[i] = positional;
      claimed.add(positional);
    }
  });

  const options: ToggleOption[] = [];
  controls.forEach((control, i) => {
    const label = paired[i];
    if (!label) return;
    label.setAttribute(VALUE_ATTR, control.value);
    options.push({ control, label, value: control.value });
  });
  return options;
}

export function findOptionForLabel(container: ParentNode, label: HTMLLabelElement): ToggleOption | null {
  const options = collectOptions(container);
  const value = label.getAttribute(VALUE_ATTR);
  if (value === null) return null;
  return options.find(o => o.value === value) ?? null;
}

export function findOptionByValue(container: ParentNode, value: string): ToggleOption | null {
  return collectOptions(container).find(o => o.value === value) ?? null;
}
