/**
 * Presentation applier
 * Derives label styling purely from the native controls' checked state.
 * Inline styles are used throughout so external stylesheets, whatever their
 * load order, cannot override the checked/unchecked look.
 */

import * as d3 from 'd3';
import type { Palette, StyleDeclarations, ToggleOption } from '@/types';
import { collectOptions, STATE_ATTR } from '@/lib/optionPairing';

export const HIDDEN_CONTROL_STYLE: StyleDeclarations = {
  'display': 'none',
  'opacity': '0',
  'position': 'absolute',
  'left': '-9999px',
  'width': '0',
  'height': '0',
  'pointer-events': 'none'
};

// Every property the checked overlay touches is reset here as well, so a
// label that loses its selection reverts fully to neutral.
export const BASE_LABEL_STYLE: StyleDeclarations = {
  'display': 'inline-block',
  'background-color': '#2D3748',
  'color': '#A0AEC0',
  'border': '2px solid #4A5568',
  'border-radius': '20px',
  'padding': '12px 24px',
  'margin': '0 8px',
  'cursor': 'pointer',
  'transition': 'all 0.3s cubic-bezier(0.4, 0, 0.2, 1)',
  'font-weight': '500',
  'min-width': '120px',
  'text-align': 'center',
  'user-select': 'none',
  'font-size': '0.95rem',
  'box-shadow': '0 1px 3px rgba(0, 0, 0, 0.1)',
  'font-family': 'inherit',
  'transform': 'none'
};

export const CHECKED_EMPHASIS_STYLE: StyleDeclarations = {
  'color': 'white',
  'font-weight': '600',
  'transform': 'translateY(-1px)'
};

/**
 * Full inline style for a label given its option's value and checked state
 */
export function styleFor(value: string, checked: boolean, palette: Palette): StyleDeclarations {
  if (!checked) return { ...BASE_LABEL_STYLE };

  const entry = palette[value];
  const accent: StyleDeclarations = entry
    ? {
        'background-color': entry.background,
        'border-color': entry.border,
        'box-shadow': entry.shadow
      }
    : {};

  return { ...BASE_LABEL_STYLE, ...CHECKED_EMPHASIS_STYLE, ...accent };
}

export function isControlHidden(control: HTMLInputElement): boolean {
  return control.style.display === 'none' && control.style.opacity === '0';
}

export class PresentationApplier {
  private palette: Palette;

  constructor(palette: Palette) {
    this.palette = palette;
  }

  /**
   * Style every option in the group. Returns how many options were styled;
   * 0 means the group (or its children) is not there yet.
   */
  apply(container: HTMLElement | null): number {
    if (!container) return 0;

    const options = collectOptions(container);
    if (options.length === 0) return 0;

    const controls = d3.selectAll(options.map(o => o.control));
    for (const [name, value] of Object.entries(HIDDEN_CONTROL_STYLE)) {
      controls.style(name, value);
    }

    for (const option of options) {
      this.styleLabel(option);
    }
    return options.length;
  }

  private styleLabel(option: ToggleOption): void {
    const checked = option.control.checked;
    const label = d3.select(option.label);

    for (const [name, value] of Object.entries(styleFor(option.value, checked, this.palette))) {
      label.style(name, value);
    }
    label.attr(STATE_ATTR, checked ? 'checked' : 'unchecked');
  }
}
