/**
 * Facility setup panel: the manual door classification toggle and the
 * section it reveals.
 */

import { RadioItems } from '@/components/RadioItems';

export type ClassificationChoice = 'yes' | 'no';

export interface ClassificationPanelOptions {
  initialChoice?: ClassificationChoice;
  /** Re-render the toggle after every change, as a server round-trip would. */
  rerenderOnChange?: boolean;
  onChoice?: (choice: ClassificationChoice) => void;
}

export const TOGGLE_ID = 'manual-map-toggle';

function toChoice(value: string): ClassificationChoice | null {
  return value === 'yes' || value === 'no' ? value : null;
}

export class ClassificationPanel {
  private container: HTMLElement;
  private options: ClassificationPanelOptions;
  private toggle: RadioItems | null = null;
  private choice: ClassificationChoice;

  constructor(container: HTMLElement, options: ClassificationPanelOptions = {}) {
    this.container = container;
    this.options = options;
    this.choice = options.initialChoice ?? 'no';
  }

  render(): void {
    this.container.innerHTML = `
      <section class="classification-panel">
        <label class="classification-question">Enable Manual Door Classification?</label>
        <div class="classification-toggle-slot" id="classification-toggle-slot"></div>
        <small class="classification-hint">
          Choose 'Yes' to manually set security levels for each door, or 'No' for automatic classification.
        </small>
        <div id="door-classification-table-container" class="classification-table">
          <p>Manual classification tools</p>
        </div>
      </section>
    `;

    const slot = this.container.querySelector<HTMLElement>('#classification-toggle-slot');
    if (!slot) return;

    this.toggle = new RadioItems(slot, {
      id: TOGGLE_ID,
      className: 'clean-radio-toggle',
      options: [
        { label: 'No', value: 'no' },
        { label: 'Yes', value: 'yes' }
      ],
      value: this.choice,
      onChange: (value) => this.handleChange(value)
    });
    this.toggle.render();
    this.updateTableVisibility();
  }

  getChoice(): ClassificationChoice {
    return this.choice;
  }

  getToggle(): RadioItems | null {
    return this.toggle;
  }

  private handleChange(value: string): void {
    const choice = toChoice(value);
    if (!choice) return;

    this.choice = choice;
    this.updateTableVisibility();
    this.options.onChoice?.(choice);

    if (this.options.rerenderOnChange) {
      this.toggle?.rerender(choice);
    }
  }

  private updateTableVisibility(): void {
    const table = this.container.querySelector<HTMLElement>('#door-classification-table-container');
    if (table) table.style.display = this.choice === 'yes' ? 'block' : 'none';
  }

  destroy(): void {
    this.toggle?.destroy();
    this.toggle = null;
    this.container.innerHTML = '';
  }
}
