/**
 * RadioItems component
 * Stand-in for the host framework's radio group: renders plain native radios
 * wrapped in labels and reports the value purely from native change events.
 * rerender() swaps the whole group element out, the way a framework render
 * cycle does.
 */

export interface RadioItemOption {
  label: string;
  value: string;
}

export interface RadioItemsOptions {
  id: string;
  options: RadioItemOption[];
  value?: string | null;
  className?: string;
  onChange?: (value: string) => void;
}

export class RadioItems {
  private host: HTMLElement;
  private options: RadioItemsOptions;
  private value: string | null;
  private element: HTMLElement | null = null;
  private renderCount = 0;

  constructor(host: HTMLElement, options: RadioItemsOptions) {
    this.host = host;
    this.options = options;
    this.value = options.value ?? null;
  }

  /**
   * Render the group, replacing any previously rendered element
   */
  render(): HTMLElement {
    const fresh = this.build();

    if (this.element && this.element.parentNode === this.host) {
      this.host.replaceChild(fresh, this.element);
    } else {
      this.host.appendChild(fresh);
    }

    this.element = fresh;
    this.renderCount++;
    this.attachEventListeners(fresh);
    return fresh;
  }

  /**
   * Re-render from scratch, optionally with a new value
   */
  rerender(value?: string | null): HTMLElement {
    if (value !== undefined) this.value = value;
    return this.render();
  }

  getValue(): string | null {
    return this.value;
  }

  getRenderCount(): number {
    return this.renderCount;
  }

  private build(): HTMLElement {
    const { id, options, className } = this.options;
    const doc = this.host.ownerDocument;
    const el = doc.createElement('div');
    el.id = id;
    if (className) el.className = className;

    el.innerHTML = options.map(option => `
      <label class="radio-item">
        <input type="radio" name="${id}" value="${option.value}" ${option.value === this.value ? 'checked' : ''} />
        ${option.label}
      </label>
    `).join('');

    return el;
  }

  private attachEventListeners(el: HTMLElement): void {
    const inputs = el.querySelectorAll<HTMLInputElement>('input[type="radio"]');
    inputs.forEach(input => {
      input.addEventListener('change', () => {
        if (!input.checked) return;
        this.value = input.value;
        this.options.onChange?.(input.value);
      });
    });
  }

  /**
   * Destroy component
   */
  destroy(): void {
    this.element?.remove();
    this.element = null;
  }
}
