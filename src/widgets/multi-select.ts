import { z } from 'zod';
import { ConstructionError } from '../errors.js';
import type { KeyEvent } from '../keys.js';
import type { ListNavigator } from '../list-navigator.js';
import { accepted, parseOptions, rejected, type ValidationOutcome } from '../validation.js';
import { PromptLifecycle, type EditResult, type WidgetStatus } from './lifecycle.js';
import {
  ListSettingsSchema,
  createNavigator,
  navigateList,
  optionViews,
  type SelectOption,
} from './options.js';
import type { MultiSelectView, Widget } from './types.js';

const MultiSelectSettingsSchema = ListSettingsSchema.extend({
  /** Indices toggled at start. */
  selected: z.array(z.number().int().nonnegative()).optional(),
  /** Minimum number of toggled options required to submit. */
  min: z.number().int().nonnegative().optional(),
  /** Maximum number of options that can be toggled. */
  max: z.number().int().positive().optional(),
});

export type MultiSelectSettings = z.input<typeof MultiSelectSettingsSchema>;

/**
 * Pick any number of items. Space or Tab toggles the focused option; Enter
 * submits the current toggle set, not the focused item.
 */
export class MultiSelect<T> implements Widget<T[]> {
  readonly kind = 'multi-select';
  readonly message: string;
  readonly options: readonly SelectOption<T>[];
  readonly min?: number;
  readonly max?: number;
  private readonly nav: ListNavigator;
  private readonly lifecycle: PromptLifecycle<T[]>;

  constructor(message: string, options: readonly SelectOption<T>[], settings: MultiSelectSettings = {}) {
    const { selected = [], min, max, ...list } = parseOptions(MultiSelectSettingsSchema, settings, 'multi-select');
    this.nav = createNavigator('multi-select', options, list);
    if (min !== undefined && min > options.length) {
      throw new ConstructionError(`Min ${min} exceeds the number of options (${options.length})`);
    }
    if (min !== undefined && max !== undefined && min > max) {
      throw new ConstructionError(`Min ${min} is greater than max ${max}`);
    }
    for (const idx of selected) {
      if (idx >= options.length) {
        throw new ConstructionError(`Selected index ${idx} is out of range (${options.length} options)`);
      }
      if (!this.nav.isToggled(idx)) this.nav.toggleAt(idx);
    }
    if (max !== undefined && this.nav.toggledCount > max) {
      throw new ConstructionError(`${this.nav.toggledCount} options selected at start, max is ${max}`);
    }
    this.message = message;
    this.options = options;
    this.min = min;
    this.max = max;
    this.lifecycle = new PromptLifecycle<T[]>({
      edit: (event) => this.edit(event),
      validate: () => this.validate(),
    });
  }

  get focused(): number {
    return this.nav.focused;
  }

  /** Toggled indices in list order. */
  get toggled(): number[] {
    return this.nav.toggled;
  }

  handleEvent(event: KeyEvent): void {
    this.lifecycle.handle(event);
  }

  status(): WidgetStatus<T[]> {
    return this.lifecycle.status;
  }

  value(): T[] {
    return this.lifecycle.value();
  }

  view(): MultiSelectView {
    return {
      kind: 'multi-select',
      message: this.message,
      state: this.lifecycle.status.state,
      options: optionViews(this.options),
      focused: this.nav.focused,
      page: this.nav.page,
      pageCount: this.nav.pageCount,
      pageRange: this.nav.pageRange(),
      toggled: this.nav.toggled,
      min: this.min,
      max: this.max,
      error: this.lifecycle.error,
    };
  }

  private edit(event: KeyEvent): EditResult {
    if (event.kind === 'tab' || (event.kind === 'char' && event.char === ' ')) {
      return this.toggleFocused();
    }
    return navigateList(this.nav, event);
  }

  private toggleFocused(): EditResult {
    const idx = this.nav.focused;
    if (this.options[idx].disabled) return 'ignored';
    const adding = !this.nav.isToggled(idx);
    if (adding && this.max !== undefined && this.nav.toggledCount >= this.max) return 'ignored';
    this.nav.toggle();
    return 'changed';
  }

  private validate(): ValidationOutcome<T[]> {
    if (this.min !== undefined && this.nav.toggledCount < this.min) {
      return rejected(`Select at least ${this.min} option${this.min === 1 ? '' : 's'}`);
    }
    return accepted(this.nav.toggled.map((i) => this.options[i].value));
  }
}
