import type { KeyEvent } from '../keys.js';
import type { ListNavigator } from '../list-navigator.js';
import { accepted, rejected, type ValidationOutcome } from '../validation.js';
import { PromptLifecycle, type WidgetStatus } from './lifecycle.js';
import { createNavigator, navigateList, optionViews, type ListSettings, type SelectOption } from './options.js';
import type { SelectView, Widget } from './types.js';

export const DISABLED_OPTION_MESSAGE = 'This option is disabled';

/**
 * Pick one item from a list. Submits the focused option's value.
 *
 * | Key        | Action             |
 * | ---------- | ------------------ |
 * | Enter      | Submit focused     |
 * | Up, `k`    | Focus previous     |
 * | Down, `j`  | Focus next         |
 * | Left, `h`  | Previous page      |
 * | Right, `l` | Next page          |
 */
export class Select<T> implements Widget<T> {
  readonly kind = 'select';
  readonly message: string;
  readonly options: readonly SelectOption<T>[];
  private readonly nav: ListNavigator;
  private readonly lifecycle: PromptLifecycle<T>;

  constructor(message: string, options: readonly SelectOption<T>[], settings: ListSettings = {}) {
    this.nav = createNavigator('select', options, settings);
    this.message = message;
    this.options = options;
    this.lifecycle = new PromptLifecycle<T>({
      edit: (event) => navigateList(this.nav, event),
      validate: () => this.validate(),
    });
  }

  get focused(): number {
    return this.nav.focused;
  }

  handleEvent(event: KeyEvent): void {
    this.lifecycle.handle(event);
  }

  status(): WidgetStatus<T> {
    return this.lifecycle.status;
  }

  value(): T {
    return this.lifecycle.value();
  }

  view(): SelectView {
    return {
      kind: 'select',
      message: this.message,
      state: this.lifecycle.status.state,
      options: optionViews(this.options),
      focused: this.nav.focused,
      page: this.nav.page,
      pageCount: this.nav.pageCount,
      pageRange: this.nav.pageRange(),
      error: this.lifecycle.error,
    };
  }

  private validate(): ValidationOutcome<T> {
    const option = this.options[this.nav.focused];
    return option.disabled ? rejected(DISABLED_OPTION_MESSAGE) : accepted(option.value);
  }
}
