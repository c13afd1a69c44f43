import { z } from 'zod';
import { ConstructionError } from '../errors.js';
import type { KeyEvent } from '../keys.js';
import { ListNavigator } from '../list-navigator.js';
import { accepted, parseOptions, type ValidationOutcome } from '../validation.js';
import { PromptLifecycle, type EditResult, type WidgetStatus } from './lifecycle.js';
import type { ToggleView, Widget } from './types.js';

const ToggleOptionsSchema = z.object({
  /** Index (0 or 1) focused at start. */
  initial: z.union([z.literal(0), z.literal(1)]).optional(),
}).strict();

export type ToggleOptions = z.input<typeof ToggleOptionsSchema>;

/** Choose between two caller-supplied labels. Submits the chosen label. */
export class Toggle implements Widget<string> {
  readonly kind = 'toggle';
  readonly message: string;
  readonly options: readonly [string, string];
  private readonly nav: ListNavigator;
  private readonly lifecycle: PromptLifecycle<string>;

  constructor(message: string, options: readonly [string, string], settings: ToggleOptions = {}) {
    if (options.length !== 2) {
      throw new ConstructionError(`A toggle needs exactly two options, got ${options.length}`);
    }
    const opts = parseOptions(ToggleOptionsSchema, settings, 'toggle');
    this.message = message;
    this.options = [options[0], options[1]];
    this.nav = new ListNavigator(2, { initial: opts.initial ?? 0 });
    this.lifecycle = new PromptLifecycle({
      edit: (event) => this.edit(event),
      validate: () => this.validate(),
    });
  }

  /** Index of the focused label. */
  get selectedIndex(): 0 | 1 {
    return this.nav.focused === 0 ? 0 : 1;
  }

  handleEvent(event: KeyEvent): void {
    this.lifecycle.handle(event);
  }

  status(): WidgetStatus<string> {
    return this.lifecycle.status;
  }

  value(): string {
    return this.lifecycle.value();
  }

  view(): ToggleView {
    return {
      kind: 'toggle',
      message: this.message,
      state: this.lifecycle.status.state,
      options: this.options,
      focused: this.selectedIndex,
    };
  }

  private edit(event: KeyEvent): EditResult {
    switch (event.kind) {
      case 'left':
        this.nav.select(0);
        return 'changed';
      case 'right':
        this.nav.select(1);
        return 'changed';
      case 'up':
        this.nav.moveUp();
        return 'changed';
      case 'down':
      case 'tab':
        this.nav.moveDown();
        return 'changed';
      case 'char':
        if (event.char === 'h' || event.char === 'H') {
          this.nav.select(0);
          return 'changed';
        }
        if (event.char === 'l' || event.char === 'L') {
          this.nav.select(1);
          return 'changed';
        }
        return 'ignored';
      default:
        return 'ignored';
    }
  }

  private validate(): ValidationOutcome<string> {
    return accepted(this.options[this.selectedIndex]);
  }
}
