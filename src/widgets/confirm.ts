import { z } from 'zod';
import type { KeyEvent } from '../keys.js';
import { ListNavigator } from '../list-navigator.js';
import { accepted, parseOptions, type ValidationOutcome } from '../validation.js';
import { PromptLifecycle, type EditResult, type WidgetStatus } from './lifecycle.js';
import type { ConfirmView, Widget } from './types.js';

const ConfirmOptionsSchema = z.object({
  default: z.boolean().optional(),
}).strict();

export type ConfirmOptions = z.input<typeof ConfirmOptionsSchema>;

const NO = 0;
const YES = 1;

/**
 * Yes/no question over a two-option navigator ([No, Yes]).
 *
 * | Key                 | Action            |
 * | ------------------- | ----------------- |
 * | Enter               | Submit focused    |
 * | `y` / `n`           | Submit yes / no   |
 * | Left, `h`           | Focus No          |
 * | Right, `l`          | Focus Yes         |
 * | Up, Down, Tab       | Flip focus        |
 */
export class Confirm implements Widget<boolean> {
  readonly kind = 'confirm';
  readonly message: string;
  private readonly nav: ListNavigator;
  private readonly lifecycle: PromptLifecycle<boolean>;

  constructor(message: string, options: ConfirmOptions = {}) {
    const opts = parseOptions(ConfirmOptionsSchema, options, 'confirm');
    this.message = message;
    this.nav = new ListNavigator(2, { initial: opts.default ? YES : NO });
    this.lifecycle = new PromptLifecycle({
      edit: (event) => this.edit(event),
      validate: () => this.validate(),
    });
  }

  handleEvent(event: KeyEvent): void {
    this.lifecycle.handle(event);
  }

  status(): WidgetStatus<boolean> {
    return this.lifecycle.status;
  }

  value(): boolean {
    return this.lifecycle.value();
  }

  view(): ConfirmView {
    return {
      kind: 'confirm',
      message: this.message,
      state: this.lifecycle.status.state,
      active: this.nav.focused === YES,
    };
  }

  private edit(event: KeyEvent): EditResult {
    switch (event.kind) {
      case 'up':
        this.nav.moveUp();
        return 'changed';
      case 'down':
      case 'tab':
        this.nav.moveDown();
        return 'changed';
      case 'left':
        this.nav.select(NO);
        return 'changed';
      case 'right':
        this.nav.select(YES);
        return 'changed';
      case 'char':
        switch (event.char.toLowerCase()) {
          case 'y':
            this.nav.select(YES);
            return 'submit';
          case 'n':
            this.nav.select(NO);
            return 'submit';
          case 'h':
            this.nav.select(NO);
            return 'changed';
          case 'l':
            this.nav.select(YES);
            return 'changed';
          default:
            return 'ignored';
        }
      default:
        return 'ignored';
    }
  }

  private validate(): ValidationOutcome<boolean> {
    return accepted(this.nav.focused === YES);
  }
}
