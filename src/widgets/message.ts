import type { KeyEvent } from '../keys.js';
import { accepted } from '../validation.js';
import { PromptLifecycle, type WidgetStatus } from './lifecycle.js';
import type { MessageView, Widget } from './types.js';

/** Shows a message and waits for any key. Esc still cancels. */
export class Message implements Widget<undefined> {
  readonly kind = 'message';
  readonly message: string;
  readonly action?: string;
  private readonly lifecycle = new PromptLifecycle<undefined>({
    edit: () => 'submit',
    validate: () => accepted(undefined),
  });

  /** `action` is a call to action such as "Press any key". */
  constructor(message: string, action?: string) {
    this.message = message;
    this.action = action;
  }

  handleEvent(event: KeyEvent): void {
    this.lifecycle.handle(event);
  }

  status(): WidgetStatus<undefined> {
    return this.lifecycle.status;
  }

  value(): undefined {
    return this.lifecycle.value();
  }

  view(): MessageView {
    return {
      kind: 'message',
      message: this.message,
      state: this.lifecycle.status.state,
      action: this.action,
    };
  }
}
