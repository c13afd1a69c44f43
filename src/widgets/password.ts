import { z } from 'zod';
import type { KeyEvent } from '../keys.js';
import { LineEditor } from '../line-editor.js';
import { parseOptions } from '../validation.js';
import { PromptLifecycle, type WidgetStatus } from './lifecycle.js';
import { editLine, isPrintable } from './line-input.js';
import { LineOptionsSchema, validateLine } from './text.js';
import type { PasswordView, Widget } from './types.js';

export const DEFAULT_MASK = '*';

const PasswordOptionsSchema = LineOptionsSchema.extend({
  /** Render nothing at all instead of one mask glyph per character. */
  hidden: z.boolean().optional(),
  mask: z.string().refine((s) => Array.from(s).length === 1, 'Mask must be a single character').optional(),
});

export type PasswordOptions = z.input<typeof PasswordOptionsSchema>;

/**
 * Same editing and acceptance as Text. The buffer holds the real characters;
 * only the render projection masks them.
 */
export class Password implements Widget<string> {
  readonly kind = 'password';
  readonly message: string;
  private readonly editor: LineEditor;
  private readonly options: z.output<typeof PasswordOptionsSchema>;
  private readonly lifecycle: PromptLifecycle<string>;

  constructor(message: string, options: PasswordOptions = {}) {
    this.options = parseOptions(PasswordOptionsSchema, options, 'password');
    this.message = message;
    this.editor = new LineEditor(this.options.initial);
    this.lifecycle = new PromptLifecycle({
      edit: (event) => editLine(this.editor, event, isPrintable),
      validate: () => validateLine(this.editor.value, this.options.default, this.options.validate),
    });
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

  view(): PasswordView {
    return {
      kind: 'password',
      message: this.message,
      state: this.lifecycle.status.state,
      input: this.editor.value,
      cursor: this.editor.cursor,
      placeholder: this.options.placeholder,
      defaultValue: this.options.default,
      error: this.lifecycle.error,
      hidden: this.options.hidden ?? false,
      mask: this.options.mask ?? DEFAULT_MASK,
    };
  }
}
