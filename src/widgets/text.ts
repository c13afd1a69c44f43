import { z } from 'zod';
import type { KeyEvent } from '../keys.js';
import { LineEditor } from '../line-editor.js';
import {
  accepted,
  parseOptions,
  refine,
  rejected,
  type Check,
  type ValidationOutcome,
} from '../validation.js';
import { PromptLifecycle, type WidgetStatus } from './lifecycle.js';
import { editLine, isPrintable } from './line-input.js';
import type { TextView, Widget } from './types.js';

export const checkSchema = <A extends unknown[]>() =>
  z.custom<Check<A>>((v) => typeof v === 'function', { message: 'Expected a function' });

export const LineOptionsSchema = z.object({
  /** Shown while the buffer is empty; never submitted. */
  placeholder: z.string().optional(),
  /** Submitted when the buffer is empty. */
  default: z.string().optional(),
  /** Pre-filled buffer the user can edit. */
  initial: z.string().optional(),
  validate: checkSchema<[string]>().optional(),
}).strict();

export type TextOptions = z.input<typeof LineOptionsSchema>;

export const EMPTY_INPUT_MESSAGE = 'Please enter a value';

/** Acceptance rule shared by Text and Password. */
export function validateLine(
  raw: string,
  defaultValue: string | undefined,
  check: Check<[string]> | undefined,
): ValidationOutcome<string> {
  const value = raw === '' ? defaultValue ?? '' : raw;
  if (value === '') return rejected(EMPTY_INPUT_MESSAGE);
  return refine(accepted(value), check, value);
}

/** One-line free text input. */
export class Text implements Widget<string> {
  readonly kind = 'text';
  readonly message: string;
  private readonly editor: LineEditor;
  private readonly options: z.output<typeof LineOptionsSchema>;
  private readonly lifecycle: PromptLifecycle<string>;

  constructor(message: string, options: TextOptions = {}) {
    this.options = parseOptions(LineOptionsSchema, options, 'text');
    this.message = message;
    this.editor = new LineEditor(this.options.initial);
    this.lifecycle = new PromptLifecycle({
      edit: (event) => editLine(this.editor, event, isPrintable),
      validate: () => validateLine(this.editor.value, this.options.default, this.options.validate),
    });
  }

  /** Current buffer content. */
  get input(): string {
    return this.editor.value;
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

  view(): TextView {
    return {
      kind: 'text',
      message: this.message,
      state: this.lifecycle.status.state,
      input: this.editor.value,
      cursor: this.editor.cursor,
      placeholder: this.options.placeholder,
      defaultValue: this.options.default,
      error: this.lifecycle.error,
    };
  }
}
