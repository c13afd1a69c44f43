import { z } from 'zod';
import { ConstructionError } from '../errors.js';
import type { KeyEvent } from '../keys.js';
import { LineEditor } from '../line-editor.js';
import { accepted, parseOptions, refine, rejected, type ValidationOutcome } from '../validation.js';
import { PromptLifecycle, type WidgetStatus } from './lifecycle.js';
import { editLine } from './line-input.js';
import { checkSchema } from './text.js';
import type { NumberView, Widget } from './types.js';

interface NumericType {
  readonly min: number;
  readonly max: number;
  readonly signed: boolean;
  readonly float: boolean;
}

const F32_MAX = 3.4028234663852886e38;

export const NUMBER_TYPES = ['u8', 'u16', 'u32', 'uint', 'i8', 'i16', 'i32', 'int', 'f32', 'f64'] as const;

export type NumberType = (typeof NUMBER_TYPES)[number];

export const NumberTypeSchema = z.enum(NUMBER_TYPES);

export const NUMERIC_TYPES: Readonly<Record<NumberType, NumericType>> = {
  u8: { min: 0, max: 255, signed: false, float: false },
  u16: { min: 0, max: 65_535, signed: false, float: false },
  u32: { min: 0, max: 4_294_967_295, signed: false, float: false },
  uint: { min: 0, max: Number.MAX_SAFE_INTEGER, signed: false, float: false },
  i8: { min: -128, max: 127, signed: true, float: false },
  i16: { min: -32_768, max: 32_767, signed: true, float: false },
  i32: { min: -2_147_483_648, max: 2_147_483_647, signed: true, float: false },
  int: { min: Number.MIN_SAFE_INTEGER, max: Number.MAX_SAFE_INTEGER, signed: true, float: false },
  f32: { min: -F32_MAX, max: F32_MAX, signed: true, float: true },
  f64: { min: -Number.MAX_VALUE, max: Number.MAX_VALUE, signed: true, float: true },
};

const NumberOptionsSchema = z.object({
  placeholder: z.string().optional(),
  /** Submitted when the buffer is empty. */
  default: z.number().finite().optional(),
  /** Pre-filled buffer the user can edit. */
  initial: z.number().finite().optional(),
  /** Extra rule, called with the raw buffer and the parsed value. */
  validate: checkSchema<[string, number]>().optional(),
}).strict();

export type NumberOptions = z.input<typeof NumberOptionsSchema>;

const SIGNS = ['-', '+'];

function startsWithSign(text: string): boolean {
  return SIGNS.some((s) => text.startsWith(s));
}

/** Whether `ch` may be typed at the editor's cursor for the given numeric type. */
export function acceptsNumericChar(type: NumberType, ch: string, editor: LineEditor): boolean {
  const limits = NUMERIC_TYPES[type];
  const text = editor.value;
  // Nothing goes in front of a sign.
  if (editor.cursor === 0 && startsWithSign(text)) return false;
  if (SIGNS.includes(ch)) return limits.signed && editor.cursor === 0;
  if (ch === '.') return limits.float && !text.includes('.');
  return ch >= '0' && ch <= '9';
}

const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)$/;

/** Why `n` cannot be a value of `type`, or undefined when it can. */
export function numberIssue(type: NumberType, n: number): string | undefined {
  const limits = NUMERIC_TYPES[type];
  if (!limits.float && !Number.isInteger(n)) return 'Value must be a whole number';
  if (!Number.isFinite(n) || n < limits.min || n > limits.max) {
    return `Value must be between ${limits.min} and ${limits.max}`;
  }
  return undefined;
}

/** Buffer text for a starting value; undefined when it has no plain decimal form (e.g. `1e+21`). */
export function numberText(type: NumberType, n: number): string | undefined {
  const text = String(n);
  return (NUMERIC_TYPES[type].float ? FLOAT_RE : INTEGER_RE).test(text) ? text : undefined;
}

/** Parses a buffer into the numeric type. Empty buffers fall back to `defaultValue`. */
export function parseNumber(type: NumberType, raw: string, defaultValue?: number): ValidationOutcome<number> {
  const limits = NUMERIC_TYPES[type];
  if (raw === '') {
    return defaultValue === undefined ? rejected('Please enter a number') : accepted(defaultValue);
  }
  if (!(limits.float ? FLOAT_RE : INTEGER_RE).test(raw)) {
    return rejected(`"${raw}" is not a valid number`);
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < limits.min || parsed > limits.max) {
    return rejected(`Value must be between ${limits.min} and ${limits.max}`);
  }
  // Normalize -0.
  return accepted(parsed === 0 ? 0 : parsed);
}

/** One-line numeric input; invalid characters never reach the buffer. */
export class NumberPrompt implements Widget<number> {
  readonly kind = 'number';
  readonly message: string;
  readonly type: NumberType;
  private readonly editor: LineEditor;
  private readonly options: z.output<typeof NumberOptionsSchema>;
  private readonly lifecycle: PromptLifecycle<number>;

  constructor(message: string, type: NumberType, options: NumberOptions = {}) {
    const parsedType = NumberTypeSchema.safeParse(type);
    if (!parsedType.success) {
      throw new ConstructionError(`Unknown number type ${JSON.stringify(type)}. Expected one of: ${NUMBER_TYPES.join(', ')}`);
    }
    this.type = parsedType.data;
    this.options = parseOptions(NumberOptionsSchema, options, 'number');
    this.message = message;
    this.editor = new LineEditor(this.startText(this.options.initial));
    this.lifecycle = new PromptLifecycle({
      edit: (event) => editLine(this.editor, event, (ch, editor) => acceptsNumericChar(this.type, ch, editor)),
      validate: () => this.validate(),
    });
  }

  private startText(initial: number | undefined): string {
    const { default: defaultValue } = this.options;
    const defaultIssue = defaultValue === undefined ? undefined : numberIssue(this.type, defaultValue);
    if (defaultIssue) throw new ConstructionError(`Default ${defaultValue} is not a valid ${this.type}: ${defaultIssue}`);
    if (initial === undefined) return '';
    const initialIssue = numberIssue(this.type, initial);
    if (initialIssue) throw new ConstructionError(`Initial value ${initial} is not a valid ${this.type}: ${initialIssue}`);
    const text = numberText(this.type, initial);
    if (text === undefined) throw new ConstructionError(`Initial value ${initial} cannot be typed as a plain ${this.type}`);
    return text;
  }

  /** Current buffer content. */
  get input(): string {
    return this.editor.value;
  }

  handleEvent(event: KeyEvent): void {
    this.lifecycle.handle(event);
  }

  status(): WidgetStatus<number> {
    return this.lifecycle.status;
  }

  value(): number {
    return this.lifecycle.value();
  }

  view(): NumberView {
    return {
      kind: 'number',
      message: this.message,
      state: this.lifecycle.status.state,
      input: this.editor.value,
      cursor: this.editor.cursor,
      placeholder: this.options.placeholder,
      defaultValue: this.options.default,
      error: this.lifecycle.error,
    };
  }

  private validate(): ValidationOutcome<number> {
    const raw = this.editor.value;
    const outcome = parseNumber(this.type, raw, this.options.default);
    return outcome.ok ? refine(outcome, this.options.validate, raw, outcome.value) : outcome;
  }
}
