import type { Choice, Form, FormSettings, Question } from './config.js';
import { runPrompt, type DriverOptions, type EventSource, type Renderer } from './driver.js';
import type { Check } from './validation.js';
import { Confirm } from './widgets/confirm.js';
import { Message } from './widgets/message.js';
import { MultiSelect } from './widgets/multi-select.js';
import { NumberPrompt } from './widgets/number.js';
import type { SelectOption } from './widgets/options.js';
import { Password } from './widgets/password.js';
import { Select } from './widgets/select.js';
import { Text } from './widgets/text.js';
import { Toggle } from './widgets/toggle.js';
import type { Widget } from './widgets/types.js';

export type Answer = boolean | string | number | string[] | undefined;
export type Answers = Record<string, Answer>;

export type PromptIo = { source: EventSource; renderer: Renderer } & DriverOptions;

function toOptions(choices: readonly Choice[]): SelectOption<string>[] {
  return choices.map((c) =>
    typeof c === 'string'
      ? { value: c, label: c }
      : { value: c.value ?? c.label, label: c.label, description: c.description, disabled: c.disabled },
  );
}

const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? '' : 's'}`;

function lengthCheck(minLength?: number, maxLength?: number): Check<[string]> | undefined {
  if (minLength === undefined && maxLength === undefined) return undefined;
  return (value) => {
    const length = Array.from(value).length;
    if (minLength !== undefined && length < minLength) return `Enter at least ${plural(minLength, 'character')}`;
    if (maxLength !== undefined && length > maxLength) return `Enter at most ${plural(maxLength, 'character')}`;
    return undefined;
  };
}

function textCheck(q: Extract<Question, { kind: 'text' }>): Check<[string]> | undefined {
  const length = lengthCheck(q.minLength, q.maxLength);
  if (q.pattern === undefined) return length;
  const re = new RegExp(q.pattern);
  const message = q.patternMessage ?? `Value must match /${q.pattern}/`;
  return (value) => length?.(value) ?? (re.test(value) ? undefined : message);
}

function rangeCheck(min?: number, max?: number): Check<[string, number]> | undefined {
  if (min === undefined && max === undefined) return undefined;
  return (_raw, n) => {
    if (min !== undefined && n < min) return `Value must be at least ${min}`;
    if (max !== undefined && n > max) return `Value must be at most ${max}`;
    return undefined;
  };
}

/** Constructs the prompt for one question. Throws ConstructionError on bad settings. */
export function buildWidget(q: Question, settings: FormSettings = {}): Widget<Answer> {
  switch (q.kind) {
    case 'confirm':
      return new Confirm(q.message, { default: q.default });
    case 'toggle':
      return new Toggle(q.message, q.options, { initial: q.initial });
    case 'text':
      return new Text(q.message, {
        placeholder: q.placeholder,
        default: q.default,
        initial: q.initial,
        validate: textCheck(q),
      });
    case 'password':
      return new Password(q.message, {
        placeholder: q.placeholder,
        hidden: q.hidden,
        mask: q.mask,
        validate: lengthCheck(q.minLength),
      });
    case 'number':
      return new NumberPrompt(q.message, q.type, {
        placeholder: q.placeholder,
        default: q.default,
        initial: q.initial,
        validate: rangeCheck(q.min, q.max),
      });
    case 'select':
      return new Select(q.message, toOptions(q.choices), {
        initial: q.initial,
        loop: q.loop,
        itemsPerPage: q.itemsPerPage ?? settings.itemsPerPage,
      });
    case 'multi-select':
      return new MultiSelect(q.message, toOptions(q.choices), {
        initial: q.initial,
        loop: q.loop,
        itemsPerPage: q.itemsPerPage ?? settings.itemsPerPage,
        selected: q.selected,
        min: q.min,
        max: q.max,
      });
    case 'message':
      return new Message(q.message, q.action);
  }
}

/**
 * Asks each prompt in turn. The next prompt starts only once the previous
 * one is submitted; a cancel or I/O failure stops the sequence.
 */
export async function runPrompts<T>(widgets: readonly Widget<T>[], io: PromptIo): Promise<T[]> {
  const values: T[] = [];
  for (const widget of widgets) {
    values.push(await runPrompt(widget, io));
  }
  return values;
}

/** Runs every question of a form and collects the answers by id. Messages record no answer. */
export async function runForm(form: Form, io: PromptIo): Promise<Answers> {
  const widgets = form.questions.map((q) => buildWidget(q, form.settings));
  const values = await runPrompts(widgets, { ascii: form.settings.ascii, ...io });
  const answers: Answers = {};
  form.questions.forEach((q, i) => {
    if (q.kind !== 'message') answers[q.id] = values[i];
  });
  io.log?.(`form completed: ${Object.keys(answers).length} answers`);
  io.tracker?.logAnswers(answers);
  return answers;
}
