import { z } from 'zod';
import { ConstructionError } from '../errors.js';
import type { KeyEvent } from '../keys.js';
import { ListNavigator } from '../list-navigator.js';
import { formatIssues, parseOptions } from '../validation.js';
import type { EditResult } from './lifecycle.js';
import type { OptionView } from './types.js';

export interface SelectOption<T> {
  /** Returned when the option is chosen. */
  value: T;
  /** Displayed in the list. */
  label: string;
  /** Shown next to the focused option. */
  description?: string;
  /** Disabled options can be focused but not chosen. */
  disabled?: boolean;
}

/** Options whose value is their own label. */
export function choices(labels: readonly string[]): SelectOption<string>[] {
  return labels.map((label) => ({ value: label, label }));
}

const OptionShapeSchema = z.object({
  label: z.string(),
  description: z.string().optional(),
  disabled: z.boolean().optional(),
}).passthrough();

export const ListSettingsSchema = z.object({
  /** Focused index at start. */
  initial: z.number().int().nonnegative().optional(),
  /** Wrap around at both ends. Defaults to true. */
  loop: z.boolean().optional(),
  itemsPerPage: z.number().int().positive().optional(),
}).strict();

export type ListSettings = z.input<typeof ListSettingsSchema>;

/** Validates an option list and builds its navigator. */
export function createNavigator<T>(
  what: string,
  options: readonly SelectOption<T>[],
  settings: ListSettings,
): ListNavigator {
  if (options.length === 0) {
    throw new ConstructionError(`A ${what} prompt needs at least one option`);
  }
  const shape = z.array(OptionShapeSchema).safeParse(options);
  if (!shape.success) {
    throw new ConstructionError(`Invalid ${what} options:\n${formatIssues(shape.error)}`);
  }
  const opts = parseOptions(ListSettingsSchema, settings, what);
  const initial = opts.initial ?? 0;
  if (initial >= options.length) {
    throw new ConstructionError(`Initial index ${initial} is out of range (${options.length} options)`);
  }
  return new ListNavigator(options.length, { initial, loop: opts.loop, itemsPerPage: opts.itemsPerPage });
}

/** Shared list keys: Up/Down (`k`/`j`) move focus, Left/Right (`h`/`l`) change page, Backspace submits like Enter. */
export function navigateList(nav: ListNavigator, event: KeyEvent): EditResult {
  const name = event.kind === 'char' ? vimKey(event.char) : event.kind;
  switch (name) {
    case 'up':
      nav.moveUp();
      return 'changed';
    case 'down':
      nav.moveDown();
      return 'changed';
    case 'left':
      nav.previousPage();
      return 'changed';
    case 'right':
      nav.nextPage();
      return 'changed';
    case 'backspace':
      return 'submit';
    default:
      return 'ignored';
  }
}

function vimKey(ch: string): string {
  switch (ch.toLowerCase()) {
    case 'k': return 'up';
    case 'j': return 'down';
    case 'h': return 'left';
    case 'l': return 'right';
    default: return ch;
  }
}

export function optionViews<T>(options: readonly SelectOption<T>[]): OptionView[] {
  return options.map((o) => ({ label: o.label, description: o.description, disabled: o.disabled ?? false }));
}
