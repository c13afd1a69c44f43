import type { KeyEvent } from '../keys.js';
import type { WidgetState, WidgetStatus } from './lifecycle.js';

export type WidgetKind =
  | 'confirm'
  | 'toggle'
  | 'text'
  | 'number'
  | 'password'
  | 'select'
  | 'multi-select'
  | 'message';

/** Capability set every prompt exposes to the driver. */
export interface Widget<T> {
  readonly kind: WidgetKind;
  readonly message: string;
  handleEvent(event: KeyEvent): void;
  status(): WidgetStatus<T>;
  /** Submitted value. Throws CancelledError when cancelled, PromptStateError while active. */
  value(): T;
  /** Read-only snapshot consumed by the render projection. */
  view(): WidgetView;
}

export interface OptionView {
  readonly label: string;
  readonly description?: string;
  readonly disabled: boolean;
}

interface ViewBase {
  readonly message: string;
  readonly state: WidgetState;
}

interface LineViewBase extends ViewBase {
  readonly input: string;
  readonly cursor: number;
  readonly placeholder?: string;
  readonly error: string | null;
}

interface ListViewBase extends ViewBase {
  readonly options: readonly OptionView[];
  readonly focused: number;
  readonly page: number;
  readonly pageCount: number;
  readonly pageRange: readonly [number, number];
  readonly error: string | null;
}

export interface ConfirmView extends ViewBase {
  readonly kind: 'confirm';
  readonly active: boolean;
}

export interface ToggleView extends ViewBase {
  readonly kind: 'toggle';
  readonly options: readonly [string, string];
  readonly focused: 0 | 1;
}

export interface TextView extends LineViewBase {
  readonly kind: 'text';
  readonly defaultValue?: string;
}

export interface PasswordView extends LineViewBase {
  readonly kind: 'password';
  readonly defaultValue?: string;
  readonly hidden: boolean;
  readonly mask: string;
}

export interface NumberView extends LineViewBase {
  readonly kind: 'number';
  readonly defaultValue?: number;
}

export interface SelectView extends ListViewBase {
  readonly kind: 'select';
}

export interface MultiSelectView extends ListViewBase {
  readonly kind: 'multi-select';
  readonly toggled: readonly number[];
  readonly min?: number;
  readonly max?: number;
}

export interface MessageView extends ViewBase {
  readonly kind: 'message';
  readonly action?: string;
}

export type WidgetView =
  | ConfirmView
  | ToggleView
  | TextView
  | PasswordView
  | NumberView
  | SelectView
  | MultiSelectView
  | MessageView;
