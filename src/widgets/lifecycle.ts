import { CancelledError, PromptStateError } from '../errors.js';
import type { KeyEvent } from '../keys.js';
import type { ValidationOutcome } from '../validation.js';

export type WidgetStatus<T> =
  | { readonly state: 'active' }
  | { readonly state: 'submitted'; readonly value: T }
  | { readonly state: 'cancelled' };

export type WidgetState = WidgetStatus<unknown>['state'];

/**
 * What a prompt did with a non-terminal key:
 * - `ignored`: nothing changed
 * - `moved`: cursor or focus moved, content untouched
 * - `changed`: buffer or selection changed, validation must re-run
 * - `submit`: the key asks for submission (e.g. `y` on a confirm)
 */
export type EditResult = 'ignored' | 'moved' | 'changed' | 'submit';

export interface LifecycleSteps<T> {
  edit(event: KeyEvent): EditResult;
  validate(): ValidationOutcome<T>;
}

const ACTIVE = { state: 'active' } as const;

/**
 * Shared Active → Submitted | Cancelled machine. Each prompt owns one and
 * plugs its own edit and validate steps into it.
 */
export class PromptLifecycle<T> {
  private current: WidgetStatus<T> = ACTIVE;
  private outcome: ValidationOutcome<T> | null = null;
  private readonly steps: LifecycleSteps<T>;

  constructor(steps: LifecycleSteps<T>) {
    this.steps = steps;
  }

  get status(): WidgetStatus<T> {
    return this.current;
  }

  get isActive(): boolean {
    return this.current.state === 'active';
  }

  /** Rejection message of the last validation run, or null. */
  get error(): string | null {
    return this.outcome && !this.outcome.ok ? this.outcome.message : null;
  }

  handle(event: KeyEvent): void {
    if (this.current.state !== 'active') return;

    if (event.kind === 'cancel') {
      this.current = { state: 'cancelled' };
      return;
    }

    const result = event.kind === 'submit' ? 'submit' : this.steps.edit(event);
    switch (result) {
      case 'changed':
        this.outcome = this.steps.validate();
        return;
      case 'submit':
        this.outcome = this.steps.validate();
        if (this.outcome.ok) this.current = { state: 'submitted', value: this.outcome.value };
        return;
      default:
        return;
    }
  }

  value(): T {
    switch (this.current.state) {
      case 'submitted':
        return this.current.value;
      case 'cancelled':
        throw new CancelledError();
      default:
        throw new PromptStateError('Prompt has no value yet: it is still active');
    }
  }
}
