import { PromptIoError } from './errors.js';
import { describeKey, type KeyEvent } from './keys.js';
import type { Log } from './logger.js';
import type { RenderFrame } from './render/frame.js';
import { project, type ProjectionOptions } from './render/projection.js';
import type { Tracker } from './tracker.js';
import type { WidgetStatus } from './widgets/lifecycle.js';
import type { Widget } from './widgets/types.js';

/** Produces key events in input order. Rejects on read failure. */
export interface EventSource {
  next(): Promise<KeyEvent>;
}

/** Draws one frame. Throws on write failure. */
export interface Renderer {
  draw(frame: RenderFrame): void;
  /** Called once after the final frame of a prompt. */
  finish?(): void;
}

export interface DriverOptions extends ProjectionOptions {
  log?: Log;
  tracker?: Tracker;
}

export type StepResult<T> =
  | { readonly done: false }
  | { readonly done: true; readonly status: WidgetStatus<T> };

const PENDING = { done: false } as const;

/**
 * One prompt interaction as an explicit resumable unit. A host scheduler
 * calls `start()` once, then `resume(event)` for each key it receives;
 * every call performs exactly one handle → project → draw step.
 */
export class PromptTask<T> {
  private started = false;
  private failure: PromptIoError | null = null;

  constructor(
    readonly widget: Widget<T>,
    private readonly renderer: Renderer,
    private readonly options: DriverOptions = {},
  ) {}

  get done(): boolean {
    return this.failure !== null || this.widget.status().state !== 'active';
  }

  /** Draws the initial frame. Idempotent. */
  start(): StepResult<T> {
    this.throwIfFailed();
    if (!this.started) {
      this.started = true;
      this.options.log?.(`prompt started: ${this.widget.kind} "${this.widget.message}"`);
      this.options.tracker?.logEvent('prompt_started', { kind: this.widget.kind, message: this.widget.message });
      this.draw();
    }
    return this.check();
  }

  resume(event: KeyEvent): StepResult<T> {
    if (!this.started) this.start();
    this.throwIfFailed();
    // Terminal states absorb everything, including redraws.
    if (this.widget.status().state !== 'active') return this.check();

    this.options.tracker?.logEvent('key', { key: describeKey(event) });
    this.widget.handleEvent(event);
    this.draw();
    const step = this.check();
    if (step.done) {
      this.finish();
      this.options.log?.(`prompt ${step.status.state}: "${this.widget.message}"`);
      this.options.tracker?.logEvent(`prompt_${step.status.state}`, { message: this.widget.message });
    } else if (event.kind === 'submit') {
      const view = this.widget.view();
      const error = 'error' in view ? view.error : null;
      this.options.log?.(`submission rejected: ${error ?? 'unknown reason'}`);
    }
    return step;
  }

  /** The final value. Throws CancelledError, PromptIoError, or PromptStateError while active. */
  result(): T {
    this.throwIfFailed();
    return this.widget.value();
  }

  /** Marks the interaction as failed by its event source. */
  fail(cause: unknown): PromptIoError {
    this.failure ??= cause instanceof PromptIoError ? cause : new PromptIoError('Failed to read key event', cause);
    this.options.log?.(`prompt aborted: ${this.failure.message}`);
    return this.failure;
  }

  private draw(): void {
    try {
      this.renderer.draw(project(this.widget.view(), this.options));
    } catch (err: unknown) {
      throw this.markFailed(new PromptIoError('Failed to draw prompt', err));
    }
  }

  private finish(): void {
    try {
      this.renderer.finish?.();
    } catch (err: unknown) {
      throw this.markFailed(new PromptIoError('Failed to draw prompt', err));
    }
  }

  private markFailed(err: PromptIoError): PromptIoError {
    this.failure = err;
    this.options.log?.(`prompt aborted: ${err.message}`);
    return err;
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.failure;
  }

  private check(): StepResult<T> {
    const status = this.widget.status();
    return status.state === 'active' ? PENDING : { done: true, status };
  }
}

/**
 * Runs a prompt to completion, awaiting one event at a time. Resolves with
 * the submitted value; rejects with CancelledError or PromptIoError.
 */
export async function runPrompt<T>(
  widget: Widget<T>,
  io: { source: EventSource; renderer: Renderer } & DriverOptions,
): Promise<T> {
  const { source, renderer, ...options } = io;
  const task = new PromptTask(widget, renderer, options);
  let step = task.start();
  while (!step.done) {
    let event: KeyEvent;
    try {
      event = await source.next();
    } catch (err: unknown) {
      throw task.fail(err);
    }
    step = task.resume(event);
  }
  return task.result();
}

/** Replays a fixed list of events; rejects once it runs out. */
export class ScriptedSource implements EventSource {
  private idx = 0;

  constructor(private readonly events: readonly KeyEvent[]) {}

  get remaining(): number {
    return this.events.length - this.idx;
  }

  async next(): Promise<KeyEvent> {
    const event = this.events[this.idx];
    if (event === undefined) throw new Error('Scripted source is exhausted');
    this.idx++;
    return event;
  }
}

/** Keeps every drawn frame, for tests and headless hosts. */
export class RecordingRenderer implements Renderer {
  readonly frames: RenderFrame[] = [];
  finished = 0;

  draw(frame: RenderFrame): void {
    this.frames.push(frame);
  }

  finish(): void {
    this.finished++;
  }

  get last(): RenderFrame | undefined {
    return this.frames[this.frames.length - 1];
  }
}
