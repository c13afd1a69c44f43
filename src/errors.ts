export type PromptErrorCode = 'cancelled' | 'io' | 'construction' | 'state';

export class PromptError extends Error {
  readonly code: PromptErrorCode;

  constructor(code: PromptErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The user dismissed the prompt (Esc, Ctrl+C, or a synthetic cancel from the host). */
export class CancelledError extends PromptError {
  constructor(message = 'Prompt was cancelled') {
    super('cancelled', message);
  }
}

/** Reading an event or drawing a frame failed. Fatal to the interaction. */
export class PromptIoError extends PromptError {
  constructor(message: string, cause: unknown) {
    super('io', `${message}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class ConstructionError extends PromptError {
  constructor(message: string) {
    super('construction', message);
  }
}

export class PromptStateError extends PromptError {
  constructor(message: string) {
    super('state', message);
  }
}

export function isCancelled(err: unknown): err is CancelledError {
  return err instanceof CancelledError;
}
