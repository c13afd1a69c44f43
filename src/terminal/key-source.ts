import * as readline from 'readline';
import { EventQueue } from '../event-queue.js';
import { key, type KeyEvent } from '../keys.js';
import type { EventSource } from '../driver.js';

/** The parts of a TTY input stream the key source touches. */
export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface KeySourceOptions {
  /** Injects a cancel when no key arrives within this many milliseconds. */
  timeoutMs?: number;
}

const NAMED: Readonly<Record<string, KeyEvent>> = {
  return: key.submit,
  enter: key.submit,
  escape: key.cancel,
  backspace: key.backspace,
  delete: key.delete,
  left: key.left,
  right: key.right,
  up: key.up,
  down: key.down,
  home: key.home,
  end: key.end,
  tab: key.tab,
};

/** Maps a readline keypress to a key event, or null for keys prompts ignore. */
export function decodeKeypress(str: string | undefined, k: readline.Key | undefined): KeyEvent | null {
  if (k?.ctrl) {
    switch (k.name) {
      case 'c':
      case 'd':
        return key.cancel;
      case 'a':
        return key.home;
      case 'e':
        return key.end;
      case 'h':
        return key.backspace;
      default:
        return null;
    }
  }
  if (k?.meta) return k.name === 'escape' ? key.cancel : null;
  const named = k?.name === undefined ? undefined : NAMED[k.name];
  if (named) return named;

  const text = k?.sequence ?? str ?? '';
  const chars = Array.from(text);
  if (chars.length !== 1) return null;
  const [ch] = chars;
  return ch >= ' ' && ch !== '\x7f' ? key.char(ch) : null;
}

/**
 * Reads key events from a terminal input. Puts the stream into raw mode
 * while open; `close()` restores the previous mode and pauses the stream.
 */
export class TerminalKeySource implements EventSource {
  private readonly queue = new EventQueue<KeyEvent>();
  private readonly wasRaw: boolean;
  private closed = false;

  private readonly onKeypress = (str: string | undefined, k: readline.Key | undefined): void => {
    const event = decodeKeypress(str, k);
    if (event) this.queue.push(event);
  };
  private readonly onEnd = (): void => {
    this.queue.fail(new Error('Input stream ended'));
  };
  private readonly onError = (err: Error): void => {
    this.queue.fail(err);
  };

  constructor(
    private readonly input: KeyInput,
    private readonly options: KeySourceOptions = {},
  ) {
    this.wasRaw = input.isRaw ?? false;
    if (input.isTTY) input.setRawMode?.(true);
    readline.emitKeypressEvents(input);
    input.on('keypress', this.onKeypress);
    input.on('end', this.onEnd);
    input.on('error', this.onError);
    input.resume();
  }

  async next(): Promise<KeyEvent> {
    if (this.closed) throw new Error('Key source is closed');
    const { timeoutMs } = this.options;
    if (timeoutMs === undefined) return this.queue.dequeue();
    return (await this.queue.tryDequeue(timeoutMs)) ?? key.cancel;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.input.removeListener('keypress', this.onKeypress);
    this.input.removeListener('end', this.onEnd);
    this.input.removeListener('error', this.onError);
    if (this.input.isTTY) this.input.setRawMode?.(this.wasRaw);
    this.input.pause();
    this.queue.fail(new Error('Key source is closed'));
  }
}
