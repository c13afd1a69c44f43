import { AnsiRenderer, type TextOutput } from './ansi-renderer.js';
import { TerminalKeySource, type KeyInput } from './key-source.js';

export interface TerminalOptions {
  input?: KeyInput;
  output?: TextOutput;
  color?: boolean;
  timeoutMs?: number;
}

export interface TerminalSession {
  source: TerminalKeySource;
  renderer: AnsiRenderer;
}

/**
 * Opens a key source and renderer on the given streams (stdin/stdout by
 * default), runs `fn`, and restores the terminal however `fn` ends.
 */
export async function withTerminal<R>(
  fn: (session: TerminalSession) => Promise<R>,
  options: TerminalOptions = {},
): Promise<R> {
  const output = options.output ?? process.stdout;
  const source = new TerminalKeySource(options.input ?? process.stdin, { timeoutMs: options.timeoutMs });
  const renderer = new AnsiRenderer(output, { color: options.color ?? !process.env['NO_COLOR'] });
  try {
    return await fn({ source, renderer });
  } finally {
    renderer.restore();
    source.close();
  }
}
