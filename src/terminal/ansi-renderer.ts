import type { Renderer } from '../driver.js';
import type { Line, RenderFrame, SpanStyle } from '../render/frame.js';

export const CSI = '\x1b[';

export const ansi = {
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  eraseDown: `${CSI}0J`,
  up: (n: number) => (n > 0 ? `${CSI}${n}A` : ''),
  right: (n: number) => (n > 0 ? `${CSI}${n}C` : ''),
  dim: (s: string) => `${CSI}2m${s}${CSI}22m`,
  accent: (s: string) => `${CSI}38;2;43;201;124m${s}${CSI}39m`,
  bold: (s: string) => `${CSI}1m${s}${CSI}22m`,
  boldAccent: (s: string) => `${CSI}1;38;2;43;201;124m${s}${CSI}22;39m`,
  red: (s: string) => `${CSI}31m${s}${CSI}39m`,
  inverse: (s: string) => `${CSI}7m${s}${CSI}27m`,
};

const STYLES: Record<SpanStyle, (s: string) => string> = {
  plain: (s) => s,
  prefix: ansi.accent,
  query: ansi.bold,
  done: ansi.accent,
  answered: ansi.bold,
  answer: ansi.accent,
  cancelled: ansi.red,
  hint: ansi.dim,
  input: (s) => s,
  placeholder: ansi.dim,
  error: ansi.red,
  pointer: ansi.accent,
  focused: ansi.boldAccent,
  selected: ansi.accent,
  disabled: ansi.dim,
  'toggle-on': (s) => ansi.inverse(ansi.accent(s)),
  'toggle-off': ansi.dim,
};

export type TextOutput = NodeJS.WritableStream & {
  writableEnded?: boolean;
  destroyed?: boolean;
};

export interface AnsiRendererOptions {
  /** Emit colors and text attributes. Defaults to true. */
  color?: boolean;
}

/**
 * Draws frames in place: each draw erases the previous frame and writes the
 * new one from the same top row, then parks the cursor where the frame asks.
 */
export class AnsiRenderer implements Renderer {
  /** Row of the terminal cursor relative to the top of the current frame. */
  private cursorRow = 0;
  private drawn = false;
  private readonly color: boolean;

  constructor(
    private readonly output: TextOutput,
    options: AnsiRendererOptions = {},
  ) {
    this.color = options.color ?? true;
  }

  draw(frame: RenderFrame): void {
    let out = '';
    if (this.drawn) out += `\r${ansi.up(this.cursorRow)}${ansi.eraseDown}`;
    out += frame.lines.map((l) => this.styleLine(l)).join('\n');

    const lastRow = Math.max(frame.lines.length - 1, 0);
    if (frame.cursor) {
      out += `${ansi.up(lastRow - frame.cursor.row)}\r${ansi.right(frame.cursor.col)}${ansi.showCursor}`;
      this.cursorRow = frame.cursor.row;
    } else {
      out += ansi.hideCursor;
      this.cursorRow = lastRow;
    }
    this.write(out);
    this.drawn = true;
  }

  /** Leaves the last frame on screen and moves below it. */
  finish(): void {
    if (!this.drawn) return;
    this.write(`\n${ansi.showCursor}`);
    this.drawn = false;
    this.cursorRow = 0;
  }

  /** Shows the cursor again after an interrupted prompt. Does nothing once the output is closed. */
  restore(): void {
    if (this.output.writableEnded || this.output.destroyed) return;
    this.finish();
  }

  private styleLine(l: Line): string {
    return l.map((s) => (this.color ? STYLES[s.style](s.text) : s.text)).join('');
  }

  private write(s: string): void {
    if (this.output.writableEnded || this.output.destroyed) {
      throw new Error('Output stream is closed');
    }
    this.output.write(s);
  }
}
