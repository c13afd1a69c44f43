/** Semantic styles a renderer maps to colors/attributes. */
export type SpanStyle =
  | 'plain'
  | 'prefix'
  | 'query'
  | 'done'
  | 'answered'
  | 'answer'
  | 'cancelled'
  | 'hint'
  | 'input'
  | 'placeholder'
  | 'error'
  | 'pointer'
  | 'focused'
  | 'selected'
  | 'disabled'
  | 'toggle-on'
  | 'toggle-off';

export interface Span {
  readonly text: string;
  readonly style: SpanStyle;
}

export type Line = readonly Span[];

export interface CursorHint {
  /** 0-based line within the frame. */
  readonly row: number;
  /** 0-based column, in characters. */
  readonly col: number;
}

/** What to draw for one prompt state. Backend-agnostic, recomputed on every event. */
export interface RenderFrame {
  readonly lines: readonly Line[];
  /** Where the terminal cursor should sit, or null to hide it. */
  readonly cursor: CursorHint | null;
}

export function span(text: string, style: SpanStyle = 'plain'): Span {
  return { text, style };
}

/** Builds a line, dropping empty spans. */
export function line(...spans: Span[]): Line {
  return spans.filter((s) => s.text !== '');
}

/** Plain text of a line, without styles. */
export function lineText(l: Line): string {
  return l.map((s) => s.text).join('');
}

export function frameText(frame: RenderFrame): string {
  return frame.lines.map(lineText).join('\n');
}
