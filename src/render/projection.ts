import type {
  MessageView,
  MultiSelectView,
  NumberView,
  OptionView,
  PasswordView,
  SelectView,
  TextView,
  WidgetView,
} from '../widgets/types.js';
import { line, span, type Line, type RenderFrame, type Span } from './frame.js';

export interface Glyphs {
  query: string;
  done: string;
  cancelled: string;
  input: string;
  radioOn: string;
  radioOff: string;
  checkFocused: string;
  checkOn: string;
  checkOff: string;
  page: string;
  separator: string;
}

export const UNICODE_GLYPHS: Glyphs = {
  query: '?',
  done: '✓',
  cancelled: '✗',
  input: '›',
  radioOn: '●',
  radioOff: '○',
  checkFocused: '◉',
  checkOn: '●',
  checkOff: '○',
  page: '•',
  separator: '·',
};

export const ASCII_GLYPHS: Glyphs = {
  query: '?',
  done: '+',
  cancelled: 'x',
  input: '>',
  radioOn: '(*)',
  radioOff: '( )',
  checkFocused: '[x]',
  checkOn: '[x]',
  checkOff: '[ ]',
  page: '*',
  separator: '-',
};

export interface ProjectionOptions {
  ascii?: boolean;
}

const width = (s: string): number => Array.from(s).length;

/**
 * Pure mapping from a prompt snapshot to the frame to draw. Same view in,
 * same frame out; nothing here touches the terminal.
 */
export function project(view: WidgetView, options: ProjectionOptions = {}): RenderFrame {
  const g = options.ascii ? ASCII_GLYPHS : UNICODE_GLYPHS;

  if (view.state === 'cancelled') {
    return { lines: [line(span(`${g.cancelled} `, 'cancelled'), span(view.message, 'answered'))], cursor: null };
  }
  if (view.state === 'submitted') {
    const answer = answerText(view);
    return {
      lines: [line(span(`${g.done} `, 'done'), span(view.message, 'answered'), span(answer ? ' ' : ''), span(answer, 'answer'))],
      cursor: null,
    };
  }

  switch (view.kind) {
    case 'confirm':
      return projectPair(view.message, ['No', 'Yes'], view.active ? 1 : 0, g);
    case 'toggle':
      return projectPair(view.message, view.options, view.focused, g);
    case 'text':
    case 'number':
      return projectLine(view, view.input, view.defaultValue === undefined ? undefined : String(view.defaultValue), g);
    case 'password':
      return projectLine(view, maskInput(view), view.defaultValue === undefined ? undefined : maskText(view, view.defaultValue), g);
    case 'select':
      return projectList(view, [], g, (_idx, focused) => span(`${focused ? g.radioOn : g.radioOff} `, focused ? 'pointer' : 'hint'));
    case 'multi-select':
      return projectList(view, minMaxHint(view, g), g, (i, focused) => checkbox(view, i, focused, g));
    case 'message':
      return projectMessage(view, g);
  }
}

function queryLine(message: string, g: Glyphs, ...extra: Span[]): Line {
  return line(span(`${g.query} `, 'prefix'), span(message, 'query'), ...extra);
}

function errorLines(error: string | null): Line[] {
  return error ? [line(span(error, 'error'))] : [];
}

function projectPair(message: string, labels: readonly [string, string], focused: number, g: Glyphs): RenderFrame {
  const option = (idx: number): Span => span(` ${labels[idx]} `, focused === idx ? 'toggle-on' : 'toggle-off');
  return {
    lines: [queryLine(message, g), line(option(0), span('  '), option(1))],
    cursor: null,
  };
}

function projectLine(
  view: TextView | NumberView | PasswordView,
  shown: string,
  defaultText: string | undefined,
  g: Glyphs,
): RenderFrame {
  const prefix = `${g.input} `;
  const input = shown === '' && view.placeholder ? span(view.placeholder, 'placeholder') : span(shown, 'input');
  const defaultHint = defaultText === undefined ? span('') : span(` (${defaultText})`, 'hint');
  const cursorCol = view.kind === 'password' && view.hidden ? 0 : view.cursor;
  return {
    lines: [
      queryLine(view.message, g, defaultHint),
      line(span(prefix, view.error ? 'error' : 'prefix'), input),
      ...errorLines(view.error),
    ],
    cursor: { row: 1, col: width(prefix) + cursorCol },
  };
}

function maskText(view: PasswordView, text: string): string {
  return view.hidden ? '' : view.mask.repeat(width(text));
}

function maskInput(view: PasswordView): string {
  return maskText(view, view.input);
}

function optionLine(option: OptionView, focused: boolean, marker: Span, g: Glyphs): Line {
  const labelStyle = option.disabled ? 'disabled' : focused ? 'focused' : 'plain';
  let note = '';
  if (focused && option.disabled) note = `${g.separator} (Disabled)`;
  else if (focused && option.description) note = `${g.separator} ${option.description}`;
  return line(marker, span(option.label, labelStyle), span(note ? ' ' : ''), span(note, 'hint'));
}

function projectList(
  view: SelectView | MultiSelectView,
  headerExtra: Span[],
  g: Glyphs,
  marker: (idx: number, focused: boolean) => Span,
): RenderFrame {
  const [start, end] = view.pageRange;
  const rows: Line[] = [];
  for (let i = start; i < end; i++) {
    const focused = i === view.focused;
    rows.push(optionLine(view.options[i], focused, marker(i, focused), g));
  }
  return {
    lines: [queryLine(view.message, g, ...headerExtra), ...rows, ...pagination(view, g), ...errorLines(view.error)],
    cursor: null,
  };
}

function pagination(view: SelectView | MultiSelectView, g: Glyphs): Line[] {
  if (view.pageCount <= 1) return [];
  const dots: Span[] = [span('  ')];
  for (let p = 0; p < view.pageCount; p++) {
    dots.push(span(g.page, p === view.page ? 'focused' : 'hint'));
  }
  return [line(...dots)];
}

function checkbox(view: MultiSelectView, idx: number, focused: boolean, g: Glyphs): Span {
  const on = view.toggled.includes(idx);
  const glyph = on ? (focused ? g.checkFocused : g.checkOn) : g.checkOff;
  const style = focused ? 'pointer' : on ? 'selected' : 'hint';
  return span(`${glyph} `, style);
}

function minMaxHint(view: MultiSelectView, g: Glyphs): Span[] {
  const parts: string[] = [];
  if (view.min !== undefined) parts.push(`Min: ${view.min}`);
  if (view.max !== undefined) parts.push(`Max: ${view.max}`);
  return parts.length > 0 ? [span(' '), span(parts.join(` ${g.separator} `), 'hint')] : [];
}

function projectMessage(view: MessageView, g: Glyphs): RenderFrame {
  const lines = [queryLine(view.message, g)];
  if (view.action) lines.push(line(span(view.action, 'hint')));
  return { lines, cursor: null };
}

/** Summary shown once a prompt is submitted. */
function answerText(view: WidgetView): string {
  switch (view.kind) {
    case 'confirm':
      return view.active ? 'Yes' : 'No';
    case 'toggle':
      return view.options[view.focused];
    case 'text':
      return view.input === '' ? view.defaultValue ?? '' : view.input;
    case 'number':
      return view.input === '' && view.defaultValue !== undefined ? String(view.defaultValue) : view.input;
    case 'password':
      return view.input === '' ? maskText(view, view.defaultValue ?? '') : maskInput(view);
    case 'select':
      return view.options[view.focused].label;
    case 'multi-select':
      return `[${view.toggled.map((i) => view.options[i].label).join(', ')}]`;
    case 'message':
      return '';
  }
}
