// ── Normalized key events ──

export type NamedKey =
  | 'backspace'
  | 'delete'
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'home'
  | 'end'
  | 'tab'
  | 'submit'
  | 'cancel';

export type KeyEvent =
  | { readonly kind: 'char'; readonly char: string }
  | { readonly kind: NamedKey };

function named<K extends NamedKey>(kind: K): { readonly kind: K } {
  return Object.freeze({ kind });
}

/** Builds a `char` event. Throws unless `ch` is exactly one code point. */
function char(ch: string): KeyEvent {
  if (Array.from(ch).length !== 1) {
    throw new Error(`A char key must hold exactly one character, got ${JSON.stringify(ch)}`);
  }
  return Object.freeze({ kind: 'char' as const, char: ch });
}

export const key = {
  char,
  backspace: named('backspace'),
  delete: named('delete'),
  left: named('left'),
  right: named('right'),
  up: named('up'),
  down: named('down'),
  home: named('home'),
  end: named('end'),
  tab: named('tab'),
  submit: named('submit'),
  cancel: named('cancel'),
} as const;

/** One `char` event per code point of `text`. */
export function keysFromText(text: string): KeyEvent[] {
  return Array.from(text, (ch) => char(ch));
}

export function describeKey(event: KeyEvent): string {
  return event.kind === 'char' ? `char(${JSON.stringify(event.char)})` : event.kind;
}
