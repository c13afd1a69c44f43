import type { KeyEvent } from '../keys.js';
import type { LineEditor } from '../line-editor.js';
import type { EditResult } from './lifecycle.js';

/**
 * Applies a key to a line editor. `accept` decides whether a typed character
 * may enter the buffer; rejected characters leave the buffer untouched.
 */
export function editLine(
  editor: LineEditor,
  event: KeyEvent,
  accept: (ch: string, editor: LineEditor) => boolean = () => true,
): EditResult {
  switch (event.kind) {
    case 'char':
      if (!accept(event.char, editor)) return 'ignored';
      return editor.insert(event.char) ? 'changed' : 'ignored';
    case 'backspace':
      return editor.deleteBefore() ? 'changed' : 'ignored';
    case 'delete':
      return editor.deleteAt() ? 'changed' : 'ignored';
    case 'left':
      editor.moveLeft();
      return 'moved';
    case 'right':
      editor.moveRight();
      return 'moved';
    case 'home':
      editor.moveHome();
      return 'moved';
    case 'end':
      editor.moveEnd();
      return 'moved';
    default:
      return 'ignored';
  }
}

/** Control characters never enter a line buffer. */
export function isPrintable(ch: string): boolean {
  return ch >= ' ' && ch !== '\x7f';
}
