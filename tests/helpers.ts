import type { KeyEvent } from '../src/keys.js';
import { keysFromText } from '../src/keys.js';
import type { Widget } from '../src/widgets/types.js';

/** Feeds events to a widget; strings are typed one character at a time. */
export function feed<W extends Widget<unknown>>(widget: W, ...events: Array<KeyEvent | string>): W {
  for (const event of events) {
    const keys = typeof event === 'string' ? keysFromText(event) : [event];
    for (const k of keys) widget.handleEvent(k);
  }
  return widget;
}
