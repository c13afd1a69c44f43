/**
 * Single-line editable buffer shared by the text-like prompts.
 *
 * The buffer is stored as an array of code points so the cursor counts
 * characters, not UTF-16 units. Every mutator re-clamps the cursor to
 * `[0, length]` and returns whether the buffer content changed.
 */
export class LineEditor {
  private chars: string[] = [];
  private col = 0;

  constructor(initial = '') {
    this.setValue(initial);
  }

  get value(): string {
    return this.chars.join('');
  }

  get cursor(): number {
    return this.col;
  }

  get length(): number {
    return this.chars.length;
  }

  get isEmpty(): boolean {
    return this.chars.length === 0;
  }

  /** Replaces the buffer and puts the cursor at the end. */
  setValue(text: string): boolean {
    const next = Array.from(text);
    const changed = next.join('') !== this.value;
    this.chars = next;
    this.col = next.length;
    return changed;
  }

  insert(ch: string): boolean {
    const points = Array.from(ch);
    if (points.length === 0) return false;
    this.chars.splice(this.col, 0, ...points);
    this.col = this.clamp(this.col + points.length);
    return true;
  }

  /** Backspace. No-op at the start of the buffer. */
  deleteBefore(): boolean {
    if (this.col === 0) return false;
    this.chars.splice(this.col - 1, 1);
    this.col = this.clamp(this.col - 1);
    return true;
  }

  /** Delete. No-op at the end of the buffer. */
  deleteAt(): boolean {
    if (this.col >= this.chars.length) return false;
    this.chars.splice(this.col, 1);
    this.col = this.clamp(this.col);
    return true;
  }

  moveLeft(): void {
    this.col = this.clamp(this.col - 1);
  }

  moveRight(): void {
    this.col = this.clamp(this.col + 1);
  }

  moveHome(): void {
    this.col = 0;
  }

  moveEnd(): void {
    this.col = this.chars.length;
  }

  private clamp(col: number): number {
    return Math.max(0, Math.min(col, this.chars.length));
  }
}
