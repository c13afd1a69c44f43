export interface ListNavigatorOptions {
  /** Focused index at start. Defaults to 0. */
  initial?: number;
  /** Wrap from the last item to the first and back. Defaults to true. */
  loop?: boolean;
  /** Rows shown per page. Defaults to 10, capped at the item count. */
  itemsPerPage?: number;
}

export const DEFAULT_ITEMS_PER_PAGE = 10;

/**
 * Focus cursor over a fixed-length list plus the toggle set used by
 * multi-select. The list itself lives with the prompt; this only tracks indices.
 */
export class ListNavigator {
  readonly total: number;
  readonly loop: boolean;
  readonly itemsPerPage: number;
  private focusedIdx: number;
  private readonly toggledSet = new Set<number>();

  constructor(total: number, options: ListNavigatorOptions = {}) {
    if (!Number.isInteger(total) || total < 1) {
      throw new RangeError(`A list needs at least one item, got ${total}`);
    }
    const initial = options.initial ?? 0;
    if (!Number.isInteger(initial) || initial < 0 || initial >= total) {
      throw new RangeError(`Initial index ${initial} is out of range (${total} items)`);
    }
    this.total = total;
    this.loop = options.loop ?? true;
    this.itemsPerPage = Math.max(1, Math.min(options.itemsPerPage ?? DEFAULT_ITEMS_PER_PAGE, total));
    this.focusedIdx = initial;
  }

  get focused(): number {
    return this.focusedIdx;
  }

  moveUp(): void {
    if (this.focusedIdx > 0) this.focusedIdx--;
    else if (this.loop) this.focusedIdx = this.total - 1;
  }

  moveDown(): void {
    if (this.focusedIdx < this.total - 1) this.focusedIdx++;
    else if (this.loop) this.focusedIdx = 0;
  }

  previousPage(): void {
    this.focusedIdx = Math.max(0, this.focusedIdx - this.itemsPerPage);
  }

  nextPage(): void {
    this.focusedIdx = Math.min(this.total - 1, this.focusedIdx + this.itemsPerPage);
  }

  select(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.total) {
      throw new RangeError(`Index ${index} is out of range (${this.total} items)`);
    }
    this.focusedIdx = index;
  }

  get page(): number {
    return Math.floor(this.focusedIdx / this.itemsPerPage);
  }

  get pageCount(): number {
    return Math.ceil(this.total / this.itemsPerPage);
  }

  /** Half-open `[start, end)` index range of the focused page. */
  pageRange(): [number, number] {
    const start = this.page * this.itemsPerPage;
    return [start, Math.min(start + this.itemsPerPage, this.total)];
  }

  // ── Toggle set (multi-select) ──

  /** Flips membership of the focused index. */
  toggle(): void {
    this.toggleAt(this.focusedIdx);
  }

  toggleAt(index: number): void {
    if (index < 0 || index >= this.total) return;
    if (this.toggledSet.has(index)) this.toggledSet.delete(index);
    else this.toggledSet.add(index);
  }

  isToggled(index: number): boolean {
    return this.toggledSet.has(index);
  }

  get toggledCount(): number {
    return this.toggledSet.size;
  }

  /** Toggled indices in list order. */
  get toggled(): number[] {
    return Array.from(this.toggledSet).sort((a, b) => a - b);
  }
}
