import { describe, it, expect } from 'vitest';
import { ListNavigator } from '../src/list-navigator.js';

describe('ListNavigator', () => {
  it('wraps around at both ends by default', () => {
    const nav = new ListNavigator(3);
    nav.moveUp();
    expect(nav.focused).toBe(2);
    nav.moveDown();
    expect(nav.focused).toBe(0);
  });

  it('clamps when looping is off', () => {
    const nav = new ListNavigator(3, { loop: false });
    nav.moveUp();
    expect(nav.focused).toBe(0);
    nav.select(2);
    nav.moveDown();
    expect(nav.focused).toBe(2);
  });

  it.each([1, 2, 5, 7])('k downs from any focus land on (focus + k) mod n for n=%i', (n) => {
    for (let start = 0; start < n; start++) {
      for (let k = 0; k <= 2 * n; k++) {
        const nav = new ListNavigator(n, { initial: start });
        for (let i = 0; i < k; i++) nav.moveDown();
        expect(nav.focused).toBe((start + k) % n);
      }
    }
  });

  it('rejects an empty list and an out-of-range initial index', () => {
    expect(() => new ListNavigator(0)).toThrow('A list needs at least one item, got 0');
    expect(() => new ListNavigator(3, { initial: 3 })).toThrow('Initial index 3 is out of range (3 items)');
  });

  it('select rejects indices outside the list', () => {
    const nav = new ListNavigator(2);
    expect(() => nav.select(2)).toThrow('Index 2 is out of range (2 items)');
  });

  describe('paging', () => {
    it('splits the list into pages of itemsPerPage', () => {
      const nav = new ListNavigator(25);
      expect(nav.itemsPerPage).toBe(10);
      expect(nav.pageCount).toBe(3);
      expect(nav.pageRange()).toEqual([0, 10]);
      nav.select(23);
      expect(nav.page).toBe(2);
      expect(nav.pageRange()).toEqual([20, 25]);
    });

    it('caps itemsPerPage at the item count', () => {
      const nav = new ListNavigator(4, { itemsPerPage: 10 });
      expect(nav.itemsPerPage).toBe(4);
      expect(nav.pageCount).toBe(1);
    });

    it('page jumps move focus by a page and clamp', () => {
      const nav = new ListNavigator(12, { itemsPerPage: 5, initial: 2 });
      nav.nextPage();
      expect(nav.focused).toBe(7);
      nav.nextPage();
      expect(nav.focused).toBe(11);
      nav.previousPage();
      expect(nav.focused).toBe(6);
      nav.previousPage();
      nav.previousPage();
      expect(nav.focused).toBe(0);
    });
  });

  describe('toggle set', () => {
    it('toggling twice restores the set', () => {
      const nav = new ListNavigator(3);
      nav.toggleAt(2);
      const before = nav.toggled;
      nav.toggle();
      nav.toggle();
      expect(nav.toggled).toEqual(before);
    });

    it('reports toggled indices in list order', () => {
      const nav = new ListNavigator(4);
      nav.toggleAt(3);
      nav.toggleAt(0);
      nav.toggleAt(2);
      expect(nav.toggled).toEqual([0, 2, 3]);
      expect(nav.toggledCount).toBe(3);
      expect(nav.isToggled(1)).toBe(false);
    });

    it('ignores out-of-range toggles', () => {
      const nav = new ListNavigator(2);
      nav.toggleAt(5);
      expect(nav.toggledCount).toBe(0);
    });
  });
});
