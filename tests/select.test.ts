import { describe, it, expect } from 'vitest';
import { ConstructionError } from '../src/errors.js';
import { key } from '../src/keys.js';
import { choices } from '../src/widgets/options.js';
import { DISABLED_OPTION_MESSAGE, Select } from '../src/widgets/select.js';
import { feed } from './helpers.js';

const letters = choices(['A', 'B', 'C']);

describe('Select', () => {
  it('wraps from the first option to the last', () => {
    expect(feed(new Select('Pick', letters), key.up, key.submit).value()).toBe('C');
  });

  it('submits the focused option value', () => {
    const sizes = [
      { value: 1, label: 'Small' },
      { value: 2, label: 'Large' },
    ];
    expect(feed(new Select('Size', sizes), key.down, key.submit).value()).toBe(2);
  });

  it('Backspace submits like Enter', () => {
    expect(feed(new Select('Pick', letters), key.down, key.backspace).value()).toBe('B');
  });

  it('moves with j and k', () => {
    const select = feed(new Select('Pick', letters), 'j', 'j', 'k');
    expect(select.focused).toBe(1);
  });

  it('clamps at the ends when loop is off', () => {
    const select = feed(new Select('Pick', letters, { loop: false }), key.up);
    expect(select.focused).toBe(0);
  });

  it('starts on the initial option', () => {
    expect(feed(new Select('Pick', letters, { initial: 2 }), key.submit).value()).toBe('C');
  });

  it('jumps a page with Left and Right', () => {
    const many = choices(['a', 'b', 'c', 'd', 'e', 'f', 'g']);
    const select = feed(new Select('Pick', many, { itemsPerPage: 3 }), key.right);
    expect(select.focused).toBe(3);
    expect(select.view()).toMatchObject({ page: 1, pageCount: 3, pageRange: [3, 6] });
    feed(select, key.left);
    expect(select.focused).toBe(0);
  });

  it('refuses to submit a disabled option', () => {
    const options = [
      { value: 'free', label: 'Free' },
      { value: 'pro', label: 'Pro', disabled: true },
    ];
    const select = feed(new Select('Plan', options), key.down, key.submit);
    expect(select.status().state).toBe('active');
    expect(select.view().error).toBe(DISABLED_OPTION_MESSAGE);
    feed(select, key.up);
    expect(select.view().error).toBeNull();
    expect(feed(select, key.submit).value()).toBe('free');
  });

  it('rejects an empty option list', () => {
    expect(() => new Select('Pick', [])).toThrow(ConstructionError);
    expect(() => new Select('Pick', [])).toThrow('A select prompt needs at least one option');
  });

  it('rejects an initial index past the end', () => {
    expect(() => new Select('Pick', letters, { initial: 5 })).toThrow('Initial index 5 is out of range (3 options)');
  });
});
