import { describe, it, expect } from 'vitest';
import { key } from '../src/keys.js';
import { LineEditor } from '../src/line-editor.js';
import { NumberPrompt, acceptsNumericChar, parseNumber, type NumberType } from '../src/widgets/number.js';
import { feed } from './helpers.js';

describe('NumberPrompt', () => {
  it('keeps non-numeric characters out of the buffer', () => {
    const prompt = feed(new NumberPrompt('Pets?', 'int'), '12x3');
    expect(prompt.input).toBe('123');
    feed(prompt, key.submit);
    expect(prompt.value()).toBe(123);
  });

  it('accepts a sign only at the start of a signed type', () => {
    const prompt = feed(new NumberPrompt('Delta?', 'i32'), '5', key.home, '-', key.end, '-', key.submit);
    expect(prompt.input).toBe('-5');
    expect(prompt.value()).toBe(-5);
  });

  it('refuses a sign for unsigned types', () => {
    expect(feed(new NumberPrompt('Count?', 'u8'), '-4').input).toBe('4');
  });

  it('accepts one decimal point for float types only', () => {
    expect(feed(new NumberPrompt('Ratio?', 'f64'), '1..5').input).toBe('1.5');
    expect(feed(new NumberPrompt('Count?', 'int'), '1.5').input).toBe('15');
  });

  it('rejects values outside the type range', () => {
    const prompt = feed(new NumberPrompt('Count?', 'u8'), '300', key.submit);
    expect(prompt.status().state).toBe('active');
    expect(prompt.view().error).toBe('Value must be between 0 and 255');
  });

  it('submits the default for an empty buffer', () => {
    expect(feed(new NumberPrompt('Count?', 'u8', { default: 7 }), key.submit).value()).toBe(7);
  });

  it('asks for a number when empty without a default', () => {
    const prompt = feed(new NumberPrompt('Count?', 'u8'), key.submit);
    expect(prompt.view().error).toBe('Please enter a number');
  });

  it('rejects a lone sign', () => {
    const prompt = feed(new NumberPrompt('Delta?', 'int'), '-', key.submit);
    expect(prompt.view().error).toBe('"-" is not a valid number');
  });

  it('passes the raw buffer and the parsed value to the check', () => {
    const seen: Array<[string, number]> = [];
    const prompt = new NumberPrompt('Age?', 'u8', {
      validate: (raw, n) => {
        seen.push([raw, n]);
        return n < 18 ? 'Must be an adult' : undefined;
      },
    });
    feed(prompt, '017', key.submit);
    expect(prompt.view().error).toBe('Must be an adult');
    feed(prompt, key.backspace, '8', key.submit);
    expect(prompt.value()).toBe(18);
    expect(seen[seen.length - 1]).toEqual(['018', 18]);
  });

  it('starts from the initial value', () => {
    expect(new NumberPrompt('Ratio?', 'f32', { initial: 2.5 }).input).toBe('2.5');
  });

  it.each<{ name: string; type: NumberType; value: number; message: string }>([
    { name: 'out of range', type: 'u8', value: 300, message: 'Default 300 is not a valid u8: Value must be between 0 and 255' },
    { name: 'a fraction for an integer type', type: 'int', value: 1.5, message: 'Default 1.5 is not a valid int: Value must be a whole number' },
  ])('refuses a default that is $name', ({ type, value, message }) => {
    expect(() => new NumberPrompt('Count?', type, { default: value })).toThrow(message);
  });

  it('refuses an initial value outside the type', () => {
    expect(() => new NumberPrompt('Offset?', 'i8', { initial: -129 })).toThrow(
      'Initial value -129 is not a valid i8: Value must be between -128 and 127',
    );
  });

  it('refuses an initial value that would need an exponent', () => {
    expect(() => new NumberPrompt('Huge?', 'f64', { initial: 1e21 })).toThrow(
      'Initial value 1e+21 cannot be typed as a plain f64',
    );
  });

  it('keeps a valid negative default and initial', () => {
    const prompt = new NumberPrompt('Delta?', 'i16', { default: -5, initial: -12 });
    expect(prompt.input).toBe('-12');
    expect(feed(prompt, key.backspace, key.backspace, key.backspace, key.submit).value()).toBe(-5);
  });

  it('rejects an unknown numeric type', () => {
    const type = JSON.parse('"u128"');
    expect(() => new NumberPrompt('Big?', type)).toThrow(
      'Unknown number type "u128". Expected one of: u8, u16, u32, uint, i8, i16, i32, int, f32, f64',
    );
  });
});

describe('parseNumber', () => {
  it.each<{ type: NumberType; raw: string; expected: number }>([
    { type: 'int', raw: '42', expected: 42 },
    { type: 'int', raw: '+7', expected: 7 },
    { type: 'f64', raw: '.5', expected: 0.5 },
    { type: 'f64', raw: '3.', expected: 3 },
    { type: 'i8', raw: '-128', expected: -128 },
  ])('$type parses "$raw" as $expected', ({ type, raw, expected }) => {
    expect(parseNumber(type, raw)).toEqual({ ok: true, value: expected });
  });

  it('normalizes negative zero', () => {
    const outcome = parseNumber('int', '-0');
    expect(outcome.ok && Object.is(outcome.value, 0)).toBe(true);
  });

  it('rejects a fraction for integer types', () => {
    expect(parseNumber('int', '1.5')).toEqual({ ok: false, message: '"1.5" is not a valid number' });
  });
});

describe('acceptsNumericChar', () => {
  it('refuses anything in front of a sign', () => {
    const editor = new LineEditor('-1');
    editor.moveHome();
    expect(acceptsNumericChar('int', '2', editor)).toBe(false);
  });
});
