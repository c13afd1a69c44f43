import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync } from 'fs';
import path from 'path';
import { parseForm } from '../src/config.js';
import { RecordingRenderer, ScriptedSource } from '../src/driver.js';
import { CancelledError, ConstructionError } from '../src/errors.js';
import { buildWidget, runForm, runPrompts } from '../src/form.js';
import { key, keysFromText, type KeyEvent } from '../src/keys.js';
import { frameText } from '../src/render/frame.js';
import { Tracker } from '../src/tracker.js';
import { Text } from '../src/widgets/text.js';
import { feed } from './helpers.js';

const TMP = path.join(import.meta.dirname, '.tmp-form-test');

beforeEach(() => mkdirSync(TMP, { recursive: true }));
afterEach(() => rmSync(TMP, { recursive: true, force: true }));

const survey = parseForm({
  questions: [
    { id: 'intro', kind: 'message', message: 'A short survey', action: 'Press any key' },
    { id: 'name', kind: 'text', message: 'Name?' },
    { id: 'pets', kind: 'number', type: 'u8', message: 'Pets?', default: 0 },
    { id: 'species', kind: 'multi-select', message: 'Which?', choices: ['Dog', 'Cat', { label: 'Goldfish', value: 'fish' }] },
    { id: 'ok', kind: 'confirm', message: 'Send?' },
  ],
}, 'survey.yaml');

const surveyKeys: KeyEvent[] = [
  key.char('x'),
  ...keysFromText('Jo'), key.submit,
  ...keysFromText('2'), key.submit,
  key.up, key.char(' '), key.submit,
  key.char('y'),
];

describe('runForm', () => {
  it('asks every question in order and collects answers by id', async () => {
    const answers = await runForm(survey, { source: new ScriptedSource(surveyKeys), renderer: new RecordingRenderer() });
    expect(answers).toEqual({ name: 'Jo', pets: 2, species: ['fish'], ok: true });
  });

  it('finishes each prompt before starting the next', async () => {
    const renderer = new RecordingRenderer();
    await runForm(survey, { source: new ScriptedSource(surveyKeys), renderer });
    const texts = renderer.frames.map(frameText);
    expect(texts[0]).toBe('? A short survey\nPress any key');
    expect(texts[1]).toBe('✓ A short survey');
    expect(texts[2]).toBe('? Name?\n› ');
    expect(renderer.finished).toBe(5);
  });

  it('stops at a cancelled question', async () => {
    const source = new ScriptedSource([key.submit, key.cancel, key.submit]);
    await expect(runForm(survey, { source, renderer: new RecordingRenderer() })).rejects.toThrow(CancelledError);
    expect(source.remaining).toBe(1);
  });

  it('records the transcript and the answers', async () => {
    const tracker = new Tracker('survey', TMP);
    await runForm(survey, { source: new ScriptedSource(surveyKeys), renderer: new RecordingRenderer(), tracker });
    const events = readFileSync(tracker.eventsPath, 'utf-8').trim().split('\n').map((l) => JSON.parse(l));
    expect(events[0]).toMatchObject({ type: 'prompt_started', data: { kind: 'message', message: 'A short survey' } });
    expect(events[1]).toMatchObject({ type: 'key', data: { key: 'char("x")' } });
    expect(events[events.length - 1]).toMatchObject({ type: 'answers', data: { answers: { name: 'Jo', ok: true } } });
  });

  it('applies the form-wide page size', async () => {
    const form = parseForm({
      settings: { itemsPerPage: 2, ascii: true },
      questions: [{ id: 'pick', kind: 'select', message: 'Pick', choices: ['a', 'b', 'c'] }],
    }, 'inline');
    const renderer = new RecordingRenderer();
    await runForm(form, { source: new ScriptedSource([key.submit]), renderer });
    expect(frameText(renderer.frames[0])).toBe('? Pick\n(*) a\n( ) b\n  **');
  });
});

describe('buildWidget', () => {
  it('enforces text length and pattern rules', () => {
    const form = parseForm({
      questions: [{ id: 'code', kind: 'text', message: 'Code?', minLength: 2, pattern: '^[A-Z]+$', patternMessage: 'Capitals only' }],
    }, 'inline');
    const widget = buildWidget(form.questions[0]);
    feed(widget, 'A', key.submit);
    expect(widget.view()).toMatchObject({ error: 'Enter at least 2 characters' });
    feed(widget, 'b', key.submit);
    expect(widget.view()).toMatchObject({ error: 'Capitals only' });
    feed(widget, key.backspace, 'B', key.submit);
    expect(widget.value()).toBe('AB');
  });

  it('enforces number bounds', () => {
    const form = parseForm({ questions: [{ id: 'age', kind: 'number', type: 'u8', message: 'Age?', min: 18 }] }, 'inline');
    const widget = feed(buildWidget(form.questions[0]), '9', key.submit);
    expect(widget.view()).toMatchObject({ error: 'Value must be at least 18' });
  });

  it('surfaces construction errors', () => {
    const form = parseForm({
      questions: [{ id: 'pets', kind: 'multi-select', message: 'Which?', choices: ['Dog'], min: 2 }],
    }, 'inline');
    expect(() => buildWidget(form.questions[0])).toThrow(ConstructionError);
  });
});

describe('runPrompts', () => {
  it('returns values in prompt order', async () => {
    const source = new ScriptedSource([...keysFromText('a'), key.submit, ...keysFromText('b'), key.submit]);
    const values = await runPrompts([new Text('First?'), new Text('Second?')], { source, renderer: new RecordingRenderer() });
    expect(values).toEqual(['a', 'b']);
  });
});
