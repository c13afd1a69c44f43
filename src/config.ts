import { readFileSync, writeFileSync, mkdirSync } from 'fs';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import path from 'path';
import { NumberTypeSchema, numberIssue, numberText } from './widgets/number.js';
import { formatIssues } from './validation.js';

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const QuestionBase = z.object({
  id: z.string().regex(/^[A-Za-z_][\w-]*$/, 'Expected a letter or _ followed by letters, digits, _ or -'),
  message: z.string().min(1),
});

const ChoiceSchema = z.union([
  z.string(),
  z.object({
    label: z.string(),
    /** Answer recorded for this choice. Defaults to the label. */
    value: z.string().optional(),
    description: z.string().optional(),
    disabled: z.boolean().optional(),
  }).strict(),
]);

const ListFields = {
  choices: z.array(ChoiceSchema).min(1),
  initial: z.number().int().nonnegative().optional(),
  loop: z.boolean().optional(),
  itemsPerPage: z.number().int().positive().optional(),
};

const QuestionSchema = z.discriminatedUnion('kind', [
  QuestionBase.extend({
    kind: z.literal('confirm'),
    default: z.boolean().optional(),
  }).strict(),
  QuestionBase.extend({
    kind: z.literal('toggle'),
    options: z.tuple([z.string(), z.string()]),
    initial: z.union([z.literal(0), z.literal(1)]).optional(),
  }).strict(),
  QuestionBase.extend({
    kind: z.literal('text'),
    placeholder: z.string().optional(),
    default: z.string().optional(),
    initial: z.string().optional(),
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().positive().optional(),
    pattern: z.string().refine(isValidPattern, 'Invalid regular expression').optional(),
    patternMessage: z.string().optional(),
  }).strict(),
  QuestionBase.extend({
    kind: z.literal('password'),
    placeholder: z.string().optional(),
    hidden: z.boolean().optional(),
    mask: z.string().optional(),
    minLength: z.number().int().nonnegative().optional(),
  }).strict(),
  QuestionBase.extend({
    kind: z.literal('number'),
    type: NumberTypeSchema.default('f64'),
    placeholder: z.string().optional(),
    default: z.number().finite().optional(),
    initial: z.number().finite().optional(),
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
  }).strict(),
  QuestionBase.extend({
    kind: z.literal('select'),
    ...ListFields,
  }).strict(),
  QuestionBase.extend({
    kind: z.literal('multi-select'),
    ...ListFields,
    selected: z.array(z.number().int().nonnegative()).optional(),
    min: z.number().int().nonnegative().optional(),
    max: z.number().int().positive().optional(),
  }).strict(),
  QuestionBase.extend({
    kind: z.literal('message'),
    action: z.string().optional(),
  }).strict(),
]);

const SettingsSchema = z.object({
  itemsPerPage: z.number().int().positive().optional(),
  /** Cancels a question when no key arrives in time. */
  timeoutMs: z.number().int().positive().optional(),
  ascii: z.boolean().optional(),
}).strict();

const FormSchema = z.object({
  settings: SettingsSchema.default({}),
  questions: z.array(QuestionSchema).min(1),
}).superRefine((form, ctx) => {
  const seen = new Set<string>();
  form.questions.forEach((q, i) => {
    if (seen.has(q.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['questions', i, 'id'], message: `Duplicate question id "${q.id}"` });
    }
    seen.add(q.id);
    if (q.kind !== 'number') return;
    for (const field of ['default', 'initial'] as const) {
      const value = q[field];
      if (value === undefined) continue;
      const issue = numberIssue(q.type, value)
        ?? (field === 'initial' && numberText(q.type, value) === undefined ? 'Value cannot be typed without an exponent' : undefined);
      if (issue) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['questions', i, field], message: `Not a valid ${q.type}: ${issue}` });
    }
  });
});

export type Choice = z.infer<typeof ChoiceSchema>;
export type Question = z.infer<typeof QuestionSchema>;
export type FormSettings = z.infer<typeof SettingsSchema>;
export type Form = z.infer<typeof FormSchema>;
/** A form as written by hand: defaults may be left out. */
export type FormInput = z.input<typeof FormSchema>;

export function parseForm(data: unknown, source: string): Form {
  const result = FormSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid form in ${source}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadForm(formPath: string): Form {
  let raw: string;
  try {
    raw = readFileSync(formPath, 'utf-8');
  } catch {
    throw new Error(`Form file not found: ${formPath}`);
  }
  let data: unknown;
  try {
    data = parse(raw);
  } catch (err: unknown) {
    throw new Error(`Invalid YAML in ${formPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseForm(data, formPath);
}

export function saveForm(form: FormInput, formPath: string): void {
  mkdirSync(path.dirname(formPath), { recursive: true });
  writeFileSync(formPath, stringify(form));
}
